import type { EndpointClass } from "./endpoint-classes.js";

/** The counter store could not be read or written. Callers fail open on this error. */
export class StoreUnavailableError extends Error {
  readonly key: string;

  constructor(key: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Rate-limit store unavailable for key "${key}": ${detail}`, { cause });
    this.name = "StoreUnavailableError";
    this.key = key;
  }
}

/** A class that counts per device was called without a device ID; no counter was touched. */
export class MissingRequiredIdentityError extends Error {
  readonly endpointClass: EndpointClass;
  readonly identity = "device";

  constructor(endpointClass: EndpointClass) {
    super(
      `Device ID is required for ${endpointClass} operations. Provide via query param 'device_id' or header 'X-Device-ID'`,
    );
    this.name = "MissingRequiredIdentityError";
    this.endpointClass = endpointClass;
  }
}

export class InvalidRateError extends Error {
  constructor(formatted: string, reason: string) {
    super(`Invalid rate "${formatted}": ${reason}`);
    this.name = "InvalidRateError";
  }
}
