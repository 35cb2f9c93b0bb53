/**
 * Client identity resolution and rate-limit key construction.
 *
 * Keys have the shape `{namespace}:{value}{suffix}`, e.g. `user:42:export`,
 * with the value percent-encoded.
 * The store treats them as opaque strings; uniqueness is all it relies on.
 */

export type IdentityNamespace = "user" | "device" | "ip";

/** Raw signals the request layer extracted. Empty strings count as absent. */
export interface IdentitySignals {
  /** Authenticated user ID, when upstream auth ran. */
  userId?: string;
  /** `device_id` query parameter. */
  deviceIdQuery?: string;
  /** `X-Device-ID` header. */
  deviceIdHeader?: string;
  /** Resolved client network address. */
  remoteAddress?: string;
}

export interface ClientIdentity {
  namespace: IdentityNamespace;
  value: string;
}

export interface IdentityResolver {
  namespace: IdentityNamespace;
  resolve(signals: IdentitySignals): string | null;
}

function present(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export const UNKNOWN_ADDRESS = "unknown";

/** Query parameter first, then header. */
export function resolveDeviceId(signals: IdentitySignals): string | null {
  return present(signals.deviceIdQuery) ?? present(signals.deviceIdHeader);
}

/**
 * Resolvers tried in order; the first non-null result wins. The address
 * resolver never returns null, so resolution always succeeds.
 */
export const IDENTITY_PRECEDENCE: readonly IdentityResolver[] = [
  { namespace: "user", resolve: (s) => present(s.userId) },
  { namespace: "device", resolve: resolveDeviceId },
  { namespace: "ip", resolve: (s) => present(s.remoteAddress) ?? UNKNOWN_ADDRESS },
];

export function resolveIdentity(
  signals: IdentitySignals,
  resolvers: readonly IdentityResolver[] = IDENTITY_PRECEDENCE,
): ClientIdentity {
  for (const resolver of resolvers) {
    const value = resolver.resolve(signals);
    if (value !== null) return { namespace: resolver.namespace, value };
  }
  return { namespace: "ip", value: UNKNOWN_ADDRESS };
}

/**
 * Compose `{namespace}:{value}{suffix}`. The value is client-supplied, so it
 * is percent-encoded: a `:` inside it can never reach into another
 * namespace or class suffix (`victim:restore` becomes `victim%3Arestore`).
 */
export function buildKey(identity: ClientIdentity, suffix = ""): string {
  return `${identity.namespace}:${encodeURIComponent(identity.value)}${suffix}`;
}
