import { parseRate, type Rate } from "./rate.js";

export const ENDPOINT_CLASSES = ["general", "export", "sync", "restore"] as const;

export type EndpointClass = (typeof ENDPOINT_CLASSES)[number];

export interface EndpointClassPolicy {
  rate: Rate;
  /** Appended to the base identity key so each class counts separately. */
  keySuffix: string;
  /** When true the key is always `device:{id}` and a missing device ID is a client error. */
  requiresDevice: boolean;
  /** Error text for the 429 body. */
  limitMessage: string;
}

export type EndpointClassPolicies = Record<EndpointClass, EndpointClassPolicy>;

/** Formatted rates per class, overridable through configuration. */
export type EndpointClassRates = Record<EndpointClass, string>;

export const DEFAULT_CLASS_RATES: EndpointClassRates = {
  general: "100-M",
  export: "10-H",
  sync: "60-M",
  restore: "1-H",
};

const PERIOD_WORDS: Record<number, string> = {
  1_000: "second",
  60_000: "minute",
  3_600_000: "hour",
  86_400_000: "day",
};

function per(rate: Rate): string {
  return PERIOD_WORDS[rate.periodMs] ?? `${rate.periodMs / 1000} seconds`;
}

function plural(count: number, noun: string): string {
  return count === 1 ? noun : `${noun}s`;
}

/** Build the four class policies from formatted rates. */
export function buildEndpointClassPolicies(rates: EndpointClassRates = DEFAULT_CLASS_RATES): EndpointClassPolicies {
  const general = parseRate(rates.general);
  const exportRate = parseRate(rates.export);
  const sync = parseRate(rates.sync);
  const restore = parseRate(rates.restore);

  return {
    general: {
      rate: general,
      keySuffix: "",
      requiresDevice: false,
      limitMessage: `Rate limit exceeded. Maximum ${general.limit} ${plural(general.limit, "request")} per ${per(general)}.`,
    },
    export: {
      rate: exportRate,
      keySuffix: ":export",
      requiresDevice: false,
      limitMessage: `Export rate limit exceeded. Maximum ${exportRate.limit} ${plural(exportRate.limit, "export")} per ${per(exportRate)}.`,
    },
    sync: {
      rate: sync,
      keySuffix: ":sync",
      requiresDevice: false,
      limitMessage: `Sync rate limit exceeded. Maximum ${sync.limit} sync ${plural(sync.limit, "request")} per ${per(sync)}.`,
    },
    restore: {
      rate: restore,
      keySuffix: ":restore",
      requiresDevice: true,
      limitMessage: `Device restore rate limit exceeded. Maximum ${restore.limit} ${plural(restore.limit, "restore")} per ${per(restore)} per device.`,
    },
  };
}
