import type { ICounterStore } from "./counter-store.js";
import {
  buildEndpointClassPolicies,
  type EndpointClass,
  type EndpointClassPolicies,
  type EndpointClassPolicy,
} from "./endpoint-classes.js";
import { MissingRequiredIdentityError, type StoreUnavailableError } from "./errors.js";
import { buildKey, type IdentitySignals, resolveDeviceId, resolveIdentity } from "./identity.js";
import { type RateDecision, RateLimiter } from "./limiter.js";

export type GovernorVerdict =
  | { outcome: "admitted"; key: string; decision: RateDecision }
  | { outcome: "limited"; key: string; decision: RateDecision }
  // Fail-open: the store errored, so the request is admitted without quota metadata.
  | { outcome: "store-unavailable"; key: string; error: StoreUnavailableError }
  | { outcome: "identity-required"; error: MissingRequiredIdentityError };

/**
 * One limiter per endpoint class, all sharing a single counter store.
 * Keys are namespaced by class suffix, so sharing the store never mixes
 * counters between classes.
 */
export class RateGovernor {
  private readonly limiters: Record<EndpointClass, RateLimiter>;

  constructor(
    readonly store: ICounterStore,
    readonly policies: EndpointClassPolicies = buildEndpointClassPolicies(),
  ) {
    this.limiters = {
      general: new RateLimiter(store, policies.general.rate),
      export: new RateLimiter(store, policies.export.rate),
      sync: new RateLimiter(store, policies.sync.rate),
      restore: new RateLimiter(store, policies.restore.rate),
    };
  }

  limiter(endpointClass: EndpointClass): RateLimiter {
    return this.limiters[endpointClass];
  }

  policy(endpointClass: EndpointClass): EndpointClassPolicy {
    return this.policies[endpointClass];
  }

  /**
   * Build the counter key for a request, or throw MissingRequiredIdentityError
   * when the class needs a device ID and none was supplied.
   */
  keyFor(endpointClass: EndpointClass, signals: IdentitySignals): string {
    const policy = this.policies[endpointClass];
    if (policy.requiresDevice) {
      const deviceId = resolveDeviceId(signals);
      if (deviceId === null) throw new MissingRequiredIdentityError(endpointClass);
      return buildKey({ namespace: "device", value: deviceId }, policy.keySuffix);
    }
    return buildKey(resolveIdentity(signals), policy.keySuffix);
  }

  /** Count this request against its class and report the verdict. */
  async evaluate(endpointClass: EndpointClass, signals: IdentitySignals): Promise<GovernorVerdict> {
    return this.run(endpointClass, signals, (limiter, key) => limiter.check(key));
  }

  /** Like `evaluate`, without consuming quota. */
  async inspect(endpointClass: EndpointClass, signals: IdentitySignals): Promise<GovernorVerdict> {
    return this.run(endpointClass, signals, (limiter, key) => limiter.peek(key));
  }

  private async run(
    endpointClass: EndpointClass,
    signals: IdentitySignals,
    op: (limiter: RateLimiter, key: string) => ReturnType<RateLimiter["check"]>,
  ): Promise<GovernorVerdict> {
    let key: string;
    try {
      key = this.keyFor(endpointClass, signals);
    } catch (err) {
      if (err instanceof MissingRequiredIdentityError) return { outcome: "identity-required", error: err };
      throw err;
    }

    const result = await op(this.limiters[endpointClass], key);
    if (!result.ok) return { outcome: "store-unavailable", key, error: result.error };
    return { outcome: result.decision.reached ? "limited" : "admitted", key, decision: result.decision };
  }
}
