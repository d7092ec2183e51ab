import { checkDestinationAddress } from "../shared/address";
import { createLogger, Logger } from "../shared/logger";
import { AdmissionConfig } from "../types/config.types";
import { AdmissionDecision, DisbursementRequest } from "../types/disbursement.types";

interface RateWindow {
  /** Accepted grant timestamps still inside the cooldown, oldest first. */
  grants: number[];
}

/**
 * Accept/reject before any chain interaction.
 *
 * Cooldowns are sliding: a grant at T blocks the same requester (and the same
 * destination address) until exactly T + cooldown. Only accepted requests are
 * written to a window.
 */
export class AdmissionController {
  private readonly requesterWindows = new Map<string, RateWindow>();
  private readonly destinationWindows = new Map<string, RateWindow>();
  private readonly logger: Logger;

  constructor(
    private readonly config: AdmissionConfig,
    private readonly inFlight: () => number,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("admission");
  }

  decide(request: DisbursementRequest): AdmissionDecision {
    const at = request.submittedAt;

    const address = checkDestinationAddress(request.destination);
    if (!address.ok) {
      this.logger.info("admission-invalid-address", { requestId: request.id, requesterId: request.requesterId });
      return { request, verdict: "REJECTED_INVALID_ADDRESS", cause: "invalid-address", reason: address.reason };
    }

    const destinationKey = address.address.toLowerCase();
    const retryAfterMs = Math.max(
      this.remainingCooldown(this.requesterWindows, request.requesterId, at),
      this.remainingCooldown(this.destinationWindows, destinationKey, at)
    );
    if (retryAfterMs > 0) {
      this.logger.info("admission-rate-limited", {
        requestId: request.id,
        requesterId: request.requesterId,
        retryAfterMs
      });
      return {
        request,
        verdict: "REJECTED_RATE_LIMITED",
        cause: "cooldown",
        reason: `cooldown active for ${retryAfterMs}ms`,
        retryAfterMs
      };
    }

    const depth = this.inFlight();
    if (depth >= this.config.maxInFlight) {
      this.logger.warn("admission-backpressure", {
        requestId: request.id,
        requesterId: request.requesterId,
        depth,
        ceiling: this.config.maxInFlight
      });
      return {
        request,
        verdict: "REJECTED_RATE_LIMITED",
        cause: "backpressure",
        reason: `in-flight ceiling ${this.config.maxInFlight} reached`,
        retryAfterMs: null
      };
    }

    this.recordGrant(this.requesterWindows, request.requesterId, at);
    this.recordGrant(this.destinationWindows, destinationKey, at);

    const accepted: DisbursementRequest = Object.freeze({ ...request, destination: address.address });
    return { request: accepted, verdict: "ACCEPTED", reason: "admitted" };
  }

  /** Drops windows whose every grant has expired. Returns how many were removed. */
  pruneExpired(now: number): number {
    let removed = 0;
    for (const windows of [this.requesterWindows, this.destinationWindows]) {
      for (const [key, window] of windows) {
        this.prune(window, now);
        if (window.grants.length === 0) {
          windows.delete(key);
          removed += 1;
        }
      }
    }
    return removed;
  }

  get trackedWindows(): number {
    return this.requesterWindows.size + this.destinationWindows.size;
  }

  private remainingCooldown(windows: Map<string, RateWindow>, key: string, at: number): number {
    const window = windows.get(key);
    if (!window) {
      return 0;
    }

    this.prune(window, at);
    const latest = window.grants[window.grants.length - 1];
    if (latest === undefined) {
      windows.delete(key);
      return 0;
    }
    return latest + this.config.cooldownMs - at;
  }

  private recordGrant(windows: Map<string, RateWindow>, key: string, at: number): void {
    const window = windows.get(key);
    if (window) {
      window.grants.push(at);
      return;
    }
    windows.set(key, { grants: [at] });
  }

  private prune(window: RateWindow, now: number): void {
    while (window.grants.length > 0 && window.grants[0] + this.config.cooldownMs <= now) {
      window.grants.shift();
    }
  }
}
