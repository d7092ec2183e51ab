import { IChainClient } from "../interfaces/IChainClient";
import { createLogger, Logger } from "../shared/logger";
import { SerialExecutor } from "../shared/serial";
import { withTimeout } from "../shared/timing";
import { LedgerConfig } from "../types/config.types";
import { FundingAccountSnapshot } from "../types/ledger.types";

/**
 * Sole owner of the funding account's sequence bookkeeping.
 *
 * Every mutation goes through one SerialExecutor, so reserve, confirm,
 * release and reconcile never interleave. Numbers below `nextSequence` are
 * treated as used on-chain; a reserved number belongs to exactly one job until
 * that job confirms or releases it.
 */
export class LedgerStateCache {
  private nextSequence: number | null = null;
  /** One past the highest sequence seen included; reconcile never goes below it. */
  private confirmedFloor = 0;
  private readonly reserved = new Set<number>();
  private lastReconciledAt: number | null = null;
  private staleReason: string | null = null;
  private readonly serial = new SerialExecutor();
  private readonly logger: Logger;

  constructor(
    private readonly chain: IChainClient,
    private readonly config: LedgerConfig,
    private readonly now: () => number = Date.now,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("ledger");
  }

  /**
   * Smallest free number at or above the cached next sequence. Reads the chain
   * only when the cache was never filled, has aged out, or was marked stale.
   */
  reserveNextSequence(): Promise<number> {
    return this.serial.run(async () => {
      if (this.needsReconcile()) {
        await this.reconcileLocked();
      }

      const sequence = this.lowestFree();
      this.reserved.add(sequence);
      this.logger.debug("sequence-reserved", { sequence, reserved: this.reservedList() });
      return sequence;
    });
  }

  confirm(sequence: number): Promise<void> {
    return this.serial.run(() => {
      if (!this.reserved.delete(sequence)) {
        this.logger.warn("confirm-unreserved-sequence", { sequence });
      }
      this.confirmedFloor = Math.max(this.confirmedFloor, sequence + 1);
      if (this.nextSequence === null || sequence + 1 > this.nextSequence) {
        this.nextSequence = sequence + 1;
      }
      this.logger.debug("sequence-confirmed", { sequence, nextSequence: this.nextSequence });
    });
  }

  /** Frees a reservation so the next reservation reuses the number. */
  release(sequence: number): Promise<void> {
    return this.serial.run(() => {
      if (!this.reserved.delete(sequence)) {
        this.logger.warn("release-unreserved-sequence", { sequence });
        return;
      }
      this.logger.debug("sequence-released", { sequence, reserved: this.reservedList() });
    });
  }

  /** Takes ownership of a number that was broadcast before a restart. */
  adopt(sequence: number): Promise<void> {
    return this.serial.run(() => {
      if (this.reserved.has(sequence)) {
        throw new Error(`sequence-already-reserved:${sequence}`);
      }
      this.reserved.add(sequence);
      this.logger.info("sequence-adopted", { sequence });
    });
  }

  reconcile(): Promise<number> {
    return this.serial.run(() => this.reconcileLocked());
  }

  markStale(reason: string): Promise<void> {
    return this.serial.run(() => {
      this.staleReason = reason;
      this.logger.info("ledger-marked-stale", { reason });
    });
  }

  snapshot(): FundingAccountSnapshot {
    return {
      nextSequence: this.nextSequence,
      reserved: this.reservedList(),
      lastReconciledAt: this.lastReconciledAt,
      stale: this.staleReason !== null,
      staleReason: this.staleReason
    };
  }

  private needsReconcile(): boolean {
    if (this.nextSequence === null || this.lastReconciledAt === null || this.staleReason !== null) {
      return true;
    }
    return this.now() - this.lastReconciledAt > this.config.maxStateAgeMs;
  }

  private lowestFree(): number {
    let candidate = this.nextSequence ?? 0;
    while (this.reserved.has(candidate)) {
      candidate += 1;
    }
    return candidate;
  }

  private async reconcileLocked(): Promise<number> {
    // "pending" counts our own broadcasts still in the mempool, so a restart
    // never hands out a number that is already in flight.
    const onChain = await withTimeout(this.chain.getSequence("pending"), this.config.rpcTimeoutMs, "get-sequence");
    const previous = this.nextSequence;
    const next = Math.max(onChain, this.confirmedFloor);
    this.nextSequence = next;
    this.lastReconciledAt = this.now();
    this.staleReason = null;

    if (previous !== next) {
      this.logger.info("ledger-reconciled", { previous, nextSequence: next, onChain, reserved: this.reservedList() });
    }
    return next;
  }

  private reservedList(): number[] {
    return [...this.reserved].sort((a, b) => a - b);
  }
}
