import { IChainClient } from "../interfaces/IChainClient";
import { IDisbursementRepository } from "../interfaces/IDisbursementRepository";
import { ChainError, errorMessage, isRetryable } from "../shared/errors";
import { bumpFee, describeFee } from "../shared/fees";
import { createLogger, Logger } from "../shared/logger";
import { Sleep, backoffDelay, sleep as defaultSleep, withTimeout } from "../shared/timing";
import { FeeQuote, SignedTransfer, TxStatusView } from "../types/chain.types";
import { SubmitterConfig } from "../types/config.types";
import { SubmissionAttempt, TerminalOutcome, TerminalStatus } from "../types/disbursement.types";
import { DispatchQueue, QueuedJob } from "./DispatchQueue";
import { LedgerStateCache } from "./LedgerStateCache";

export type TransactionState =
  | "PREPARING"
  | "RETRYING"
  | "SUBMITTED"
  | "AMBIGUOUS_PENDING"
  | "CONFIRMED"
  | "FAILED"
  | "ABANDONED";

export interface TransactionRecord {
  readonly job: QueuedJob;
  signed: SignedTransfer | null;
  txHash: string | null;
  attempts: SubmissionAttempt[];
  state: TransactionState;
}

export type SubmitResult =
  | { kind: "submitted"; record: TransactionRecord }
  | { kind: "settled"; outcome: TerminalOutcome }
  | { kind: "halted"; record: TransactionRecord };

type BroadcastResult = { kind: "accepted"; error: null } | { kind: "unresolved"; error: string };

interface SentAttempt {
  sequence: number;
  signed: SignedTransfer;
  fee: FeeQuote;
  broadcast: BroadcastResult;
}

export interface TransactionSubmitterDeps {
  chain: IChainClient;
  ledger: LedgerStateCache;
  queue: DispatchQueue;
  repo: IDisbursementRepository;
  config: SubmitterConfig;
  now?: () => number;
  sleep?: Sleep;
  logger?: Logger;
}

/**
 * Drives one job from reservation to a terminal outcome.
 *
 * `submit` (reserve, price, sign, broadcast, with retries) must only ever run
 * for one job at a time; the dispatch worker guarantees that. `track` may run
 * for many broadcast jobs at once.
 */
export class TransactionSubmitter {
  private readonly chain: IChainClient;
  private readonly ledger: LedgerStateCache;
  private readonly queue: DispatchQueue;
  private readonly repo: IDisbursementRepository;
  private readonly config: SubmitterConfig;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private halted = false;

  constructor(deps: TransactionSubmitterDeps) {
    this.chain = deps.chain;
    this.ledger = deps.ledger;
    this.queue = deps.queue;
    this.repo = deps.repo;
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.logger = deps.logger ?? createLogger("submitter");
  }

  async process(job: QueuedJob): Promise<TerminalOutcome | null> {
    const submission = await this.submit(job);
    if (submission.kind === "settled") {
      return submission.outcome;
    }
    if (submission.kind === "halted") {
      return null;
    }
    return this.track(submission.record);
  }

  /** Stops retry and tracking loops at their next step; unsettled jobs keep their archive state. */
  halt(): void {
    this.halted = true;
  }

  /**
   * Attempt numbers continue from the archive, so a job resumed after a
   * restart keeps its retry budget and never reuses an attempt number.
   */
  async submit(job: QueuedJob): Promise<SubmitResult> {
    const record: TransactionRecord = {
      job,
      signed: null,
      txHash: null,
      attempts: this.repo.listAttempts(job.jobId),
      state: "PREPARING"
    };
    const log = this.logger.child({ jobId: job.jobId });
    const value = BigInt(job.request.amount);
    let feeBumps = 0;

    for (let attempt = record.attempts.length + 1; ; attempt += 1) {
      let sent: SentAttempt;
      try {
        sent = await this.sendOnce(record, value, feeBumps, log);
      } catch (error) {
        const chainError =
          error instanceof ChainError ? error : new ChainError("TERMINAL", errorMessage(error), { cause: error });
        const sequence = job.sequence;
        if (sequence !== null) {
          this.recordAttempt(record, attempt, sequence, record.signed, chainError.message);
        }
        // The payload was refused, so there is no hash worth reporting.
        record.signed = null;
        record.txHash = null;

        const exhausted = attempt >= this.config.retry.maxAttempts;
        if (!isRetryable(chainError) || exhausted) {
          log.error("disbursement-failed", {
            attempt,
            kind: chainError.kind,
            exhausted,
            error: chainError
          });
          const reason =
            exhausted && isRetryable(chainError)
              ? `retries-exhausted after ${attempt} attempts: ${chainError.message}`
              : chainError.message;
          return { kind: "settled", outcome: await this.finalize(record, "FAILED", "release", reason) };
        }

        if (sequence !== null) {
          await this.ledger.release(sequence);
          job.sequence = null;
        }
        if (chainError.kind === "SEQUENCE_CONFLICT" || chainError.kind === "FEE_TOO_LOW") {
          await this.ledger.markStale(`${chainError.kind.toLowerCase()}:${chainError.message}`);
        }
        if (chainError.kind === "FEE_TOO_LOW") {
          feeBumps += 1;
        }

        record.state = "RETRYING";
        const delayMs = backoffDelay(attempt, this.config.retry.baseDelayMs, this.config.retry.maxDelayMs);
        log.warn("disbursement-retrying", { attempt, kind: chainError.kind, delayMs, error: chainError.message });
        await this.sleep(delayMs);

        if (this.halted) {
          log.warn("disbursement-halted-before-retry", { attempt });
          return { kind: "halted", record };
        }
        continue;
      }

      // The chain has answered; a failing archive write must not be read as a refusal.
      const { sequence, signed, fee, broadcast } = sent;
      this.archive(log, () => this.recordAttempt(record, attempt, sequence, signed, broadcast.error));

      if (broadcast.kind === "accepted") {
        record.state = "SUBMITTED";
        this.archive(log, () =>
          this.repo.updateStatus(job.jobId, "SUBMITTED", this.now(), { sequence, txHash: signed.hash })
        );
        log.info("disbursement-submitted", { sequence, txHash: signed.hash, attempt, fee: describeFee(fee) });
        return { kind: "submitted", record };
      }

      // Never rebroadcast a payload that may already be on its way.
      return {
        kind: "settled",
        outcome: await this.finalize(record, "FAILED", "release", broadcast.error)
      };
    }
  }

  /**
   * Settles a job whose submission or tracking threw outside the chain error
   * handling. Its reservation, if any, is released. Null when the job had
   * already settled before the crash.
   */
  async failCrashed(job: QueuedJob, error: unknown): Promise<TerminalOutcome | null> {
    if (job.state === "SETTLED") {
      return null;
    }
    const record: TransactionRecord = { job, signed: null, txHash: null, attempts: [], state: "FAILED" };
    return this.finalize(record, "FAILED", "release", `submission-crashed: ${errorMessage(error)}`);
  }

  /** Polls for inclusion; a payload that never shows up is abandoned, never resent. */
  async track(record: TransactionRecord): Promise<TerminalOutcome | null> {
    const txHash = record.txHash;
    const log = this.logger.child({ jobId: record.job.jobId, txHash });
    if (txHash === null) {
      return this.finalize(record, "FAILED", "release", "missing-transaction-hash");
    }

    const deadline = this.now() + this.config.confirmationTimeoutMs;
    for (;;) {
      if (this.halted) {
        return null;
      }

      const status = await this.queryStatus(txHash, log);
      if (status?.state === "INCLUDED") {
        return this.settleIncluded(record, status);
      }
      if (this.now() >= deadline) {
        break;
      }
      await this.sleep(this.config.pollIntervalMs);
    }

    record.state = "AMBIGUOUS_PENDING";
    log.warn("disbursement-confirmation-timeout", { timeoutMs: this.config.confirmationTimeoutMs });
    const resolved = await this.requeryStatus(txHash, (status) => status.state === "INCLUDED", log);
    if (resolved?.state === "INCLUDED") {
      return this.settleIncluded(record, resolved);
    }
    if (this.halted) {
      return null;
    }

    return this.finalize(record, "ABANDONED", "release", "not-included-before-timeout");
  }

  private async broadcast(record: TransactionRecord, log: Logger): Promise<BroadcastResult> {
    const signed = record.signed;
    if (!signed) {
      throw new ChainError("TERMINAL", "broadcast-without-signed-payload");
    }

    try {
      await withTimeout(this.chain.submitSignedTransaction(signed), this.config.rpcTimeoutMs, "submit", "AMBIGUOUS");
      return { kind: "accepted", error: null };
    } catch (error) {
      if (!(error instanceof ChainError) || (error.kind !== "AMBIGUOUS" && error.kind !== "ALREADY_KNOWN")) {
        throw error;
      }

      record.state = "AMBIGUOUS_PENDING";
      log.warn("disbursement-broadcast-ambiguous", { txHash: signed.hash, kind: error.kind, error: error.message });
      const resolved = await this.requeryStatus(signed.hash, (status) => status.state !== "UNKNOWN", log);
      if (resolved) {
        log.info("disbursement-broadcast-resolved", { txHash: signed.hash, state: resolved.state });
        return { kind: "accepted", error: null };
      }
      return { kind: "unresolved", error: `ambiguous-broadcast-unresolved: ${error.message}` };
    }
  }

  private async sendOnce(
    record: TransactionRecord,
    value: bigint,
    feeBumps: number,
    log: Logger
  ): Promise<SentAttempt> {
    const { job } = record;
    const sequence = await this.ledger.reserveNextSequence();
    job.sequence = sequence;

    const quote = await withTimeout(
      this.chain.estimateFee(job.request.destination, value),
      this.config.rpcTimeoutMs,
      "estimate-fee"
    );
    const fee = bumpFee(quote, this.config.retry.feeBumpPercent, feeBumps);
    const signed = await withTimeout(
      this.chain.signTransfer({ to: job.request.destination, value, nonce: sequence, fee }),
      this.config.rpcTimeoutMs,
      "sign"
    );
    record.signed = signed;
    record.txHash = signed.hash;

    const broadcast = await this.broadcast(record, log);
    return { sequence, signed, fee, broadcast };
  }

  private async requeryStatus(
    txHash: string,
    accept: (status: TxStatusView) => boolean,
    log: Logger
  ): Promise<TxStatusView | null> {
    for (let query = 1; query <= this.config.statusRequeryLimit; query += 1) {
      const status = await this.queryStatus(txHash, log);
      if (status && accept(status)) {
        return status;
      }
      if (query < this.config.statusRequeryLimit) {
        await this.sleep(backoffDelay(query, this.config.retry.baseDelayMs, this.config.retry.maxDelayMs));
      }
    }
    return null;
  }

  private async queryStatus(txHash: string, log: Logger): Promise<TxStatusView | null> {
    try {
      return await withTimeout(this.chain.getTransactionStatus(txHash), this.config.rpcTimeoutMs, "tx-status");
    } catch (error) {
      log.warn("transaction-status-query-failed", { txHash, error: errorMessage(error) });
      return null;
    }
  }

  private settleIncluded(record: TransactionRecord, status: Extract<TxStatusView, { state: "INCLUDED" }>) {
    // A reverted transfer still consumed its sequence number on-chain.
    if (status.reverted) {
      return this.finalize(record, "FAILED", "confirm", "transaction-reverted");
    }
    return this.finalize(record, "CONFIRMED", "confirm", null);
  }

  private recordAttempt(
    record: TransactionRecord,
    attempt: number,
    sequence: number,
    signed: SignedTransfer | null,
    error: string | null
  ): void {
    const entry: SubmissionAttempt = {
      attempt,
      sequence,
      txHash: signed?.hash ?? null,
      fee: signed ? describeFee(signed.fee) : null,
      submittedAt: this.now(),
      error
    };
    record.attempts.push(entry);
    this.repo.recordAttempt(record.job.jobId, entry);
  }

  private archive(log: Logger, write: () => void): void {
    try {
      write();
    } catch (error) {
      log.error("disbursement-archive-write-failed", { error: errorMessage(error) });
    }
  }

  /**
   * The single exit of every job: one confirm or release, one archive update,
   * one settle on the queue, then a best-effort reconcile.
   */
  private async finalize(
    record: TransactionRecord,
    status: TerminalStatus,
    ledgerAction: "confirm" | "release",
    failureReason: string | null
  ): Promise<TerminalOutcome> {
    const { job } = record;
    const sequence = job.sequence;
    const now = this.now();

    if (sequence !== null) {
      if (ledgerAction === "confirm") {
        await this.ledger.confirm(sequence);
      } else {
        await this.ledger.release(sequence);
      }
    }
    if (status === "ABANDONED" || (status === "FAILED" && record.state === "AMBIGUOUS_PENDING")) {
      await this.ledger.markStale(`${status.toLowerCase()}:${job.jobId}`);
    }

    record.state = status;
    this.archive(this.logger.child({ jobId: job.jobId }), () => {
      this.repo.updateStatus(job.jobId, status, now, {
        ...(failureReason ? { failureReason } : {}),
        ...(record.txHash ? { txHash: record.txHash } : {}),
        ...(sequence !== null ? { sequence } : {}),
        settledAt: now
      });
    });

    const outcome: TerminalOutcome = {
      status,
      disbursementId: job.jobId,
      sequence,
      txHash: record.txHash,
      failureReason
    };
    this.queue.settle(job.jobId, outcome);

    const log = this.logger.child({ jobId: job.jobId });
    if (status === "CONFIRMED") {
      log.info("disbursement-confirmed", { sequence, txHash: record.txHash });
    } else {
      log.warn("disbursement-settled-unsuccessfully", { status, sequence, txHash: record.txHash, failureReason });
    }

    try {
      await this.ledger.reconcile();
    } catch (error) {
      log.warn("post-settlement-reconcile-failed", { error: errorMessage(error) });
    }
    return outcome;
  }
}
