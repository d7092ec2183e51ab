import { randomUUID } from "node:crypto";
import { IChainClient } from "../interfaces/IChainClient";
import { IDisbursementRepository } from "../interfaces/IDisbursementRepository";
import { IHealthProvider } from "../interfaces/IHealthProvider";
import { errorMessage } from "../shared/errors";
import { createLogger, Logger } from "../shared/logger";
import { Sleep, withTimeout } from "../shared/timing";
import { FaucetConfig } from "../types/config.types";
import {
  DisbursementOutcome,
  DisbursementRecord,
  DisbursementRequest,
  ListDisbursementInput,
  SubmissionAttempt,
  TerminalOutcome
} from "../types/disbursement.types";
import { HealthStatus } from "../types/health.types";
import { FundingAccountSnapshot } from "../types/ledger.types";
import { DispatchWorker } from "../worker/dispatchWorker";
import { AdmissionController } from "./AdmissionController";
import { DispatchQueue, JobHandle } from "./DispatchQueue";
import { LedgerStateCache } from "./LedgerStateCache";
import { TransactionRecord, TransactionSubmitter } from "./TransactionSubmitter";

export type FaucetServiceConfig = Pick<
  FaucetConfig,
  | "grantAmountWei"
  | "minBalanceWei"
  | "admission"
  | "submitter"
  | "ledger"
  | "clientTimeoutMs"
  | "reconcileIntervalMs"
  | "shutdownGraceMs"
>;

export interface FaucetServiceDeps {
  chain: IChainClient;
  repo: IDisbursementRepository;
  config: FaucetServiceConfig;
  now?: () => number;
  sleep?: Sleep;
  logger?: Logger;
  /** Called once on stop, after the worker has halted. */
  persist?: () => void;
}

export interface DisbursementDetails {
  record: DisbursementRecord;
  attempts: SubmissionAttempt[];
}

export function toDisbursementOutcome(outcome: TerminalOutcome): DisbursementOutcome {
  if (outcome.status === "CONFIRMED" && outcome.txHash !== null && outcome.sequence !== null) {
    return {
      kind: "CONFIRMED",
      disbursementId: outcome.disbursementId,
      txHash: outcome.txHash,
      sequence: outcome.sequence
    };
  }
  if (outcome.status === "ABANDONED") {
    return {
      kind: "ABANDONED",
      disbursementId: outcome.disbursementId,
      reason: outcome.failureReason ?? "abandoned",
      txHash: outcome.txHash
    };
  }
  return {
    kind: "FAILED",
    disbursementId: outcome.disbursementId,
    reason: outcome.failureReason ?? "failed",
    txHash: outcome.txHash
  };
}

/**
 * The one entry point adapters talk to. Wires admission, the queue, the
 * worker and the ledger around a single funding account.
 */
export class FaucetService implements IHealthProvider {
  readonly admission: AdmissionController;
  readonly queue: DispatchQueue;
  readonly ledger: LedgerStateCache;
  private readonly submitter: TransactionSubmitter;
  private readonly worker: DispatchWorker;
  private readonly chain: IChainClient;
  private readonly repo: IDisbursementRepository;
  private readonly config: FaucetServiceConfig;
  private readonly now: () => number;
  private readonly logger: Logger;
  private readonly persist: (() => void) | null;
  private maintenance: NodeJS.Timeout | null = null;
  private startupError: string | null = null;
  private started = false;
  private stopping = false;

  constructor(deps: FaucetServiceDeps) {
    this.chain = deps.chain;
    this.repo = deps.repo;
    this.config = deps.config;
    this.now = deps.now ?? Date.now;
    this.logger = deps.logger ?? createLogger("faucet");
    this.persist = deps.persist ?? null;

    this.queue = new DispatchQueue(this.now);
    this.ledger = new LedgerStateCache(deps.chain, deps.config.ledger, this.now);
    this.admission = new AdmissionController(deps.config.admission, () => this.queue.depth);
    this.submitter = new TransactionSubmitter({
      chain: deps.chain,
      ledger: this.ledger,
      queue: this.queue,
      repo: deps.repo,
      config: deps.config.submitter,
      now: this.now,
      sleep: deps.sleep
    });
    this.worker = new DispatchWorker(this.queue, this.submitter);
  }

  /**
   * Admission, archive insert and enqueue happen in one synchronous turn, so
   * concurrent callers cannot overshoot the in-flight ceiling.
   */
  async requestDisbursement(requesterId: string, destination: string): Promise<DisbursementOutcome> {
    if (this.stopping) {
      return { kind: "UNAVAILABLE", reason: "faucet is shutting down" };
    }

    const request: DisbursementRequest = Object.freeze({
      id: randomUUID(),
      requesterId,
      destination,
      amount: this.config.grantAmountWei.toString(),
      submittedAt: this.now()
    });

    const decision = this.admission.decide(request);
    if (decision.verdict === "REJECTED_INVALID_ADDRESS") {
      return { kind: "INVALID_ADDRESS", reason: decision.reason };
    }
    if (decision.verdict === "REJECTED_RATE_LIMITED") {
      return {
        kind: "RATE_LIMITED",
        cause: decision.cause,
        reason: decision.reason,
        retryAfterMs: decision.retryAfterMs
      };
    }

    this.repo.create(decision.request);
    const handle = this.queue.enqueue(decision.request);
    this.logger.info("disbursement-admitted", {
      disbursementId: handle.jobId,
      requesterId,
      destination: decision.request.destination,
      queueDepth: this.queue.depth
    });
    return this.awaitOutcome(handle);
  }

  getDisbursement(id: string): DisbursementDetails | null {
    const record = this.repo.getById(id);
    if (!record) {
      return null;
    }
    return { record, attempts: this.repo.listAttempts(id) };
  }

  listDisbursements(input: ListDisbursementInput): DisbursementRecord[] {
    return this.repo.list(input);
  }

  /** Always asks the chain; never served from a cache. */
  async healthStatus(): Promise<HealthStatus> {
    const fundingAddress = this.chain.fundingAddress;
    const queueDepth = this.queue.depth;

    try {
      const balance = await withTimeout(
        this.chain.getBalance(fundingAddress),
        this.config.submitter.rpcTimeoutMs,
        "get-balance"
      );
      const aboveThreshold = balance >= this.config.minBalanceWei;
      return {
        healthy: aboveThreshold && this.startupError === null,
        reachableChain: true,
        fundingBalanceAboveThreshold: aboveThreshold,
        fundingBalance: balance.toString(),
        fundingAddress,
        queueDepth,
        fatalError: this.startupError
      };
    } catch (error) {
      this.logger.warn("health-balance-read-failed", { error: errorMessage(error) });
      return {
        healthy: false,
        reachableChain: false,
        fundingBalanceAboveThreshold: false,
        fundingBalance: null,
        fundingAddress,
        queueDepth,
        fatalError: this.startupError
      };
    }
  }

  ledgerSnapshot(): FundingAccountSnapshot {
    return this.ledger.snapshot();
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    try {
      const nextSequence = await this.ledger.reconcile();
      this.logger.info("startup-reconciled", { nextSequence, fundingAddress: this.chain.fundingAddress });
    } catch (error) {
      this.startupError = `chain-unreachable-at-startup: ${errorMessage(error)}`;
      this.logger.error("startup-reconcile-failed", { error });
    }

    await this.recoverUnsettled();
    this.worker.start();

    this.maintenance = setInterval(() => {
      this.maintain().catch((error: unknown) => {
        this.logger.error("maintenance-failed", { error: errorMessage(error) });
      });
    }, this.config.reconcileIntervalMs);
    this.maintenance.unref();
  }

  async stop(): Promise<void> {
    if (this.stopping) {
      return;
    }
    this.stopping = true;

    if (this.maintenance) {
      clearInterval(this.maintenance);
      this.maintenance = null;
    }
    this.queue.close();

    const drained = await this.waitForDrain();
    if (!drained) {
      this.logger.warn("shutdown-grace-elapsed", { queueDepth: this.queue.depth });
    }

    this.submitter.halt();
    await this.worker.stop();
    if (this.persist) {
      this.persist();
    }
    this.logger.info("faucet-stopped", { drained });
  }

  /** One pass of the periodic timer: prune cooldown windows, then reconcile. */
  async maintain(): Promise<void> {
    const pruned = this.admission.pruneExpired(this.now());
    if (pruned > 0) {
      this.logger.debug("rate-windows-pruned", { pruned });
    }

    try {
      await this.ledger.reconcile();
      if (this.startupError) {
        this.logger.info("chain-reachable-again", { previousError: this.startupError });
        this.startupError = null;
      }
    } catch (error) {
      this.logger.warn("periodic-reconcile-failed", { error: errorMessage(error) });
    }
  }

  private async awaitOutcome(handle: JobHandle): Promise<DisbursementOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), this.config.clientTimeoutMs);
    });

    try {
      const outcome = await Promise.race([handle.outcome, timeout]);
      if (!outcome) {
        this.logger.info("disbursement-pending-after-client-timeout", { disbursementId: handle.jobId });
        return { kind: "PENDING", disbursementId: handle.jobId };
      }
      return toDisbursementOutcome(outcome);
    } finally {
      clearTimeout(timer);
    }
  }

  private async waitForDrain(): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const grace = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.config.shutdownGraceMs);
    });

    try {
      return await Promise.race([this.queue.whenEmpty().then(() => true), grace]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Picks up archived work from a previous run: broadcast rows are tracked by
   * hash again, queued rows go back on the queue.
   */
  private async recoverUnsettled(): Promise<void> {
    for (const row of this.repo.listUnsettled()) {
      const request: DisbursementRequest = Object.freeze({
        id: row.id,
        requesterId: row.requesterId,
        destination: row.destination,
        amount: row.amount,
        submittedAt: row.createdAt
      });

      if (row.status === "QUEUED") {
        this.queue.enqueue(request);
        this.logger.info("disbursement-requeued", { disbursementId: row.id });
        continue;
      }

      if (row.sequence === null || row.txHash === null) {
        this.repo.updateStatus(row.id, "FAILED", this.now(), {
          failureReason: "recovered-without-transaction",
          settledAt: this.now()
        });
        continue;
      }

      await this.ledger.adopt(row.sequence);
      const restored = this.queue.restoreActive(request, row.sequence);
      const record: TransactionRecord = {
        job: restored.job,
        signed: null,
        txHash: row.txHash,
        attempts: this.repo.listAttempts(row.id),
        state: "SUBMITTED"
      };
      this.worker.trackInBackground(restored.job, this.submitter.track(record));
      this.logger.info("disbursement-tracking-resumed", { disbursementId: row.id, sequence: row.sequence });
    }
  }
}
