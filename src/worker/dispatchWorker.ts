import { DispatchQueue, QueuedJob } from "../services/DispatchQueue";
import { SubmitResult, TransactionSubmitter } from "../services/TransactionSubmitter";
import { errorMessage } from "../shared/errors";
import { createLogger, Logger } from "../shared/logger";
import { TerminalOutcome } from "../types/disbursement.types";

export interface WorkerTickResult {
  claimedId: string | null;
  action: "none" | "submitted" | "settled" | "halted";
}

/**
 * The queue's single consumer. Submissions run one at a time in queue order;
 * once a job is broadcast its confirmation tracking runs in the background so
 * the next job can be submitted straight away.
 */
export class DispatchWorker {
  private readonly tracking = new Set<Promise<void>>();
  private readonly logger: Logger;
  private detach: (() => void) | null = null;
  private loop: Promise<void> | null = null;
  private running = false;

  constructor(
    private readonly queue: DispatchQueue,
    private readonly submitter: TransactionSubmitter,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("dispatch-worker");
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.detach = this.queue.attachConsumer();
    this.running = true;
    this.loop = this.run();
    this.logger.info("dispatch-worker-started");
  }

  /** Pulls and submits the oldest waiting job, if any. */
  async tick(): Promise<WorkerTickResult> {
    const next = this.queue.drain().next();
    if (next.done) {
      return { claimedId: null, action: "none" };
    }

    const job = next.value;
    let result: SubmitResult;
    try {
      result = await this.submitter.submit(job);
    } catch (error) {
      this.logger.error("submission-crashed", { jobId: job.jobId, error: errorMessage(error) });
      await this.submitter.failCrashed(job, error);
      return { claimedId: job.jobId, action: "settled" };
    }
    if (result.kind === "submitted") {
      this.trackInBackground(result.record.job, this.submitter.track(result.record));
      return { claimedId: job.jobId, action: "submitted" };
    }
    return { claimedId: job.jobId, action: result.kind };
  }

  /**
   * Tracks a broadcast job alongside the others. A crash still settles the
   * job unless it already has its outcome.
   */
  trackInBackground(job: QueuedJob, tracking: Promise<TerminalOutcome | null>): void {
    const task = tracking.then(
      () => undefined,
      async (error: unknown) => {
        this.logger.error("tracking-crashed", { jobId: job.jobId, error: errorMessage(error) });
        await this.submitter.failCrashed(job, error);
      }
    ).catch((error: unknown) => {
      this.logger.error("crashed-job-settlement-failed", { jobId: job.jobId, error: errorMessage(error) });
    });
    this.tracking.add(task);
    void task.finally(() => this.tracking.delete(task));
  }

  get activeTracking(): number {
    return this.tracking.size;
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    this.running = false;
    this.queue.interrupt();
    await this.loop;
    await Promise.all([...this.tracking]);
    this.loop = null;
    this.detach?.();
    this.detach = null;
    this.logger.info("dispatch-worker-stopped");
  }

  private async run(): Promise<void> {
    while (this.running) {
      await this.queue.waitForWork();
      while (this.running && this.queue.waitingCount > 0) {
        try {
          await this.tick();
        } catch (error) {
          this.logger.error("worker-tick-failed", { error: errorMessage(error) });
        }
      }
    }
  }
}
