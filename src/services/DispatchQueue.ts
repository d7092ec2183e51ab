import { DisbursementRequest, TerminalOutcome } from "../types/disbursement.types";

export type JobState = "QUEUED" | "ACTIVE" | "SETTLED";

export interface QueuedJob {
  readonly jobId: string;
  readonly request: DisbursementRequest;
  readonly enqueuedAt: number;
  state: JobState;
  /** Assigned at submission time, never at admission. */
  sequence: number | null;
}

export interface JobHandle {
  readonly jobId: string;
  readonly request: DisbursementRequest;
  readonly outcome: Promise<TerminalOutcome>;
}

interface Unsettled {
  job: QueuedJob;
  resolve: (outcome: TerminalOutcome) => void;
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

/**
 * FIFO of admitted jobs with exactly one consumer.
 *
 * A job counts toward `depth` from enqueue until `settle`, so jobs that are
 * being submitted or tracked still hold their slot under the in-flight ceiling.
 */
export class DispatchQueue {
  private readonly waiting: QueuedJob[] = [];
  private readonly unsettled = new Map<string, Unsettled>();
  private readonly emptyWaiters: Array<() => void> = [];
  private consumerAttached = false;
  private closed = false;
  private wake: (() => void) | null = null;

  constructor(private readonly now: () => number = Date.now) {}

  enqueue(request: DisbursementRequest): JobHandle {
    if (this.closed) {
      throw new Error("queue-closed");
    }
    if (this.unsettled.has(request.id)) {
      throw new Error(`duplicate-job:${request.id}`);
    }

    const job: QueuedJob = {
      jobId: request.id,
      request,
      enqueuedAt: this.now(),
      state: "QUEUED",
      sequence: null
    };
    const { promise, resolve } = deferred<TerminalOutcome>();
    this.unsettled.set(job.jobId, { job, resolve });
    this.waiting.push(job);
    this.signal();

    return { jobId: job.jobId, request, outcome: promise };
  }

  /**
   * Registers a job that already holds a broadcast sequence (restart recovery).
   * It skips the waiting line and goes straight to tracking.
   */
  restoreActive(request: DisbursementRequest, sequence: number): JobHandle & { job: QueuedJob } {
    if (this.unsettled.has(request.id)) {
      throw new Error(`duplicate-job:${request.id}`);
    }

    const job: QueuedJob = { jobId: request.id, request, enqueuedAt: this.now(), state: "ACTIVE", sequence };
    const { promise, resolve } = deferred<TerminalOutcome>();
    this.unsettled.set(job.jobId, { job, resolve });
    return { jobId: job.jobId, request, outcome: promise, job };
  }

  /**
   * Hands out the jobs waiting right now, oldest first, marking each ACTIVE as
   * it is pulled. Stopping early leaves the rest queued for the next call.
   */
  *drain(): Generator<QueuedJob, void, undefined> {
    while (this.waiting.length > 0) {
      const job = this.waiting.shift();
      if (!job) {
        return;
      }
      job.state = "ACTIVE";
      yield job;
    }
  }

  /** Delivers the one terminal outcome of a job. Later calls are ignored. */
  settle(jobId: string, outcome: TerminalOutcome): boolean {
    const entry = this.unsettled.get(jobId);
    if (!entry) {
      return false;
    }

    this.unsettled.delete(jobId);
    entry.job.state = "SETTLED";
    entry.resolve(outcome);

    if (this.unsettled.size === 0) {
      for (const notify of this.emptyWaiters.splice(0)) {
        notify();
      }
    }
    return true;
  }

  attachConsumer(): () => void {
    if (this.consumerAttached) {
      throw new Error("consumer-already-attached");
    }
    this.consumerAttached = true;
    return () => {
      this.consumerAttached = false;
    };
  }

  /** Resolves once a job is waiting, or when `interrupt` is called. */
  waitForWork(): Promise<void> {
    if (this.waiting.length > 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.wake = resolve;
    });
  }

  interrupt(): void {
    this.signal();
  }

  /** Resolves when every admitted job has settled. */
  whenEmpty(): Promise<void> {
    if (this.unsettled.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.emptyWaiters.push(resolve);
    });
  }

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get depth(): number {
    return this.unsettled.size;
  }

  get waitingCount(): number {
    return this.waiting.length;
  }

  get hasConsumer(): boolean {
    return this.consumerAttached;
  }

  private signal(): void {
    const wake = this.wake;
    this.wake = null;
    if (wake) {
      wake();
    }
  }
}
