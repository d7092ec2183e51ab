export interface DisbursementRequest {
  readonly id: string;
  readonly requesterId: string;
  readonly destination: string;
  /** Wei, as a decimal string. Always the configured grant amount. */
  readonly amount: string;
  /** Epoch milliseconds; also the instant admission is decided at. */
  readonly submittedAt: number;
}

export type AdmissionVerdict = "ACCEPTED" | "REJECTED_RATE_LIMITED" | "REJECTED_INVALID_ADDRESS";

export type RejectionCause = "invalid-address" | "cooldown" | "backpressure";

export type AdmissionDecision =
  | { request: DisbursementRequest; verdict: "ACCEPTED"; reason: string }
  | {
      request: DisbursementRequest;
      verdict: "REJECTED_RATE_LIMITED";
      cause: "cooldown" | "backpressure";
      reason: string;
      retryAfterMs: number | null;
    }
  | { request: DisbursementRequest; verdict: "REJECTED_INVALID_ADDRESS"; cause: "invalid-address"; reason: string };

export type DisbursementStatus = "QUEUED" | "SUBMITTED" | "CONFIRMED" | "FAILED" | "ABANDONED";

export type TerminalStatus = Extract<DisbursementStatus, "CONFIRMED" | "FAILED" | "ABANDONED">;

export interface TerminalOutcome {
  status: TerminalStatus;
  disbursementId: string;
  sequence: number | null;
  txHash: string | null;
  failureReason: string | null;
}

export type DisbursementOutcome =
  | { kind: "CONFIRMED"; disbursementId: string; txHash: string; sequence: number }
  | { kind: "FAILED"; disbursementId: string; reason: string; txHash: string | null }
  | { kind: "ABANDONED"; disbursementId: string; reason: string; txHash: string | null }
  | { kind: "PENDING"; disbursementId: string }
  | { kind: "RATE_LIMITED"; cause: "cooldown" | "backpressure"; reason: string; retryAfterMs: number | null }
  | { kind: "INVALID_ADDRESS"; reason: string }
  | { kind: "UNAVAILABLE"; reason: string };

export interface SubmissionAttempt {
  attempt: number;
  sequence: number;
  txHash: string | null;
  fee: string | null;
  submittedAt: number;
  error: string | null;
}

export interface DisbursementRecord {
  id: string;
  requesterId: string;
  destination: string;
  amount: string;
  status: DisbursementStatus;
  sequence: number | null;
  txHash: string | null;
  failureReason: string | null;
  attemptCount: number;
  createdAt: number;
  updatedAt: number;
  settledAt: number | null;
}

export interface UpdateStatusPatch {
  sequence?: number;
  txHash?: string;
  failureReason?: string;
  settledAt?: number;
}

export interface ListDisbursementInput {
  status?: DisbursementStatus;
  first: number;
  after?: string | null;
}
