/**
 * How the submitter should react to a failed chain call.
 *
 * SEQUENCE_CONFLICT and FEE_TOO_LOW are retried after a forced reconcile.
 * AMBIGUOUS means the transaction may have reached the chain: its status is
 * re-queried by hash before anything else happens. ALREADY_KNOWN is the node
 * telling us it holds the exact payload already.
 */
export type ChainErrorKind =
  | "SEQUENCE_CONFLICT"
  | "FEE_TOO_LOW"
  | "ALREADY_KNOWN"
  | "AMBIGUOUS"
  | "TRANSIENT"
  | "TERMINAL";

export class ChainError extends Error {
  readonly kind: ChainErrorKind;

  constructor(kind: ChainErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ChainError";
    this.kind = kind;
  }
}

export function isChainError(error: unknown, kind?: ChainErrorKind): error is ChainError {
  return error instanceof ChainError && (kind === undefined || error.kind === kind);
}

export function isRetryable(error: ChainError): boolean {
  return error.kind === "SEQUENCE_CONFLICT" || error.kind === "FEE_TOO_LOW" || error.kind === "TRANSIENT";
}

export class ConfigError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`invalid-config: ${problems.join(", ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export function errorMessage(error: unknown, fallback = "unknown-error"): string {
  return error instanceof Error ? error.message : fallback;
}
