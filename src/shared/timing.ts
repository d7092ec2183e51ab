import { ChainError, ChainErrorKind } from "./errors";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Races `task` against a timer. The task itself is not cancelled: a late
 * result is dropped, which is why a timed-out broadcast is raised as
 * AMBIGUOUS rather than TRANSIENT.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  ms: number,
  label: string,
  kind: ChainErrorKind = "TRANSIENT"
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ChainError(kind, `rpc-timeout:${label}:${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([task, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(maxDelayMs, baseDelayMs * 2 ** exponent);
}
