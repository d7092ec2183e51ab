import { createDb } from "../../src/db/db";
import { DisbursementRepo } from "../../src/db/repo";
import { FaucetServiceConfig } from "../../src/services/FaucetService";
import { Sleep } from "../../src/shared/timing";
import { SubmitterConfig } from "../../src/types/config.types";
import { DisbursementRequest } from "../../src/types/disbursement.types";

export const DEST_A = "0x1111111111111111111111111111111111111111";
export const DEST_B = "0x2222222222222222222222222222222222222222";
export const DEST_C = "0x3333333333333333333333333333333333333333";

export const GRANT_WEI = 100_000_000_000_000_000n;

/**
 * Clock whose `sleep` advances time instead of waiting, yielding once so
 * other jobs get a turn.
 */
export interface TestClock {
  now: () => number;
  sleep: Sleep;
  advance(ms: number): void;
  readonly sleeps: number[];
}

export function createTestClock(start = 1_700_000_000_000): TestClock {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleep: (ms) => {
      sleeps.push(ms);
      current += ms;
      return new Promise((resolve) => setImmediate(resolve));
    },
    advance(ms) {
      current += ms;
    },
    sleeps
  };
}

export function makeRequest(
  id: string,
  options: { requesterId?: string; destination?: string; submittedAt?: number; amount?: string } = {}
): DisbursementRequest {
  return Object.freeze({
    id,
    requesterId: options.requesterId ?? `user-${id}`,
    destination: options.destination ?? DEST_A,
    amount: options.amount ?? "1000",
    submittedAt: options.submittedAt ?? 1_700_000_000_000
  });
}

export async function createRepo(): Promise<DisbursementRepo> {
  return new DisbursementRepo(await createDb());
}

export function submitterConfig(overrides: Partial<SubmitterConfig> = {}): SubmitterConfig {
  return {
    retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 40, feeBumpPercent: 25 },
    rpcTimeoutMs: 1_000,
    pollIntervalMs: 5,
    confirmationTimeoutMs: 50,
    statusRequeryLimit: 2,
    ...overrides
  };
}

export function serviceConfig(overrides: Partial<FaucetServiceConfig> = {}): FaucetServiceConfig {
  return {
    grantAmountWei: GRANT_WEI,
    minBalanceWei: 1_000_000_000_000_000_000n,
    admission: { cooldownMs: 60_000, maxInFlight: 4 },
    submitter: submitterConfig(),
    ledger: { maxStateAgeMs: 60_000, rpcTimeoutMs: 1_000 },
    clientTimeoutMs: 2_000,
    reconcileIntervalMs: 60_000,
    shutdownGraceMs: 1_000,
    ...overrides
  };
}
