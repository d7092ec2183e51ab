export type FundingCredential =
  | { kind: "private-key"; privateKey: string }
  | { kind: "mnemonic"; phrase: string; accountIndex: number };

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  feeBumpPercent: number;
}

export interface AdmissionConfig {
  cooldownMs: number;
  maxInFlight: number;
}

export interface SubmitterConfig {
  retry: RetryPolicy;
  rpcTimeoutMs: number;
  pollIntervalMs: number;
  confirmationTimeoutMs: number;
  statusRequeryLimit: number;
}

export interface LedgerConfig {
  maxStateAgeMs: number;
  rpcTimeoutMs: number;
}

export interface FaucetConfig {
  port: number;
  rpcUrl: string;
  chainId: number;
  credential: FundingCredential;
  grantAmountWei: bigint;
  minBalanceWei: bigint;
  admission: AdmissionConfig;
  submitter: SubmitterConfig;
  ledger: LedgerConfig;
  clientTimeoutMs: number;
  reconcileIntervalMs: number;
  shutdownGraceMs: number;
  databasePath: string | null;
  explorerTxUrl: string | null;
  /** Shared secret of the chat gateways allowed to speak for a requester. */
  gatewayKey: string | null;
}
