export interface FundingAccountSnapshot {
  /** First sequence number not known to be used on-chain. */
  nextSequence: number | null;
  reserved: number[];
  lastReconciledAt: number | null;
  stale: boolean;
  staleReason: string | null;
}
