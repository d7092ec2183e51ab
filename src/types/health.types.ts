export interface HealthStatus {
  healthy: boolean;
  reachableChain: boolean;
  fundingBalanceAboveThreshold: boolean;
  /** Wei as a decimal string; null when the chain could not be read. */
  fundingBalance: string | null;
  fundingAddress: string | null;
  queueDepth: number;
  fatalError: string | null;
}
