export type FeePricing =
  | { type: "eip1559"; maxFeePerGas: bigint; maxPriorityFeePerGas: bigint }
  | { type: "legacy"; gasPrice: bigint };

export interface FeeQuote {
  gasLimit: bigint;
  pricing: FeePricing;
}

export interface TransferInput {
  to: string;
  value: bigint;
  nonce: number;
  fee: FeeQuote;
}

export interface SignedTransfer {
  /** Serialized, signed transaction as 0x-prefixed hex. */
  raw: string;
  /** Hash of the signed payload; known before broadcast. */
  hash: string;
  from: string;
  to: string;
  value: bigint;
  nonce: number;
  fee: FeeQuote;
}

export type TxStatusView =
  | { state: "UNKNOWN"; txHash: string }
  | { state: "PENDING"; txHash: string }
  | { state: "INCLUDED"; txHash: string; blockNumber: number; reverted: boolean };

export type SequenceTag = "latest" | "pending";
