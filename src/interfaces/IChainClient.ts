import { FeeQuote, SequenceTag, SignedTransfer, TransferInput, TxStatusView } from "../types/chain.types";

/**
 * Everything the faucet needs from the chain, for the one funding account.
 * Implementations: EthersChainClient (JSON-RPC), FakeChainClient (in-process).
 *
 * Failures are raised as ChainError so callers can branch on `kind`.
 */
export interface IChainClient {
  readonly fundingAddress: string;

  /** Transaction count of the funding account, i.e. its next sequence number. */
  getSequence(tag: SequenceTag): Promise<number>;

  estimateFee(to: string, value: bigint): Promise<FeeQuote>;

  /** Signs locally; the hash of the result is known before broadcast. */
  signTransfer(input: TransferInput): Promise<SignedTransfer>;

  /** Broadcasts a signed payload and returns its hash. */
  submitSignedTransaction(signed: SignedTransfer): Promise<string>;

  getTransactionStatus(txHash: string): Promise<TxStatusView>;

  getBalance(address: string): Promise<bigint>;
}
