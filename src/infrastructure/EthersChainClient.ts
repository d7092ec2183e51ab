import {
  BaseWallet,
  HDNodeWallet,
  JsonRpcProvider,
  Network,
  Transaction,
  TransactionRequest,
  Wallet,
  isError
} from "ethers";
import { IChainClient } from "../interfaces/IChainClient";
import { ChainError } from "../shared/errors";
import { FeeQuote, SequenceTag, SignedTransfer, TransferInput, TxStatusView } from "../types/chain.types";
import { FundingCredential } from "../types/config.types";

export interface EthersChainClientConfig {
  rpcUrl: string;
  chainId: number;
  credential: FundingCredential;
}

export type ChainCallContext = "read" | "broadcast";

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Maps ethers and node error shapes onto ChainError kinds.
 *
 * A network failure while broadcasting may still have delivered the payload,
 * so it becomes AMBIGUOUS there and TRANSIENT everywhere else.
 */
export function toChainError(error: unknown, context: ChainCallContext): ChainError {
  if (error instanceof ChainError) {
    return error;
  }

  const message = describeError(error);
  const text = message.toLowerCase();

  if (text.includes("already known") || text.includes("known transaction") || text.includes("already imported")) {
    return new ChainError("ALREADY_KNOWN", message, { cause: error });
  }
  if (isError(error, "NONCE_EXPIRED") || /nonce too (low|high)|nonce has already been used|invalid nonce/.test(text)) {
    return new ChainError("SEQUENCE_CONFLICT", message, { cause: error });
  }
  if (
    isError(error, "REPLACEMENT_UNDERPRICED") ||
    /underpriced|fee too low|less than block base fee|fee cap less than/.test(text)
  ) {
    return new ChainError("FEE_TOO_LOW", message, { cause: error });
  }
  if (isError(error, "INSUFFICIENT_FUNDS") || text.includes("insufficient funds")) {
    return new ChainError("TERMINAL", message, { cause: error });
  }
  if (
    isError(error, "TIMEOUT") ||
    isError(error, "NETWORK_ERROR") ||
    isError(error, "SERVER_ERROR") ||
    /timeout|timed out|econnreset|econnrefused|socket hang up|fetch failed/.test(text)
  ) {
    return new ChainError(context === "broadcast" ? "AMBIGUOUS" : "TRANSIENT", message, { cause: error });
  }

  // The node answered and refused the payload.
  return new ChainError(context === "broadcast" ? "TERMINAL" : "TRANSIENT", message, { cause: error });
}

export function derivationPath(accountIndex: number): string {
  return `m/44'/60'/0'/0/${accountIndex}`;
}

export function createFundingWallet(credential: FundingCredential, provider: JsonRpcProvider | null): BaseWallet {
  if (credential.kind === "private-key") {
    return new Wallet(credential.privateKey, provider);
  }
  const wallet = HDNodeWallet.fromPhrase(credential.phrase, undefined, derivationPath(credential.accountIndex));
  return wallet.connect(provider);
}

export class EthersChainClient implements IChainClient {
  private readonly provider: JsonRpcProvider;
  private readonly wallet: BaseWallet;
  private readonly chainId: bigint;

  /** The network is pinned so the provider never asks the endpoint for its network. */
  constructor(config: EthersChainClientConfig) {
    const network = Network.from(config.chainId);
    this.provider = new JsonRpcProvider(config.rpcUrl, network, { staticNetwork: network });
    this.wallet = createFundingWallet(config.credential, this.provider);
    this.chainId = network.chainId;
  }

  get fundingAddress(): string {
    return this.wallet.address;
  }

  async getSequence(tag: SequenceTag): Promise<number> {
    try {
      return await this.provider.getTransactionCount(this.wallet.address, tag);
    } catch (error) {
      throw toChainError(error, "read");
    }
  }

  async estimateFee(to: string, value: bigint): Promise<FeeQuote> {
    try {
      const [feeData, gasLimit] = await Promise.all([
        this.provider.getFeeData(),
        this.provider.estimateGas({ from: this.wallet.address, to, value })
      ]);

      if (feeData.maxFeePerGas !== null && feeData.maxPriorityFeePerGas !== null) {
        return {
          gasLimit,
          pricing: {
            type: "eip1559",
            maxFeePerGas: feeData.maxFeePerGas,
            maxPriorityFeePerGas: feeData.maxPriorityFeePerGas
          }
        };
      }
      if (feeData.gasPrice !== null) {
        return { gasLimit, pricing: { type: "legacy", gasPrice: feeData.gasPrice } };
      }
      throw new ChainError("TRANSIENT", "fee-data-unavailable");
    } catch (error) {
      throw toChainError(error, "read");
    }
  }

  async signTransfer(input: TransferInput): Promise<SignedTransfer> {
    const pricing: TransactionRequest =
      input.fee.pricing.type === "eip1559"
        ? {
            type: 2,
            maxFeePerGas: input.fee.pricing.maxFeePerGas,
            maxPriorityFeePerGas: input.fee.pricing.maxPriorityFeePerGas
          }
        : { type: 0, gasPrice: input.fee.pricing.gasPrice };

    let raw: string;
    try {
      raw = await this.wallet.signTransaction({
        ...pricing,
        to: input.to,
        value: input.value,
        nonce: input.nonce,
        gasLimit: input.fee.gasLimit,
        chainId: this.chainId
      });
    } catch (error) {
      throw new ChainError("TERMINAL", `sign-transfer-failed: ${describeError(error)}`, { cause: error });
    }

    const hash = Transaction.from(raw).hash;
    if (!hash) {
      throw new ChainError("TERMINAL", "signed-transaction-missing-hash");
    }

    return {
      raw,
      hash,
      from: this.wallet.address,
      to: input.to,
      value: input.value,
      nonce: input.nonce,
      fee: input.fee
    };
  }

  async submitSignedTransaction(signed: SignedTransfer): Promise<string> {
    try {
      const response = await this.provider.broadcastTransaction(signed.raw);
      return response.hash;
    } catch (error) {
      throw toChainError(error, "broadcast");
    }
  }

  async getTransactionStatus(txHash: string): Promise<TxStatusView> {
    try {
      const receipt = await this.provider.getTransactionReceipt(txHash);
      if (receipt) {
        return {
          state: "INCLUDED",
          txHash,
          blockNumber: receipt.blockNumber,
          reverted: receipt.status === 0
        };
      }

      const pending = await this.provider.getTransaction(txHash);
      if (pending) {
        return { state: "PENDING", txHash };
      }
      return { state: "UNKNOWN", txHash };
    } catch (error) {
      throw toChainError(error, "read");
    }
  }

  async getBalance(address: string): Promise<bigint> {
    try {
      return await this.provider.getBalance(address);
    } catch (error) {
      throw toChainError(error, "read");
    }
  }

  destroy(): void {
    this.provider.destroy();
  }
}
