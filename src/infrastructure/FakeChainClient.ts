import { hexlify, id, toUtf8Bytes } from "ethers";
import { IChainClient } from "../interfaces/IChainClient";
import { ChainError, ChainErrorKind } from "../shared/errors";
import { FeeQuote, SequenceTag, SignedTransfer, TransferInput, TxStatusView } from "../types/chain.types";

export const FAKE_FUNDING_ADDRESS = "0x000000000000000000000000000000000000fa0c";

export interface FakeChainOptions {
  fundingAddress?: string;
  startingSequence?: number;
  balance?: bigint;
  /** Include every broadcast transaction right away (default true). */
  autoMine?: boolean;
  /** Quoted max fee per gas. */
  quotedFeePerGas?: bigint;
  /** Broadcasts priced below this are rejected as fee-too-low. */
  requiredFeePerGas?: bigint;
}

interface ScriptedFailure {
  kind: ChainErrorKind;
  message: string;
  /** Accept the payload into the mempool before failing, as a timed-out broadcast that still landed. */
  landed: boolean;
}

interface Inclusion {
  blockNumber: number;
  reverted: boolean;
}

function maxFeeOf(fee: FeeQuote): bigint {
  return fee.pricing.type === "eip1559" ? fee.pricing.maxFeePerGas : fee.pricing.gasPrice;
}

/**
 * In-process chain for one funding account.
 *
 * Follows node mempool rules closely enough for nonce bookkeeping: a payload
 * below the mined nonce is rejected, a second payload at a nonce already held
 * in the mempool is rejected as underpriced, and mining only includes a
 * contiguous run starting at the mined nonce.
 */
export class FakeChainClient implements IChainClient {
  readonly fundingAddress: string;
  /** Every payload the chain accepted, in acceptance order. */
  readonly accepted: SignedTransfer[] = [];
  submitCalls = 0;
  sequenceReads = 0;

  private minedNonce: number;
  private balance: bigint;
  private blockNumber = 0;
  private reachable = true;
  private autoMine: boolean;
  private readonly quotedFeePerGas: bigint;
  private requiredFeePerGas: bigint;
  private readonly mempool = new Map<number, SignedTransfer>();
  private readonly inclusions = new Map<string, Inclusion>();
  private readonly revertNonces = new Set<number>();
  private readonly submitFailures: ScriptedFailure[] = [];
  private statusFailures = 0;
  private readonly balances = new Map<string, bigint>();
  private stallGate: Promise<void> | null = null;
  private openStallGate: (() => void) | null = null;

  constructor(options: FakeChainOptions = {}) {
    this.fundingAddress = options.fundingAddress ?? FAKE_FUNDING_ADDRESS;
    this.minedNonce = options.startingSequence ?? 0;
    this.balance = options.balance ?? 1_000n * 10n ** 18n;
    this.autoMine = options.autoMine ?? true;
    this.quotedFeePerGas = options.quotedFeePerGas ?? 2_000_000_000n;
    this.requiredFeePerGas = options.requiredFeePerGas ?? 0n;
  }

  async getSequence(tag: SequenceTag): Promise<number> {
    this.assertReachable();
    this.sequenceReads += 1;
    if (tag === "latest") {
      return this.minedNonce;
    }
    let next = this.minedNonce;
    while (this.mempool.has(next)) {
      next += 1;
    }
    return next;
  }

  async estimateFee(_to: string, _value: bigint): Promise<FeeQuote> {
    this.assertReachable();
    return {
      gasLimit: 21_000n,
      pricing: {
        type: "eip1559",
        maxFeePerGas: this.quotedFeePerGas,
        maxPriorityFeePerGas: 1_000_000_000n
      }
    };
  }

  async signTransfer(input: TransferInput): Promise<SignedTransfer> {
    const body = JSON.stringify({
      from: this.fundingAddress,
      to: input.to,
      value: input.value.toString(),
      nonce: input.nonce,
      maxFee: maxFeeOf(input.fee).toString()
    });
    return {
      raw: hexlify(toUtf8Bytes(body)),
      hash: id(body),
      from: this.fundingAddress,
      to: input.to,
      value: input.value,
      nonce: input.nonce,
      fee: input.fee
    };
  }

  async submitSignedTransaction(signed: SignedTransfer): Promise<string> {
    this.submitCalls += 1;
    if (this.stallGate) {
      await this.stallGate;
    }
    if (!this.reachable) {
      throw new ChainError("AMBIGUOUS", "connect ECONNREFUSED");
    }

    const failure = this.submitFailures.shift();
    if (failure) {
      if (failure.landed) {
        this.accept(signed);
      }
      throw new ChainError(failure.kind, failure.message);
    }

    this.accept(signed);
    return signed.hash;
  }

  async getTransactionStatus(txHash: string): Promise<TxStatusView> {
    this.assertReachable();
    if (this.statusFailures > 0) {
      this.statusFailures -= 1;
      throw new ChainError("TRANSIENT", "status-query-failed");
    }

    const inclusion = this.inclusions.get(txHash);
    if (inclusion) {
      return { state: "INCLUDED", txHash, blockNumber: inclusion.blockNumber, reverted: inclusion.reverted };
    }
    for (const pending of this.mempool.values()) {
      if (pending.hash === txHash) {
        return { state: "PENDING", txHash };
      }
    }
    return { state: "UNKNOWN", txHash };
  }

  async getBalance(address: string): Promise<bigint> {
    this.assertReachable();
    if (address.toLowerCase() === this.fundingAddress.toLowerCase()) {
      return this.balance;
    }
    return this.balances.get(address.toLowerCase()) ?? 0n;
  }

  /** Includes the contiguous run of mempool payloads starting at the mined nonce. */
  mine(): number {
    let included = 0;
    for (let tx = this.mempool.get(this.minedNonce); tx; tx = this.mempool.get(this.minedNonce)) {
      this.mempool.delete(this.minedNonce);
      this.blockNumber += 1;
      const reverted = this.revertNonces.delete(tx.nonce);
      this.inclusions.set(tx.hash, { blockNumber: this.blockNumber, reverted });
      if (!reverted) {
        this.balance -= tx.value;
        const key = tx.to.toLowerCase();
        this.balances.set(key, (this.balances.get(key) ?? 0n) + tx.value);
      }
      this.minedNonce += 1;
      included += 1;
    }
    return included;
  }

  setAutoMine(enabled: boolean): void {
    this.autoMine = enabled;
  }

  setBalance(balance: bigint): void {
    this.balance = balance;
  }

  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  setRequiredFeePerGas(fee: bigint): void {
    this.requiredFeePerGas = fee;
  }

  failNextSubmits(kind: ChainErrorKind, count = 1, options: { landed?: boolean; message?: string } = {}): void {
    for (let index = 0; index < count; index += 1) {
      this.submitFailures.push({
        kind,
        message: options.message ?? `scripted-${kind.toLowerCase()}`,
        landed: options.landed ?? false
      });
    }
  }

  failNextStatusQueries(count: number): void {
    this.statusFailures += count;
  }

  revertNonce(nonce: number): void {
    this.revertNonces.add(nonce);
  }

  /** Another sender used the funding account's next nonce behind our back. */
  advanceExternally(count = 1): void {
    this.minedNonce += count;
  }

  /** Holds every broadcast until `releaseStalled` is called. */
  stallSubmits(): void {
    if (this.stallGate) {
      return;
    }
    this.stallGate = new Promise<void>((resolve) => {
      this.openStallGate = resolve;
    });
  }

  releaseStalled(): void {
    const open = this.openStallGate;
    this.stallGate = null;
    this.openStallGate = null;
    if (open) {
      open();
    }
  }

  balanceOf(address: string): bigint {
    return this.balances.get(address.toLowerCase()) ?? 0n;
  }

  get pendingCount(): number {
    return this.mempool.size;
  }

  private accept(signed: SignedTransfer): void {
    if (this.inclusions.has(signed.hash)) {
      throw new ChainError("ALREADY_KNOWN", "already known");
    }
    const holder = this.mempool.get(signed.nonce);
    if (holder && holder.hash === signed.hash) {
      throw new ChainError("ALREADY_KNOWN", "already known");
    }
    if (signed.nonce < this.minedNonce) {
      throw new ChainError("SEQUENCE_CONFLICT", "nonce too low");
    }
    if (holder) {
      throw new ChainError("FEE_TOO_LOW", "replacement transaction underpriced");
    }
    if (maxFeeOf(signed.fee) < this.requiredFeePerGas) {
      throw new ChainError("FEE_TOO_LOW", "max fee per gas less than block base fee");
    }
    if (signed.value > this.balance) {
      throw new ChainError("TERMINAL", "insufficient funds for gas * price + value");
    }

    this.mempool.set(signed.nonce, signed);
    this.accepted.push(signed);
    if (this.autoMine) {
      this.mine();
    }
  }

  private assertReachable(): void {
    if (!this.reachable) {
      throw new ChainError("TRANSIENT", "connect ECONNREFUSED");
    }
  }
}
