import { FeeQuote } from "../types/chain.types";

/** Raises every price component of `quote` by `percent` per bump, compounding. */
export function bumpFee(quote: FeeQuote, percent: number, bumps: number): FeeQuote {
  if (bumps <= 0 || percent <= 0) {
    return quote;
  }

  const scale = (value: bigint): bigint => {
    let next = value;
    for (let index = 0; index < bumps; index += 1) {
      next = (next * BigInt(100 + percent) + 99n) / 100n;
    }
    return next;
  };

  if (quote.pricing.type === "eip1559") {
    return {
      gasLimit: quote.gasLimit,
      pricing: {
        type: "eip1559",
        maxFeePerGas: scale(quote.pricing.maxFeePerGas),
        maxPriorityFeePerGas: scale(quote.pricing.maxPriorityFeePerGas)
      }
    };
  }

  return {
    gasLimit: quote.gasLimit,
    pricing: { type: "legacy", gasPrice: scale(quote.pricing.gasPrice) }
  };
}

export function describeFee(quote: FeeQuote): string {
  if (quote.pricing.type === "eip1559") {
    return `gas=${quote.gasLimit} maxFee=${quote.pricing.maxFeePerGas} tip=${quote.pricing.maxPriorityFeePerGas}`;
  }
  return `gas=${quote.gasLimit} gasPrice=${quote.pricing.gasPrice}`;
}
