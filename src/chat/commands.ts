import { formatEther } from "ethers";
import { DisbursementOutcome } from "../types/disbursement.types";

export const USAGE_MESSAGE = "Usage: !faucet <address>";

export type FaucetCommand = { kind: "request"; destination: string } | { kind: "usage" };

export interface ChatMessage {
  requesterId: string;
  content: string;
}

export interface ChatReplyOptions {
  grantAmountWei: bigint;
  /** Prefix the transaction hash is appended to, e.g. "https://explorer.example/tx/". */
  explorerTxUrl?: string | null;
}

export interface DisbursementRequester {
  requestDisbursement(requesterId: string, destination: string): Promise<DisbursementOutcome>;
}

const COMMAND_PATTERN = /^[!/]faucet(?:\s+(\S+))?\s*$/i;
const COMMAND_PREFIX = /^[!/]faucet\b/i;

/** `null` for messages that are not faucet commands at all. */
export function parseFaucetCommand(content: string): FaucetCommand | null {
  const trimmed = content.trim();
  if (!COMMAND_PREFIX.test(trimmed)) {
    return null;
  }

  const match = COMMAND_PATTERN.exec(trimmed);
  if (!match || !match[1]) {
    return { kind: "usage" };
  }
  return { kind: "request", destination: match[1] };
}

/** Rounds up to whole seconds: "45s", "2m 5s", "1h 0m 30s". */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(1, Math.ceil(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return `${hours}h ${minutes}m ${seconds}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

function txReference(txHash: string, explorerTxUrl: string | null | undefined): string {
  return explorerTxUrl ? `${explorerTxUrl}${txHash}` : txHash;
}

export function formatOutcomeMessage(outcome: DisbursementOutcome, options: ChatReplyOptions): string {
  const amount = `${formatEther(options.grantAmountWei)} ETH`;

  switch (outcome.kind) {
    case "CONFIRMED":
      return `Sent ${amount}. Transaction: ${txReference(outcome.txHash, options.explorerTxUrl)}`;
    case "PENDING":
      return `Your request for ${amount} is queued and still being processed (id ${outcome.disbursementId}).`;
    case "RATE_LIMITED":
      if (outcome.cause === "cooldown" && outcome.retryAfterMs !== null) {
        return `You already received funds recently. Try again in ${formatDuration(outcome.retryAfterMs)}.`;
      }
      return "The faucet is busy right now. Please try again in a moment.";
    case "INVALID_ADDRESS":
      return `That is not a valid address: ${outcome.reason}`;
    case "FAILED":
    case "ABANDONED": {
      const reference = outcome.txHash ? ` Transaction: ${txReference(outcome.txHash, options.explorerTxUrl)}` : "";
      return `The transfer could not be completed (${outcome.reason}).${reference}`;
    }
    case "UNAVAILABLE":
      return "The faucet is currently unavailable. Please try again later.";
  }
}

/** Transport-neutral handler a chat gateway calls for every incoming message. */
export async function handleChatCommand(
  faucet: DisbursementRequester,
  message: ChatMessage,
  options: ChatReplyOptions
): Promise<string | null> {
  const command = parseFaucetCommand(message.content);
  if (!command) {
    return null;
  }
  if (command.kind === "usage") {
    return USAGE_MESSAGE;
  }

  const outcome = await faucet.requestDisbursement(message.requesterId, command.destination);
  return formatOutcomeMessage(outcome, options);
}
