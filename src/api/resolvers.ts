import {
  DisbursementOutcome,
  DisbursementRecord,
  DisbursementStatus,
  SubmissionAttempt
} from "../types/disbursement.types";
import { ApiContext } from "./context";

function toGraphRow(row: DisbursementRecord) {
  return {
    id: row.id,
    requesterId: row.requesterId,
    destination: row.destination,
    amount: row.amount,
    status: row.status,
    sequence: row.sequence,
    txHash: row.txHash,
    failureReason: row.failureReason,
    attemptCount: row.attemptCount,
    createdAt: String(row.createdAt),
    updatedAt: String(row.updatedAt),
    settledAt: row.settledAt === null ? null : String(row.settledAt)
  };
}

type GraphRow = ReturnType<typeof toGraphRow>;

function toGraphAttempt(attempt: SubmissionAttempt) {
  return { ...attempt, submittedAt: String(attempt.submittedAt) };
}

export function toGraphResult(outcome: DisbursementOutcome) {
  const empty = {
    disbursementId: null,
    txHash: null,
    sequence: null,
    reason: null,
    cause: null,
    retryAfterMs: null
  };

  switch (outcome.kind) {
    case "CONFIRMED":
      return {
        ...empty,
        outcome: outcome.kind,
        disbursementId: outcome.disbursementId,
        txHash: outcome.txHash,
        sequence: outcome.sequence
      };
    case "FAILED":
    case "ABANDONED":
      return {
        ...empty,
        outcome: outcome.kind,
        disbursementId: outcome.disbursementId,
        txHash: outcome.txHash,
        reason: outcome.reason
      };
    case "PENDING":
      return { ...empty, outcome: outcome.kind, disbursementId: outcome.disbursementId };
    case "RATE_LIMITED":
      return {
        ...empty,
        outcome: outcome.kind,
        reason: outcome.reason,
        cause: outcome.cause,
        retryAfterMs: outcome.retryAfterMs
      };
    case "INVALID_ADDRESS":
    case "UNAVAILABLE":
      return { ...empty, outcome: outcome.kind, reason: outcome.reason };
  }
}

function encodeCursor(id: string): string {
  return Buffer.from(`id:${id}`, "utf8").toString("base64");
}

function decodeCursor(cursor: string | null | undefined): string | undefined {
  if (!cursor) {
    return undefined;
  }

  const decoded = Buffer.from(cursor, "base64").toString("utf8");
  if (!decoded.startsWith("id:")) {
    throw new Error("invalid-cursor");
  }
  return decoded.slice(3);
}

function asPositiveFirst(value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error("first must be a positive integer");
  }
  if (value > 100) {
    throw new Error("first cannot be greater than 100");
  }
  return value;
}

export function buildResolvers() {
  return {
    Query: {
      health: (_: unknown, __: unknown, context: ApiContext) => context.faucet.healthStatus(),
      disbursement: (_: unknown, args: { id: string }, context: ApiContext) => {
        const details = context.faucet.getDisbursement(args.id);
        return details ? toGraphRow(details.record) : null;
      },
      disbursements: (
        _: unknown,
        args: { status?: DisbursementStatus | null; first: number; after?: string | null },
        context: ApiContext
      ) => {
        const first = asPositiveFirst(args.first);
        const after = decodeCursor(args.after);

        const rows = context.faucet.listDisbursements({ status: args.status ?? undefined, first: first + 1, after });
        const hasNextPage = rows.length > first;
        const pageRows = hasNextPage ? rows.slice(0, first) : rows;

        const edges = pageRows.map((row) => ({ cursor: encodeCursor(row.id), node: toGraphRow(row) }));
        return {
          edges,
          pageInfo: {
            endCursor: edges.length > 0 ? edges[edges.length - 1].cursor : null,
            hasNextPage
          }
        };
      }
    },
    Disbursement: {
      attempts: (parent: GraphRow, _: unknown, context: ApiContext) =>
        (context.faucet.getDisbursement(parent.id)?.attempts ?? []).map(toGraphAttempt)
    },
    Mutation: {
      requestDisbursement: async (
        _: unknown,
        args: { requesterId: string; destination: string },
        context: ApiContext
      ) => {
        // The requester id drives the cooldown, so only a gateway may assert it.
        if (!context.trustedGateway) {
          throw new Error("untrusted-requester");
        }
        return toGraphResult(await context.faucet.requestDisbursement(args.requesterId, args.destination));
      }
    }
  };
}
