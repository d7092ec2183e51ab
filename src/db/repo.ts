import { Database, SqlValue } from "sql.js";
import { IDisbursementRepository } from "../interfaces/IDisbursementRepository";
import {
  DisbursementRecord,
  DisbursementRequest,
  DisbursementStatus,
  ListDisbursementInput,
  SubmissionAttempt,
  UpdateStatusPatch
} from "../types/disbursement.types";

const DISBURSEMENT_STATUSES: ReadonlyArray<DisbursementStatus> = [
  "QUEUED",
  "SUBMITTED",
  "CONFIRMED",
  "FAILED",
  "ABANDONED"
];

const ALLOWED_TRANSITIONS: Record<DisbursementStatus, ReadonlyArray<DisbursementStatus>> = {
  QUEUED: ["SUBMITTED", "FAILED"],
  SUBMITTED: ["CONFIRMED", "FAILED", "ABANDONED"],
  CONFIRMED: [],
  FAILED: [],
  ABANDONED: []
};

const SELECT_COLUMNS = `id, requester_id, destination, amount, status, sequence, tx_hash, failure_reason,
  attempt_count, created_at, updated_at, settled_at`;

export function isDisbursementStatus(value: unknown): value is DisbursementStatus {
  return typeof value === "string" && DISBURSEMENT_STATUSES.some((status) => status === value);
}

function asString(value: SqlValue, column: string): string {
  if (typeof value !== "string") {
    throw new Error(`unexpected-column-type:${column}`);
  }
  return value;
}

function asNullableString(value: SqlValue, column: string): string | null {
  return value === null ? null : asString(value, column);
}

function asNumber(value: SqlValue, column: string): number {
  if (typeof value !== "number") {
    throw new Error(`unexpected-column-type:${column}`);
  }
  return value;
}

function asNullableNumber(value: SqlValue, column: string): number | null {
  return value === null ? null : asNumber(value, column);
}

function mapRow(values: SqlValue[]): DisbursementRecord {
  const status = values[4];
  if (!isDisbursementStatus(status)) {
    throw new Error(`unexpected-status:${String(status)}`);
  }

  return {
    id: asString(values[0], "id"),
    requesterId: asString(values[1], "requester_id"),
    destination: asString(values[2], "destination"),
    amount: asString(values[3], "amount"),
    status,
    sequence: asNullableNumber(values[5], "sequence"),
    txHash: asNullableString(values[6], "tx_hash"),
    failureReason: asNullableString(values[7], "failure_reason"),
    attemptCount: asNumber(values[8], "attempt_count"),
    createdAt: asNumber(values[9], "created_at"),
    updatedAt: asNumber(values[10], "updated_at"),
    settledAt: asNullableNumber(values[11], "settled_at")
  };
}

function mapAttempt(values: SqlValue[]): SubmissionAttempt {
  return {
    attempt: asNumber(values[0], "attempt"),
    sequence: asNumber(values[1], "sequence"),
    txHash: asNullableString(values[2], "tx_hash"),
    fee: asNullableString(values[3], "fee"),
    submittedAt: asNumber(values[4], "submitted_at"),
    error: asNullableString(values[5], "error")
  };
}

export class DisbursementRepo implements IDisbursementRepository {
  constructor(private readonly db: Database) {}

  create(request: DisbursementRequest): DisbursementRecord {
    this.db.run(
      `INSERT INTO disbursements (
        id, requester_id, destination, amount, status,
        sequence, tx_hash, failure_reason, attempt_count,
        created_at, updated_at, settled_at
      ) VALUES (?, ?, ?, ?, 'QUEUED', NULL, NULL, NULL, 0, ?, ?, NULL)`,
      [request.id, request.requesterId, request.destination, request.amount, request.submittedAt, request.submittedAt]
    );

    const created = this.getById(request.id);
    if (!created) {
      throw new Error(`failed-to-persist-disbursement:${request.id}`);
    }
    return created;
  }

  getById(id: string): DisbursementRecord | null {
    const stmt = this.db.prepare(`SELECT ${SELECT_COLUMNS} FROM disbursements WHERE id = ?`);
    stmt.bind([id]);
    if (!stmt.step()) {
      stmt.free();
      return null;
    }
    const row = mapRow(stmt.get());
    stmt.free();
    return row;
  }

  updateStatus(
    id: string,
    status: DisbursementStatus,
    now: number,
    patch?: UpdateStatusPatch
  ): DisbursementRecord | null {
    const current = this.getById(id);
    if (!current) return null;

    if (current.status !== status && !ALLOWED_TRANSITIONS[current.status].includes(status)) {
      return null;
    }

    const nextSequence = patch?.sequence ?? current.sequence;
    const nextTxHash = patch?.txHash ?? current.txHash;
    const nextFailureReason = patch?.failureReason ?? current.failureReason;
    const nextSettledAt = patch?.settledAt ?? current.settledAt;

    this.db.run(
      `UPDATE disbursements
       SET status = ?, sequence = ?, tx_hash = ?, failure_reason = ?, settled_at = ?, updated_at = ?
       WHERE id = ?`,
      [status, nextSequence, nextTxHash, nextFailureReason, nextSettledAt, now, id]
    );
    return this.getById(id);
  }

  recordAttempt(id: string, attempt: SubmissionAttempt): void {
    this.db.run(
      `INSERT INTO submission_attempts (disbursement_id, attempt, sequence, tx_hash, fee, submitted_at, error)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [id, attempt.attempt, attempt.sequence, attempt.txHash, attempt.fee, attempt.submittedAt, attempt.error]
    );
    this.db.run(
      `UPDATE disbursements SET attempt_count = attempt_count + 1, updated_at = ? WHERE id = ?`,
      [attempt.submittedAt, id]
    );
  }

  listAttempts(id: string): SubmissionAttempt[] {
    const stmt = this.db.prepare(
      `SELECT attempt, sequence, tx_hash, fee, submitted_at, error
       FROM submission_attempts WHERE disbursement_id = ? ORDER BY attempt ASC`
    );
    stmt.bind([id]);
    const attempts: SubmissionAttempt[] = [];
    while (stmt.step()) {
      attempts.push(mapAttempt(stmt.get()));
    }
    stmt.free();
    return attempts;
  }

  list(input: ListDisbursementInput): DisbursementRecord[] {
    const first = Math.max(1, Math.min(101, input.first));
    const conditions: string[] = [];
    const params: SqlValue[] = [];

    if (input.status) {
      conditions.push("status = ?");
      params.push(input.status);
    }

    if (input.after) {
      conditions.push("id > ?");
      params.push(input.after);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const stmt = this.db.prepare(`SELECT ${SELECT_COLUMNS} FROM disbursements ${where} ORDER BY id ASC LIMIT ?`);

    stmt.bind([...params, first]);
    const rows: DisbursementRecord[] = [];
    while (stmt.step()) {
      rows.push(mapRow(stmt.get()));
    }
    stmt.free();
    return rows;
  }

  /** QUEUED and SUBMITTED rows, oldest first: the work a restart has to pick up. */
  listUnsettled(): DisbursementRecord[] {
    const stmt = this.db.prepare(
      `SELECT ${SELECT_COLUMNS} FROM disbursements
       WHERE status IN ('QUEUED', 'SUBMITTED')
       ORDER BY created_at ASC, id ASC`
    );
    const rows: DisbursementRecord[] = [];
    while (stmt.step()) {
      rows.push(mapRow(stmt.get()));
    }
    stmt.free();
    return rows;
  }
}
