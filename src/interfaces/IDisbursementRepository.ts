import {
  DisbursementRecord,
  DisbursementRequest,
  DisbursementStatus,
  ListDisbursementInput,
  SubmissionAttempt,
  UpdateStatusPatch
} from "../types/disbursement.types";

export interface IDisbursementRepository {
  create(request: DisbursementRequest): DisbursementRecord;

  getById(id: string): DisbursementRecord | null;
  updateStatus(
    id: string,
    status: DisbursementStatus,
    now: number,
    patch?: UpdateStatusPatch
  ): DisbursementRecord | null;

  recordAttempt(id: string, attempt: SubmissionAttempt): void;
  listAttempts(id: string): SubmissionAttempt[];

  list(input: ListDisbursementInput): DisbursementRecord[];
  listUnsettled(): DisbursementRecord[];
}
