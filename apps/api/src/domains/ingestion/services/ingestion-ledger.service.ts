import {
  IngestionJobType,
  JobStatus,
  StagingStatus,
  MAX_FAILED_ROWS_LISTED,
} from '@carelytics/shared/constants/ingestion.constants.js';
import type {
  SelectIngestionJob,
  SelectStagingPatientVisit,
} from '@carelytics/shared/schemas/db/ingestion.schema.js';
import { NotFoundError } from '../../../lib/errors.js';
import type {
  IngestionLedgerRepository,
  PaginatedResult,
} from '../repos/ingestion-ledger.repo.js';
import type { RawRow } from './tabular-reader.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface JobCounts {
  totalRecords: number;
  successCount: number;
  failureCount: number;
}

export interface FailedRowEntry {
  stagingId: string;
  rowNumber: number;
  rawPayload: unknown;
  errorMessage: string | null;
  processedAt: Date | null;
}

/**
 * A job fails only when it had rows and none of them made it through.
 * Partial success, and an empty file, both complete.
 */
export function deriveJobStatus(counts: JobCounts): JobStatus {
  return counts.successCount === 0 && counts.totalRecords > 0
    ? JobStatus.FAILED
    : JobStatus.COMPLETED;
}

// ---------------------------------------------------------------------------
// Job lifecycle
// ---------------------------------------------------------------------------

export async function startJob(
  repo: IngestionLedgerRepository,
  fileName: string,
): Promise<SelectIngestionJob> {
  return repo.createJob({
    jobType: IngestionJobType.PATIENT_VISITS,
    sourceFile: fileName,
    status: JobStatus.PROCESSING,
    startedAt: new Date(),
  });
}

export async function finalizeJob(
  repo: IngestionLedgerRepository,
  jobId: string,
  counts: JobCounts,
): Promise<JobStatus> {
  const status = deriveJobStatus(counts);
  await repo.completeJob(jobId, {
    ...counts,
    status,
    completedAt: new Date(),
  });
  return status;
}

/** Mark a job FAILED after a fatal error, keeping the counts reached so far. */
export async function abortJob(
  repo: IngestionLedgerRepository,
  jobId: string,
  message: string,
  counts: JobCounts,
): Promise<void> {
  await repo.completeJob(jobId, {
    ...counts,
    status: JobStatus.FAILED,
    completedAt: new Date(),
    errorMessage: message,
  });
}

// ---------------------------------------------------------------------------
// Staging rows
// ---------------------------------------------------------------------------

export async function openStagingRow(
  repo: IngestionLedgerRepository,
  jobId: string,
  rowNumber: number,
  fileName: string,
  rawPayload: RawRow,
): Promise<SelectStagingPatientVisit> {
  return repo.createStagingRow({
    jobId,
    rowNumber,
    rawPayload,
    sourceFile: fileName,
    status: StagingStatus.PENDING,
  });
}

export async function markRowProcessed(
  repo: IngestionLedgerRepository,
  stagingId: string,
): Promise<void> {
  await repo.finalizeStagingRow(stagingId, {
    status: StagingStatus.PROCESSED,
    errorMessage: null,
    processedAt: new Date(),
  });
}

export async function markRowFailed(
  repo: IngestionLedgerRepository,
  stagingId: string,
  message: string,
): Promise<void> {
  await repo.finalizeStagingRow(stagingId, {
    status: StagingStatus.FAILED,
    errorMessage: message,
    processedAt: new Date(),
  });
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export async function listJobs(
  repo: IngestionLedgerRepository,
  page: number,
  pageSize: number,
): Promise<PaginatedResult<SelectIngestionJob>> {
  return repo.listJobs(page, pageSize);
}

export async function getJob(
  repo: IngestionLedgerRepository,
  jobId: string,
): Promise<SelectIngestionJob> {
  const job = await repo.findJobById(jobId);
  if (!job) {
    throw new NotFoundError('Ingestion job');
  }
  return job;
}

export async function listFailedRows(
  repo: IngestionLedgerRepository,
  jobId: string,
  limit: number = MAX_FAILED_ROWS_LISTED,
): Promise<FailedRowEntry[]> {
  await getJob(repo, jobId);

  const rows = await repo.listFailedStagingRows(
    jobId,
    Math.min(Math.max(limit, 1), MAX_FAILED_ROWS_LISTED),
  );
  return rows.map((row) => ({
    stagingId: row.stagingId,
    rowNumber: row.rowNumber,
    rawPayload: row.rawPayload,
    errorMessage: row.errorMessage,
    processedAt: row.processedAt,
  }));
}
