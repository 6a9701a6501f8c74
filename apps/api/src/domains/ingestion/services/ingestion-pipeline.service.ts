import type { FastifyBaseLogger } from 'fastify';
import type { JobStatus } from '@carelytics/shared/constants/ingestion.constants.js';
import {
  RowValidationError,
  StorageError,
  StorageUnavailableError,
  ValidationError,
} from '../../../lib/errors.js';
import type { WarehouseRepository } from '../repos/warehouse.repo.js';
import type { IngestionLedgerRepository } from '../repos/ingestion-ledger.repo.js';
import { detectTabularFormat, readTabularFile } from './tabular-reader.service.js';
import {
  createVisitRowView,
  normalizeVisitRow,
  validateColumns,
} from './row-validation.service.js';
import { resolveDimensions } from './dimension-resolver.service.js';
import { writeVisitFact } from './fact-writer.service.js';
import {
  abortJob,
  finalizeJob,
  markRowFailed,
  markRowProcessed,
  openStagingRow,
  startJob,
  type JobCounts,
} from './ingestion-ledger.service.js';

// ---------------------------------------------------------------------------
// Pipeline context (constructed by the caller, one per process or test)
// ---------------------------------------------------------------------------

export type IngestionLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface IngestionContext {
  warehouseRepo: WarehouseRepository;
  ledgerRepo: IngestionLedgerRepository;
  logger: IngestionLogger;
}

export interface IngestionJobSummary {
  jobId: string;
  totalRecords: number;
  successCount: number;
  failureCount: number;
  status: JobStatus;
}

// ---------------------------------------------------------------------------
// Failure classification
// ---------------------------------------------------------------------------

const UNREACHABLE_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
]);

// 57P01 admin_shutdown, 57P02 crash_shutdown, 57P03 cannot_connect_now
const SHUTDOWN_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}

/**
 * True when the error (or anything in its cause chain) means the database
 * cannot be reached, as opposed to rejecting one row's data.
 */
export function isStorageUnavailable(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && current != null; depth++) {
    if (current instanceof StorageUnavailableError) return true;

    const code = errorCode(current);
    if (code !== undefined) {
      if (UNREACHABLE_ERROR_CODES.has(code)) return true;
      if (SHUTDOWN_SQLSTATES.has(code)) return true;
      if (/^08[0-9A-Z]{3}$/.test(code)) return true;
    }

    current = current instanceof Error ? current.cause : undefined;
  }
  return false;
}

function toFatalError(err: unknown): unknown {
  if (err instanceof StorageUnavailableError) return err;
  if (isStorageUnavailable(err)) {
    const message = err instanceof Error ? err.message : String(err);
    return new StorageUnavailableError(`Storage unavailable: ${message}`, err);
  }
  return err;
}

/** Anything that is not a validation failure is reported as a storage error. */
function toRowFailure(err: unknown): RowValidationError | StorageError {
  if (err instanceof RowValidationError || err instanceof StorageError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StorageError(message, err);
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Ingest one uploaded file of patient visits as a single job.
 *
 * Format and header problems are thrown before any job exists. After that,
 * every row gets a staging record; rows that fail validation or storage are
 * recorded and skipped. A row's dimension and fact writes share one
 * transaction, so a failed row leaves nothing behind in the warehouse.
 *
 * Storage outages and ledger write failures abort the job: it is marked
 * FAILED where possible and the error is rethrown.
 */
export async function processPatientVisitsFile(
  ctx: IngestionContext,
  content: Buffer,
  fileName: string,
): Promise<IngestionJobSummary> {
  detectTabularFormat(fileName);
  if (content.length === 0) {
    throw new ValidationError('Uploaded file is empty');
  }

  const table = readTabularFile(content, fileName);
  validateColumns(table.columns);

  let jobId: string;
  try {
    const job = await startJob(ctx.ledgerRepo, fileName);
    jobId = job.jobId;
  } catch (err) {
    ctx.logger.error({ err, fileName }, 'Could not create ingestion job');
    throw toFatalError(err);
  }

  ctx.logger.info(
    { jobId, fileName, format: table.format, rows: table.rows.length },
    'Ingestion job started',
  );

  const counts: JobCounts = {
    totalRecords: table.rows.length,
    successCount: 0,
    failureCount: 0,
  };

  try {
    for (let i = 0; i < table.rows.length; i++) {
      const raw = table.rows[i];
      const rowNumber = i + 1;
      const staging = await openStagingRow(ctx.ledgerRepo, jobId, rowNumber, fileName, raw);

      let failure: RowValidationError | StorageError | null = null;
      try {
        const row = normalizeVisitRow(createVisitRowView(raw));
        await ctx.warehouseRepo.transaction(async (tx) => {
          const dims = await resolveDimensions(tx, row);
          await writeVisitFact(tx, dims, row);
        });
      } catch (err) {
        if (isStorageUnavailable(err)) throw err;
        failure = toRowFailure(err);
      }

      if (failure) {
        await markRowFailed(ctx.ledgerRepo, staging.stagingId, failure.message);
        counts.failureCount++;
        ctx.logger.debug(
          { jobId, rowNumber, reason: failure.name, message: failure.message },
          'Ingestion row failed',
        );
      } else {
        await markRowProcessed(ctx.ledgerRepo, staging.stagingId);
        counts.successCount++;
      }
    }

    const status = await finalizeJob(ctx.ledgerRepo, jobId, counts);

    ctx.logger.info({ jobId, ...counts, status }, 'Ingestion job finished');

    return { jobId, ...counts, status };
  } catch (err) {
    const fatal = toFatalError(err);
    const message = fatal instanceof Error ? fatal.message : String(fatal);

    ctx.logger.error({ err, jobId, ...counts }, 'Ingestion job aborted');

    try {
      await abortJob(ctx.ledgerRepo, jobId, message, counts);
    } catch (abortErr) {
      ctx.logger.error({ err: abortErr, jobId }, 'Could not mark ingestion job as failed');
    }

    throw fatal;
  }
}
