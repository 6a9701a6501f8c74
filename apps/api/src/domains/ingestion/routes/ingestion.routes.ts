// ============================================================================
// Patient-Visit Ingestion Routes
// Upload, job history, job detail, failed rows, and the upload template.
// ============================================================================

import { type FastifyInstance, type FastifyRequest, type FastifyReply } from 'fastify';
import multipart from '@fastify/multipart';
import {
  jobIdParamSchema,
  jobListQuerySchema,
  jobErrorsQuerySchema,
  type JobIdParam,
  type JobListQuery,
  type JobErrorsQuery,
} from '@carelytics/shared/schemas/ingestion.schema.js';
import { TEMPLATE_FILE_NAME } from '@carelytics/shared/constants/ingestion.constants.js';
import type { SelectIngestionJob } from '@carelytics/shared/schemas/db/ingestion.schema.js';
import { ValidationError } from '../../../lib/errors.js';
import {
  processPatientVisitsFile,
  type IngestionContext,
  type IngestionJobSummary,
} from '../services/ingestion-pipeline.service.js';
import {
  getJob,
  listFailedRows,
  listJobs,
  type FailedRowEntry,
} from '../services/ingestion-ledger.service.js';
import { buildTemplateCsv } from '../services/ingestion-template.service.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface IngestionRouteDeps {
  ingestion: IngestionContext;
}

export interface IngestionRouteOptions {
  deps: IngestionRouteDeps;
  /** Largest accepted upload, in bytes. */
  uploadMaxBytes?: number;
}

const DEFAULT_UPLOAD_MAX_BYTES = 10 * 1024 * 1024;

// ---------------------------------------------------------------------------
// Helpers: API response shapes
// ---------------------------------------------------------------------------

function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

function sanitizeSummary(summary: IngestionJobSummary) {
  return {
    job_id: summary.jobId,
    total_records: summary.totalRecords,
    success_count: summary.successCount,
    failure_count: summary.failureCount,
    status: summary.status,
  };
}

function sanitizeJob(job: SelectIngestionJob) {
  return {
    job_id: job.jobId,
    job_type: job.jobType,
    source_file: job.sourceFile,
    total_records: job.totalRecords,
    success_count: job.successCount,
    failure_count: job.failureCount,
    status: job.status,
    started_at: job.startedAt.toISOString(),
    completed_at: toIso(job.completedAt),
    error_message: job.errorMessage,
  };
}

function sanitizeFailedRow(row: FailedRowEntry) {
  return {
    staging_id: row.stagingId,
    row_number: row.rowNumber,
    raw_payload: row.rawPayload,
    error_message: row.errorMessage,
    processed_at: toIso(row.processedAt),
  };
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------

export async function ingestionRoutes(
  app: FastifyInstance,
  opts: IngestionRouteOptions,
) {
  const { ingestion } = opts.deps;
  const uploadMaxBytes = opts.uploadMaxBytes ?? DEFAULT_UPLOAD_MAX_BYTES;

  await app.register(multipart, {
    limits: {
      fileSize: uploadMaxBytes,
      files: 1,
    },
  });

  // =========================================================================
  // POST /api/v1/ingestion/patient-visits
  // Multipart field "file" (.csv, .xlsx, .xls). Processes synchronously and
  // returns the job summary.
  // =========================================================================

  app.post('/api/v1/ingestion/patient-visits', {
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      const data = await request.file();
      if (!data || data.fieldname !== 'file') {
        throw new ValidationError('No file uploaded');
      }

      const fileName = data.filename;
      if (!fileName) {
        throw new ValidationError('No file selected');
      }

      const chunks: Buffer[] = [];
      for await (const chunk of data.file) {
        chunks.push(chunk);
      }
      const content = Buffer.concat(chunks);

      if (data.file.truncated) {
        throw new ValidationError(
          `File exceeds maximum size of ${uploadMaxBytes} bytes`,
        );
      }

      const summary = await processPatientVisitsFile(ingestion, content, fileName);

      return reply.code(200).send({ data: sanitizeSummary(summary) });
    },
  });

  // =========================================================================
  // GET /api/v1/ingestion/jobs
  // Job history, newest first.
  // =========================================================================

  app.get('/api/v1/ingestion/jobs', {
    schema: { querystring: jobListQuerySchema },
    handler: async (
      request: FastifyRequest<{ Querystring: JobListQuery }>,
      reply: FastifyReply,
    ) => {
      const { page, page_size } = request.query;
      const result = await listJobs(ingestion.ledgerRepo, page, page_size);

      return reply.code(200).send({
        data: result.data.map(sanitizeJob),
        pagination: {
          total: result.pagination.total,
          page: result.pagination.page,
          page_size: result.pagination.pageSize,
          has_more: result.pagination.hasMore,
        },
      });
    },
  });

  // =========================================================================
  // GET /api/v1/ingestion/jobs/:id
  // =========================================================================

  app.get('/api/v1/ingestion/jobs/:id', {
    schema: { params: jobIdParamSchema },
    handler: async (
      request: FastifyRequest<{ Params: JobIdParam }>,
      reply: FastifyReply,
    ) => {
      const job = await getJob(ingestion.ledgerRepo, request.params.id);
      return reply.code(200).send({ data: sanitizeJob(job) });
    },
  });

  // =========================================================================
  // GET /api/v1/ingestion/jobs/:id/errors
  // Failed staging rows of one job, by row number.
  // =========================================================================

  app.get('/api/v1/ingestion/jobs/:id/errors', {
    schema: { params: jobIdParamSchema, querystring: jobErrorsQuerySchema },
    handler: async (
      request: FastifyRequest<{ Params: JobIdParam; Querystring: JobErrorsQuery }>,
      reply: FastifyReply,
    ) => {
      const rows = await listFailedRows(
        ingestion.ledgerRepo,
        request.params.id,
        request.query.limit,
      );
      return reply.code(200).send({ data: rows.map(sanitizeFailedRow) });
    },
  });

  // =========================================================================
  // GET /api/v1/ingestion/template
  // =========================================================================

  app.get('/api/v1/ingestion/template', {
    handler: async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply
        .code(200)
        .header('Content-Type', 'text/csv; charset=utf-8')
        .header('Content-Disposition', `attachment; filename="${TEMPLATE_FILE_NAME}"`)
        .send(buildTemplateCsv());
    },
  });
}
