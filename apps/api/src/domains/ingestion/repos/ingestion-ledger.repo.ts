import { eq, and, asc, desc, count } from 'drizzle-orm';
import {
  ingestionJobs,
  stagingPatientVisits,
  type InsertIngestionJob,
  type SelectIngestionJob,
  type InsertStagingPatientVisit,
  type SelectStagingPatientVisit,
} from '@carelytics/shared/schemas/db/ingestion.schema.js';
import {
  JobStatus,
  StagingStatus,
} from '@carelytics/shared/constants/ingestion.constants.js';
import type { WarehouseDb } from '../../../lib/db.js';

// ---------------------------------------------------------------------------
// Pagination types
// ---------------------------------------------------------------------------

export interface PaginatedResult<T> {
  data: T[];
  pagination: {
    total: number;
    page: number;
    pageSize: number;
    hasMore: boolean;
  };
}

// ---------------------------------------------------------------------------
// Ingestion Ledger Repository (ingestion_jobs + staging_patient_visits)
// ---------------------------------------------------------------------------

export interface JobCompletion {
  totalRecords: number;
  successCount: number;
  failureCount: number;
  status: JobStatus;
  completedAt: Date;
  errorMessage?: string | null;
}

export interface StagingOutcome {
  status: typeof StagingStatus.PROCESSED | typeof StagingStatus.FAILED;
  errorMessage: string | null;
  processedAt: Date;
}

export interface IngestionLedgerRepository {
  createJob(data: InsertIngestionJob): Promise<SelectIngestionJob>;
  completeJob(
    jobId: string,
    completion: JobCompletion,
  ): Promise<SelectIngestionJob | undefined>;
  findJobById(jobId: string): Promise<SelectIngestionJob | undefined>;
  listJobs(
    page: number,
    pageSize: number,
  ): Promise<PaginatedResult<SelectIngestionJob>>;

  createStagingRow(
    data: InsertStagingPatientVisit,
  ): Promise<SelectStagingPatientVisit>;
  finalizeStagingRow(
    stagingId: string,
    outcome: StagingOutcome,
  ): Promise<SelectStagingPatientVisit | undefined>;
  listFailedStagingRows(
    jobId: string,
    limit: number,
  ): Promise<SelectStagingPatientVisit[]>;
}

export function createIngestionLedgerRepository(
  db: WarehouseDb,
): IngestionLedgerRepository {
  return {
    async createJob(data: InsertIngestionJob): Promise<SelectIngestionJob> {
      const rows = await db.insert(ingestionJobs).values(data).returning();
      return rows[0];
    },

    /**
     * Write final counts and status. Only a job still PROCESSING is updated,
     * so a terminal job is never rewritten.
     */
    async completeJob(
      jobId: string,
      completion: JobCompletion,
    ): Promise<SelectIngestionJob | undefined> {
      const rows = await db
        .update(ingestionJobs)
        .set({
          totalRecords: completion.totalRecords,
          successCount: completion.successCount,
          failureCount: completion.failureCount,
          status: completion.status,
          completedAt: completion.completedAt,
          errorMessage: completion.errorMessage ?? null,
        })
        .where(
          and(
            eq(ingestionJobs.jobId, jobId),
            eq(ingestionJobs.status, JobStatus.PROCESSING),
          ),
        )
        .returning();
      return rows[0];
    },

    async findJobById(jobId: string): Promise<SelectIngestionJob | undefined> {
      const rows = await db
        .select()
        .from(ingestionJobs)
        .where(eq(ingestionJobs.jobId, jobId))
        .limit(1);
      return rows[0];
    },

    /**
     * Job history, newest first. Paginated.
     */
    async listJobs(
      page: number,
      pageSize: number,
    ): Promise<PaginatedResult<SelectIngestionJob>> {
      const offset = (page - 1) * pageSize;

      const [countResult, rows] = await Promise.all([
        db.select({ total: count() }).from(ingestionJobs),
        db
          .select()
          .from(ingestionJobs)
          .orderBy(desc(ingestionJobs.startedAt))
          .limit(pageSize)
          .offset(offset),
      ]);

      const total = Number(countResult[0]?.total ?? 0);

      return {
        data: rows,
        pagination: {
          total,
          page,
          pageSize,
          hasMore: page * pageSize < total,
        },
      };
    },

    async createStagingRow(
      data: InsertStagingPatientVisit,
    ): Promise<SelectStagingPatientVisit> {
      const rows = await db
        .insert(stagingPatientVisits)
        .values(data)
        .returning();
      return rows[0];
    },

    /**
     * Move a PENDING staging row to its terminal status. A row that is
     * already finalized is left as is and undefined is returned.
     */
    async finalizeStagingRow(
      stagingId: string,
      outcome: StagingOutcome,
    ): Promise<SelectStagingPatientVisit | undefined> {
      const rows = await db
        .update(stagingPatientVisits)
        .set({
          status: outcome.status,
          errorMessage: outcome.errorMessage,
          processedAt: outcome.processedAt,
        })
        .where(
          and(
            eq(stagingPatientVisits.stagingId, stagingId),
            eq(stagingPatientVisits.status, StagingStatus.PENDING),
          ),
        )
        .returning();
      return rows[0];
    },

    async listFailedStagingRows(
      jobId: string,
      limit: number,
    ): Promise<SelectStagingPatientVisit[]> {
      return db
        .select()
        .from(stagingPatientVisits)
        .where(
          and(
            eq(stagingPatientVisits.jobId, jobId),
            eq(stagingPatientVisits.status, StagingStatus.FAILED),
          ),
        )
        .orderBy(asc(stagingPatientVisits.rowNumber))
        .limit(limit);
    },
  };
}
