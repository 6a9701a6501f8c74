// ============================================================================
// Patient-Visit Ingestion: Drizzle DB Schema (job + staging ledger)
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  timestamp,
  text,
  integer,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

// --- Ingestion Jobs Table ---
// One row per upload. Created as PROCESSING before the first row is read and
// finalized once with aggregate counts.

export const ingestionJobs = pgTable(
  'ingestion_jobs',
  {
    jobId: uuid('job_id').primaryKey().defaultRandom(),
    jobType: varchar('job_type', { length: 30 }).notNull(),
    sourceFile: varchar('source_file', { length: 255 }).notNull(),
    totalRecords: integer('total_records').notNull().default(0),
    successCount: integer('success_count').notNull().default(0),
    failureCount: integer('failure_count').notNull().default(0),
    status: varchar('status', { length: 20 }).notNull().default('PROCESSING'),
    startedAt: timestamp('started_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    errorMessage: text('error_message'),
  },
  (table) => [
    index('ingestion_jobs_status_idx').on(table.status),
    index('ingestion_jobs_started_at_idx').on(table.startedAt),
  ],
);

// --- Staging Patient Visits Table ---
// One row per input record regardless of outcome. raw_payload keeps the
// parsed row verbatim for replay and audit.

export const stagingPatientVisits = pgTable(
  'staging_patient_visits',
  {
    stagingId: uuid('staging_id').primaryKey().defaultRandom(),
    jobId: uuid('job_id')
      .notNull()
      .references(() => ingestionJobs.jobId),
    rowNumber: integer('row_number').notNull(),
    rawPayload: jsonb('raw_payload').notNull(),
    sourceFile: varchar('source_file', { length: 255 }).notNull(),
    status: varchar('status', { length: 20 }).notNull().default('PENDING'),
    errorMessage: text('error_message'),
    insertedAt: timestamp('inserted_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    processedAt: timestamp('processed_at', { withTimezone: true }),
  },
  (table) => [
    index('staging_patient_visits_job_status_idx').on(
      table.jobId,
      table.status,
    ),
  ],
);

// --- Inferred Types ---

export type InsertIngestionJob = typeof ingestionJobs.$inferInsert;
export type SelectIngestionJob = typeof ingestionJobs.$inferSelect;

export type InsertStagingPatientVisit = typeof stagingPatientVisits.$inferInsert;
export type SelectStagingPatientVisit = typeof stagingPatientVisits.$inferSelect;
