// ============================================================================
// Patient-Visit Ingestion: Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  DEFAULT_JOBS_PAGE_SIZE,
  MAX_FAILED_ROWS_LISTED,
} from '../constants/ingestion.constants.js';

// --- Job ID Parameter ---

export const jobIdParamSchema = z.object({
  id: z.string().uuid(),
});

export type JobIdParam = z.infer<typeof jobIdParamSchema>;

// --- Job History Query ---

export const jobListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  page_size: z.coerce
    .number()
    .int()
    .min(1)
    .max(100)
    .default(DEFAULT_JOBS_PAGE_SIZE),
});

export type JobListQuery = z.infer<typeof jobListQuerySchema>;

// --- Failed Rows Query ---

export const jobErrorsQuerySchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_FAILED_ROWS_LISTED)
    .default(MAX_FAILED_ROWS_LISTED),
});

export type JobErrorsQuery = z.infer<typeof jobErrorsQuerySchema>;
