import { z } from 'zod';

export const ASSEMBLY_LEVELS = ['Complete Genome', 'Chromosome', 'Scaffold', 'Contig'] as const;

export const SOURCE_DB_PREFERENCES = ['RefSeq', 'GenBank', 'Either'] as const;

export const QueryFiltersSchema = z.object({
  assembly_level: z.array(z.enum(ASSEMBLY_LEVELS)).optional(),
  source_db_preference: z.enum(SOURCE_DB_PREFERENCES).default('RefSeq'),
  latest_only: z.boolean().default(true),
});

export const QueryJobRequestSchema = z.object({
  organism: z.string().trim().min(1, 'Organism must not be empty'),
  keywords: z.union([z.string(), z.array(z.string())]).optional(),
  filters: QueryFiltersSchema.default({}),
  limit: z.number().int().min(1).max(100).default(20),
});

/**
 * `filters` is kept on the job input so a follow-up job can reuse it; the
 * accessions themselves are harvested as given, never filtered.
 */
export const AccessionJobRequestSchema = z.object({
  accessions: z
    .array(z.string().trim().min(1, 'Accession must not be empty'))
    .min(1, 'At least 1 accession is required'),
  filters: QueryFiltersSchema.default({}),
});

export type QueryFilters = z.infer<typeof QueryFiltersSchema>;
export type QueryJobRequest = z.infer<typeof QueryJobRequestSchema>;
export type AccessionJobRequest = z.infer<typeof AccessionJobRequestSchema>;
export type SourceDbPreference = (typeof SOURCE_DB_PREFERENCES)[number];
