import { z } from 'zod';

/**
 * Response shapes of the E-utilities JSON endpoints.
 * Only the nested keys the harvester reads are declared.
 */
export const SearchResponseSchema = z.object({
  esearchresult: z.object({
    idlist: z.array(z.string()).default([]),
  }),
});

export const SummaryResponseSchema = z.object({
  result: z.record(z.string(), z.unknown()).default({}),
});

export const LinkResponseSchema = z.object({
  linksets: z
    .array(
      z.object({
        ids: z.array(z.union([z.string(), z.number()])).optional(),
        linksetdbs: z
          .array(
            z.object({
              linkname: z.string().optional(),
              links: z.array(z.union([z.string(), z.number()])).default([]),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

export const AssemblySummarySchema = z
  .object({
    uid: z.string().optional(),
    assemblyaccession: z.string().optional(),
    assemblyname: z.string().optional(),
    assemblystatus: z.string().optional(),
    refseq_category: z.string().optional(),
    submitter: z.string().optional(),
    seqreleasedate: z.string().optional(),
  })
  .passthrough();

export type AssemblySummary = z.infer<typeof AssemblySummarySchema>;
