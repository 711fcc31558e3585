import { unparse } from 'papaparse';
import { EnrichedRecord } from '../../core/entities/GenBankRecord.js';

export const EMPTY_EXPORT_MESSAGE = 'No results to export';

export const CSV_COLUMNS = [
  'accession',
  'version',
  'locus',
  'definition',
  'organism',
  'source',
  'biosample',
  'bioproject',
  'keywords',
  'taxonomy',
  'assembly_accession',
  'assembly_name',
  'assembly_level',
  'refseq_category',
  'ref_authors',
  'ref_title',
  'ref_journal',
  'ref_pubmed',
] as const;

type CsvRow = Record<(typeof CSV_COLUMNS)[number], string>;

/**
 * One flat row per record; only the first reference is kept
 */
export function flattenRecord(record: EnrichedRecord): CsvRow {
  const ref = record.references[0];

  return {
    accession: record.accession,
    version: record.version,
    locus: record.locus,
    definition: record.definition,
    organism: record.organism,
    source: record.source,
    biosample: record.dblink.biosample ?? '',
    bioproject: record.dblink.bioproject ?? '',
    keywords: record.keywords.join('; '),
    taxonomy: record.taxonomy.join('; '),
    assembly_accession: record.assembly.accession ?? '',
    assembly_name: record.assembly.name ?? '',
    assembly_level: record.assembly.level ?? '',
    refseq_category: record.assembly.refseq_category ?? '',
    ref_authors: ref?.authors ?? '',
    ref_title: ref?.title ?? '',
    ref_journal: ref?.journal ?? '',
    ref_pubmed: ref?.pubmed ?? '',
  };
}

export function exportResultsToCsv(results: EnrichedRecord[]): string {
  if (results.length === 0) {
    return EMPTY_EXPORT_MESSAGE;
  }

  return unparse(results.map(flattenRecord), {
    columns: [...CSV_COLUMNS],
    newline: '\n',
  });
}
