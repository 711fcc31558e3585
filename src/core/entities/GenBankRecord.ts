/**
 * Metadata extracted from one GenBank flat-file record
 */
export interface GenBankRecord {
  locus: string;
  definition: string;
  /** Primary accession without version suffix */
  accession: string;
  /** Versioned accession, e.g. NC_000913.3 */
  version: string;
  dblink: DbLink;
  keywords: string[];
  source: string;
  organism: string;
  taxonomy: string[];
  references: Reference[];
}

export interface DbLink {
  biosample: string | null;
  bioproject: string | null;
}

export interface Reference {
  authors: string;
  title: string;
  journal: string;
  pubmed: string | null;
  remark: string | null;
}

/**
 * Assembly metadata merged into a record; all null for accessions fetched directly
 */
export interface AssemblyInfo {
  accession: string | null;
  name: string | null;
  level: string | null;
  refseq_category: string | null;
  submitter?: string | null;
  date?: string | null;
}

export interface EnrichedRecord extends GenBankRecord {
  assembly: AssemblyInfo;
}
