import { GenBankRecord, Reference } from '../../core/entities/GenBankRecord.js';
import { IRecordParser } from '../../core/interfaces/IRecordParser.js';

/** Column where header values start */
const HEADER_INDENT = 12;

const RECORD_TERMINATOR = /^\/\/[ \t]*$/m;

interface HeaderField {
  key: string;
  lines: string[];
}

/**
 * Parser for the header section of GenBank flat files.
 * Stops at FEATURES/ORIGIN; sequence data is never read.
 */
export class GenBankParser implements IRecordParser {
  constructor(private readonly onParseError?: (message: string) => void) {}

  parseOne(text: string): GenBankRecord | null {
    const [chunk] = text.split(RECORD_TERMINATOR);
    return chunk === undefined ? null : this.parseChunk(chunk);
  }

  parseBatch(text: string): GenBankRecord[] {
    const records: GenBankRecord[] = [];

    for (const chunk of text.split(RECORD_TERMINATOR)) {
      if (!chunk.trim()) {
        continue;
      }
      const record = this.parseChunk(chunk);
      if (record) {
        records.push(record);
      }
    }

    return records;
  }

  private parseChunk(chunk: string): GenBankRecord | null {
    try {
      return buildRecord(readHeader(chunk));
    } catch (error) {
      this.onParseError?.(
        `Failed to parse GenBank record: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
  }
}

function readHeader(chunk: string): HeaderField[] {
  const fields: HeaderField[] = [];

  for (const rawLine of chunk.split(/\r?\n/)) {
    const line = rawLine.replace(/\t/g, ' ');
    if (!line.trim()) {
      continue;
    }
    if (line.startsWith('FEATURES') || line.startsWith('ORIGIN')) {
      break;
    }

    const label = line.slice(0, HEADER_INDENT).trim();
    const value = line.slice(HEADER_INDENT).trim();
    const current = fields[fields.length - 1];

    if (label) {
      fields.push({ key: label, lines: [value] });
    } else if (current) {
      current.lines.push(value);
    }
  }

  return fields;
}

function buildRecord(fields: HeaderField[]): GenBankRecord | null {
  const locusField = fields.find((field) => field.key === 'LOCUS');
  if (!locusField) {
    return null;
  }

  const record: GenBankRecord = {
    locus: firstToken(locusField.lines),
    definition: '',
    accession: '',
    version: '',
    dblink: { biosample: null, bioproject: null },
    keywords: [],
    source: '',
    organism: '',
    taxonomy: [],
    references: [],
  };

  let reference: Reference | null = null;

  for (const field of fields) {
    switch (field.key) {
      case 'DEFINITION':
        record.definition = stripFinalPeriod(joined(field.lines));
        break;
      case 'ACCESSION':
        record.accession = firstToken(field.lines);
        break;
      case 'VERSION':
        record.version = firstToken(field.lines);
        break;
      case 'DBLINK':
        for (const line of field.lines) {
          const [name, ...rest] = line.split(':');
          const value = rest.join(':').trim() || null;
          if (name.trim() === 'BioSample') record.dblink.biosample = value;
          else if (name.trim() === 'BioProject') record.dblink.bioproject = value;
        }
        break;
      case 'KEYWORDS':
        record.keywords = splitList(joined(field.lines));
        break;
      case 'SOURCE':
        record.source = joined(field.lines);
        break;
      case 'ORGANISM':
        record.organism = field.lines[0] ?? '';
        record.taxonomy = splitList(joined(field.lines.slice(1)));
        break;
      case 'REFERENCE':
        reference = { authors: '', title: '', journal: '', pubmed: null, remark: null };
        record.references.push(reference);
        break;
      case 'AUTHORS':
        if (reference) reference.authors = joined(field.lines);
        break;
      case 'TITLE':
        if (reference) reference.title = joined(field.lines);
        break;
      case 'JOURNAL':
        if (reference) reference.journal = joined(field.lines);
        break;
      case 'PUBMED':
        if (reference) reference.pubmed = joined(field.lines) || null;
        break;
      case 'REMARK':
        if (reference) reference.remark = joined(field.lines) || null;
        break;
    }
  }

  // Older records may omit VERSION
  if (!record.version) {
    record.version = record.accession || record.locus;
  }
  if (!record.accession) {
    record.accession = record.version.split('.')[0];
  } else {
    record.accession = record.accession.split('.')[0];
  }

  return record;
}

function joined(lines: string[]): string {
  return lines.filter(Boolean).join(' ');
}

function firstToken(lines: string[]): string {
  return (lines[0] ?? '').split(/\s+/)[0] ?? '';
}

function stripFinalPeriod(value: string): string {
  return value.endsWith('.') ? value.slice(0, -1) : value;
}

/**
 * "A; B; C." -> ["A", "B", "C"]; a lone "." means an empty list
 */
function splitList(value: string): string[] {
  return stripFinalPeriod(value.trim())
    .split(';')
    .map((item) => item.trim())
    .filter(Boolean);
}
