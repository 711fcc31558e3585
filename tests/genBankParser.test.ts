/**
 * Tests for the GenBank header parser
 */

import { GenBankParser } from '../src/infrastructure/parsing/GenBankParser.js';
import { loadFixture } from './helpers/entrez.js';

describe('GenBankParser', () => {
  const parser = new GenBankParser();

  describe('parseOne', () => {
    it('should read the header fields of a complete record', () => {
      const record = parser.parseOne(loadFixture('nc_000913.gb'));

      expect(record).toEqual({
        locus: 'NC_000913',
        definition: 'Escherichia coli str. K-12 substr. MG1655, complete genome',
        accession: 'NC_000913',
        version: 'NC_000913.3',
        dblink: { biosample: 'SAMN00000001', bioproject: 'PRJNA000001' },
        keywords: ['RefSeq', 'complete genome'],
        source: 'Escherichia coli str. K-12 substr. MG1655',
        organism: 'Escherichia coli str. K-12 substr. MG1655',
        taxonomy: [
          'Bacteria',
          'Pseudomonadota',
          'Gammaproteobacteria',
          'Enterobacterales',
          'Enterobacteriaceae',
          'Escherichia',
        ],
        references: [
          {
            authors: 'Doe,J., Roe,R. and Poe,P.',
            title: 'A placeholder study of a well known laboratory strain',
            journal: 'J. Placeholder Genomics 1 (1), 1-10 (2020)',
            pubmed: '10000001',
            remark: null,
          },
          {
            authors: '',
            title: 'Direct Submission',
            journal: 'Submitted (01-JAN-2020) Example Institute, Example City',
            pubmed: null,
            remark: 'Sequence update by submitter',
          },
        ],
      });
    });

    it('should treat a lone period as no keywords and default missing links to null', () => {
      const record = parser.parseOne(loadFixture('nz_cp000001.gb'));

      expect(record).toMatchObject({
        accession: 'NZ_CP000001',
        version: 'NZ_CP000001.1',
        definition: 'Examplea testii strain T1 chromosome, complete genome',
        keywords: [],
        taxonomy: ['Bacteria', 'Bacillota'],
        dblink: { biosample: null, bioproject: null },
        references: [],
      });
    });

    it('should return null for text without a LOCUS line', () => {
      expect(parser.parseOne('')).toBeNull();
      expect(parser.parseOne('Error: ID list is empty!\n')).toBeNull();
    });

    it('should fall back to the accession when VERSION is missing', () => {
      const text = ['LOCUS       AB000001   120 bp    DNA     linear   PLN 01-JAN-2000', 'ACCESSION   AB000001', '//'].join('\n');

      const record = parser.parseOne(text);

      expect(record?.accession).toBe('AB000001');
      expect(record?.version).toBe('AB000001');
    });
  });

  describe('parseBatch', () => {
    it('should parse every record of a concatenated response in order', () => {
      const text = loadFixture('nc_000913.gb') + loadFixture('nz_cp000001.gb');

      const records = parser.parseBatch(text);

      expect(records.map((record) => record.version)).toEqual(['NC_000913.3', 'NZ_CP000001.1']);
    });

    it('should skip chunks that are not records', () => {
      const text = 'some preamble\n//\n' + loadFixture('nz_cp000001.gb');

      expect(parser.parseBatch(text).map((record) => record.accession)).toEqual(['NZ_CP000001']);
    });

    it('should return nothing for empty text', () => {
      expect(parser.parseBatch('')).toEqual([]);
      expect(parser.parseBatch('\n\n')).toEqual([]);
    });
  });
});
