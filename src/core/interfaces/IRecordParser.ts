import { GenBankRecord } from '../entities/GenBankRecord.js';

/**
 * Interface for parsing raw record text returned by a fetch
 */
export interface IRecordParser {
  parseOne(text: string): GenBankRecord | null;

  /**
   * Records in encounter order; unparseable entries are skipped, never thrown
   */
  parseBatch(text: string): GenBankRecord[];
}
