import { AssemblySummary } from '../entities/Entrez.js';

/**
 * Interface for the remote metadata service (search, summary, link, fetch)
 */
export interface IMetadataGateway {
  /**
   * Run a text query; ids come back in the service's relevance order
   */
  search(db: string, term: string, maxResults: number): Promise<string[]>;

  /**
   * Batch summary lookup keyed by the requested ids
   */
  summarize(db: string, ids: string[]): Promise<Map<string, AssemblySummary>>;

  /**
   * Cross-database links, keyed by source id
   */
  link(fromDb: string, toDb: string, ids: string[], linkName?: string): Promise<Map<string, string[]>>;

  /**
   * Raw batched record text for all ids in one call
   */
  fetch(db: string, ids: string[], format?: string): Promise<string>;
}
