import { z } from 'zod';
import { IMetadataGateway } from '../../core/interfaces/IMetadataGateway.js';
import {
  AssemblySummary,
  AssemblySummarySchema,
  LinkResponseSchema,
  SearchResponseSchema,
  SummaryResponseSchema,
} from '../../core/entities/Entrez.js';
import { MalformedResponseError } from '../../core/errors.js';
import { RateLimiter, TokenBucketRateLimiter } from '../../utils/rateLimiter.js';
import { QueryParams, RetryingTransport, TransportResponse } from './RetryingTransport.js';

export interface EntrezClientSettings {
  baseUrl: string;
  tool: string;
  email: string;
  apiKey?: string;
  /** Requests per second before the API-key tier is applied */
  rateLimit: number;
  /** Tokens the limiter may accumulate while idle */
  burst: number;
}

/** Requests per second granted to callers that send an API key */
export const API_KEY_RATE_LIMIT = 10;

const DEFAULT_RATE_LIMIT = 3;

/**
 * NCBI E-utilities client.
 * Every call waits on the shared rate limiter, then goes through the retrying transport.
 */
export class EntrezApiClient implements IMetadataGateway {
  constructor(
    private readonly settings: EntrezClientSettings,
    private readonly rateLimiter: RateLimiter,
    private readonly transport: RetryingTransport
  ) {}

  /**
   * An API key lifts the default tier to 10 rps; an explicitly higher rate is kept
   */
  static effectiveRate(settings: Pick<EntrezClientSettings, 'rateLimit' | 'apiKey'>): number {
    if (settings.apiKey && settings.rateLimit <= DEFAULT_RATE_LIMIT) {
      return API_KEY_RATE_LIMIT;
    }
    return settings.rateLimit;
  }

  /**
   * Build the one limiter that every client in the process should share
   */
  static createRateLimiter(settings: EntrezClientSettings): TokenBucketRateLimiter {
    return new TokenBucketRateLimiter(
      EntrezApiClient.effectiveRate(settings),
      Math.max(1, settings.burst)
    );
  }

  async search(db: string, term: string, maxResults: number): Promise<string[]> {
    const res = await this.get('esearch', { db, term, retmax: maxResults, retmode: 'json' });
    const data = readJson(res, 'esearch', SearchResponseSchema);
    return data.esearchresult.idlist;
  }

  async summarize(db: string, ids: string[]): Promise<Map<string, AssemblySummary>> {
    const summaries = new Map<string, AssemblySummary>();
    if (ids.length === 0) {
      return summaries;
    }

    const res = await this.get('esummary', { db, id: ids.join(','), retmode: 'json' });
    const data = readJson(res, 'esummary', SummaryResponseSchema);

    for (const id of ids) {
      const doc = AssemblySummarySchema.safeParse(data.result[id]);
      if (doc.success) {
        summaries.set(id, doc.data);
      }
    }

    return summaries;
  }

  async link(
    fromDb: string,
    toDb: string,
    ids: string[],
    linkName?: string
  ): Promise<Map<string, string[]>> {
    const links = new Map<string, string[]>();
    if (ids.length === 0) {
      return links;
    }

    const res = await this.get('elink', {
      dbfrom: fromDb,
      db: toDb,
      id: ids.join(','),
      linkname: linkName,
      retmode: 'json',
    });
    const data = readJson(res, 'elink', LinkResponseSchema);

    data.linksets.forEach((linkset, index) => {
      const sourceIds = linkset.ids?.map(String) ?? (ids[index] !== undefined ? [ids[index]] : []);
      const linksetdb =
        linkset.linksetdbs.find((db) => linkName === undefined || db.linkname === linkName) ??
        linkset.linksetdbs[0];
      const related = linksetdb ? linksetdb.links.map(String) : [];

      for (const sourceId of sourceIds) {
        links.set(sourceId, [...(links.get(sourceId) ?? []), ...related]);
      }
    });

    return links;
  }

  async fetch(db: string, ids: string[], format: string = 'gb'): Promise<string> {
    if (ids.length === 0) {
      return '';
    }

    const res = await this.get('efetch', {
      db,
      id: ids.join(','),
      rettype: format,
      retmode: 'text',
    });
    return res.text;
  }

  private async get(endpoint: string, params: QueryParams): Promise<TransportResponse> {
    await this.rateLimiter.acquire();
    return this.transport.execute({
      url: `${this.settings.baseUrl}/${endpoint}.fcgi`,
      params: { ...this.identification(), ...params },
    });
  }

  private identification(): QueryParams {
    return {
      tool: this.settings.tool,
      email: this.settings.email,
      api_key: this.settings.apiKey || undefined,
    };
  }
}

function readJson<S extends z.ZodTypeAny>(
  res: TransportResponse,
  operation: string,
  schema: S
): z.output<S> {
  let body: unknown;
  try {
    body = JSON.parse(res.text);
  } catch {
    throw new MalformedResponseError(operation, 'body is not JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new MalformedResponseError(
      operation,
      issue ? `${issue.path.join('.') || 'root'}: ${issue.message}` : 'unexpected shape'
    );
  }
  return parsed.data;
}
