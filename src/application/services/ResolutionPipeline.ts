import { Semaphore } from 'async-mutex';
import { IMetadataGateway } from '../../core/interfaces/IMetadataGateway.js';
import { IRecordParser } from '../../core/interfaces/IRecordParser.js';
import { IJobStore } from '../../core/interfaces/IJobStore.js';
import { AssemblySummary } from '../../core/entities/Entrez.js';
import { AssemblyInfo, EnrichedRecord, GenBankRecord } from '../../core/entities/GenBankRecord.js';
import {
  AccessionJobRequest,
  QueryJobRequest,
  SourceDbPreference,
} from '../../core/schemas/jobRequests.js';
import { errorMessage } from '../../core/errors.js';

const ASSEMBLY_DB = 'assembly';
const NUCCORE_DB = 'nuccore';
const REPRESENTATIVE_LINK = 'assembly_nuccore_refseq';

export interface PipelineOptions {
  /** Resolutions allowed in flight at once, per job */
  concurrency: number;
  /** Ids per fetch call */
  batchSize: number;
  debugLog?: (message: string) => void;
}

/**
 * A fetchable sequence id paired with the assembly summary it came from
 */
export interface ResolvedItem {
  fetchableId: string;
  summary: AssemblySummary | null;
}

interface AssemblyCandidate {
  uid: string;
  summary: AssemblySummary;
}

export type AccessionKind = 'container' | 'direct';

/**
 * Assembly accessions (GCF_/GCA_) must be resolved to a sequence id;
 * anything else is fetched as-is.
 */
export function classifyAccession(accession: string): AccessionKind {
  return /^GC[AF]_/i.test(accession.trim()) ? 'container' : 'direct';
}

export function buildSearchTerm(request: QueryJobRequest): string {
  const terms = [`${request.organism}[Organism]`];

  const keywords =
    typeof request.keywords === 'string' ? [request.keywords] : (request.keywords ?? []);
  for (const keyword of keywords) {
    if (keyword.trim()) {
      terms.push(`${keyword.trim()}[All Fields]`);
    }
  }

  const levels = (request.filters.assembly_level ?? []).map(
    (level) => `"${level}"[Assembly Level]`
  );
  if (levels.length === 1) {
    terms.push(levels[0]);
  } else if (levels.length > 1) {
    terms.push(`(${levels.join(' OR ')})`);
  }

  if (request.filters.latest_only) {
    terms.push('latest[filter]');
  }

  return terms.join(' AND ');
}

/**
 * The assembly database cannot filter by source, so it is done on the
 * accession prefix: GCF_ is RefSeq, GCA_ is GenBank.
 */
export function matchesSourcePreference(
  assemblyAccession: string,
  preference: SourceDbPreference
): boolean {
  switch (preference) {
    case 'RefSeq':
      return assemblyAccession.startsWith('GCF_');
    case 'GenBank':
      return assemblyAccession.startsWith('GCA_');
    case 'Either':
      return true;
  }
}

export function toAssemblyInfo(summary: AssemblySummary | null): AssemblyInfo {
  if (!summary) {
    return { accession: null, name: null, level: null, refseq_category: null };
  }
  return {
    accession: summary.assemblyaccession ?? '',
    name: summary.assemblyname ?? '',
    level: summary.assemblystatus ?? '',
    refseq_category: summary.refseq_category ?? '',
    submitter: summary.submitter ?? '',
    date: summary.seqreleasedate ?? '',
  };
}

/**
 * Pair requested ids with parsed records. Records are matched by accession
 * first; numeric uids have nothing to match on and take the leftover records
 * in request order.
 */
export function matchRecordsToIds(
  ids: string[],
  records: GenBankRecord[]
): Map<string, GenBankRecord> {
  const matched = new Map<string, GenBankRecord>();
  const remaining = [...records];

  for (const id of ids) {
    const index = remaining.findIndex((record) => recordMatchesId(record, id));
    if (index !== -1) {
      matched.set(id, remaining[index]);
      remaining.splice(index, 1);
    }
  }

  for (const id of ids) {
    if (matched.has(id) || !/^\d+$/.test(id) || remaining.length === 0) {
      continue;
    }
    const next = remaining.shift();
    if (next) {
      matched.set(id, next);
    }
  }

  return matched;
}

function recordMatchesId(record: GenBankRecord, id: string): boolean {
  const wanted = id.toUpperCase();
  return (
    record.version.toUpperCase() === wanted ||
    record.accession.toUpperCase() === wanted.split('.')[0]
  );
}

/**
 * Turns a submitted job into enriched records.
 *
 * Per-item problems become job errors and processing continues; anything
 * escaping a stage fails the whole job. All job state goes through the store.
 */
export class ResolutionPipeline {
  private readonly debugLog: (message: string) => void;

  constructor(
    private readonly gateway: IMetadataGateway,
    private readonly parser: IRecordParser,
    private readonly jobStore: IJobStore,
    private readonly options: PipelineOptions
  ) {
    this.debugLog = options.debugLog ?? (() => {});
  }

  async run(jobId: string): Promise<void> {
    const job = this.jobStore.get(jobId);
    if (!job) {
      console.error(`[Pipeline] Job ${jobId} not found, nothing to run`);
      return;
    }

    this.jobStore.setStatus(jobId, 'running');
    this.debugLog(`[Pipeline] Job ${jobId} started (${job.input.kind})`);

    try {
      if (job.input.kind === 'query') {
        await this.processQuery(jobId, job.input);
      } else {
        await this.processAccessions(jobId, job.input);
      }
      this.jobStore.setStatus(jobId, 'succeeded');
      this.debugLog(`[Pipeline] Job ${jobId} succeeded`);
    } catch (error) {
      const message = errorMessage(error);
      console.error(`[Pipeline] Job ${jobId} failed: ${message}`);
      this.jobStore.appendError(jobId, `Job failed: ${message}`);
      this.jobStore.setStatus(jobId, 'failed');
    }
  }

  private async processQuery(jobId: string, request: QueryJobRequest): Promise<void> {
    const term = buildSearchTerm(request);
    this.debugLog(`[Pipeline] Job ${jobId} search term: ${term}`);

    const ids = await this.gateway.search(ASSEMBLY_DB, term, request.limit);
    if (ids.length === 0) {
      this.jobStore.appendError(jobId, 'No assemblies found matching criteria');
      return;
    }

    const summaries = await this.gateway.summarize(ASSEMBLY_DB, ids);
    const preference = request.filters.source_db_preference;
    const candidates: AssemblyCandidate[] = [];

    for (const uid of ids) {
      const summary = summaries.get(uid) ?? {};
      if (!matchesSourcePreference(summary.assemblyaccession ?? '', preference)) continue;

      candidates.push({ uid, summary });
      if (candidates.length >= request.limit) break;
    }

    if (candidates.length === 0) {
      this.jobStore.appendError(jobId, 'No assemblies found after filtering');
      return;
    }

    this.jobStore.setProgressTotal(jobId, candidates.length);

    const resolved = await this.resolveAll(candidates, (candidate) =>
      this.resolveAssemblyCandidate(jobId, candidate)
    );
    await this.fetchInBatches(jobId, resolved);
  }

  private async processAccessions(jobId: string, request: AccessionJobRequest): Promise<void> {
    this.jobStore.setProgressTotal(jobId, request.accessions.length);

    const resolved = await this.resolveAll(request.accessions, (accession) =>
      this.resolveAccession(jobId, accession)
    );
    await this.fetchInBatches(jobId, resolved);
  }

  /**
   * Runs every resolution under the semaphore and keeps input order in the
   * output, whatever order they finish in.
   */
  private async resolveAll<T>(
    items: T[],
    resolve: (item: T) => Promise<ResolvedItem | null>
  ): Promise<ResolvedItem[]> {
    const semaphore = new Semaphore(Math.max(1, this.options.concurrency));
    const resolved = await Promise.all(
      items.map((item) => semaphore.runExclusive(() => resolve(item)))
    );
    return resolved.filter((item): item is ResolvedItem => item !== null);
  }

  private async resolveAssemblyCandidate(
    jobId: string,
    candidate: AssemblyCandidate
  ): Promise<ResolvedItem | null> {
    const label = candidate.summary.assemblyaccession ?? candidate.uid;
    try {
      return await this.linkToSequence(jobId, candidate.uid, candidate.summary, label);
    } catch (error) {
      this.jobStore.appendError(jobId, `Error linking assembly ${label}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async resolveAccession(jobId: string, accession: string): Promise<ResolvedItem | null> {
    if (classifyAccession(accession) === 'direct') {
      return { fetchableId: accession, summary: null };
    }

    try {
      const [uid] = await this.gateway.search(ASSEMBLY_DB, `${accession}[Assembly Accession]`, 1);
      if (!uid) {
        this.jobStore.appendError(jobId, `Assembly not found: ${accession}`);
        return null;
      }

      const summaries = await this.gateway.summarize(ASSEMBLY_DB, [uid]);
      return await this.linkToSequence(jobId, uid, summaries.get(uid) ?? {}, accession);
    } catch (error) {
      this.jobStore.appendError(jobId, `Error resolving ${accession}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async linkToSequence(
    jobId: string,
    uid: string,
    summary: AssemblySummary,
    label: string
  ): Promise<ResolvedItem | null> {
    const links = await this.gateway.link(ASSEMBLY_DB, NUCCORE_DB, [uid], REPRESENTATIVE_LINK);
    const [sequenceId] = links.get(uid) ?? [];

    if (!sequenceId) {
      this.jobStore.appendError(jobId, `No nuccore link for ${label}`);
      return null;
    }

    return { fetchableId: sequenceId, summary };
  }

  /**
   * Batches run one after another so results stay close to input order.
   * The cache lives for this run only and stops an id shared by two
   * inputs from being fetched twice.
   */
  private async fetchInBatches(jobId: string, items: ResolvedItem[]): Promise<void> {
    const batchSize = Math.max(1, this.options.batchSize);
    const cache = new Map<string, GenBankRecord>();

    for (let start = 0; start < items.length; start += batchSize) {
      const batch = items.slice(start, start + batchSize);
      const idsToFetch = [...new Set(batch.map((item) => item.fetchableId))].filter(
        (id) => !cache.has(id)
      );
      const failedIds = new Map<string, string>();

      if (idsToFetch.length > 0) {
        this.debugLog(
          `[Pipeline] Job ${jobId} fetching ${idsToFetch.length} record(s) in batch ${start / batchSize + 1}`
        );
        try {
          const text = await this.gateway.fetch(NUCCORE_DB, idsToFetch, 'gb');
          const records = this.parser.parseBatch(text);
          for (const [id, record] of matchRecordsToIds(idsToFetch, records)) {
            cache.set(id, record);
          }
        } catch (error) {
          const message = errorMessage(error);
          for (const id of idsToFetch) {
            failedIds.set(id, message);
          }
        }
      }

      for (const item of batch) {
        const record = cache.get(item.fetchableId);
        if (record) {
          this.jobStore.appendResult(jobId, enrich(record, item.summary));
          continue;
        }

        const fetchError = failedIds.get(item.fetchableId);
        this.jobStore.appendError(
          jobId,
          fetchError === undefined
            ? `Failed to parse GenBank for ${item.fetchableId}`
            : `Error fetching ${item.fetchableId}: ${fetchError}`
        );
      }
    }
  }
}

function enrich(record: GenBankRecord, summary: AssemblySummary | null): EnrichedRecord {
  return { ...record, assembly: toAssemblyInfo(summary) };
}
