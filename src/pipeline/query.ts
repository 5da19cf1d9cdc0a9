import type { Embedder } from './embedding';
import { InvalidQueryError, ModelMismatchError } from './errors';
import { debug, info } from './log';
import { DEFAULT_RETRY_CONFIG, withRetry, withTimeout, type RetryConfig } from './retry';
import { assertCompatible, type IndexStore } from './store';
import type { DistanceMetric, MediaItem, SearchFilters, SearchResult } from './types';
import { toSimilarity } from './vector';

export interface QueryOptions {
  k: number;
  /** Candidates below this similarity are dropped before re-ranking */
  similarityFloor: number;
  rerank: boolean;
  /** Candidates fetched for re-ranking; at least k */
  rerankDepth: number;
  /** Weight of lexical overlap in the re-ranked score, within [0, 1] */
  lexicalWeight: number;
}

export const DEFAULT_QUERY_OPTIONS: QueryOptions = {
  k: 10,
  similarityFloor: 0.2,
  rerank: true,
  rerankDepth: 50,
  lexicalWeight: 0.15,
};

const TOKEN_RE = /[\p{L}\p{N}]+/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_RE) ?? [];
}

/** Share of distinct query tokens present in the candidate text. */
export function lexicalOverlap(query: string, text: string): number {
  const q = new Set(tokenize(query));
  if (!q.size) return 0;
  const c = new Set(tokenize(text));
  let hits = 0;
  for (const t of q) if (c.has(t)) hits++;
  return hits / q.size;
}

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

function validateFilters(filters: SearchFilters, k: number): void {
  if (!Number.isInteger(k) || k <= 0) throw new InvalidQueryError(`k must be a positive integer, got ${k}`);
  for (const [key, value] of [['dateFrom', filters.dateFrom], ['dateTo', filters.dateTo]] as const) {
    if (value !== undefined && !DATE_RE.test(value)) {
      throw new InvalidQueryError(`${key} must be YYYY-MM-DD, got "${value}"`);
    }
  }
  if (filters.dateFrom && filters.dateTo && filters.dateFrom > filters.dateTo) {
    throw new InvalidQueryError(`dateFrom ${filters.dateFrom} is after dateTo ${filters.dateTo}`);
  }
}

export interface QueryEngineDeps {
  retry?: RetryConfig;
  timeoutMs?: number;
}

/**
 * Read path: embed the question, fetch neighbors among committed versions, attach
 * media snapshots, drop weak matches, optionally blend in lexical overlap.
 */
export class QueryEngine {
  private readonly retry: RetryConfig;
  private readonly timeoutMs: number;

  constructor(
    private readonly store: IndexStore,
    private readonly embedder: Embedder,
    private readonly metric: DistanceMetric,
    private readonly options: QueryOptions = DEFAULT_QUERY_OPTIONS,
    deps: QueryEngineDeps = {}
  ) {
    this.retry = deps.retry ?? DEFAULT_RETRY_CONFIG;
    this.timeoutMs = deps.timeoutMs ?? 0;
  }

  /** Empty index or nothing above the floor yields []. */
  async search(
    queryText: string,
    filters: SearchFilters = {},
    k: number = this.options.k,
    signal?: AbortSignal
  ): Promise<SearchResult[]> {
    const text = queryText.trim();
    if (!text) throw new InvalidQueryError('Query text is empty');
    validateFilters(filters, k);
    if (!(await this.checkIndex())) return [];

    const vector = await withRetry(
      () => withTimeout((s) => this.embedder.embed(text, s), this.timeoutMs, 'embedding', signal),
      this.retry,
      { signal, onRetry: (attempt, e) => debug('query.embed.retry', { attempt, error: e.message }) }
    );
    return this.rank(vector, filters, k, text);
  }

  /** Same path from a ready vector; no lexical re-rank without query text. */
  async searchVector(
    vector: readonly number[],
    filters: SearchFilters = {},
    k: number = this.options.k
  ): Promise<SearchResult[]> {
    validateFilters(filters, k);
    const spec = await this.store.describe();
    if (!spec) return [];
    if (vector.length !== spec.dimension) {
      throw new ModelMismatchError(`Query vector has ${vector.length} dimensions, index has ${spec.dimension}`, {
        expected: spec.dimension,
        actual: vector.length,
      });
    }
    return this.rank(vector, filters, k);
  }

  /** false when the index is empty; throws when it was built with another model. */
  private async checkIndex(): Promise<boolean> {
    const stored = await this.store.describe();
    if (!stored) return false;
    assertCompatible(stored, { model: this.embedder.model, dimension: this.embedder.dimension, metric: this.metric });
    return true;
  }

  private async rank(
    vector: readonly number[],
    filters: SearchFilters,
    k: number,
    queryText?: string
  ): Promise<SearchResult[]> {
    const { similarityFloor, rerank, rerankDepth, lexicalWeight } = this.options;
    const blend = rerank && queryText !== undefined && lexicalWeight > 0;
    const depth = blend ? Math.max(k, rerankDepth) : k;
    const neighbors = await this.store.nearestNeighbors(vector, depth, filters);

    const media = new Map<string, MediaItem | null>();
    const results: SearchResult[] = [];
    for (const n of neighbors) {
      const similarity = toSimilarity(n.distance, this.metric);
      if (similarity < similarityFloor) continue;
      if (!media.has(n.chunk.mediaId)) media.set(n.chunk.mediaId, await this.store.getMediaItem(n.chunk.mediaId));
      const item = media.get(n.chunk.mediaId);
      if (!item) continue;
      const result: SearchResult = { chunk: n.chunk, distance: n.distance, similarity, score: similarity, media: item };
      if (blend && queryText !== undefined) {
        result.lexical = lexicalOverlap(queryText, n.chunk.text);
        result.score = (1 - lexicalWeight) * similarity + lexicalWeight * result.lexical;
      }
      results.push(result);
    }

    // Array.prototype.sort is stable, so equal scores keep the store's tie order
    if (blend) results.sort((a, b) => b.score - a.score);
    const top = results.slice(0, k);
    info('query.done', { candidates: neighbors.length, kept: results.length, returned: top.length, reranked: blend });
    return top;
  }
}
