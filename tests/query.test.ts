import { describe, it, expect, beforeEach } from 'vitest';
import type { Embedder } from '../src/pipeline/embedding';
import { BackendUnavailableError, InvalidQueryError, ModelMismatchError } from '../src/pipeline/errors';
import { DEFAULT_QUERY_OPTIONS, QueryEngine, lexicalOverlap, tokenize, type QueryOptions } from '../src/pipeline/query';
import { FileIndexStore } from '../src/pipeline/store/file';
import { makeTempDir } from './helpers/fakes';
import { SPEC, commitEntries, makeEntry, makeItem, mediaId } from './helpers/fixtures';

/** Returns a fixed vector per query text; fails the first `failures` calls. */
class LookupEmbedder implements Embedder {
  readonly model = SPEC.model;
  readonly dimension = SPEC.dimension;
  calls = 0;

  constructor(private readonly vectors: Record<string, number[]>, private failures = 0) {}

  async embed(text: string): Promise<number[]> {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw new BackendUnavailableError('rate limited', 'embedding', { status: 429 });
    }
    return this.vectors[text] ?? [1, 0, 0];
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    return Promise.all(texts.map((t) => this.embed(t)));
  }
}

const NO_RERANK: QueryOptions = { ...DEFAULT_QUERY_OPTIONS, rerank: false };
const FAST_RETRY = { maxRetries: 2, initialDelay: 1, maxDelay: 2, exponentialBase: 2, jitter: false };

describe('tokenize and lexicalOverlap', () => {
  it('should split on letters and digits, case-insensitively', () => {
    expect(tokenize('Q3 Budget, revised!')).toEqual(['q3', 'budget', 'revised']);
    expect(tokenize('  ')).toEqual([]);
  });

  it('should score the share of query tokens found', () => {
    expect(lexicalOverlap('budget review', 'the budget was approved')).toBe(0.5);
    expect(lexicalOverlap('budget budget', 'budget')).toBe(1);
    expect(lexicalOverlap('...', 'anything')).toBe(0);
  });
});

describe('QueryEngine', () => {
  let store: FileIndexStore;
  const a = mediaId(1);
  const b = mediaId(2);

  beforeEach(async () => {
    store = new FileIndexStore(await makeTempDir(), 'cosine');
  });

  async function seed(): Promise<void> {
    await store.open(SPEC);
    await commitEntries(store, makeItem(a, { eventDate: '2024-03-01' }), [
      makeEntry(a, 0, 'alpha report', [1, 0, 0]),
      makeEntry(a, 1, 'gamma notes', [0, 1, 0]),
    ]);
    await commitEntries(store, makeItem(b, { projectName: 'Council' }), [makeEntry(b, 0, 'beta summary', [1, 1, 0])]);
  }

  it('should return nothing from an empty index without embedding', async () => {
    const embedder = new LookupEmbedder({});
    const engine = new QueryEngine(store, embedder, 'cosine', NO_RERANK);
    expect(await engine.search('anything')).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it('should rank by similarity, attach media and drop matches under the floor', async () => {
    await seed();
    const engine = new QueryEngine(store, new LookupEmbedder({}), 'cosine', NO_RERANK);
    const results = await engine.search('alpha report');

    expect(results.map((r) => r.chunk.text)).toEqual(['alpha report', 'beta summary']);
    expect(results[0].similarity).toBeCloseTo(1);
    expect(results[0].score).toBe(results[0].similarity);
    expect(results[0].media.id).toBe(a);
    expect(results[0].media.eventDate).toBe('2024-03-01');
    expect(results[1].similarity).toBeCloseTo(Math.SQRT1_2);
    expect(results[1].lexical).toBeUndefined();
  });

  it('should honor k and filters', async () => {
    await seed();
    const engine = new QueryEngine(store, new LookupEmbedder({}), 'cosine', NO_RERANK);
    expect((await engine.search('x', {}, 1)).map((r) => r.chunk.text)).toEqual(['alpha report']);
    expect((await engine.search('x', { projectName: 'Council' })).map((r) => r.chunk.text)).toEqual(['beta summary']);
    expect(await engine.search('x', { dateFrom: '2025-01-01' })).toEqual([]);
  });

  it('should blend lexical overlap into the score when re-ranking', async () => {
    await seed();
    const options: QueryOptions = { ...DEFAULT_QUERY_OPTIONS, rerank: true, lexicalWeight: 0.5 };
    const engine = new QueryEngine(store, new LookupEmbedder({ 'beta summary': [1, 0, 0] }), 'cosine', options);
    const results = await engine.search('beta summary');

    expect(results.map((r) => r.chunk.text)).toEqual(['beta summary', 'alpha report']);
    expect(results[0].lexical).toBe(1);
    expect(results[0].score).toBeCloseTo(0.5 * Math.SQRT1_2 + 0.5);
    expect(results[1].lexical).toBe(0);
    expect(results[1].score).toBeCloseTo(0.5);
  });

  it('should retry a transient embedding failure', async () => {
    await seed();
    const embedder = new LookupEmbedder({}, 1);
    const engine = new QueryEngine(store, embedder, 'cosine', NO_RERANK, { retry: FAST_RETRY });
    expect(await engine.search('alpha')).toHaveLength(2);
    expect(embedder.calls).toBe(2);
  });

  it('should reject invalid queries', async () => {
    const engine = new QueryEngine(store, new LookupEmbedder({}), 'cosine');
    await expect(engine.search('   ')).rejects.toBeInstanceOf(InvalidQueryError);
    await expect(engine.search('q', {}, 0)).rejects.toBeInstanceOf(InvalidQueryError);
    await expect(engine.search('q', { dateFrom: '01/02/2024' })).rejects.toBeInstanceOf(InvalidQueryError);
    await expect(engine.search('q', { dateFrom: '2024-05-01', dateTo: '2024-04-01' })).rejects.toThrow(/after dateTo/);
  });

  it('should refuse to search an index built with another model', async () => {
    await store.open({ ...SPEC, model: 'other-model' });
    const engine = new QueryEngine(store, new LookupEmbedder({}), 'cosine');
    await expect(engine.search('alpha')).rejects.toBeInstanceOf(ModelMismatchError);
  });

  it('should search by vector and check its dimension', async () => {
    await seed();
    const engine = new QueryEngine(store, new LookupEmbedder({}), 'cosine');
    expect((await engine.searchVector([0, 1, 0], {}, 1)).map((r) => r.chunk.text)).toEqual(['gamma notes']);
    await expect(engine.searchVector([1, 0])).rejects.toBeInstanceOf(ModelMismatchError);
  });
});
