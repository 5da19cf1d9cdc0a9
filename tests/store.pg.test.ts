import { describe, it, expect } from 'vitest';
import type { MediaFailure } from '../src/pipeline/types';
import { ConsistencyError, ModelMismatchError, StoreWriteError } from '../src/pipeline/errors';
import { PgIndexStore, candidateCount, efSearchFor, type SqlPool, type SqlPoolClient, type SqlRow } from '../src/pipeline/store/pg';
import { SPEC, makeEntry, makeItem, mediaId, segmentsFor } from './helpers/fixtures';

interface Call {
  sql: string;
  values?: readonly unknown[];
}

type Handler = (sql: string, values?: readonly unknown[]) => SqlRow[];

/** In-process stand-in for a pg pool: records every statement and answers from a handler. */
class ScriptedPool implements SqlPool {
  calls: Call[] = [];
  released = 0;
  ended = false;

  constructor(private readonly handler: Handler = () => []) {}

  async query(sql: string, values?: readonly unknown[]): Promise<{ rows: SqlRow[] }> {
    this.calls.push({ sql, values });
    return { rows: this.handler(sql, values) };
  }

  async connect(): Promise<SqlPoolClient> {
    return {
      query: (sql, values) => this.query(sql, values),
      release: () => {
        this.released++;
      },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  statements(): string[] {
    return this.calls.map((c) => c.sql.trim().split(/\s+/).slice(0, 3).join(' '));
  }
}

const ID = mediaId(7);

function ingestHandler(version: string, registered = true): Handler {
  return (sql) => {
    if (sql.includes('FOR UPDATE')) return registered ? [{ id: ID }] : [];
    if (sql.includes('COALESCE(MAX(version)')) return [{ version }];
    return [];
  };
}

describe('PgIndexStore', () => {
  it('should write one pass inside a transaction', async () => {
    const pool = new ScriptedPool(ingestHandler('3'));
    const store = new PgIndexStore(pool, 'cosine');
    const entry = makeEntry(ID, 0, 'budget review', [1, 0, 0]);

    const version = await store.ingest(ID, async (tx) => {
      await tx.appendSegments(segmentsFor(['budget review']));
      await tx.appendChunksWithEmbeddings([entry]);
      await tx.upsertMediaItem(makeItem(ID, { status: 'Indexed', currentVersion: tx.version }));
      return tx.version;
    });

    expect(version).toBe(3);
    expect(pool.statements()).toEqual([
      'BEGIN',
      'SELECT id FROM',
      'SELECT COALESCE(MAX(version), 0)',
      'INSERT INTO ingestion_versions',
      'INSERT INTO segments',
      'INSERT INTO chunks',
      'INSERT INTO embeddings',
      'INSERT INTO media_items',
      'COMMIT',
    ]);
    const embeddingInsert = pool.calls[6];
    expect(embeddingInsert.sql).toContain('($1,$2,$3,$4,$5,$6,$7,$8::vector,$9)');
    expect(embeddingInsert.values?.[7]).toBe('[1,0,0]');
    expect(pool.calls[7].values?.[11]).toBe(3);
    expect(pool.calls[7].values?.[14]).toBeNull();
    expect(pool.released).toBe(1);
  });

  it('should roll back and wrap unexpected failures', async () => {
    const pool = new ScriptedPool(ingestHandler('1'));
    const store = new PgIndexStore(pool, 'cosine');

    const err = await store
      .ingest(ID, async (tx) => {
        await tx.appendSegments(segmentsFor(['partial']));
        throw new Error('embedder crashed');
      })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreWriteError);
    expect(pool.statements().slice(-2)).toEqual(['INSERT INTO segments', 'ROLLBACK']);
    expect(pool.statements()).not.toContain('COMMIT');
    expect(pool.released).toBe(1);
  });

  it('should refuse to ingest an unregistered item', async () => {
    const pool = new ScriptedPool(ingestHandler('1', false));
    const store = new PgIndexStore(pool, 'cosine');
    await expect(store.ingest(ID, async () => 1)).rejects.toBeInstanceOf(ConsistencyError);
    expect(pool.statements()).toEqual(['BEGIN', 'SELECT id FROM', 'ROLLBACK']);
  });

  it('should surface driver errors as StoreWriteError', async () => {
    const pool = new ScriptedPool((sql) => {
      if (sql === 'BEGIN') throw new Error('connection reset');
      return [];
    });
    const store = new PgIndexStore(pool, 'cosine');
    await expect(store.ingest(ID, async () => 1)).rejects.toBeInstanceOf(StoreWriteError);
    expect(pool.released).toBe(1);
  });

  it('should record the spec and build the vector index on first open', async () => {
    let meta: SqlRow[] = [];
    const pool = new ScriptedPool((sql, values) => {
      if (sql.startsWith('SELECT model')) return meta;
      if (sql.startsWith('INSERT INTO index_meta')) {
        meta = [{ model: values?.[0], dimension: values?.[1], metric: values?.[2] }];
      }
      return [];
    });
    const store = new PgIndexStore(pool, 'cosine');
    await store.open(SPEC);

    expect(await store.describe()).toEqual(SPEC);
    const createIndex = pool.calls.find((c) => c.sql.includes('CREATE INDEX'));
    expect(createIndex?.sql).toContain('embeddings_hnsw_cosine_3');
    expect(createIndex?.sql).toContain('((embedding::vector(3)) vector_cosine_ops)');
  });

  it('should reject a configuration that differs from the recorded spec', async () => {
    const pool = new ScriptedPool((sql) =>
      sql.startsWith('SELECT model') ? [{ model: 'fake-embed', dimension: 3, metric: 'l2' }] : []
    );
    const store = new PgIndexStore(pool, 'cosine');
    await expect(store.open(SPEC)).rejects.toBeInstanceOf(ModelMismatchError);
  });

  it('should query neighbors with the metric operator and decode rows', async () => {
    const pool = new ScriptedPool((sql) => {
      if (sql.startsWith('SELECT model')) return [{ model: 'fake-embed', dimension: 3, metric: 'cosine' }];
      return [
        {
          id: 'chunk-0',
          media_id: ID,
          idx: 0,
          text: 'budget review',
          overlap_text: '',
          start_sec: 0,
          end_sec: 10,
          first_segment: 0,
          last_segment: 0,
          speakers: ['A'],
          content_hash: 'abc',
          distance: 0.25,
        },
      ];
    });
    const store = new PgIndexStore(pool, 'cosine');
    const hits = await store.nearestNeighbors([1, 0, 0], 5, { projectName: 'Board', dateFrom: '2024-01-01' });

    expect(hits).toEqual([
      {
        chunk: {
          id: 'chunk-0',
          mediaId: ID,
          index: 0,
          text: 'budget review',
          overlapText: '',
          startSec: 0,
          endSec: 10,
          firstSegment: 0,
          lastSegment: 0,
          speakers: ['A'],
          contentHash: 'abc',
        },
        distance: 0.25,
      },
    ]);
    expect(pool.statements()).toEqual([
      'SELECT model, dimension,',
      'BEGIN',
      'SET LOCAL hnsw.ef_search',
      'SET LOCAL hnsw.iterative_scan',
      'WITH candidates AS',
      'COMMIT',
    ]);
    expect(pool.calls[2].sql).toBe('SET LOCAL hnsw.ef_search = 40');
    expect(pool.calls[3].sql).toBe('SET LOCAL hnsw.iterative_scan = relaxed_order');
    const search = pool.calls[4];
    expect(search.values).toEqual(['[1,0,0]', 25, 'Board', '2024-01-01', null, null, 5]);
    expect(pool.released).toBe(1);
  });

  it('should keep the index scan in pure distance order and break ties outside it', async () => {
    const pool = new ScriptedPool((sql) =>
      sql.startsWith('SELECT model') ? [{ model: 'fake-embed', dimension: 3, metric: 'cosine' }] : []
    );
    const store = new PgIndexStore(pool, 'cosine');
    await store.nearestNeighbors([1, 0, 0], 3);

    const sql = pool.calls[4].sql.replace(/\s+/g, ' ');
    const [inner, outer] = sql.split(') SELECT');
    expect(inner).toContain('ORDER BY e.embedding::vector(3) <=> $1::vector(3) LIMIT $2');
    expect(inner).not.toContain('event_date DESC');
    expect(outer).toContain('ORDER BY cand.distance ASC, m.event_date DESC NULLS LAST, m.id ASC, c.idx ASC LIMIT $7');
  });

  it('should size the candidate pool and ef_search from k', () => {
    expect(candidateCount(5)).toBe(25);
    expect(candidateCount(100)).toBe(200);
    expect(efSearchFor(25)).toBe(40);
    expect(efSearchFor(200)).toBe(200);
    expect(efSearchFor(5000)).toBe(1000);
  });

  it('should roll back the search transaction when the query fails', async () => {
    const pool = new ScriptedPool((sql) => {
      if (sql.startsWith('SELECT model')) return [{ model: 'fake-embed', dimension: 3, metric: 'cosine' }];
      if (sql.startsWith('SET LOCAL hnsw.iterative_scan')) throw new Error('unrecognized configuration parameter');
      return [];
    });
    const store = new PgIndexStore(pool, 'cosine');
    await expect(store.nearestNeighbors([1, 0, 0], 3)).rejects.toThrow('unrecognized configuration parameter');
    expect(pool.statements().slice(-1)).toEqual(['ROLLBACK']);
    expect(pool.released).toBe(1);
  });

  it('should decode media rows including failures', async () => {
    const failure: MediaFailure = { code: 'BACKEND_UNAVAILABLE', message: 'down', retryable: true, stage: 'Transcribing', at: '2024-05-01T00:00:00.000Z' };
    const pool = new ScriptedPool(() => [
      {
        id: ID,
        path: '/media/0007.wav',
        duration_sec: 60,
        format: 'wav',
        kind: 'audio',
        size_bytes: '1024',
        project_name: 'Board',
        event_date: '2024-03-01',
        language: null,
        status: 'Failed',
        checkpoint: 'transcribe',
        current_version: null,
        failure,
        updated_at: '2024-05-01T00:00:00.000Z',
        event_name: 'Budget hearing',
      },
    ]);
    const store = new PgIndexStore(pool, 'cosine');
    expect(await store.getMediaItem(ID)).toEqual(
      makeItem(ID, { status: 'Failed', eventName: 'Budget hearing', eventDate: '2024-03-01', checkpoint: 'transcribe', failure })
    );
  });

  it('should write the event name with the media item', async () => {
    const pool = new ScriptedPool();
    const store = new PgIndexStore(pool, 'cosine');
    await store.upsertMediaItem(makeItem(ID, { eventName: 'Budget hearing' }));
    expect(pool.calls[0].sql).toContain('event_name = EXCLUDED.event_name');
    expect(pool.calls[0].values?.[14]).toBe('Budget hearing');
  });

  it('should reject rows with unexpected column types', async () => {
    const pool = new ScriptedPool(() => [{ id: ID, path: 42 }]);
    const store = new PgIndexStore(pool, 'cosine');
    await expect(store.getMediaItem(ID)).rejects.toBeInstanceOf(ConsistencyError);
  });

  it('should parse stored vectors for reuse', async () => {
    const pool = new ScriptedPool(() => [{ content_hash: 'h1', embedding: '[0.5,0.25,0]' }]);
    const store = new PgIndexStore(pool, 'cosine');
    const found = await store.findEmbeddings(['h1'], 'fake-embed');
    expect(found.get('h1')).toEqual([0.5, 0.25, 0]);
    await store.close();
    expect(pool.ended).toBe(true);
  });
});
