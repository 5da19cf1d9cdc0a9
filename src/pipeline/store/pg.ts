import { Pool } from 'pg';
import { z } from 'zod';
import { ConsistencyError, PipelineError, StoreWriteError, errorMessage } from '../errors';
import { debug, info, warn } from '../log';
import {
  mediaFailureSchema,
  mediaKindSchema,
  mediaStatusSchema,
  metricSchema,
  parseStored,
  stageSchema,
} from '../schemas';
import type {
  AlignedSegment,
  Chunk,
  ChunkWithEmbedding,
  DistanceMetric,
  IndexSpec,
  MediaItem,
  Neighbor,
  SearchFilters,
} from '../types';
import { parseVectorLiteral, toVectorLiteral } from '../vector';
import { assertCompatible } from './filters';
import type { IndexStore, IngestionTx, MediaFilters } from './index';

export type SqlRow = Record<string, unknown>;

/** The slice of pg the store uses; tests substitute a scripted client. */
export interface SqlClient {
  query(text: string, values?: readonly unknown[]): Promise<{ rows: SqlRow[] }>;
}

export interface SqlPoolClient extends SqlClient {
  release(): void;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlPoolClient>;
  end(): Promise<void>;
}

export function createPgPool(databaseUrl: string): SqlPool {
  const pool = new Pool({ connectionString: databaseUrl });
  pool.on('error', (e) => warn('db.pool.error', { error: e.message }));
  return {
    async query(text, values) {
      const res = await pool.query(text, values ? [...values] : undefined);
      return { rows: res.rows };
    },
    async connect() {
      const client = await pool.connect();
      return {
        async query(text, values) {
          const res = await client.query(text, values ? [...values] : undefined);
          return { rows: res.rows };
        },
        release: () => client.release(),
      };
    },
    end: () => pool.end(),
  };
}

// Row decoding. Columns are selected with text casts where pg would otherwise
// produce Date objects, so every value here is a string, number, array or JSON.

// BIGINT and NUMERIC arrive as strings
const numeric = z.union([z.number(), z.string().trim().min(1).transform(Number)]).pipe(z.number().finite());
const optNumeric = numeric.nullish().transform((v) => v ?? undefined);
const optText = z.string().nullish().transform((v) => v || undefined);

const mediaRowSchema = z
  .object({
    id: z.string(),
    path: z.string(),
    duration_sec: numeric,
    format: z.string(),
    kind: mediaKindSchema,
    size_bytes: numeric,
    project_name: z.string(),
    event_name: optText,
    event_date: optText,
    language: optText,
    status: mediaStatusSchema,
    checkpoint: stageSchema.nullish(),
    current_version: optNumeric,
    failure: mediaFailureSchema.nullish(),
    updated_at: z.string(),
  })
  .transform((r): MediaItem => {
    const item: MediaItem = {
      id: r.id,
      path: r.path,
      durationSec: r.duration_sec,
      format: r.format,
      kind: r.kind,
      sizeBytes: r.size_bytes,
      projectName: r.project_name,
      status: r.status,
      updatedAt: r.updated_at,
    };
    if (r.event_name) item.eventName = r.event_name;
    if (r.event_date) item.eventDate = r.event_date;
    if (r.language) item.language = r.language;
    if (r.checkpoint) item.checkpoint = r.checkpoint;
    if (r.current_version !== undefined) item.currentVersion = r.current_version;
    if (r.failure) item.failure = r.failure;
    return item;
  });

const chunkRowSchema = z
  .object({
    id: z.string(),
    media_id: z.string(),
    idx: numeric,
    text: z.string(),
    overlap_text: z.string(),
    start_sec: numeric,
    end_sec: numeric,
    first_segment: numeric,
    last_segment: numeric,
    speakers: z.array(z.string()),
    content_hash: z.string(),
  })
  .transform(
    (r): Chunk => ({
      id: r.id,
      mediaId: r.media_id,
      index: r.idx,
      text: r.text,
      overlapText: r.overlap_text,
      startSec: r.start_sec,
      endSec: r.end_sec,
      firstSegment: r.first_segment,
      lastSegment: r.last_segment,
      speakers: r.speakers,
      contentHash: r.content_hash,
    })
  );

const distanceRowSchema = z.object({ distance: numeric });

const segmentRowSchema = z
  .object({
    segment_index: numeric,
    start_sec: numeric,
    end_sec: numeric,
    text: z.string(),
    confidence: optNumeric,
    source: z.string(),
    speaker: optText,
  })
  .transform((r): AlignedSegment => {
    const seg: AlignedSegment = {
      segmentIndex: r.segment_index,
      startSec: r.start_sec,
      endSec: r.end_sec,
      text: r.text,
      source: r.source,
    };
    if (r.confidence !== undefined) seg.confidence = r.confidence;
    if (r.speaker) seg.speaker = r.speaker;
    return seg;
  });

const indexMetaRowSchema = z.object({ model: z.string(), dimension: numeric, metric: metricSchema });

const versionRowSchema = z.object({ version: numeric });

const storedVectorRowSchema = z.object({ content_hash: z.string(), embedding: z.string() });

const decodeMedia = (row: SqlRow) => parseStored(mediaRowSchema, row, 'media_items row');
const decodeSegment = (row: SqlRow) => parseStored(segmentRowSchema, row, 'segments row');
const decodeNeighbor = (row: SqlRow): Neighbor => ({
  chunk: parseStored(chunkRowSchema, row, 'chunks row'),
  distance: parseStored(distanceRowSchema, row, 'chunks row').distance,
});

const MEDIA_COLUMNS = `id, path, duration_sec, format, kind, size_bytes, project_name,
  to_char(event_date, 'YYYY-MM-DD') AS event_date, language, status, checkpoint, current_version, failure,
  to_char(updated_at AT TIME ZONE 'UTC', 'YYYY-MM-DD"T"HH24:MI:SS.MS"Z"') AS updated_at, event_name`;

const UPSERT_MEDIA = `INSERT INTO media_items
  (id, path, duration_sec, format, kind, size_bytes, project_name, event_date, language, status, checkpoint, current_version, failure, updated_at, event_name)
  VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9,$10,$11,$12,$13,$14,$15)
  ON CONFLICT (id) DO UPDATE SET
    path = EXCLUDED.path, duration_sec = EXCLUDED.duration_sec, format = EXCLUDED.format, kind = EXCLUDED.kind,
    size_bytes = EXCLUDED.size_bytes, project_name = EXCLUDED.project_name, event_date = EXCLUDED.event_date,
    language = EXCLUDED.language, status = EXCLUDED.status, checkpoint = EXCLUDED.checkpoint,
    current_version = EXCLUDED.current_version, failure = EXCLUDED.failure, updated_at = EXCLUDED.updated_at,
    event_name = EXCLUDED.event_name`;

function mediaParams(item: MediaItem): unknown[] {
  return [
    item.id,
    item.path,
    item.durationSec,
    item.format,
    item.kind,
    item.sizeBytes,
    item.projectName,
    item.eventDate ?? null,
    item.language ?? null,
    item.status,
    item.checkpoint ?? null,
    item.currentVersion ?? null,
    item.failure ? JSON.stringify(item.failure) : null,
    item.updatedAt,
    item.eventName ?? null,
  ];
}

const INSERT_BATCH = 200;

/** Multi-row INSERT in batches; casts[i] is appended to the i-th placeholder of each row. */
async function insertRows(
  client: SqlClient,
  table: string,
  columns: readonly string[],
  rows: readonly unknown[][],
  casts: readonly string[] = []
): Promise<void> {
  for (let i = 0; i < rows.length; i += INSERT_BATCH) {
    const batch = rows.slice(i, i + INSERT_BATCH);
    const values: unknown[] = [];
    const tuples = batch.map((row) => {
      const ph = row.map((v, j) => {
        values.push(v);
        return `$${values.length}${casts[j] ?? ''}`;
      });
      return `(${ph.join(',')})`;
    });
    await client.query(`INSERT INTO ${table} (${columns.join(', ')}) VALUES ${tuples.join(', ')}`, values);
  }
}

function operatorFor(metric: DistanceMetric): string {
  return metric === 'cosine' ? '<=>' : '<->';
}

function opsFor(metric: DistanceMetric): string {
  return metric === 'cosine' ? 'vector_cosine_ops' : 'vector_l2_ops';
}

/** Rows the inner index scan returns for a top-k query; the surplus lets ties at the k-th distance reach the outer sort. */
export function candidateCount(k: number): number {
  return Math.max(k * 2, k + 20);
}

/** pgvector accepts hnsw.ef_search between 1 and 1000; iterative scans continue past it. */
export function efSearchFor(candidates: number): number {
  return Math.min(1000, Math.max(40, candidates));
}

/** pgvector's HNSW index is limited to 2000 dimensions. */
const HNSW_MAX_DIMENSION = 2000;

/**
 * Postgres + pgvector. Vectors live in an untyped `vector` column; the recorded
 * dimension is applied as a cast in both the HNSW expression index and queries so
 * the planner can use the index.
 */
export class PgIndexStore implements IndexStore {
  private spec: IndexSpec | null = null;

  constructor(private readonly pool: SqlPool, private readonly metric: DistanceMetric) {}

  async open(spec: IndexSpec): Promise<void> {
    const stored = await this.describe();
    if (stored) {
      assertCompatible(stored, spec);
      debug('store.open', { ...stored });
      return;
    }
    await this.pool.query(
      `INSERT INTO index_meta (id, model, dimension, metric) VALUES (TRUE, $1, $2, $3) ON CONFLICT (id) DO NOTHING`,
      [spec.model, spec.dimension, spec.metric]
    );
    // a concurrent opener may have won the insert
    const recorded = await this.describe();
    if (recorded) assertCompatible(recorded, spec);
    if (spec.dimension <= HNSW_MAX_DIMENSION) {
      await this.pool.query(
        `CREATE INDEX IF NOT EXISTS embeddings_hnsw_${spec.metric}_${spec.dimension}
         ON embeddings USING hnsw ((embedding::vector(${spec.dimension})) ${opsFor(spec.metric)})`
      );
    } else {
      warn('store.hnsw.skipped', { dimension: spec.dimension, max: HNSW_MAX_DIMENSION });
    }
    info('store.open.recorded', { ...spec });
  }

  async describe(): Promise<IndexSpec | null> {
    if (this.spec) return this.spec;
    const res = await this.pool.query(`SELECT model, dimension, metric FROM index_meta WHERE id = TRUE`);
    const row = res.rows[0];
    if (!row) return null;
    this.spec = parseStored(indexMetaRowSchema, row, 'index_meta row');
    return this.spec;
  }

  async upsertMediaItem(item: MediaItem): Promise<void> {
    try {
      await this.pool.query(UPSERT_MEDIA, mediaParams(item));
    } catch (e) {
      throw new StoreWriteError(`Failed to write media item ${item.id}: ${errorMessage(e)}`, item.id);
    }
  }

  async getMediaItem(id: string): Promise<MediaItem | null> {
    const res = await this.pool.query(`SELECT ${MEDIA_COLUMNS} FROM media_items WHERE id = $1`, [id]);
    return res.rows[0] ? decodeMedia(res.rows[0]) : null;
  }

  async listMediaItems(filters: MediaFilters = {}): Promise<MediaItem[]> {
    const res = await this.pool.query(
      `SELECT ${MEDIA_COLUMNS} FROM media_items
       WHERE ($1::text IS NULL OR project_name = $1)
         AND ($2::text[] IS NULL OR status = ANY($2))
         AND ($3::text[] IS NULL OR id = ANY($3))
       ORDER BY path ASC`,
      [filters.projectName ?? null, filters.status ?? null, filters.mediaIds ?? null]
    );
    return res.rows.map(decodeMedia);
  }

  async deleteMediaItem(id: string): Promise<void> {
    // versions, segments, chunks and embeddings cascade
    await this.pool.query(`DELETE FROM media_items WHERE id = $1`, [id]);
  }

  async ingest<T>(mediaId: string, fn: (tx: IngestionTx) => Promise<T>): Promise<T> {
    let client: SqlPoolClient;
    try {
      client = await this.pool.connect();
    } catch (e) {
      throw new StoreWriteError(`Could not open a transaction for ${mediaId}: ${errorMessage(e)}`, mediaId);
    }
    const run = async (text: string, values?: readonly unknown[]) => {
      try {
        return await client.query(text, values);
      } catch (e) {
        throw new StoreWriteError(`Write for ${mediaId} failed: ${errorMessage(e)}`, mediaId);
      }
    };
    try {
      await run('BEGIN');
      const locked = await run(`SELECT id FROM media_items WHERE id = $1 FOR UPDATE`, [mediaId]);
      if (!locked.rows.length) {
        throw new ConsistencyError(`Media item ${mediaId} must be registered before ingestion`, { mediaId });
      }
      const next = await run(
        `SELECT COALESCE(MAX(version), 0) + 1 AS version FROM ingestion_versions WHERE media_id = $1`,
        [mediaId]
      );
      const { version } = parseStored(versionRowSchema, next.rows[0], 'ingestion_versions row');
      await run(`INSERT INTO ingestion_versions (media_id, version) VALUES ($1, $2)`, [mediaId, version]);

      const sink: SqlClient = { query: run };
      const tx: IngestionTx = {
        mediaId,
        version,
        appendSegments: (segments) =>
          insertRows(
            sink,
            'segments',
            ['media_id', 'version', 'idx', 'segment_index', 'start_sec', 'end_sec', 'text', 'confidence', 'source', 'speaker'],
            segments.map((s, idx) => [
              mediaId,
              version,
              idx,
              s.segmentIndex,
              s.startSec,
              s.endSec,
              s.text,
              s.confidence ?? null,
              s.source,
              s.speaker ?? null,
            ])
          ),
        appendChunksWithEmbeddings: async (items: readonly ChunkWithEmbedding[]) => {
          await insertRows(
            sink,
            'chunks',
            ['media_id', 'version', 'idx', 'id', 'text', 'overlap_text', 'start_sec', 'end_sec', 'first_segment', 'last_segment', 'speakers', 'content_hash'],
            items.map(({ chunk: c }) => [
              mediaId,
              version,
              c.index,
              c.id,
              c.text,
              c.overlapText,
              c.startSec,
              c.endSec,
              c.firstSegment,
              c.lastSegment,
              c.speakers,
              c.contentHash,
            ])
          );
          await insertRows(
            sink,
            'embeddings',
            ['media_id', 'version', 'chunk_idx', 'chunk_id', 'model', 'dimension', 'content_hash', 'embedding', 'created_at'],
            items.map(({ chunk, embedding: e }) => [
              mediaId,
              version,
              chunk.index,
              e.chunkId,
              e.model,
              e.dimension,
              e.contentHash,
              toVectorLiteral(e.vector),
              e.createdAt,
            ]),
            ['', '', '', '', '', '', '', '::vector', '']
          );
        },
        upsertMediaItem: async (item) => {
          await run(UPSERT_MEDIA, mediaParams(item));
        },
      };

      const result = await fn(tx);
      await run('COMMIT');
      info('store.commit', { mediaId, version });
      return result;
    } catch (e) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        warn('store.rollback.fail', { mediaId, error: errorMessage(rollbackError) });
      });
      if (e instanceof PipelineError) throw e;
      throw new StoreWriteError(`Ingestion of ${mediaId} rolled back: ${errorMessage(e)}`, mediaId);
    } finally {
      client.release();
    }
  }

  async getSegments(mediaId: string): Promise<AlignedSegment[]> {
    const res = await this.pool.query(
      `SELECT s.segment_index, s.start_sec, s.end_sec, s.text, s.confidence, s.source, s.speaker
       FROM segments s JOIN media_items m ON m.id = s.media_id AND m.current_version = s.version
       WHERE s.media_id = $1 ORDER BY s.idx ASC`,
      [mediaId]
    );
    return res.rows.map(decodeSegment);
  }

  /**
   * Filtered top-k in two steps. The inner query walks the HNSW index in distance order
   * only, with iterative scans so filtered-out rows do not starve it, and returns
   * `candidateCount(k)` rows; the outer query settles exact order and ties.
   * Needs pgvector 0.8 or later.
   */
  async nearestNeighbors(vector: readonly number[], k: number, filters: SearchFilters = {}): Promise<Neighbor[]> {
    const spec = await this.describe();
    if (!spec || k <= 0) return [];
    const dim = spec.dimension;
    const op = operatorFor(this.metric);
    const candidates = candidateCount(k);
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(`SET LOCAL hnsw.ef_search = ${efSearchFor(candidates)}`);
      await client.query(`SET LOCAL hnsw.iterative_scan = relaxed_order`);
      const res = await client.query(
        `WITH candidates AS MATERIALIZED (
           SELECT e.media_id, e.version, e.chunk_idx,
                  (e.embedding::vector(${dim}) ${op} $1::vector(${dim})) AS distance
           FROM embeddings e
           JOIN media_items m ON m.id = e.media_id AND m.current_version = e.version
           WHERE ($3::text IS NULL OR m.project_name = $3)
             AND ($4::date IS NULL OR m.event_date >= $4::date)
             AND ($5::date IS NULL OR m.event_date <= $5::date)
             AND ($6::text[] IS NULL OR m.id = ANY($6))
           ORDER BY e.embedding::vector(${dim}) ${op} $1::vector(${dim})
           LIMIT $2
         )
         SELECT c.id, c.media_id, c.idx, c.text, c.overlap_text, c.start_sec, c.end_sec, c.first_segment,
                c.last_segment, c.speakers, c.content_hash, cand.distance
         FROM candidates cand
         JOIN media_items m ON m.id = cand.media_id
         JOIN chunks c ON c.media_id = cand.media_id AND c.version = cand.version AND c.idx = cand.chunk_idx
         ORDER BY cand.distance ASC, m.event_date DESC NULLS LAST, m.id ASC, c.idx ASC
         LIMIT $7`,
        [
          toVectorLiteral(vector),
          candidates,
          filters.projectName ?? null,
          filters.dateFrom ?? null,
          filters.dateTo ?? null,
          filters.mediaIds ?? null,
          k,
        ]
      );
      await client.query('COMMIT');
      return res.rows.map(decodeNeighbor);
    } catch (e) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        warn('store.search.rollback.fail', { error: errorMessage(rollbackError) });
      });
      throw e;
    } finally {
      client.release();
    }
  }

  async findEmbeddings(contentHashes: readonly string[], model: string): Promise<Map<string, number[]>> {
    const found = new Map<string, number[]>();
    if (!contentHashes.length) return found;
    const res = await this.pool.query(
      `SELECT DISTINCT ON (e.content_hash) e.content_hash, e.embedding::text AS embedding
       FROM embeddings e JOIN media_items m ON m.id = e.media_id AND m.current_version = e.version
       WHERE e.model = $1 AND e.content_hash = ANY($2::text[])`,
      [model, [...contentHashes]]
    );
    for (const row of res.rows) {
      const { content_hash, embedding } = parseStored(storedVectorRowSchema, row, 'embeddings row');
      const vector = parseVectorLiteral(embedding);
      if (vector) found.set(content_hash, vector);
    }
    return found;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
