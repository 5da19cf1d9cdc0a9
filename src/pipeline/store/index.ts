import type {
  AlignedSegment,
  ChunkWithEmbedding,
  DistanceMetric,
  IndexSpec,
  MediaItem,
  MediaStatus,
  Neighbor,
  SearchFilters,
} from '../types';
import { FileIndexStore } from './file';
import { PgIndexStore, createPgPool } from './pg';

/**
 * Writes of one ingestion pass. Nothing is visible to readers until the callback
 * passed to IndexStore.ingest resolves and the version is committed.
 */
export interface IngestionTx {
  readonly mediaId: string;
  /** Version number this pass will commit as */
  readonly version: number;
  appendSegments(segments: readonly AlignedSegment[]): Promise<void>;
  appendChunksWithEmbeddings(items: readonly ChunkWithEmbedding[]): Promise<void>;
  /** Staged with the pass; set currentVersion to `version` to publish it */
  upsertMediaItem(item: MediaItem): Promise<void>;
}

export interface MediaFilters {
  projectName?: string;
  status?: MediaStatus[];
  mediaIds?: string[];
}

export interface IndexStore {
  /** Record the spec on an empty index, or verify it matches what is recorded. */
  open(spec: IndexSpec): Promise<void>;
  describe(): Promise<IndexSpec | null>;
  upsertMediaItem(item: MediaItem): Promise<void>;
  getMediaItem(id: string): Promise<MediaItem | null>;
  listMediaItems(filters?: MediaFilters): Promise<MediaItem[]>;
  /** Remove a media item with every version it owns. */
  deleteMediaItem(id: string): Promise<void>;
  /**
   * Run one ingestion pass as a transaction. Resolves after commit; on any error
   * every staged write is discarded and write failures surface as StoreWriteError.
   */
  ingest<T>(mediaId: string, fn: (tx: IngestionTx) => Promise<T>): Promise<T>;
  /** Segments of the committed current version */
  getSegments(mediaId: string): Promise<AlignedSegment[]>;
  /**
   * Closest chunks among current versions, distance ascending. Ties: more recent
   * event date first, then media id, then chunk index.
   */
  nearestNeighbors(vector: readonly number[], k: number, filters?: SearchFilters): Promise<Neighbor[]>;
  /** Stored vectors for the given content hashes under model, keyed by hash. */
  findEmbeddings(contentHashes: readonly string[], model: string): Promise<Map<string, number[]>>;
  close(): Promise<void>;
}

export interface FileStoreSpec {
  kind: 'file';
  dir: string;
}

export interface PostgresStoreSpec {
  kind: 'postgres';
  databaseUrl: string;
}

export type StoreSpec = FileStoreSpec | PostgresStoreSpec;

export function createIndexStore(spec: StoreSpec, metric: DistanceMetric): IndexStore {
  switch (spec.kind) {
    case 'file':
      return new FileIndexStore(spec.dir, metric);
    case 'postgres':
      return new PgIndexStore(createPgPool(spec.databaseUrl), metric);
  }
}

export { assertCompatible, compareNeighbors, matchesFilters, sameSpec } from './filters';
