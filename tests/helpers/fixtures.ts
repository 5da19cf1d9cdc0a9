import { sha256, toChunkId } from '../../src/pipeline/ids';
import type { IndexStore } from '../../src/pipeline/store';
import type { AlignedSegment, ChunkWithEmbedding, IndexSpec, MediaItem } from '../../src/pipeline/types';

export const SPEC: IndexSpec = { model: 'fake-embed', dimension: 3, metric: 'cosine' };

export function mediaId(n: number): string {
  return String(n).padStart(32, '0');
}

export function makeItem(id: string, overrides: Partial<MediaItem> = {}): MediaItem {
  return {
    id,
    path: `/media/${id.slice(-4)}.wav`,
    durationSec: 60,
    format: 'wav',
    kind: 'audio',
    sizeBytes: 1024,
    projectName: 'Board',
    status: 'Discovered',
    updatedAt: '2024-05-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeEntry(id: string, index: number, text: string, vector: number[], model = SPEC.model): ChunkWithEmbedding {
  const contentHash = sha256(text);
  const chunkId = toChunkId(id, index, contentHash);
  return {
    chunk: {
      id: chunkId,
      mediaId: id,
      index,
      text,
      overlapText: '',
      startSec: index * 10,
      endSec: index * 10 + 10,
      firstSegment: index,
      lastSegment: index,
      speakers: [],
      contentHash,
    },
    embedding: {
      chunkId,
      model,
      dimension: vector.length,
      vector,
      contentHash,
      createdAt: '2024-05-01T00:00:00.000Z',
    },
  };
}

export function segmentsFor(texts: string[]): AlignedSegment[] {
  return texts.map((text, i) => ({ startSec: i * 10, endSec: i * 10 + 10, text, source: 'fake:asr', segmentIndex: i }));
}

/** Commit entries as the item's next version and mark it Indexed. */
export function commitEntries(store: IndexStore, item: MediaItem, entries: ChunkWithEmbedding[]): Promise<number> {
  return store.ingest(item.id, async (tx) => {
    await tx.appendSegments(segmentsFor(entries.map((e) => e.chunk.text)));
    await tx.appendChunksWithEmbeddings(entries);
    await tx.upsertMediaItem({ ...item, status: 'Indexed', currentVersion: tx.version });
    return tx.version;
  });
}
