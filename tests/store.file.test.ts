import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { ConsistencyError, ModelMismatchError } from '../src/pipeline/errors';
import { FileIndexStore } from '../src/pipeline/store/file';
import type { SearchFilters } from '../src/pipeline/types';
import { makeTempDir } from './helpers/fakes';
import { SPEC, commitEntries, makeEntry, makeItem, mediaId, segmentsFor } from './helpers/fixtures';

const commit = commitEntries;

describe('FileIndexStore', () => {
  let store: FileIndexStore;
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new FileIndexStore(dir, 'cosine');
    await store.open(SPEC);
  });

  it('should record the index spec and refuse a different one', async () => {
    expect(await store.describe()).toEqual(SPEC);
    await expect(store.open({ ...SPEC, model: 'other' })).rejects.toBeInstanceOf(ModelMismatchError);
    await expect(store.open({ ...SPEC, dimension: 4 })).rejects.toBeInstanceOf(ModelMismatchError);
    await expect(store.open(SPEC)).resolves.toBeUndefined();
  });

  it('should publish a committed pass', async () => {
    const id = mediaId(1);
    await store.upsertMediaItem(makeItem(id));
    const version = await commit(store, makeItem(id), [makeEntry(id, 0, 'budget review', [1, 0, 0])]);

    expect(version).toBe(1);
    expect((await store.getMediaItem(id))?.currentVersion).toBe(1);
    expect((await store.getSegments(id)).map((s) => s.text)).toEqual(['budget review']);
    const hits = await store.nearestNeighbors([1, 0, 0], 5);
    expect(hits.map((h) => [h.chunk.text, h.distance])).toEqual([['budget review', 0]]);
  });

  it('should discard everything when the pass fails midway', async () => {
    const id = mediaId(2);
    const item = makeItem(id, { status: 'Embedding' });
    await store.upsertMediaItem(item);

    await expect(
      store.ingest(id, async (tx) => {
        await tx.appendSegments(segmentsFor(['partial']));
        throw new Error('embedder crashed');
      })
    ).rejects.toThrow('embedder crashed');

    expect(await store.getSegments(id)).toEqual([]);
    expect(await store.nearestNeighbors([1, 0, 0], 5)).toEqual([]);
    expect(await store.getMediaItem(id)).toEqual(item);
  });

  it('should serve only the current version after a reprocess', async () => {
    const id = mediaId(3);
    await commit(store, makeItem(id), [makeEntry(id, 0, 'first take', [1, 0, 0])]);
    const v2 = await commit(store, makeItem(id), [makeEntry(id, 0, 'second take', [0, 1, 0])]);

    expect(v2).toBe(2);
    const hits = await store.nearestNeighbors([1, 0, 0], 5);
    expect(hits.map((h) => h.chunk.text)).toEqual(['second take']);
    expect((await store.getSegments(id)).map((s) => s.text)).toEqual(['second take']);
  });

  it('should apply project, date and media filters', async () => {
    const a = mediaId(10);
    const b = mediaId(11);
    const c = mediaId(12);
    await commit(store, makeItem(a, { eventDate: '2024-01-10' }), [makeEntry(a, 0, 'a', [1, 0, 0])]);
    await commit(store, makeItem(b, { eventDate: '2024-02-20', projectName: 'Council' }), [makeEntry(b, 0, 'b', [1, 0, 0])]);
    await commit(store, makeItem(c), [makeEntry(c, 0, 'c', [1, 0, 0])]);

    const texts = async (filters: SearchFilters) =>
      (await store.nearestNeighbors([1, 0, 0], 10, filters)).map((h) => h.chunk.text);

    expect(await texts({ projectName: 'Board' })).toEqual(['a', 'c']);
    expect(await texts({ dateFrom: '2024-01-10', dateTo: '2024-02-20' })).toEqual(['b', 'a']);
    expect(await texts({ dateFrom: '2024-01-11' })).toEqual(['b']);
    expect(await texts({ dateTo: '2024-01-10' })).toEqual(['a']);
    expect(await texts({ mediaIds: [c] })).toEqual(['c']);
  });

  it('should break distance ties by event date, then media id, then chunk index', async () => {
    const older = mediaId(20);
    const newer = mediaId(21);
    const undatedLow = mediaId(5);
    const undatedHigh = mediaId(6);
    await commit(store, makeItem(older, { eventDate: '2023-06-01' }), [makeEntry(older, 0, 'older', [0, 1, 0])]);
    await commit(store, makeItem(newer, { eventDate: '2024-06-01' }), [makeEntry(newer, 0, 'newer', [0, 1, 0])]);
    await commit(store, makeItem(undatedHigh), [makeEntry(undatedHigh, 0, 'undated high', [0, 1, 0])]);
    await commit(store, makeItem(undatedLow), [
      makeEntry(undatedLow, 0, 'undated low 0', [0, 2, 0]),
      makeEntry(undatedLow, 1, 'undated low 1', [0, 1, 0]),
    ]);

    const hits = await store.nearestNeighbors([0, 3, 0], 10);
    expect(hits.map((h) => h.chunk.text)).toEqual([
      'newer',
      'older',
      'undated low 0',
      'undated low 1',
      'undated high',
    ]);
    expect(await store.nearestNeighbors([0, 3, 0], 2)).toHaveLength(2);
  });

  it('should find stored vectors by content hash for the same model', async () => {
    const id = mediaId(30);
    const entry = makeEntry(id, 0, 'reusable text', [0, 0, 1]);
    await commit(store, makeItem(id), [entry]);

    const found = await store.findEmbeddings([entry.chunk.contentHash, 'unknown'], SPEC.model);
    expect([...found.entries()]).toEqual([[entry.chunk.contentHash, [0, 0, 1]]]);
    expect((await store.findEmbeddings([entry.chunk.contentHash], 'other-model')).size).toBe(0);
  });

  it('should list by status and delete an item with its versions', async () => {
    const done = mediaId(40);
    const failed = mediaId(41);
    await commit(store, makeItem(done), [makeEntry(done, 0, 'kept', [1, 0, 0])]);
    await store.upsertMediaItem(makeItem(failed, { status: 'Failed' }));

    expect((await store.listMediaItems({ status: ['Failed'] })).map((m) => m.id)).toEqual([failed]);
    expect(await store.listMediaItems()).toHaveLength(2);

    await store.deleteMediaItem(done);
    expect(await store.getMediaItem(done)).toBeNull();
    expect(await store.nearestNeighbors([1, 0, 0], 5)).toEqual([]);
  });

  it('should refuse a media record that does not match the schema', async () => {
    const id = mediaId(50);
    await fs.outputJson(path.join(dir, 'media', `${id}.json`), { ...makeItem(id), status: 'Done', sizeBytes: -1 });
    const err = await store.getMediaItem(id).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConsistencyError);
    expect(err).toMatchObject({ code: 'CONSISTENCY' });
  });

  it('should refuse a truncated version file', async () => {
    const id = mediaId(51);
    await commit(store, makeItem(id), [makeEntry(id, 0, 'budget review', [1, 0, 0])]);
    await fs.writeFile(path.join(dir, 'versions', id, '000001.json'), '{"mediaId": "');

    const reopened = new FileIndexStore(dir, 'cosine');
    await expect(reopened.getSegments(id)).rejects.toBeInstanceOf(ConsistencyError);
  });
});
