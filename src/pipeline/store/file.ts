import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConsistencyError, StoreWriteError, errorMessage } from '../errors';
import { debug, info, warn } from '../log';
import type {
    AlignedSegment,
    ChunkWithEmbedding,
    DistanceMetric,
    IndexSpec,
    MediaItem,
    Neighbor,
    SearchFilters,
} from '../types';
import { writeJsonAtomic } from '../json';
import { alignedSegmentSchema, chunkWithEmbeddingSchema, indexSpecSchema, mediaItemSchema, parseStored } from '../schemas';
import { distance } from '../vector';
import { assertCompatible, compareNeighbors, matchesFilters } from './filters';
import type { IndexStore, IngestionTx, MediaFilters } from './index';

interface VersionRecord {
    mediaId: string;
    version: number;
    committedAt: string;
    segments: AlignedSegment[];
    chunks: ChunkWithEmbedding[];
}

const versionRecordSchema: z.ZodType<VersionRecord> = z.object({
    mediaId: z.string(),
    version: z.number().int().positive(),
    committedAt: z.string(),
    segments: z.array(alignedSegmentSchema),
    chunks: z.array(chunkWithEmbeddingSchema),
});

async function readStored<T>(file: string, schema: z.ZodType<T>): Promise<T> {
    let raw: unknown;
    try {
        raw = await fs.readJson(file);
    } catch (e) {
        throw new ConsistencyError(`Index file ${file} is unreadable: ${errorMessage(e)}`, { file });
    }
    return parseStored(schema, raw, `Index file ${file}`);
}

/**
 * JSON index for DISABLE_DB deployments:
 *
 *   meta.json                       recorded IndexSpec
 *   media/<id>.json                 MediaItem
 *   versions/<id>/<version>.json    segments, chunks and vectors of one pass
 *
 * A version file is written before the media item that points at it, each through
 * rename, so readers only ever follow currentVersion to a complete file.
 * Search is a brute-force scan.
 */
export class FileIndexStore implements IndexStore {
    private readonly versionCache = new Map<string, VersionRecord>();

    constructor(private readonly dir: string, private readonly metric: DistanceMetric) {}

    private metaPath() {
        return path.join(this.dir, 'meta.json');
    }

    private mediaPath(id: string) {
        return path.join(this.dir, 'media', `${id}.json`);
    }

    private versionsDir(id: string) {
        return path.join(this.dir, 'versions', id);
    }

    private versionPath(id: string, version: number) {
        return path.join(this.versionsDir(id), `${String(version).padStart(6, '0')}.json`);
    }

    async open(spec: IndexSpec): Promise<void> {
        const stored = await this.describe();
        if (!stored) {
            await writeJsonAtomic(this.metaPath(), spec);
            info('store.open.recorded', { dir: this.dir, ...spec });
            return;
        }
        assertCompatible(stored, spec);
        debug('store.open', { dir: this.dir, ...stored });
    }

    async describe(): Promise<IndexSpec | null> {
        if (!(await fs.pathExists(this.metaPath()))) return null;
        return readStored(this.metaPath(), indexSpecSchema);
    }

    async upsertMediaItem(item: MediaItem): Promise<void> {
        try {
            await writeJsonAtomic(this.mediaPath(item.id), item);
        } catch (e) {
            throw new StoreWriteError(`Failed to write media item ${item.id}: ${errorMessage(e)}`, item.id);
        }
    }

    async getMediaItem(id: string): Promise<MediaItem | null> {
        const p = this.mediaPath(id);
        if (!(await fs.pathExists(p))) return null;
        return readStored(p, mediaItemSchema);
    }

    async listMediaItems(filters: MediaFilters = {}): Promise<MediaItem[]> {
        const dir = path.join(this.dir, 'media');
        if (!(await fs.pathExists(dir))) return [];
        const names = (await fs.readdir(dir)).filter((f) => f.endsWith('.json')).sort();
        const items: MediaItem[] = [];
        for (const name of names) {
            const item = await this.getMediaItem(path.basename(name, '.json'));
            if (!item) continue;
            if (filters.projectName !== undefined && item.projectName !== filters.projectName) continue;
            if (filters.status && !filters.status.includes(item.status)) continue;
            if (filters.mediaIds && !filters.mediaIds.includes(item.id)) continue;
            items.push(item);
        }
        return items.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
    }

    async deleteMediaItem(id: string): Promise<void> {
        await fs.remove(this.mediaPath(id));
        await fs.remove(this.versionsDir(id));
        for (const key of [...this.versionCache.keys()]) {
            if (key.startsWith(`${id}/`)) this.versionCache.delete(key);
        }
    }

    private async nextVersion(mediaId: string): Promise<number> {
        const current = (await this.getMediaItem(mediaId))?.currentVersion ?? 0;
        const dir = this.versionsDir(mediaId);
        if (!(await fs.pathExists(dir))) return current + 1;
        const written = (await fs.readdir(dir))
            .map((f) => Number.parseInt(path.basename(f, '.json'), 10))
            .filter((n) => Number.isInteger(n));
        return Math.max(current, ...written) + 1;
    }

    async ingest<T>(mediaId: string, fn: (tx: IngestionTx) => Promise<T>): Promise<T> {
        const version = await this.nextVersion(mediaId);
        const segments: AlignedSegment[] = [];
        const chunks: ChunkWithEmbedding[] = [];
        const staged: { item?: MediaItem } = {};

        const tx: IngestionTx = {
            mediaId,
            version,
            appendSegments: async (s) => {
                segments.push(...s);
            },
            appendChunksWithEmbeddings: async (c) => {
                chunks.push(...c);
            },
            upsertMediaItem: async (m) => {
                staged.item = m;
            },
        };

        // staged in memory: a failure here leaves nothing behind
        const result = await fn(tx);

        const record: VersionRecord = { mediaId, version, committedAt: new Date().toISOString(), segments, chunks };
        const versionPath = this.versionPath(mediaId, version);
        try {
            await writeJsonAtomic(versionPath, record);
            if (staged.item) await writeJsonAtomic(this.mediaPath(mediaId), staged.item);
        } catch (e) {
            await fs.remove(versionPath).catch((cleanupError: unknown) => {
                warn('store.rollback.fail', { mediaId, version, error: errorMessage(cleanupError) });
            });
            throw new StoreWriteError(`Commit of ${mediaId} v${version} failed: ${errorMessage(e)}`, mediaId);
        }
        this.versionCache.set(`${mediaId}/${version}`, record);
        info('store.commit', { mediaId, version, segments: segments.length, chunks: chunks.length });
        return result;
    }

    private async loadVersion(mediaId: string, version: number): Promise<VersionRecord | null> {
        const key = `${mediaId}/${version}`;
        const cached = this.versionCache.get(key);
        if (cached) return cached;
        const p = this.versionPath(mediaId, version);
        if (!(await fs.pathExists(p))) return null;
        const record = await readStored(p, versionRecordSchema);
        // versions are immutable once written
        this.versionCache.set(key, record);
        return record;
    }

    private async currentVersions(filters?: SearchFilters): Promise<Array<{ item: MediaItem; record: VersionRecord }>> {
        const out: Array<{ item: MediaItem; record: VersionRecord }> = [];
        for (const item of await this.listMediaItems()) {
            if (item.currentVersion === undefined || !matchesFilters(item, filters)) continue;
            const record = await this.loadVersion(item.id, item.currentVersion);
            if (record) out.push({ item, record });
        }
        return out;
    }

    async getSegments(mediaId: string): Promise<AlignedSegment[]> {
        const item = await this.getMediaItem(mediaId);
        if (item?.currentVersion === undefined) return [];
        return (await this.loadVersion(mediaId, item.currentVersion))?.segments ?? [];
    }

    async nearestNeighbors(vector: readonly number[], k: number, filters?: SearchFilters): Promise<Neighbor[]> {
        if (k <= 0) return [];
        const scored: Array<Neighbor & { eventDate?: string }> = [];
        for (const { item, record } of await this.currentVersions(filters)) {
            for (const { chunk, embedding } of record.chunks) {
                scored.push({ chunk, distance: distance(vector, embedding.vector, this.metric), eventDate: item.eventDate });
            }
        }
        return scored
            .sort(compareNeighbors)
            .slice(0, k)
            .map(({ chunk, distance: d }) => ({ chunk, distance: d }));
    }

    async findEmbeddings(contentHashes: readonly string[], model: string): Promise<Map<string, number[]>> {
        const wanted = new Set(contentHashes);
        const found = new Map<string, number[]>();
        if (!wanted.size) return found;
        for (const { record } of await this.currentVersions()) {
            for (const { embedding } of record.chunks) {
                if (embedding.model === model && wanted.has(embedding.contentHash) && !found.has(embedding.contentHash)) {
                    found.set(embedding.contentHash, embedding.vector);
                }
            }
        }
        return found;
    }

    async close(): Promise<void> {
        this.versionCache.clear();
    }
}
