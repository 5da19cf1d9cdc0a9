import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { ConsistencyError, errorMessage } from './errors';
import { sha256 } from './ids';
import { writeJsonAtomic } from './json';
import { debug, info } from './log';
import {
    alignedSegmentSchema,
    chunkWithEmbeddingSchema,
    parseStored,
    speakerIntervalSchema,
    stageSchema,
    transcriptSegmentSchema,
} from './schemas';
import {
    STAGES,
    type AlignedSegment,
    type ChunkWithEmbedding,
    type SpeakerInterval,
    type Stage,
    type TranscriptSegment,
} from './types';

export interface DiarizeCheckpoint {
    enabled: boolean;
    intervals: SpeakerInterval[];
}

export interface StageOutputs {
    transcribe: TranscriptSegment[];
    diarize: DiarizeCheckpoint;
    align: AlignedSegment[];
    embed: ChunkWithEmbedding[];
}

interface CheckpointFile<S extends Stage> {
    stage: S;
    mediaId: string;
    fingerprint: string;
    savedAt: string;
    data: StageOutputs[S];
}

const envelopeSchema = z.object({
    stage: stageSchema,
    mediaId: z.string(),
    fingerprint: z.string(),
    savedAt: z.string(),
    data: z.unknown(),
});

const STAGE_DATA: { [S in Stage]: z.ZodType<StageOutputs[S]> } = {
    transcribe: z.array(transcriptSegmentSchema),
    diarize: z.object({ enabled: z.boolean(), intervals: z.array(speakerIntervalSchema) }),
    align: z.array(alignedSegmentSchema),
    embed: z.array(chunkWithEmbeddingSchema),
};

/** Stages whose checkpoints are derived from the given stage's output. */
export const DOWNSTREAM: Record<Stage, readonly Stage[]> = {
    transcribe: ['align', 'embed'],
    diarize: ['align', 'embed'],
    align: ['embed'],
    embed: [],
};

function canonical(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(canonical);
    if (typeof value === 'object' && value !== null) {
        return Object.fromEntries(
            Object.entries(value)
                .filter(([, v]) => v !== undefined)
                .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
                .map(([k, v]) => [k, canonical(v)])
        );
    }
    return value;
}

/** Stable hash of the settings that produced a stage output; key order does not matter. */
export function fingerprint(parts: Record<string, unknown>): string {
    return sha256(JSON.stringify(canonical(parts))).slice(0, 16);
}

/**
 * Per-item stage outputs under `<root>/<mediaId>/<stage>.json`. A checkpoint whose
 * fingerprint differs from the current configuration is treated as absent.
 */
export class CheckpointStore {
    constructor(private readonly root: string) {}

    dir(mediaId: string): string {
        return path.join(this.root, mediaId);
    }

    private file(mediaId: string, stage: Stage): string {
        return path.join(this.dir(mediaId), `${stage}.json`);
    }

    async load<S extends Stage>(mediaId: string, stage: S, fp: string): Promise<StageOutputs[S] | null> {
        const p = this.file(mediaId, stage);
        if (!(await fs.pathExists(p))) return null;
        let raw: unknown;
        try {
            raw = await fs.readJson(p);
        } catch (e) {
            throw new ConsistencyError(`Checkpoint ${p} is unreadable: ${errorMessage(e)}`, { mediaId, stage });
        }
        const cp = parseStored(envelopeSchema, raw, `Checkpoint ${p}`);
        if (cp.stage !== stage || cp.fingerprint !== fp) {
            info('checkpoint.stale', { mediaId, stage, stored: cp.fingerprint, current: fp });
            await this.invalidate(mediaId, stage);
            return null;
        }
        debug('checkpoint.hit', { mediaId, stage });
        return parseStored(STAGE_DATA[stage], cp.data, `Checkpoint ${p}`);
    }

    async save<S extends Stage>(mediaId: string, stage: S, fp: string, data: StageOutputs[S]): Promise<void> {
        const cp: CheckpointFile<S> = { stage, mediaId, fingerprint: fp, savedAt: new Date().toISOString(), data };
        await writeJsonAtomic(this.file(mediaId, stage), cp);
        debug('checkpoint.saved', { mediaId, stage });
    }

    /** Drop a stage's checkpoint and everything computed from it. */
    async invalidate(mediaId: string, stage: Stage): Promise<void> {
        for (const s of [stage, ...DOWNSTREAM[stage]]) {
            await fs.remove(this.file(mediaId, s));
        }
    }

    async has(mediaId: string, stage: Stage): Promise<boolean> {
        return fs.pathExists(this.file(mediaId, stage));
    }

    /** The last stage of the checkpointed prefix of the pipeline, e.g. 'diarize' once transcribe and diarize are saved. */
    async lastCompleted(mediaId: string): Promise<Stage | undefined> {
        let last: Stage | undefined;
        for (const s of STAGES) {
            if (!(await this.has(mediaId, s))) break;
            last = s;
        }
        return last;
    }

    async clear(mediaId: string): Promise<void> {
        await fs.remove(this.dir(mediaId));
    }
}
