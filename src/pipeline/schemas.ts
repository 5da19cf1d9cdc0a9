import { z } from 'zod';
import { ConsistencyError } from './errors';
import type {
    AlignedSegment,
    Chunk,
    ChunkWithEmbedding,
    DistanceMetric,
    Embedding,
    IndexSpec,
    MediaFailure,
    MediaItem,
    MediaKind,
    MediaStatus,
    SpeakerInterval,
    Stage,
    TranscriptSegment,
} from './types';

export const mediaStatusSchema: z.ZodType<MediaStatus> = z.enum([
    'Discovered',
    'Transcribing',
    'Diarizing',
    'Aligning',
    'Embedding',
    'Indexed',
    'Failed',
]);

export const stageSchema: z.ZodType<Stage> = z.enum(['transcribe', 'diarize', 'align', 'embed']);

export const mediaKindSchema: z.ZodType<MediaKind> = z.enum(['audio', 'video', 'text']);

export const metricSchema: z.ZodType<DistanceMetric> = z.enum(['cosine', 'l2']);

const seconds = z.number().finite().nonnegative();

export const mediaFailureSchema: z.ZodType<MediaFailure> = z.object({
    code: z.string(),
    message: z.string(),
    retryable: z.boolean(),
    stage: mediaStatusSchema,
    at: z.string(),
});

export const mediaItemSchema: z.ZodType<MediaItem> = z.object({
    id: z.string().min(1),
    path: z.string(),
    durationSec: seconds,
    format: z.string(),
    kind: mediaKindSchema,
    sizeBytes: z.number().int().nonnegative(),
    projectName: z.string(),
    eventName: z.string().optional(),
    eventDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
    language: z.string().optional(),
    status: mediaStatusSchema,
    checkpoint: stageSchema.optional(),
    currentVersion: z.number().int().positive().optional(),
    failure: mediaFailureSchema.optional(),
    updatedAt: z.string(),
});

const transcriptSegmentShape = {
    startSec: seconds,
    endSec: seconds,
    text: z.string(),
    confidence: z.number().min(0).max(1).optional(),
    source: z.string(),
};

export const transcriptSegmentSchema: z.ZodType<TranscriptSegment> = z.object(transcriptSegmentShape);

export const alignedSegmentSchema: z.ZodType<AlignedSegment> = z.object({
    ...transcriptSegmentShape,
    segmentIndex: z.number().int().nonnegative(),
    speaker: z.string().optional(),
});

export const speakerIntervalSchema: z.ZodType<SpeakerInterval> = z.object({
    startSec: seconds,
    endSec: seconds,
    speaker: z.string(),
});

export const chunkSchema: z.ZodType<Chunk> = z.object({
    id: z.string(),
    mediaId: z.string(),
    index: z.number().int().nonnegative(),
    text: z.string(),
    overlapText: z.string(),
    startSec: seconds,
    endSec: seconds,
    firstSegment: z.number().int().nonnegative(),
    lastSegment: z.number().int().nonnegative(),
    speakers: z.array(z.string()),
    contentHash: z.string(),
});

export const embeddingSchema: z.ZodType<Embedding> = z.object({
    chunkId: z.string(),
    model: z.string(),
    dimension: z.number().int().positive(),
    vector: z.array(z.number().finite()),
    contentHash: z.string(),
    createdAt: z.string(),
});

export const chunkWithEmbeddingSchema: z.ZodType<ChunkWithEmbedding> = z.object({
    chunk: chunkSchema,
    embedding: embeddingSchema,
});

export const indexSpecSchema: z.ZodType<IndexSpec> = z.object({
    model: z.string().min(1),
    dimension: z.number().int().positive(),
    metric: metricSchema,
});

/** One line per issue: `segments.3.endSec: Expected number, received string` */
export function describeIssues(error: z.ZodError): string {
    return error.issues.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`).join('; ');
}

/**
 * Validate data the pipeline wrote itself (checkpoints, index files, table rows).
 * A mismatch means the stored state is corrupt, not that the input is bad.
 */
export function parseStored<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, what: string): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ConsistencyError(`${what} is malformed: ${describeIssues(result.error)}`, { what });
    }
    return result.data;
}
