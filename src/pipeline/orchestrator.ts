import fs from 'fs-extra';
import path from 'path';
import { alignSegments, assertAlignment } from './align';
import type { AudioDecoder } from './audio';
import { CheckpointStore, fingerprint, type DiarizeCheckpoint } from './checkpoint';
import { chunkSegments, type ChunkerOptions } from './chunk';
import type { DiarizationBackend } from './diarization';
import type { Embedder } from './embedding';
import {
    CancelledError,
    ConfigurationError,
    ConsistencyError,
    PermanentInputError,
    errorCode,
    errorMessage,
    isRetryable,
    type BackendName,
} from './errors';
import { sha256, toMediaId } from './ids';
import { findMediaFiles, kindFromExtension, locateMedia, type DuplicateMedia, type LocatedMedia, type RejectedMedia } from './locate';
import { error, info, startStep, warn } from './log';
import { Semaphore, runPool } from './pool';
import type { MediaProbe } from './probe';
import { withRetry, withTimeout, type RetryConfig } from './retry';
import type { IndexStore } from './store';
import type { TranscriptionBackend } from './transcription';
import { TRANSCRIPT_EXTENSIONS, parseTranscriptText } from './transcript_import';
import type {
    AlignedSegment,
    Chunk,
    ChunkWithEmbedding,
    DistanceMetric,
    MediaItem,
    MediaStatus,
    Stage,
    TranscriptSegment,
} from './types';

export interface PipelineDeps {
    store: IndexStore;
    probe: MediaProbe;
    decoder: AudioDecoder;
    transcriber: TranscriptionBackend;
    /** null when no diarization backend is configured */
    diarizer: DiarizationBackend | null;
    embedder: Embedder;
    checkpoints: CheckpointStore;
    chunker: ChunkerOptions;
    metric: DistanceMetric;
    retry: RetryConfig;
    /** Watchdog per backend call; 0 disables */
    backendTimeoutMs: number;
    ingestConcurrency: number;
    /** Backend calls in flight across all items; 0 disables the limit */
    backendConcurrency: number;
    mediaExtensions: readonly string[];
    now?: () => Date;
}

export type ItemOutcomeKind = 'indexed' | 'skipped' | 'failed' | 'cancelled';

export interface ItemOutcome {
    path: string;
    mediaId?: string;
    outcome: ItemOutcomeKind;
    status?: MediaStatus;
    version?: number;
    chunks?: number;
    /** First stage that ran in this pass when earlier stages came from checkpoints */
    resumedFrom?: Stage;
    reason?: string;
    error?: { code: string; message: string; retryable: boolean };
}

export type PipelineEvent =
    | { kind: 'status'; mediaId: string; path: string; status: MediaStatus }
    | { kind: 'checkpoint'; mediaId: string; path: string; stage: Stage }
    | { kind: 'done'; item: ItemOutcome };

export interface ProcessOptions {
    /** Event name applied to every item of the run */
    eventName?: string;
    /** YYYY-MM-DD applied to every item of the run */
    eventDate?: string;
    /** Reprocess Indexed and permanently Failed items, discarding checkpoints */
    force?: boolean;
    signal?: AbortSignal;
    concurrency?: number;
    onEvent?: (event: PipelineEvent) => void;
}

export interface ImportOptions {
    eventName?: string;
    /** YYYY-MM-DD */
    eventDate?: string;
    language?: string;
    /** Re-register transcripts that are already indexed */
    force?: boolean;
    /** Lowercase, without the dot; defaults to txt and md */
    extensions?: readonly string[];
    wordsPerSecond?: number;
    signal?: AbortSignal;
    onEvent?: (event: PipelineEvent) => void;
}

export interface ProcessSummary {
    root: string;
    projectName: string;
    items: ItemOutcome[];
    indexed: number;
    skipped: number;
    failed: number;
    cancelled: number;
    durationMs: number;
}

/**
 * Status a stopped item is left in when the given stage is the last one checkpointed:
 * the stage the next run resumes at. `checkpoint` keeps the completed stage.
 */
const RESUME_STATUS: Record<Stage, MediaStatus> = {
    transcribe: 'Diarizing',
    diarize: 'Aligning',
    align: 'Embedding',
    embed: 'Embedding',
};

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

function assertEventDate(eventDate: string | undefined): void {
    if (eventDate !== undefined && !DATE_RE.test(eventDate)) {
        throw new ConfigurationError(`eventDate must be YYYY-MM-DD, got "${eventDate}"`, 'INVALID_EVENT_DATE');
    }
}

/** Event, date and language of the run, falling back to what the item already carries. */
function applyRunFields(item: MediaItem, ctx: RunContext, existing: MediaItem | null): void {
    const eventName = ctx.eventName ?? existing?.eventName;
    if (eventName) item.eventName = eventName;
    const eventDate = ctx.eventDate ?? existing?.eventDate;
    if (eventDate) item.eventDate = eventDate;
    const language = ctx.language ?? existing?.language;
    if (language) item.language = language;
}

function summarize(root: string, projectName: string, outcomes: ItemOutcome[], started: number): ProcessSummary {
    return {
        root: path.resolve(root),
        projectName,
        items: outcomes,
        indexed: outcomes.filter((o) => o.outcome === 'indexed').length,
        skipped: outcomes.filter((o) => o.outcome === 'skipped').length,
        failed: outcomes.filter((o) => o.outcome === 'failed').length,
        cancelled: outcomes.filter((o) => o.outcome === 'cancelled').length,
        durationMs: Date.now() - started,
    };
}

/** Chunks per embedding call; each call gets its own watchdog and retries. */
const EMBED_GROUP = 256;

interface RunContext {
    projectName: string;
    language?: string;
    diarize: boolean;
    eventName?: string;
    eventDate?: string;
    force: boolean;
    signal: AbortSignal;
    emit: (event: PipelineEvent) => void;
}

/**
 * Drives media items through transcribe → diarize → align → chunk/embed → commit.
 * Each stage output is checkpointed under a fingerprint of the settings that
 * produced it, so a rerun picks up at the first stage without a valid checkpoint.
 */
export class PipelineOrchestrator {
    private readonly backendSlots: Semaphore;
    private readonly now: () => Date;

    constructor(private readonly deps: PipelineDeps) {
        this.backendSlots = new Semaphore(deps.backendConcurrency, 'backend');
        this.now = deps.now ?? (() => new Date());
    }

    async processFolder(
        root: string,
        projectName: string,
        language: string | undefined,
        diarizationEnabled: boolean,
        options: ProcessOptions = {}
    ): Promise<ProcessSummary> {
        const started = Date.now();
        assertEventDate(options.eventDate);
        await this.openStore();

        // Aborted by the caller's signal, or by a configuration error in any worker
        const halt = new AbortController();
        const onAbort = () => halt.abort();
        if (options.signal?.aborted) halt.abort();
        options.signal?.addEventListener('abort', onAbort, { once: true });

        const ctx: RunContext = {
            projectName,
            language: language || undefined,
            diarize: diarizationEnabled,
            eventName: options.eventName || undefined,
            eventDate: options.eventDate,
            force: options.force ?? false,
            signal: halt.signal,
            emit: (event) => options.onEvent?.(event),
        };

        try {
            const { items, rejected, duplicates } = await locateMedia(root, this.deps.probe, {
                extensions: this.deps.mediaExtensions,
                signal: halt.signal,
            });
            const outcomes: ItemOutcome[] = [];
            for (const r of rejected) outcomes.push(await this.recordRejected(r, ctx));
            outcomes.push(...duplicates.map((d) => this.duplicateOutcome(d, ctx)));
            const timer = startStep('ingest.folder', { root, projectName, items: items.length, rejected: rejected.length });
            let done = 0;
            const processed = await runPool(items, options.concurrency ?? this.deps.ingestConcurrency, async (m) => {
                try {
                    return await this.processItem(m, ctx);
                } catch (e) {
                    if (e instanceof ConfigurationError) {
                        // systemic: stop every other worker and fail the run
                        halt.abort();
                        throw e;
                    }
                    error('ingest.item.error', { mediaId: m.id, path: m.path, error: errorMessage(e) });
                    const outcome: ItemOutcome = {
                        path: m.path,
                        mediaId: m.id,
                        outcome: 'failed',
                        error: { code: errorCode(e), message: errorMessage(e), retryable: isRetryable(e) },
                    };
                    ctx.emit({ kind: 'done', item: outcome });
                    return outcome;
                } finally {
                    timer.eta(++done, items.length);
                }
            });
            outcomes.push(...processed);
            const summary = summarize(root, projectName, outcomes, started);
            timer.end({ indexed: summary.indexed, skipped: summary.skipped, failed: summary.failed, cancelled: summary.cancelled });
            return summary;
        } finally {
            options.signal?.removeEventListener('abort', onAbort);
        }
    }

    /** One file; a rejected probe comes back as a failed outcome. */
    async processFile(
        filePath: string,
        projectName: string,
        language: string | undefined,
        diarizationEnabled: boolean,
        options: ProcessOptions = {}
    ): Promise<ItemOutcome> {
        const summary = await this.processFolder(filePath, projectName, language, diarizationEnabled, options);
        const [item] = summary.items;
        return item ?? { path: path.resolve(filePath), outcome: 'skipped', reason: 'not a media file' };
    }

    /**
     * Register existing plain-text transcripts under root as indexed items. Each file
     * goes through align, chunk, embed and commit; there is no media to decode.
     */
    async importTranscripts(root: string, projectName: string, options: ImportOptions = {}): Promise<ProcessSummary> {
        const started = Date.now();
        assertEventDate(options.eventDate);
        await this.openStore();
        const ctx: RunContext = {
            projectName,
            language: options.language || undefined,
            diarize: false,
            eventName: options.eventName || undefined,
            eventDate: options.eventDate,
            force: options.force ?? false,
            signal: options.signal ?? new AbortController().signal,
            emit: (event) => options.onEvent?.(event),
        };

        const files = await findMediaFiles(root, options.extensions ?? TRANSCRIPT_EXTENSIONS);
        const timer = startStep('import.folder', { root, projectName, files: files.length });
        const outcomes: ItemOutcome[] = [];
        const firstPath = new Map<string, string>();
        for (const file of files) {
            if (ctx.signal.aborted) {
                outcomes.push({ path: file, outcome: 'cancelled', reason: 'run cancelled' });
                continue;
            }
            const id = await toMediaId(file);
            const first = firstPath.get(id);
            if (first !== undefined) {
                outcomes.push(this.duplicateOutcome({ path: file, id, duplicateOf: first }, ctx));
                continue;
            }
            firstPath.set(id, file);
            outcomes.push(await this.importOne(file, id, ctx, options.wordsPerSecond));
            timer.eta(outcomes.length, files.length);
        }
        const summary = summarize(root, projectName, outcomes, started);
        timer.end({ indexed: summary.indexed, skipped: summary.skipped, failed: summary.failed });
        return summary;
    }

    private async importOne(file: string, id: string, ctx: RunContext, wordsPerSecond?: number): Promise<ItemOutcome> {
        const { store, chunker } = this.deps;
        const existing = await store.getMediaItem(id);
        if (existing?.status === 'Indexed' && !ctx.force) {
            const outcome: ItemOutcome = {
                path: file,
                mediaId: id,
                outcome: 'skipped',
                status: 'Indexed',
                version: existing.currentVersion,
                reason: 'already indexed',
            };
            ctx.emit({ kind: 'done', item: outcome });
            return outcome;
        }

        const text = await fs.readFile(file, 'utf8');
        const { segments, intervals } = parseTranscriptText(text, { wordsPerSecond });
        let item: MediaItem = {
            id,
            path: file,
            durationSec: segments.length ? segments[segments.length - 1].endSec : 0,
            format: path.extname(file).slice(1).toLowerCase() || 'txt',
            kind: 'text',
            sizeBytes: Buffer.byteLength(text),
            projectName: ctx.projectName,
            status: 'Aligning',
            updatedAt: this.now().toISOString(),
        };
        applyRunFields(item, ctx, existing);
        if (existing?.currentVersion !== undefined) item.currentVersion = existing.currentVersion;
        const setStatus = async (status: MediaStatus) => {
            item = { ...item, status, updatedAt: this.now().toISOString() };
            await store.upsertMediaItem(item);
            ctx.emit({ kind: 'status', mediaId: id, path: file, status });
        };

        try {
            if (!segments.length) {
                throw new PermanentInputError(`No transcript text in ${file}`, 'EMPTY_TRANSCRIPT', { path: file });
            }
            await setStatus('Aligning');
            const aligned = alignSegments(segments, intervals);
            assertAlignment(segments, aligned);
            await setStatus('Embedding');
            const embedded = await this.embedChunks(chunkSegments(id, aligned, chunker), ctx.signal);
            const version = await this.commit(item, aligned, embedded, ctx.signal);
            info('import.item.done', { mediaId: id, path: file, segments: segments.length, speakers: intervals.length, version });
            const outcome: ItemOutcome = { path: file, mediaId: id, outcome: 'indexed', status: 'Indexed', version, chunks: embedded.length };
            ctx.emit({ kind: 'status', mediaId: id, path: file, status: 'Indexed' });
            ctx.emit({ kind: 'done', item: outcome });
            return outcome;
        } catch (e) {
            if (e instanceof ConfigurationError) throw e;
            if (e instanceof CancelledError || ctx.signal.aborted) {
                await this.persistQuietly({ ...item, status: existing?.status ?? 'Discovered', updatedAt: this.now().toISOString() });
                const outcome: ItemOutcome = { path: file, mediaId: id, outcome: 'cancelled', reason: errorMessage(e) };
                ctx.emit({ kind: 'done', item: outcome });
                return outcome;
            }
            return this.recordFailure(item, e, ctx);
        }
    }

    private async openStore(): Promise<void> {
        const { store, embedder, metric } = this.deps;
        await store.open({ model: embedder.model, dimension: embedder.dimension, metric });
    }

    /** A file the probe rejected is recorded as a permanently Failed item, unless its content is already indexed. */
    private async recordRejected(r: RejectedMedia, ctx: RunContext): Promise<ItemOutcome> {
        const existing = await this.deps.store.getMediaItem(r.id);
        if (existing?.status === 'Indexed') {
            warn('ingest.rejected.indexed', { mediaId: r.id, path: r.path, error: r.error.message });
        } else {
            const at = this.now().toISOString();
            const failed: MediaItem = {
                id: r.id,
                path: r.path,
                durationSec: existing?.durationSec ?? 0,
                format: existing?.format ?? (path.extname(r.path).slice(1).toLowerCase() || 'unknown'),
                kind: existing?.kind ?? kindFromExtension(r.path),
                sizeBytes: r.sizeBytes,
                projectName: ctx.projectName,
                status: 'Failed',
                failure: { code: r.error.code, message: r.error.message, retryable: false, stage: 'Discovered', at },
                updatedAt: at,
            };
            applyRunFields(failed, ctx, existing);
            await this.persistQuietly(failed);
        }
        const outcome: ItemOutcome = {
            path: r.path,
            mediaId: r.id,
            outcome: 'failed',
            status: existing?.status === 'Indexed' ? 'Indexed' : 'Failed',
            error: { code: r.error.code, message: r.error.message, retryable: false },
        };
        ctx.emit({ kind: 'done', item: outcome });
        return outcome;
    }

    private duplicateOutcome(d: DuplicateMedia, ctx: RunContext): ItemOutcome {
        const outcome: ItemOutcome = {
            path: d.path,
            mediaId: d.id,
            outcome: 'skipped',
            reason: `duplicate of ${d.duplicateOf}`,
        };
        ctx.emit({ kind: 'done', item: outcome });
        return outcome;
    }

    /** Run fn against a backend under the global slot limit, watchdog and retry policy. */
    private call<T>(backend: BackendName, fn: (signal: AbortSignal) => Promise<T>, signal: AbortSignal): Promise<T> {
        return withRetry(
            () => this.backendSlots.use(() => withTimeout(fn, this.deps.backendTimeoutMs, backend, signal)),
            this.deps.retry,
            {
                signal,
                onRetry: (attempt, e, delayMs) =>
                    warn('backend.retry', { backend, attempt, delayMs: Math.round(delayMs), error: e.message }),
            }
        );
    }

    private async processItem(m: LocatedMedia, ctx: RunContext): Promise<ItemOutcome> {
        const { store, checkpoints } = this.deps;
        const existing = await store.getMediaItem(m.id);

        if (existing && !ctx.force) {
            const permanent = existing.status === 'Failed' && existing.failure?.retryable === false;
            if (existing.status === 'Indexed' || permanent) {
                const outcome: ItemOutcome = {
                    path: m.path,
                    mediaId: m.id,
                    outcome: 'skipped',
                    status: existing.status,
                    version: existing.currentVersion,
                    reason: existing.status === 'Indexed' ? 'already indexed' : 'failed permanently',
                };
                info('ingest.item.skip', { mediaId: m.id, path: m.path, reason: outcome.reason });
                ctx.emit({ kind: 'done', item: outcome });
                return outcome;
            }
        }
        if (ctx.force) await checkpoints.clear(m.id);

        let item: MediaItem = {
            id: m.id,
            path: m.path,
            durationSec: m.durationSec,
            format: m.format,
            kind: m.kind,
            sizeBytes: m.sizeBytes,
            projectName: ctx.projectName,
            status: existing?.status ?? 'Discovered',
            updatedAt: this.now().toISOString(),
        };
        applyRunFields(item, ctx, existing);
        if (existing?.currentVersion !== undefined) item.currentVersion = existing.currentVersion;
        const previousStatus = item.status;

        const setStatus = async (status: MediaStatus) => {
            item = { ...item, status, updatedAt: this.now().toISOString() };
            await store.upsertMediaItem(item);
            ctx.emit({ kind: 'status', mediaId: item.id, path: item.path, status });
        };
        const markCheckpoint = async (stage: Stage) => {
            const last = await checkpoints.lastCompleted(item.id);
            if (last) item = { ...item, checkpoint: last };
            ctx.emit({ kind: 'checkpoint', mediaId: item.id, path: item.path, stage });
        };

        const timer = startStep('ingest.item', { mediaId: m.id, path: m.path });
        try {
            if (!existing) await setStatus('Discovered');
            const result = await this.runStages(item, ctx, setStatus, markCheckpoint);
            const outcome: ItemOutcome = {
                path: m.path,
                mediaId: m.id,
                outcome: 'indexed',
                status: 'Indexed',
                version: result.version,
                chunks: result.chunks,
                resumedFrom: result.resumedFrom,
            };
            timer.end({ version: result.version, chunks: result.chunks });
            ctx.emit({ kind: 'status', mediaId: m.id, path: m.path, status: 'Indexed' });
            ctx.emit({ kind: 'done', item: outcome });
            return outcome;
        } catch (e) {
            const stopped = e instanceof CancelledError || e instanceof ConfigurationError || ctx.signal.aborted;
            if (stopped) {
                // back to the last checkpointed state so a later run resumes from there
                const last = await checkpoints.lastCompleted(item.id);
                const reverted: MediaItem = {
                    ...item,
                    status: last ? RESUME_STATUS[last] : previousStatus,
                    updatedAt: this.now().toISOString(),
                };
                if (last) reverted.checkpoint = last;
                await this.persistQuietly(reverted);
                if (e instanceof ConfigurationError) {
                    error('ingest.item.config', { mediaId: m.id, error: errorMessage(e), code: e.code });
                    throw e;
                }
                const outcome: ItemOutcome = {
                    path: m.path,
                    mediaId: m.id,
                    outcome: 'cancelled',
                    status: reverted.status,
                    reason: errorMessage(e),
                };
                warn('ingest.item.cancelled', { mediaId: m.id, status: reverted.status, checkpoint: last });
                ctx.emit({ kind: 'done', item: outcome });
                return outcome;
            }

            return this.recordFailure(item, e, ctx, await checkpoints.lastCompleted(item.id));
        }
    }

    /** Persist the item as Failed at its current status and report it. */
    private async recordFailure(item: MediaItem, e: unknown, ctx: RunContext, checkpoint?: Stage): Promise<ItemOutcome> {
        const retryable = isRetryable(e);
        const at = this.now().toISOString();
        const failed: MediaItem = {
            ...item,
            status: 'Failed',
            failure: { code: errorCode(e), message: errorMessage(e), retryable, stage: item.status, at },
            updatedAt: at,
        };
        if (checkpoint) failed.checkpoint = checkpoint;
        await this.persistQuietly(failed);
        error('ingest.item.fail', { mediaId: item.id, path: item.path, stage: item.status, code: errorCode(e), retryable, error: errorMessage(e) });
        const outcome: ItemOutcome = {
            path: item.path,
            mediaId: item.id,
            outcome: 'failed',
            status: 'Failed',
            error: { code: errorCode(e), message: errorMessage(e), retryable },
        };
        ctx.emit({ kind: 'done', item: outcome });
        return outcome;
    }

    private async persistQuietly(item: MediaItem): Promise<void> {
        await this.deps.store.upsertMediaItem(item).catch((e: unknown) => {
            error('ingest.item.status.fail', { mediaId: item.id, status: item.status, error: errorMessage(e) });
        });
    }

    private async runStages(
        item: MediaItem,
        ctx: RunContext,
        setStatus: (s: MediaStatus) => Promise<void>,
        markCheckpoint: (stage: Stage) => Promise<void>
    ): Promise<{ version: number; chunks: number; resumedFrom?: Stage }> {
        const { checkpoints, transcriber, embedder, chunker } = this.deps;
        const diarizer = ctx.diarize ? this.deps.diarizer : null;
        if (ctx.diarize && !diarizer) info('diarize.disabled', { mediaId: item.id, reason: 'no diarization backend configured' });

        const fpTranscribe = fingerprint({ backend: transcriber.id, language: ctx.language });
        const fpDiarize = fingerprint({ backend: diarizer?.id ?? 'none' });
        // stages computed in this pass, to report where a resumed item picked up
        const ran: Stage[] = [];

        let segments = await checkpoints.load(item.id, 'transcribe', fpTranscribe);
        let diarization = await checkpoints.load(item.id, 'diarize', fpDiarize);
        const resumed = segments !== null;

        if (!diarizer && !diarization) {
            diarization = { enabled: false, intervals: [] };
            await checkpoints.save(item.id, 'diarize', fpDiarize, diarization);
        }

        if (!segments || !diarization) {
            if (!segments) ran.push('transcribe');
            if (!diarization) ran.push('diarize');
            const out = await this.transcribeAndDiarize(item, ctx, diarizer, segments, diarization, fpTranscribe, fpDiarize, setStatus, markCheckpoint);
            segments = out.segments;
            diarization = out.diarization;
        }

        await setStatus('Aligning');
        const fpAlign = fingerprint({ transcribe: fpTranscribe, speakers: sha256(JSON.stringify(diarization.intervals)) });
        let aligned = await checkpoints.load(item.id, 'align', fpAlign);
        if (!aligned) {
            ran.push('align');
            aligned = alignSegments(segments, diarization.intervals);
            assertAlignment(segments, aligned);
            await checkpoints.save(item.id, 'align', fpAlign, aligned);
            await markCheckpoint('align');
        }

        await setStatus('Embedding');
        const fpEmbed = fingerprint({ align: fpAlign, chunker, model: embedder.model, dimension: embedder.dimension });
        let embedded = await checkpoints.load(item.id, 'embed', fpEmbed);
        if (!embedded) {
            ran.push('embed');
            embedded = await this.embedChunks(chunkSegments(item.id, aligned, chunker), ctx.signal);
            await checkpoints.save(item.id, 'embed', fpEmbed, embedded);
            await markCheckpoint('embed');
        }

        const version = await this.commit(item, aligned, embedded, ctx.signal);
        await checkpoints.clear(item.id);
        return { version, chunks: embedded.length, resumedFrom: resumed ? ran[0] : undefined };
    }

    /**
     * Transcription and diarization share the decoded audio and run concurrently.
     * A transcription failure aborts diarization; a diarization failure other than
     * cancellation or misconfiguration leaves the segments unlabeled.
     */
    private async transcribeAndDiarize(
        item: MediaItem,
        ctx: RunContext,
        diarizer: DiarizationBackend | null,
        cachedSegments: TranscriptSegment[] | null,
        cachedDiarization: DiarizeCheckpoint | null,
        fpTranscribe: string,
        fpDiarize: string,
        setStatus: (s: MediaStatus) => Promise<void>,
        markCheckpoint: (stage: Stage) => Promise<void>
    ): Promise<{ segments: TranscriptSegment[]; diarization: DiarizeCheckpoint }> {
        const { decoder, checkpoints, transcriber } = this.deps;

        return decoder.withDecodedAudio(
            item.path,
            async (wavPath) => {
                const child = new AbortController();
                const onAbort = () => child.abort();
                ctx.signal.addEventListener('abort', onAbort, { once: true });
                let diarizing = cachedDiarization === null && diarizer !== null;

                await setStatus(cachedSegments ? 'Diarizing' : 'Transcribing');

                const transcription: Promise<TranscriptSegment[]> = cachedSegments
                    ? Promise.resolve(cachedSegments)
                    : this.call('transcription', (s) => transcriber.transcribe(wavPath, ctx.language, s), child.signal)
                          .then(async (segments) => {
                              await checkpoints.save(item.id, 'transcribe', fpTranscribe, segments);
                              await markCheckpoint('transcribe');
                              info('transcribe.done', { mediaId: item.id, segments: segments.length, backend: transcriber.id });
                              if (diarizing) await setStatus('Diarizing');
                              return segments;
                          })
                          .catch((e: unknown) => {
                              child.abort();
                              throw e;
                          });

                const diarization: Promise<DiarizeCheckpoint> =
                    cachedDiarization !== null
                        ? Promise.resolve(cachedDiarization)
                        : diarizer === null
                          ? Promise.resolve({ enabled: false, intervals: [] })
                          : this.call('diarization', (s) => diarizer.diarize(wavPath, s), child.signal)
                                .then(async (intervals) => {
                                    const out: DiarizeCheckpoint = { enabled: true, intervals };
                                    await checkpoints.save(item.id, 'diarize', fpDiarize, out);
                                    await markCheckpoint('diarize');
                                    return out;
                                })
                                .catch((e: unknown): DiarizeCheckpoint => {
                                    if (e instanceof CancelledError || e instanceof ConfigurationError || child.signal.aborted) throw e;
                                    warn('diarize.degraded', { mediaId: item.id, backend: diarizer.id, error: errorMessage(e) });
                                    // not checkpointed, so the next pass retries diarization
                                    return { enabled: true, intervals: [] };
                                })
                                .finally(() => {
                                    diarizing = false;
                                });

                try {
                    const [t, d] = await Promise.allSettled([transcription, diarization]);
                    if (t.status === 'rejected') throw t.reason;
                    if (d.status === 'rejected') throw d.reason;
                    return { segments: t.value, diarization: d.value };
                } finally {
                    ctx.signal.removeEventListener('abort', onAbort);
                }
            },
            ctx.signal
        );
    }

    /** Vectors for new content hashes; unchanged chunks reuse what the index already holds. */
    private async embedChunks(chunks: readonly Chunk[], signal: AbortSignal): Promise<ChunkWithEmbedding[]> {
        const { store, embedder } = this.deps;
        const known = await store.findEmbeddings(
            chunks.map((c) => c.contentHash),
            embedder.model
        );
        const reusable = (c: Chunk) => known.get(c.contentHash)?.length === embedder.dimension;
        const missing = chunks.filter((c) => !reusable(c));
        const freshByHash = new Map<string, number[]>();
        for (let i = 0; i < missing.length; i += EMBED_GROUP) {
            const group = missing.slice(i, i + EMBED_GROUP);
            const vectors = await this.call('embedding', (s) => embedder.embedBatch(group.map((c) => c.text), s), signal);
            if (vectors.length !== group.length) {
                throw new ConsistencyError(`Embedder returned ${vectors.length} vectors for ${group.length} chunks`, {
                    model: embedder.model,
                });
            }
            group.forEach((c, j) => freshByHash.set(c.contentHash, vectors[j]));
        }
        info('embed.done', { chunks: chunks.length, reused: chunks.length - missing.length, embedded: missing.length });

        const createdAt = this.now().toISOString();
        return chunks.map((chunk) => {
            const vector = freshByHash.get(chunk.contentHash) ?? known.get(chunk.contentHash) ?? [];
            return {
                chunk,
                embedding: {
                    chunkId: chunk.id,
                    model: embedder.model,
                    dimension: vector.length,
                    vector,
                    contentHash: chunk.contentHash,
                    createdAt,
                },
            };
        });
    }

    /** Publish the pass as a new version; retried on transient write failures. */
    private commit(
        item: MediaItem,
        aligned: readonly AlignedSegment[],
        embedded: readonly ChunkWithEmbedding[],
        signal: AbortSignal
    ): Promise<number> {
        return withRetry(
            () =>
                this.deps.store.ingest(item.id, async (tx) => {
                    await tx.appendSegments(aligned);
                    await tx.appendChunksWithEmbeddings(embedded);
                    const indexed: MediaItem = {
                        ...item,
                        status: 'Indexed',
                        currentVersion: tx.version,
                        updatedAt: this.now().toISOString(),
                    };
                    delete indexed.checkpoint;
                    delete indexed.failure;
                    await tx.upsertMediaItem(indexed);
                    return tx.version;
                }),
            this.deps.retry,
            {
                signal,
                onRetry: (attempt, e) => warn('store.commit.retry', { mediaId: item.id, attempt, error: e.message }),
            }
        );
    }
}
