import fs from 'fs-extra';
import path from 'path';
import type { KyInstance } from 'ky';
import { z } from 'zod';
import { splitAudio, withTempDir } from '../audio';
import { BackendUnavailableError, UnsupportedFormatError } from '../errors';
import { createHttpClient, requestJson } from '../http';
import { debug, info, startStep } from '../log';
import { sleep } from '../retry';
import { describeIssues } from '../schemas';
import type { TranscriptSegment } from '../types';
import type { ReplicateSpec, TranscriptionBackend } from './index';
import { mergeWindowSegments, normalizeSegments, readRawSegments, type RawSegment } from './normalize';

export const REPLICATE_API_URL = 'https://api.replicate.com/v1';

export const DEFAULT_REPLICATE_MODEL =
    'victor-upmeet/whisperx:84d2ad2d6194fe98a17d2b60bef1c7f910c46b2f6fd38996ca457afd9c8abfcb';

const predictionSchema = z.object({
    id: z.string().min(1),
    status: z.enum(['starting', 'processing', 'succeeded', 'failed', 'canceled']),
    output: z.unknown().optional(),
    error: z.unknown().optional(),
});

type Prediction = z.infer<typeof predictionSchema>;

/** "owner/model:hash" or a bare hash; the predictions endpoint takes the hash. */
export function versionHash(modelVersion: string): string {
    const idx = modelVersion.lastIndexOf(':');
    return idx >= 0 ? modelVersion.slice(idx + 1) : modelVersion;
}

function readPrediction(payload: unknown): Prediction {
    const r = predictionSchema.safeParse(payload);
    if (!r.success) {
        throw new BackendUnavailableError(`Replicate returned an unexpected prediction: ${describeIssues(r.error)}`, 'transcription');
    }
    return r.data;
}

/**
 * WhisperX hosted on Replicate. Each audio window is uploaded inline as a data URI and
 * the prediction is polled until it settles. Speaker labels are left to the diarizer.
 */
export class ReplicateTranscriptionBackend implements TranscriptionBackend {
    readonly id: string;
    private readonly client: KyInstance;

    constructor(private readonly spec: ReplicateSpec, fetchImpl?: typeof fetch) {
        this.id = `replicate:${spec.modelVersion}`;
        this.client = createHttpClient({ baseUrl: spec.baseUrl ?? REPLICATE_API_URL, token: spec.apiToken, fetch: fetchImpl });
    }

    private async settle(first: Prediction, windowPath: string, signal?: AbortSignal): Promise<Prediction> {
        let prediction = first;
        while (prediction.status === 'starting' || prediction.status === 'processing') {
            await sleep(this.spec.pollIntervalMs, signal);
            debug('transcribe.replicate.poll', { id: prediction.id, status: prediction.status });
            prediction = readPrediction(
                await requestJson(this.client, `predictions/${prediction.id}`, { method: 'GET', signal }, 'transcription')
            );
        }
        if (prediction.status === 'failed') {
            const reason = typeof prediction.error === 'string' ? prediction.error : 'no reason given';
            throw new UnsupportedFormatError(`Replicate prediction ${prediction.id} failed on ${windowPath}: ${reason}`, windowPath, 'transcription');
        }
        if (prediction.status === 'canceled') {
            throw new BackendUnavailableError(`Replicate prediction ${prediction.id} was canceled`, 'transcription', { id: prediction.id });
        }
        return prediction;
    }

    /** Transcribe one window file; times are relative to the window start. */
    async transcribeWindow(windowPath: string, language?: string, signal?: AbortSignal): Promise<RawSegment[]> {
        const audio = await fs.readFile(windowPath);
        const created = readPrediction(
            await requestJson(
                this.client,
                'predictions',
                {
                    method: 'POST',
                    headers: { Prefer: 'wait' },
                    json: {
                        version: versionHash(this.spec.modelVersion),
                        input: {
                            audio_file: `data:audio/wav;base64,${audio.toString('base64')}`,
                            batch_size: 64,
                            temperature: 0,
                            diarization: false,
                            align_output: false,
                            ...(language ? { language } : {}),
                        },
                    },
                    signal,
                },
                'transcription',
                windowPath
            )
        );
        const done = await this.settle(created, windowPath, signal);
        return readRawSegments(done.output);
    }

    async transcribe(audioPath: string, language?: string, signal?: AbortSignal): Promise<TranscriptSegment[]> {
        return withTempDir('msi-replicate-', async (dir) => {
            const windows = await splitAudio(
                audioPath,
                path.join(dir, 'windows'),
                { windowSec: this.spec.windowSec, overlapSec: this.spec.overlapSec },
                signal
            );
            const timer = startStep('transcribe.windows', { total: windows.length, backend: this.id });
            const perWindow: RawSegment[][] = [];
            for (const w of windows) {
                const segments = await this.transcribeWindow(w.path, language, signal);
                info('transcribe.window.done', { idx: w.index, segments: segments.length });
                perWindow.push(segments);
                timer.eta(w.index + 1, windows.length);
            }
            timer.end();
            return normalizeSegments(mergeWindowSegments(windows, perWindow), this.id);
        });
    }
}
