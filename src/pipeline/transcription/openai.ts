import fs from 'fs-extra';
import path from 'path';
import type OpenAI from 'openai';
import { splitAudio, withTempDir } from '../audio';
import { createOpenAIClient, mapOpenAIError } from '../openai_client';
import { info, startStep } from '../log';
import type { TranscriptSegment } from '../types';
import type { OpenAITranscriptionSpec, TranscriptionBackend } from './index';
import { mergeWindowSegments, normalizeSegments, readRawSegments, type RawSegment } from './normalize';

/**
 * Hosted Whisper through the OpenAI SDK. Audio is windowed the same way as the
 * docker runner so each upload stays under the provider's file size limit.
 */
export class OpenAITranscriptionBackend implements TranscriptionBackend {
    readonly id: string;
    private readonly client: OpenAI;

    constructor(private readonly spec: OpenAITranscriptionSpec, client?: OpenAI) {
        this.id = `openai:${spec.model}`;
        this.client = client ?? createOpenAIClient(spec.apiKey);
    }

    private async runWindow(windowPath: string, idx: number, language?: string, signal?: AbortSignal): Promise<RawSegment[]> {
        let payload: unknown;
        try {
            payload = await this.client.audio.transcriptions.create(
                {
                    file: fs.createReadStream(windowPath),
                    model: this.spec.model,
                    response_format: 'verbose_json',
                    timestamp_granularities: ['segment'],
                    ...(language ? { language } : {}),
                },
                { signal }
            );
        } catch (e) {
            throw mapOpenAIError(e, 'transcription', windowPath);
        }
        const segments = readRawSegments(payload);
        info('transcribe.window.done', { idx, segments: segments.length });
        return segments;
    }

    async transcribe(audioPath: string, language?: string, signal?: AbortSignal): Promise<TranscriptSegment[]> {
        return withTempDir('msi-openai-', async (dir) => {
            const windows = await splitAudio(
                audioPath,
                path.join(dir, 'windows'),
                { windowSec: this.spec.windowSec, overlapSec: this.spec.overlapSec },
                signal
            );
            const timer = startStep('transcribe.windows', { total: windows.length, backend: this.id });
            const perWindow: RawSegment[][] = [];
            for (const w of windows) {
                perWindow.push(await this.runWindow(w.path, w.index, language, signal));
                timer.eta(w.index + 1, windows.length);
            }
            timer.end();
            return normalizeSegments(mergeWindowSegments(windows, perWindow), this.id);
        });
    }
}
