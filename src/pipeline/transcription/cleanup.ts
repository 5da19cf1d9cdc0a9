import type OpenAI from 'openai';
import { z } from 'zod';
import { createOpenAIClient, mapOpenAIError } from '../openai_client';
import { info, warn } from '../log';
import { describeIssues } from '../schemas';
import type { TranscriptSegment } from '../types';
import type { TranscriptionBackend } from './index';

export interface CleanupSpec {
    apiKey: string;
    model: string;
    /** Segments sent per chat request */
    batchSize: number;
}

const SYSTEM_PROMPT = [
    'You correct automatic speech recognition output.',
    'Fix spelling, punctuation, casing and obvious mis-heard words. Do not summarize, translate or reorder.',
    'The user sends {"segments": [...]} with one string per segment.',
    'Reply with {"segments": [...]} holding exactly as many strings, in the same order.',
].join(' ');

const cleanupReplySchema = z.object({ segments: z.array(z.string()) });

/**
 * Decorates a transcription backend with an LLM pass that rewrites segment text.
 * Timings never change. A batch whose reply does not line up keeps its original text.
 */
export class CleanedTranscriptionBackend implements TranscriptionBackend {
    readonly id: string;
    private readonly client: OpenAI;

    constructor(private readonly inner: TranscriptionBackend, private readonly spec: CleanupSpec, client?: OpenAI) {
        this.id = `${inner.id}+cleanup:${spec.model}`;
        this.client = client ?? createOpenAIClient(spec.apiKey);
    }

    private async cleanBatch(texts: string[], signal?: AbortSignal): Promise<string[]> {
        const response = await this.client.chat.completions
            .create(
                {
                    model: this.spec.model,
                    temperature: 0,
                    response_format: { type: 'json_object' },
                    messages: [
                        { role: 'system', content: SYSTEM_PROMPT },
                        { role: 'user', content: JSON.stringify({ segments: texts }) },
                    ],
                },
                { signal }
            )
            .catch((e: unknown) => {
                throw mapOpenAIError(e, 'transcription');
            });

        const content = response.choices[0]?.message.content ?? '';
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch {
            warn('transcribe.cleanup.unparsable', { model: this.spec.model, size: texts.length });
            return texts;
        }
        const reply = cleanupReplySchema.safeParse(parsed);
        if (!reply.success) {
            warn('transcribe.cleanup.invalid', { model: this.spec.model, issues: describeIssues(reply.error) });
            return texts;
        }
        if (reply.data.segments.length !== texts.length) {
            warn('transcribe.cleanup.count_mismatch', { expected: texts.length, got: reply.data.segments.length });
            return texts;
        }
        return reply.data.segments.map((t, i) => t.replace(/\s+/g, ' ').trim() || texts[i]);
    }

    async clean(segments: TranscriptSegment[], signal?: AbortSignal): Promise<TranscriptSegment[]> {
        const out: TranscriptSegment[] = [];
        let changed = 0;
        for (let i = 0; i < segments.length; i += this.spec.batchSize) {
            const batch = segments.slice(i, i + this.spec.batchSize);
            const cleaned = await this.cleanBatch(batch.map((s) => s.text), signal);
            batch.forEach((s, j) => {
                if (cleaned[j] !== s.text) changed++;
                out.push({ ...s, text: cleaned[j], source: this.id });
            });
        }
        info('transcribe.cleanup.done', { model: this.spec.model, segments: segments.length, changed });
        return out;
    }

    async transcribe(audioPath: string, language?: string, signal?: AbortSignal): Promise<TranscriptSegment[]> {
        const segments = await this.inner.transcribe(audioPath, language, signal);
        return this.clean(segments, signal);
    }
}
