import fs from 'fs-extra';
import type { KyInstance } from 'ky';
import { z } from 'zod';
import { createHttpClient, requestJson } from '../http';
import { info } from '../log';
import type { SpeakerInterval } from '../types';
import type { DiarizationBackend, PyannoteSpec } from './index';
import { normalizeIntervals } from './normalize';

const loose = z.number().finite().optional().catch(undefined);
const label = z.string().min(1).optional().catch(undefined);

const intervalEntrySchema = z.object({
    start: loose,
    end: loose,
    start_ms: loose,
    end_ms: loose,
    speaker: label,
    label,
});

const intervalListSchema = z.union([
    z.object({ segments: z.array(z.unknown()) }).transform((p) => p.segments),
    z.array(z.unknown()),
]);

const fromMs = (ms: number | undefined) => (ms !== undefined ? ms / 1000 : undefined);

/**
 * Read `{segments: [{start, end, speaker}]}` (seconds) or `start_ms/end_ms`.
 * Entries without a usable span or label are dropped.
 */
export function readSpeakerIntervals(payload: unknown): SpeakerInterval[] {
    const list = intervalListSchema.safeParse(payload);
    if (!list.success) return [];
    const out: SpeakerInterval[] = [];
    for (const entry of list.data) {
        const r = intervalEntrySchema.safeParse(entry);
        if (!r.success) continue;
        const s = r.data;
        const startSec = s.start ?? fromMs(s.start_ms);
        const endSec = s.end ?? fromMs(s.end_ms);
        const speaker = s.speaker ?? s.label;
        if (startSec === undefined || endSec === undefined || !speaker) continue;
        out.push({ startSec, endSec, speaker });
    }
    return out;
}

/** pyannote served over HTTP: POST the decoded WAV to `<url>/diarize`. */
export class PyannoteBackend implements DiarizationBackend {
    readonly id: string;
    private readonly client: KyInstance;

    constructor(spec: PyannoteSpec, fetchImpl?: typeof fetch) {
        this.id = `pyannote:${spec.url}`;
        this.client = createHttpClient({ baseUrl: spec.url, token: spec.token, fetch: fetchImpl });
    }

    async diarize(audioPath: string, signal?: AbortSignal): Promise<SpeakerInterval[]> {
        const body = await fs.readFile(audioPath);
        const payload = await requestJson(
            this.client,
            'diarize',
            { method: 'POST', body, headers: { 'Content-Type': 'audio/wav' }, signal },
            'diarization',
            audioPath
        );
        const intervals = normalizeIntervals(readSpeakerIntervals(payload));
        info('diarize.done', { backend: this.id, intervals: intervals.length, speakers: new Set(intervals.map((i) => i.speaker)).size });
        return intervals;
    }
}
