import { z } from 'zod';
import type { AudioWindow } from '../audio';
import type { TranscriptSegment } from '../types';

/** A segment as a provider returns it, before ordering guarantees are applied. */
export interface RawSegment {
  startSec: number;
  endSec: number;
  text: string;
  confidence?: number;
}

const roundMs = (x: number) => Math.round(x * 1000) / 1000;

function clampConfidence(c: number | undefined): number | undefined {
  if (c === undefined || !Number.isFinite(c)) return undefined;
  return Math.min(1, Math.max(0, c));
}

function minDefined(a: number | undefined, b: number | undefined): number | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return Math.min(a, b);
}

/**
 * Bring provider output into the TranscriptSegment contract: sorted by start, pairwise
 * non-overlapping, start < end. Overlaps are resolved by truncating the earlier
 * segment's end to the next start; segments sharing a start are merged.
 */
export function normalizeSegments(raw: readonly RawSegment[], source: string): TranscriptSegment[] {
  const cleaned = raw
    .map((s) => ({
      startSec: roundMs(s.startSec),
      endSec: roundMs(s.endSec),
      text: (s.text ?? '').replace(/\s+/g, ' ').trim(),
      confidence: clampConfidence(s.confidence),
    }))
    .filter((s) => Number.isFinite(s.startSec) && Number.isFinite(s.endSec))
    .filter((s) => s.startSec >= 0 && s.endSec > s.startSec && s.text.length > 0)
    .sort((a, b) => a.startSec - b.startSec || a.endSec - b.endSec);

  const merged: RawSegment[] = [];
  for (const s of cleaned) {
    const last = merged[merged.length - 1];
    if (last && last.startSec === s.startSec) {
      last.text = `${last.text} ${s.text}`;
      last.endSec = Math.max(last.endSec, s.endSec);
      last.confidence = minDefined(last.confidence, s.confidence);
      continue;
    }
    merged.push({ ...s });
  }

  for (let i = 0; i < merged.length - 1; i++) {
    if (merged[i].endSec > merged[i + 1].startSec) {
      merged[i].endSec = merged[i + 1].startSec;
    }
  }

  return merged.map((s) => {
    const seg: TranscriptSegment = { startSec: s.startSec, endSec: s.endSec, text: s.text, source };
    if (s.confidence !== undefined) seg.confidence = s.confidence;
    return seg;
  });
}

/**
 * Shift window-local segments to global time. Where windows overlap, a segment is
 * kept only by the window owning its midpoint (ownership splits each overlap in half).
 */
export function mergeWindowSegments(
  windows: readonly AudioWindow[],
  perWindow: readonly (readonly RawSegment[])[]
): RawSegment[] {
  const out: RawSegment[] = [];
  windows.forEach((w, i) => {
    const prev = windows[i - 1];
    const next = windows[i + 1];
    const lo = prev ? (w.startSec + prev.endSec) / 2 : -Infinity;
    const hi = next ? (next.startSec + w.endSec) / 2 : Infinity;
    for (const s of perWindow[i] ?? []) {
      const startSec = s.startSec + w.startSec;
      const endSec = s.endSec + w.startSec;
      const mid = (startSec + endSec) / 2;
      if (mid < lo || mid >= hi) continue;
      out.push({ ...s, startSec, endSec });
    }
  });
  return out;
}

const loose = z.number().finite().optional().catch(undefined);

const providerSegmentSchema = z.object({
  start: loose,
  end: loose,
  startSec: loose,
  endSec: loose,
  start_ms: loose,
  end_ms: loose,
  text: z.string().catch(''),
  confidence: loose,
  score: loose,
  avg_logprob: loose,
});

const providerPayloadSchema = z.object({ segments: z.array(z.unknown()) });

const fromMs = (ms: number | undefined) => (ms !== undefined ? ms / 1000 : undefined);

/**
 * Read segments from a provider JSON payload. Accepts `{segments: [...]}` with times
 * in `start/end` (seconds), `startSec/endSec` or `start_ms/end_ms`, and confidence
 * from `confidence`, `score` or `avg_logprob` (converted with exp).
 */
export function readRawSegments(payload: unknown): RawSegment[] {
  const parsed = providerPayloadSchema.safeParse(payload);
  if (!parsed.success) return [];
  const out: RawSegment[] = [];
  for (const entry of parsed.data.segments) {
    const r = providerSegmentSchema.safeParse(entry);
    if (!r.success) continue;
    const s = r.data;
    const startSec = s.startSec ?? s.start ?? fromMs(s.start_ms);
    const endSec = s.endSec ?? s.end ?? fromMs(s.end_ms);
    if (startSec === undefined || endSec === undefined) continue;
    const confidence = s.confidence ?? s.score ?? (s.avg_logprob !== undefined ? Math.exp(s.avg_logprob) : undefined);
    out.push({ startSec, endSec, text: s.text, ...(confidence !== undefined ? { confidence } : {}) });
  }
  return out;
}
