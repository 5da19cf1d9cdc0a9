import { describe, it, expect } from 'vitest';
import type { AudioWindow } from '../src/pipeline/audio';
import { mergeWindowSegments, normalizeSegments, readRawSegments } from '../src/pipeline/transcription';

describe('normalizeSegments', () => {
  it('should sort, trim and stamp the source', () => {
    const out = normalizeSegments(
      [
        { startSec: 5, endSec: 8, text: '  second   part ' },
        { startSec: 0, endSec: 4.99999, text: 'first', confidence: 0.9 },
      ],
      'openai:whisper-1'
    );
    expect(out).toEqual([
      { startSec: 0, endSec: 5, text: 'first', confidence: 0.9, source: 'openai:whisper-1' },
      { startSec: 5, endSec: 8, text: 'second part', source: 'openai:whisper-1' },
    ]);
  });

  it('should truncate overlaps to the next start', () => {
    const out = normalizeSegments(
      [
        { startSec: 0, endSec: 6, text: 'a' },
        { startSec: 4, endSec: 9, text: 'b' },
      ],
      's'
    );
    expect(out.map((s) => [s.startSec, s.endSec])).toEqual([
      [0, 4],
      [4, 9],
    ]);
  });

  it('should merge segments sharing a start', () => {
    const out = normalizeSegments(
      [
        { startSec: 2, endSec: 3, text: 'one', confidence: 0.8 },
        { startSec: 2, endSec: 5, text: 'two', confidence: 0.6 },
      ],
      's'
    );
    expect(out).toEqual([{ startSec: 2, endSec: 5, text: 'one two', confidence: 0.6, source: 's' }]);
  });

  it('should drop empty, inverted and negative segments and clamp confidence', () => {
    const out = normalizeSegments(
      [
        { startSec: 1, endSec: 1, text: 'zero length' },
        { startSec: 3, endSec: 2, text: 'inverted' },
        { startSec: -1, endSec: 2, text: 'negative' },
        { startSec: 4, endSec: 5, text: '   ' },
        { startSec: 6, endSec: 7, text: 'kept', confidence: 1.4 },
      ],
      's'
    );
    expect(out).toEqual([{ startSec: 6, endSec: 7, text: 'kept', confidence: 1, source: 's' }]);
  });
});

describe('mergeWindowSegments', () => {
  const windows: AudioWindow[] = [
    { index: 0, path: 'w0.wav', startSec: 0, endSec: 100 },
    { index: 1, path: 'w1.wav', startSec: 90, endSec: 150 },
  ];

  it('should shift to global time and keep overlap duplicates once', () => {
    const merged = mergeWindowSegments(windows, [
      [
        { startSec: 0, endSec: 10, text: 'intro' },
        { startSec: 92, endSec: 96, text: 'seam' },
      ],
      [
        { startSec: 2, endSec: 6, text: 'seam' },
        { startSec: 20, endSec: 30, text: 'outro' },
      ],
    ]);
    // overlap [90, 100] splits at 95; "seam" spans 92-96 with midpoint 94, owned by window 0
    expect(merged).toEqual([
      { startSec: 0, endSec: 10, text: 'intro' },
      { startSec: 92, endSec: 96, text: 'seam' },
      { startSec: 110, endSec: 120, text: 'outro' },
    ]);
  });
});

describe('readRawSegments', () => {
  it('should accept seconds, milliseconds and logprob confidence', () => {
    const out = readRawSegments({
      segments: [
        { start: 0, end: 1.5, text: 'a', score: 0.7 },
        { start_ms: 2000, end_ms: 2500, text: 'b' },
        { startSec: 3, endSec: 4, text: 'c', avg_logprob: 0 },
      ],
    });
    expect(out).toEqual([
      { startSec: 0, endSec: 1.5, text: 'a', confidence: 0.7 },
      { startSec: 2, endSec: 2.5, text: 'b' },
      { startSec: 3, endSec: 4, text: 'c', confidence: 1 },
    ]);
  });

  it('should skip entries without times and tolerate unexpected payloads', () => {
    expect(readRawSegments({ segments: [{ text: 'no times' }, 'junk'] })).toEqual([]);
    expect(readRawSegments(null)).toEqual([]);
    expect(readRawSegments({ text: 'no segments' })).toEqual([]);
  });
});
