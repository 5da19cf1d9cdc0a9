import { ConsistencyError } from './errors';
import type { AlignedSegment, SpeakerInterval, TranscriptSegment } from './types';

function overlap(seg: TranscriptSegment, int: SpeakerInterval): number {
  return Math.max(0, Math.min(seg.endSec, int.endSec) - Math.max(seg.startSec, int.startSec));
}

/**
 * Attribute each segment to the speaker interval it overlaps most. Ties go to the
 * interval that starts first; no positive overlap leaves the segment unlabeled.
 *
 * Both inputs must be sorted by start. The sweep keeps a low-water mark of intervals
 * that ended before the current segment began; since segment starts never decrease
 * those intervals cannot overlap any later segment.
 */
export function alignSegments(
  segments: readonly TranscriptSegment[],
  intervals: readonly SpeakerInterval[]
): AlignedSegment[] {
  const out: AlignedSegment[] = [];
  let lo = 0;
  segments.forEach((seg, segmentIndex) => {
    while (lo < intervals.length && intervals[lo].endSec <= seg.startSec) lo++;

    let best: SpeakerInterval | undefined;
    let bestOverlap = 0;
    for (let j = lo; j < intervals.length && intervals[j].startSec < seg.endSec; j++) {
      const o = overlap(seg, intervals[j]);
      // strict comparison keeps the earliest-starting interval on ties
      if (o > bestOverlap) {
        best = intervals[j];
        bestOverlap = o;
      }
    }

    const aligned: AlignedSegment = { ...seg, segmentIndex };
    if (best) aligned.speaker = best.speaker;
    out.push(aligned);
  });
  return out;
}

/** Every aligned segment must sit inside the parent segment it claims. */
export function assertAlignment(segments: readonly TranscriptSegment[], aligned: readonly AlignedSegment[]): void {
  for (const a of aligned) {
    const parent = segments[a.segmentIndex];
    if (!parent) {
      throw new ConsistencyError(`Aligned segment references missing parent ${a.segmentIndex}`, {
        segmentIndex: a.segmentIndex,
      });
    }
    if (a.startSec < parent.startSec || a.endSec > parent.endSec || a.startSec >= a.endSec) {
      throw new ConsistencyError(
        `Aligned segment [${a.startSec}, ${a.endSec}) escapes parent [${parent.startSec}, ${parent.endSec})`,
        { segmentIndex: a.segmentIndex }
      );
    }
  }
}
