import type { SpeakerInterval } from '../types';

const roundMs = (x: number) => Math.round(x * 1000) / 1000;

export function normalizeIntervals(raw: readonly SpeakerInterval[]): SpeakerInterval[] {
  return raw
    .map((i) => ({ startSec: roundMs(i.startSec), endSec: roundMs(i.endSec), speaker: i.speaker.trim() }))
    .filter((i) => Number.isFinite(i.startSec) && Number.isFinite(i.endSec))
    .filter((i) => i.endSec > i.startSec && i.speaker.length > 0)
    .sort((a, b) => a.startSec - b.startSec || a.endSec - b.endSec);
}
