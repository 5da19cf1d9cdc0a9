import type { SpeakerInterval } from '../types';
import { PyannoteBackend } from './pyannote';

/**
 * Wraps one diarization engine. Intervals come back sorted by start with positive
 * duration; brief overlaps at speaker changes are expected.
 */
export interface DiarizationBackend {
  readonly id: string;
  diarize(audioPath: string, signal?: AbortSignal): Promise<SpeakerInterval[]>;
}

export interface PyannoteSpec {
  kind: 'pyannote';
  url: string;
  token?: string;
}

export interface NoDiarizationSpec {
  kind: 'none';
}

export type DiarizationBackendSpec = PyannoteSpec | NoDiarizationSpec;

/** null means diarization is disabled for the deployment. */
export function createDiarizationBackend(spec: DiarizationBackendSpec): DiarizationBackend | null {
  switch (spec.kind) {
    case 'pyannote':
      return new PyannoteBackend(spec);
    case 'none':
      return null;
  }
}

export { normalizeIntervals } from './normalize';
export { readSpeakerIntervals } from './pyannote';
