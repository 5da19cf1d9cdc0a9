import type { TranscriptSegment } from '../types';
import { CleanedTranscriptionBackend, type CleanupSpec } from './cleanup';
import { OpenAITranscriptionBackend } from './openai';
import { ReplicateTranscriptionBackend } from './replicate';
import { WhisperxBackend } from './whisperx';

/**
 * Wraps one transcription engine. Implementations return segments sorted by start and
 * pairwise non-overlapping, and fail with UnsupportedFormatError, BackendUnavailableError
 * or BackendTimeoutError.
 */
export interface TranscriptionBackend {
  /** Stable identifier recorded on every segment, e.g. "openai:whisper-1" */
  readonly id: string;
  transcribe(audioPath: string, language?: string, signal?: AbortSignal): Promise<TranscriptSegment[]>;
}

export interface WhisperxSpec {
  kind: 'whisperx';
  image: string;
  dockerBin: string;
  dockerArgs: string[];
  windowSec: number;
  overlapSec: number;
}

export interface OpenAITranscriptionSpec {
  kind: 'openai';
  apiKey: string;
  model: string;
  windowSec: number;
  overlapSec: number;
}

export interface ReplicateSpec {
  kind: 'replicate';
  apiToken: string;
  /** "owner/model:version" */
  modelVersion: string;
  baseUrl?: string;
  pollIntervalMs: number;
  windowSec: number;
  overlapSec: number;
}

export type TranscriptionBackendSpec = WhisperxSpec | OpenAITranscriptionSpec | ReplicateSpec;

function createEngine(spec: TranscriptionBackendSpec): TranscriptionBackend {
  switch (spec.kind) {
    case 'whisperx':
      return new WhisperxBackend(spec);
    case 'openai':
      return new OpenAITranscriptionBackend(spec);
    case 'replicate':
      return new ReplicateTranscriptionBackend(spec);
  }
}

/** Build the configured engine, wrapped in the LLM cleanup pass when one is given. */
export function createTranscriptionBackend(spec: TranscriptionBackendSpec, cleanup?: CleanupSpec): TranscriptionBackend {
  const engine = createEngine(spec);
  return cleanup ? new CleanedTranscriptionBackend(engine, cleanup) : engine;
}

export { normalizeSegments, mergeWindowSegments, readRawSegments } from './normalize';
export type { RawSegment } from './normalize';
export type { CleanupSpec } from './cleanup';
