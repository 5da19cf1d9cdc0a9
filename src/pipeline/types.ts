export type ISO8601 = string;

export type MediaStatus =
  | 'Discovered'
  | 'Transcribing'
  | 'Diarizing'
  | 'Aligning'
  | 'Embedding'
  | 'Indexed'
  | 'Failed';

/** Pipeline stages whose output is checkpointed, in execution order. */
export type Stage = 'transcribe' | 'diarize' | 'align' | 'embed';

export const STAGES: readonly Stage[] = ['transcribe', 'diarize', 'align', 'embed'];

/** `text` marks transcripts registered from plain text rather than transcribed. */
export type MediaKind = 'audio' | 'video' | 'text';

export interface MediaFailure {
  code: string;
  message: string;
  retryable: boolean;
  stage: MediaStatus;
  at: ISO8601;
}

export interface MediaItem {
  /** SHA-256 of the file content (first 32 hex chars) */
  id: string;
  path: string;
  durationSec: number;
  format: string;
  kind: MediaKind;
  sizeBytes: number;
  projectName: string;
  /** Free-form name of the recorded event, e.g. "Council meeting" */
  eventName?: string;
  /** YYYY-MM-DD */
  eventDate?: string;
  language?: string;
  status: MediaStatus;
  /** Last stage whose output is checkpointed for the pending pass */
  checkpoint?: Stage;
  currentVersion?: number;
  failure?: MediaFailure;
  updatedAt: ISO8601;
}

export interface TranscriptSegment {
  startSec: number;
  endSec: number;
  text: string;
  confidence?: number;
  /** Backend identifier, e.g. "whisperx:whisperx:cpu" */
  source: string;
}

export interface SpeakerInterval {
  startSec: number;
  endSec: number;
  speaker: string;
}

export interface AlignedSegment extends TranscriptSegment {
  /** Index of the parent TranscriptSegment */
  segmentIndex: number;
  speaker?: string;
}

export interface Chunk {
  id: string;
  mediaId: string;
  index: number;
  /** overlapText followed by the chunk's own segment text */
  text: string;
  overlapText: string;
  startSec: number;
  endSec: number;
  firstSegment: number;
  lastSegment: number;
  speakers: string[];
  contentHash: string;
}

export interface Embedding {
  chunkId: string;
  model: string;
  dimension: number;
  vector: number[];
  contentHash: string;
  createdAt: ISO8601;
}

export interface ChunkWithEmbedding {
  chunk: Chunk;
  embedding: Embedding;
}

export type DistanceMetric = 'cosine' | 'l2';

/** Recorded alongside the index so readers can validate compatibility. */
export interface IndexSpec {
  model: string;
  dimension: number;
  metric: DistanceMetric;
}

export interface SearchFilters {
  projectName?: string;
  /** inclusive, YYYY-MM-DD */
  dateFrom?: string;
  /** inclusive, YYYY-MM-DD */
  dateTo?: string;
  mediaIds?: string[];
}

export interface Neighbor {
  chunk: Chunk;
  distance: number;
}

export interface SearchResult {
  chunk: Chunk;
  distance: number;
  similarity: number;
  /** similarity after optional lexical re-rank */
  score: number;
  lexical?: number;
  media: MediaItem;
}
