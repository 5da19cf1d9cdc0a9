import type { SpeakerInterval, TranscriptSegment } from './types';

export const IMPORT_SOURCE = 'text-import';

/** Extensions registered by `import` when none are given. */
export const TRANSCRIPT_EXTENSIONS = ['txt', 'md'];

export interface ParsedTranscript {
  segments: TranscriptSegment[];
  /** One interval per labeled paragraph */
  intervals: SpeakerInterval[];
}

export interface TranscriptParseOptions {
  /** Speaking rate used to place sentences on an estimated timeline */
  wordsPerSecond?: number;
}

// "**SPEAKER_00** : text", as the transcribe pipeline renders merged transcripts
const SPEAKER_PREFIX = /^\*\*([^*]+)\*\*\s*:\s*/;
const SENTENCE = /[^.!?…]+(?:[.!?…]+["'»)\]]*|$)/g;

function splitSentences(paragraph: string): string[] {
  return (paragraph.match(SENTENCE) ?? []).map((s) => s.trim()).filter((s) => s.length > 0);
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Turn an existing plain-text transcript into segments. Paragraphs are separated by
 * blank lines and may start with a bold speaker label; each sentence becomes a
 * segment whose times are estimated from its word count.
 */
export function parseTranscriptText(text: string, options: TranscriptParseOptions = {}): ParsedTranscript {
  const rate = options.wordsPerSecond ?? 2.5;
  const segments: TranscriptSegment[] = [];
  const intervals: SpeakerInterval[] = [];
  // whole milliseconds, so consecutive segments meet exactly
  let cursorMs = 0;

  const paragraphs = text
    .replace(/\r\n?/g, '\n')
    .split(/\n\s*\n/)
    .map((p) => p.replace(/\s+/g, ' ').trim())
    .filter(Boolean);

  for (const paragraph of paragraphs) {
    const label = SPEAKER_PREFIX.exec(paragraph);
    const body = label ? paragraph.slice(label[0].length) : paragraph;
    const paragraphStart = cursorMs;
    for (const sentence of splitSentences(body)) {
      const durationMs = Math.max(1, Math.round((wordCount(sentence) * 1000) / rate));
      segments.push({
        startSec: cursorMs / 1000,
        endSec: (cursorMs + durationMs) / 1000,
        text: sentence,
        source: IMPORT_SOURCE,
      });
      cursorMs += durationMs;
    }
    const speaker = label?.[1].trim();
    if (speaker && cursorMs > paragraphStart) {
      intervals.push({ startSec: paragraphStart / 1000, endSec: cursorMs / 1000, speaker });
    }
  }
  return { segments, intervals };
}
