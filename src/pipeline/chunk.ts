import { sha256, toChunkId } from './ids';
import type { AlignedSegment, Chunk } from './types';

export type ChunkUnit = 'chars' | 'words';

export interface ChunkerOptions {
    unit: ChunkUnit;
    /** Budget for a chunk's full text, overlap included */
    maxChunkSize: number;
    /** Units of the previous chunk's own text re-seeded into the next one; 0 disables */
    overlapSize: number;
}

const WORD_RE = /\S+/g;

export function measure(text: string, unit: ChunkUnit): number {
    if (unit === 'chars') return text.length;
    return text.match(WORD_RE)?.length ?? 0;
}

/**
 * The last `size` units of text, cut at a word boundary so the seed never starts
 * mid-word. Returns '' when size is 0.
 */
export function overlapTail(text: string, size: number, unit: ChunkUnit): string {
    if (size <= 0 || !text) return '';
    if (unit === 'words') {
        const words = text.match(WORD_RE) ?? [];
        return words.slice(-size).join(' ');
    }
    if (text.length <= size) return text.trim();
    const cut = text.length - size;
    if (/\s/.test(text[cut - 1])) return text.slice(cut).trim();
    const boundary = text.slice(cut).search(/\s/);
    return boundary < 0 ? '' : text.slice(cut + boundary).trim();
}

interface Draft {
    overlapText: string;
    parts: AlignedSegment[];
}

function bodyOf(parts: readonly AlignedSegment[]): string {
    return parts.map((p) => p.text).join(' ');
}

function seedFor(overlap: string): string {
    return overlap ? `${overlap} ` : '';
}

function finish(mediaId: string, index: number, draft: Draft): Chunk {
    const text = draft.overlapText + bodyOf(draft.parts);
    const first = draft.parts[0];
    const last = draft.parts[draft.parts.length - 1];
    const contentHash = sha256(text);
    return {
        id: toChunkId(mediaId, index, contentHash),
        mediaId,
        index,
        text,
        overlapText: draft.overlapText,
        startSec: first.startSec,
        endSec: last.endSec,
        firstSegment: first.segmentIndex,
        lastSegment: last.segmentIndex,
        speakers: [...new Set(draft.parts.flatMap((p) => (p.speaker ? [p.speaker] : [])))].sort(),
        contentHash,
    };
}

/**
 * Greedily pack aligned segments into chunks of at most maxChunkSize units. A segment
 * is never split; one that alone exceeds the budget becomes its own chunk. Each new
 * chunk after the first is seeded with the tail of the previous chunk's own text,
 * unless that seed would push its first segment over budget.
 *
 * Output depends only on the inputs, so identical input yields identical chunks.
 */
export function chunkSegments(mediaId: string, segments: readonly AlignedSegment[], options: ChunkerOptions): Chunk[] {
    const { unit, maxChunkSize, overlapSize } = options;
    const chunks: Chunk[] = [];
    let draft: Draft | null = null;

    const open = (seg: AlignedSegment, prevBody: string): Draft => {
        const seed = seedFor(overlapTail(prevBody, overlapSize, unit));
        const overlapText = seed && measure(seed + seg.text, unit) <= maxChunkSize ? seed : '';
        return { overlapText, parts: [seg] };
    };

    for (const seg of segments) {
        if (!draft) {
            draft = open(seg, '');
            continue;
        }
        const candidate = `${draft.overlapText}${bodyOf(draft.parts)} ${seg.text}`;
        if (measure(candidate, unit) <= maxChunkSize) {
            draft.parts.push(seg);
            continue;
        }
        chunks.push(finish(mediaId, chunks.length, draft));
        draft = open(seg, bodyOf(draft.parts));
    }
    if (draft) chunks.push(finish(mediaId, chunks.length, draft));
    return chunks;
}

/** A chunk's own text with the re-seeded overlap removed. */
export function chunkBody(chunk: Chunk): string {
    return chunk.text.slice(chunk.overlapText.length);
}
