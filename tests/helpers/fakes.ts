import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import type { AudioDecoder } from '../../src/pipeline/audio';
import type { DiarizationBackend } from '../../src/pipeline/diarization';
import type { Embedder } from '../../src/pipeline/embedding';
import { UnsupportedFormatError } from '../../src/pipeline/errors';
import type { MediaProbe, ProbeResult } from '../../src/pipeline/probe';
import { tokenize } from '../../src/pipeline/query';
import type { TranscriptionBackend } from '../../src/pipeline/transcription';
import type { SpeakerInterval, TranscriptSegment } from '../../src/pipeline/types';

export async function makeTempDir(prefix = 'msi-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Files whose content starts with "corrupt" are rejected like an undecodable container. */
export class FakeProbe implements MediaProbe {
  calls = 0;

  constructor(private readonly result: ProbeResult = { durationSec: 60, format: 'wav', kind: 'audio' }) {}

  async probe(filePath: string): Promise<ProbeResult> {
    this.calls++;
    const head = (await fs.readFile(filePath, 'utf8')).slice(0, 7);
    if (head === 'corrupt') throw new UnsupportedFormatError(`cannot decode ${filePath}`, filePath);
    return this.result;
  }
}

export class PassthroughDecoder implements AudioDecoder {
  withDecodedAudio<T>(inputPath: string, fn: (wavPath: string) => Promise<T>): Promise<T> {
    return fn(inputPath);
  }
}

export function seg(startSec: number, endSec: number, text: string, source = 'fake:asr'): TranscriptSegment {
  return { startSec, endSec, text, source };
}

/** The five segments of a 60 second two-speaker conversation. */
export const CONVERSATION: TranscriptSegment[] = [
  seg(0, 10, 'Hello'),
  seg(10, 25, 'How are you'),
  seg(25, 40, 'I am fine'),
  seg(40, 50, 'Great'),
  seg(50, 60, 'Goodbye'),
];

export const TWO_SPEAKERS: SpeakerInterval[] = [
  { startSec: 0, endSec: 28, speaker: 'A' },
  { startSec: 28, endSec: 60, speaker: 'B' },
];

type Script<T> = (audioPath: string, signal?: AbortSignal) => Promise<T>;

export class FakeTranscriber implements TranscriptionBackend {
  calls: string[] = [];

  constructor(
    private readonly script: Script<TranscriptSegment[]> = async () => CONVERSATION,
    readonly id = 'fake:asr'
  ) {}

  transcribe(audioPath: string, _language?: string, signal?: AbortSignal): Promise<TranscriptSegment[]> {
    this.calls.push(audioPath);
    return this.script(audioPath, signal);
  }
}

export class FakeDiarizer implements DiarizationBackend {
  calls: string[] = [];

  constructor(
    private readonly script: Script<SpeakerInterval[]> = async () => TWO_SPEAKERS,
    readonly id = 'fake:diarizer'
  ) {}

  diarize(audioPath: string, signal?: AbortSignal): Promise<SpeakerInterval[]> {
    this.calls.push(audioPath);
    return this.script(audioPath, signal);
  }
}

/** Resolves never; rejects once the signal aborts. */
export function untilAborted<T>(signal?: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

function bucket(token: string, dimension: number): number {
  let h = 0;
  for (const ch of token) h = (h * 31 + ch.charCodeAt(0)) % 1_000_003;
  return h % dimension;
}

/** Bag-of-words vector: texts sharing words point in similar directions. */
export function bagOfWords(text: string, dimension: number): number[] {
  const v = new Array<number>(dimension).fill(0);
  for (const t of tokenize(text)) v[bucket(t, dimension)] += 1;
  return v;
}

export class FakeEmbedder implements Embedder {
  batches: string[][] = [];

  constructor(readonly model = 'fake-embed', readonly dimension = 8) {}

  get embeddedTexts(): string[] {
    return this.batches.flat();
  }

  async embed(text: string): Promise<number[]> {
    const [v] = await this.embedBatch([text]);
    return v;
  }

  async embedBatch(texts: readonly string[]): Promise<number[][]> {
    this.batches.push([...texts]);
    return texts.map((t) => bagOfWords(t, this.dimension));
  }
}

/** In-process fetch that records each request and answers from respond. */
export function fakeFetch(respond: (req: Request) => Response | Promise<Response>) {
  const requests: Request[] = [];
  const fn: typeof fetch = async (input, init) => {
    const req = input instanceof Request ? input : new Request(input, init);
    requests.push(req);
    return respond(req);
  };
  return { fn, requests };
}

export const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
