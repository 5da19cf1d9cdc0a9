import { execa } from 'execa';
import { z } from 'zod';
import { CancelledError, UnsupportedFormatError, errorMessage } from './errors';
import { describeIssues } from './schemas';
import type { MediaKind } from './types';

export interface ProbeResult {
  durationSec: number;
  format: string;
  kind: MediaKind;
}

/** Media probing collaborator: duration, container format and decodability. */
export interface MediaProbe {
  probe(filePath: string, signal?: AbortSignal): Promise<ProbeResult>;
}

const ffprobeSchema = z.object({
  streams: z.array(z.object({ codec_type: z.string().optional() })).default([]),
  format: z.object({ format_name: z.string().optional(), duration: z.string().optional() }).default({}),
});

/**
 * Interpret ffprobe JSON. Throws UnsupportedFormatError when there is no audio to transcribe.
 */
export function parseProbeOutput(filePath: string, stdout: string): ProbeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new UnsupportedFormatError(`ffprobe returned unreadable output for ${filePath}`, filePath);
  }
  const parsed = ffprobeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UnsupportedFormatError(`ffprobe output for ${filePath} has an unexpected shape: ${describeIssues(parsed.error)}`, filePath);
  }
  const out = parsed.data;
  const streams = out.streams;
  if (!streams.some((s) => s.codec_type === 'audio')) {
    throw new UnsupportedFormatError(`No audio stream found in ${filePath}`, filePath);
  }
  const duration = parseFloat(out.format.duration ?? '');
  if (!isFinite(duration) || duration <= 0) {
    throw new UnsupportedFormatError(
      `ffprobe could not determine duration for ${filePath}. Raw duration: ${out.format.duration ?? '(none)'}`,
      filePath
    );
  }
  return {
    durationSec: duration,
    format: out.format.format_name ?? 'unknown',
    kind: streams.some((s) => s.codec_type === 'video') ? 'video' : 'audio',
  };
}

export class FfprobeMediaProbe implements MediaProbe {
  constructor(private readonly ffprobeBin = 'ffprobe') {}

  async probe(filePath: string, signal?: AbortSignal): Promise<ProbeResult> {
    let stdout: string;
    try {
      const res = await execa(
        this.ffprobeBin,
        ['-v', 'error', '-show_format', '-show_streams', '-of', 'json', filePath],
        { signal }
      );
      stdout = res.stdout;
    } catch (e) {
      if (signal?.aborted) throw new CancelledError();
      throw new UnsupportedFormatError(`ffprobe failed for ${filePath}: ${errorMessage(e)}`, filePath);
    }
    return parseProbeOutput(filePath, stdout);
  }
}
