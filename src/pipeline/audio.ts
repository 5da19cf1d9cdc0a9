import { execa } from 'execa';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { UnsupportedFormatError, errorMessage } from './errors';
import { debug, info, startStep } from './log';

export interface AudioWindow {
    index: number;
    path: string;
    startSec: number;
    endSec: number;
}

export interface WindowOptions {
    windowSec: number;
    overlapSec: number;
}

/**
 * Decodes any media container to the 16 kHz mono PCM WAV the backends consume.
 * The decoded file only lives for the duration of fn.
 */
export interface AudioDecoder {
    withDecodedAudio<T>(
        inputPath: string,
        fn: (wavPath: string) => Promise<T>,
        signal?: AbortSignal
    ): Promise<T>;
}

/** Scoped temporary directory, removed on every exit path. */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
    try {
        return await fn(dir);
    } finally {
        await fs.remove(dir);
        debug('audio.tmp.removed', { dir });
    }
}

export class FfmpegAudioDecoder implements AudioDecoder {
    constructor(private readonly ffmpegBin = 'ffmpeg') {}

    async withDecodedAudio<T>(
        inputPath: string,
        fn: (wavPath: string) => Promise<T>,
        signal?: AbortSignal
    ): Promise<T> {
        return withTempDir('msi-decode-', async (dir) => {
            const wavPath = path.join(dir, 'audio.wav');
            const timer = startStep('audio.decode', { inputPath });
            try {
                await execa(
                    this.ffmpegBin,
                    [
                        '-y',
                        '-loglevel',
                        'error',
                        '-hide_banner',
                        '-nostdin',
                        '-i',
                        inputPath,
                        '-vn',
                        '-sn',
                        '-ac',
                        '1',
                        '-ar',
                        '16000',
                        '-acodec',
                        'pcm_s16le',
                        '-f',
                        'wav',
                        wavPath,
                    ],
                    { signal }
                );
            } catch (e) {
                if (signal?.aborted) throw e;
                throw new UnsupportedFormatError(
                    `ffmpeg could not decode ${inputPath}: ${errorMessage(e)}`,
                    inputPath,
                    'decoder'
                );
            }
            const stat = await fs.stat(wavPath);
            if (stat.size === 0) {
                throw new UnsupportedFormatError(`Decoded audio is empty (0 bytes) for ${inputPath}`, inputPath, 'decoder');
            }
            timer.end({ bytes: stat.size });
            return fn(wavPath);
        });
    }
}

/**
 * Window boundaries over [0, durationSec): each window starts overlapSec before the
 * previous one ended; slivers shorter than 50ms are dropped.
 */
export function planWindows(durationSec: number, opts: WindowOptions): Array<{ startSec: number; endSec: number }> {
    const windowSec = Math.max(1, Math.floor(opts.windowSec));
    const overlapSec = Math.min(Math.max(0, Math.floor(opts.overlapSec)), windowSec - 1);
    const out: Array<{ startSec: number; endSec: number }> = [];
    let start = 0;
    while (start < durationSec) {
        const end = Math.min(durationSec, start + windowSec);
        if (end - start < 0.05) break;
        out.push({ startSec: start, endSec: end });
        if (end >= durationSec - 1e-6) break;
        start = Math.max(0, end - overlapSec);
    }
    return out;
}

export async function probeDuration(audioPath: string, ffprobeBin = 'ffprobe', signal?: AbortSignal): Promise<number> {
    const probe = await execa(
        ffprobeBin,
        ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', audioPath],
        { signal }
    );
    const parsed = parseFloat(probe.stdout);
    if (!isFinite(parsed)) {
        throw new UnsupportedFormatError(
            `ffprobe could not determine duration for ${audioPath}. Raw output: ${probe.stdout}`,
            audioPath,
            'decoder'
        );
    }
    return Math.max(0, parsed);
}

/**
 * Split a decoded WAV into overlapping windows written to outDir. Audio that fits in
 * one window is returned as-is without copying.
 */
export async function splitAudio(
    audioPath: string,
    outDir: string,
    opts: WindowOptions,
    signal?: AbortSignal,
    ffmpegBin = 'ffmpeg'
): Promise<AudioWindow[]> {
    const durationSec = await probeDuration(audioPath, 'ffprobe', signal);
    const plan = planWindows(durationSec, opts);
    if (plan.length <= 1) {
        return [{ index: 0, path: audioPath, startSec: 0, endSec: durationSec }];
    }
    await fs.ensureDir(outDir);
    const timer = startStep('audio.split', { audioPath, durationSec, windows: plan.length });
    const windows: AudioWindow[] = [];
    for (const [index, w] of plan.entries()) {
        const outPath = path.resolve(outDir, `window_${String(index).padStart(4, '0')}.wav`);
        const dur = w.endSec - w.startSec;
        try {
            // -ss after -i for accurate seeking
            await execa(
                ffmpegBin,
                [
                    '-y', '-loglevel', 'error', '-hide_banner', '-nostdin',
                    '-i', audioPath,
                    '-ss', String(w.startSec),
                    '-t', String(dur),
                    '-ac', '1', '-ar', '16000', '-acodec', 'pcm_s16le', '-f', 'wav',
                    outPath,
                ],
                { signal }
            );
        } catch (e) {
            if (signal?.aborted) throw e;
            throw new UnsupportedFormatError(
                `ffmpeg failed while extracting window index=${index} start=${w.startSec} dur=${dur}: ${errorMessage(e)}`,
                audioPath,
                'decoder'
            );
        }
        const st = await fs.stat(outPath);
        if (st.size === 0) {
            throw new UnsupportedFormatError(
                `Created empty window at ${outPath}; the source had no samples in [${w.startSec}, ${w.endSec})`,
                audioPath,
                'decoder'
            );
        }
        windows.push({ index, path: outPath, startSec: w.startSec, endSec: w.endSec });
        timer.eta(index + 1, plan.length);
    }
    timer.end();
    info('audio.split.complete', { audioPath, count: windows.length, durationSec });
    return windows;
}
