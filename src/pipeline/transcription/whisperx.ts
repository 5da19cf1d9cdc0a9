import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { splitAudio, withTempDir } from '../audio';
import { BackendUnavailableError, ConfigurationError, errorMessage } from '../errors';
import { debug, info, startStep, warn } from '../log';
import type { TranscriptSegment } from '../types';
import type { TranscriptionBackend, WhisperxSpec } from './index';
import { mergeWindowSegments, normalizeSegments, readRawSegments, type RawSegment } from './normalize';

interface ExecFailure {
    code?: string;
    exitCode?: number;
    shortMessage?: string;
    stderr?: string;
}

function execFailure(e: unknown): ExecFailure {
    if (typeof e !== 'object' || e === null) return {};
    const r: Record<string, unknown> = { ...e };
    return {
        code: typeof r.code === 'string' ? r.code : undefined,
        exitCode: typeof r.exitCode === 'number' ? r.exitCode : undefined,
        shortMessage: typeof r.shortMessage === 'string' ? r.shortMessage : undefined,
        stderr: typeof r.stderr === 'string' ? r.stderr : undefined,
    };
}

/**
 * Runs a WhisperX docker image once per audio window: `<image> <input.wav> <output.json>`.
 */
export class WhisperxBackend implements TranscriptionBackend {
    readonly id: string;
    private preflight: Promise<void> | null = null;

    constructor(private readonly spec: WhisperxSpec) {
        this.id = `whisperx:${spec.image}`;
    }

    private ensureImage(): Promise<void> {
        if (!this.preflight) {
            this.preflight = execa(this.spec.dockerBin, ['image', 'inspect', this.spec.image])
                .then(() => undefined)
                .catch((e: unknown) => {
                    this.preflight = null;
                    const f = execFailure(e);
                    if (f.code === 'ENOENT') {
                        throw new ConfigurationError(`Docker binary "${this.spec.dockerBin}" not found`, 'DOCKER_MISSING');
                    }
                    throw new ConfigurationError(
                        `Docker image ${this.spec.image} not found locally. Build it first, e.g.:\n` +
                            (this.spec.image.endsWith(':cpu')
                                ? `  docker build -f docker/whisperx.cpu.Dockerfile -t ${this.spec.image} .`
                                : `  docker build -f docker/whisperx.rocm.Dockerfile -t ${this.spec.image} .`),
                        'IMAGE_MISSING'
                    );
                });
        }
        return this.preflight;
    }

    private dockerArgs(inputPath: string, outPath: string, language?: string): string[] {
        const mounts = [...new Set([path.dirname(inputPath), path.dirname(outPath)])];
        return [
            'run',
            '--rm',
            ...this.spec.dockerArgs,
            ...mounts.flatMap((m) => ['-v', `${m}:${m}`]),
            ...(language ? ['-e', `WHISPERX_LANGUAGE=${language}`] : []),
            this.spec.image,
            inputPath,
            outPath,
        ];
    }

    private async runWindow(inputPath: string, outPath: string, idx: number, language?: string, signal?: AbortSignal): Promise<RawSegment[]> {
        info('transcribe.window.start', { idx, path: inputPath });
        const proc = execa(this.spec.dockerBin, this.dockerArgs(inputPath, outPath, language), { all: true, signal });
        proc.all?.on('data', (d: Buffer) => {
            const line = d.toString().trim();
            if (!line) return;
            debug('transcribe.window.log', { idx, line });
        });
        try {
            await proc;
        } catch (e) {
            if (signal?.aborted) throw e;
            const f = execFailure(e);
            warn('transcribe.window.fail', {
                idx,
                exitCode: f.exitCode,
                error: f.shortMessage || errorMessage(e),
                stderrSnippet: (f.stderr || '').slice(-400),
            });
            throw new BackendUnavailableError(
                `WhisperX container failed on window ${idx} (exit ${f.exitCode ?? 'unknown'})`,
                'transcription',
                { idx, exitCode: f.exitCode }
            );
        }
        let payload: unknown;
        try {
            payload = await fs.readJson(outPath);
        } catch (e) {
            throw new BackendUnavailableError(
                `WhisperX produced no readable output for window ${idx}: ${errorMessage(e)}`,
                'transcription'
            );
        }
        const segments = readRawSegments(payload);
        info('transcribe.window.done', { idx, segments: segments.length });
        return segments;
    }

    async transcribe(audioPath: string, language?: string, signal?: AbortSignal): Promise<TranscriptSegment[]> {
        await this.ensureImage();
        return withTempDir('msi-whisperx-', async (dir) => {
            const windows = await splitAudio(
                audioPath,
                path.join(dir, 'windows'),
                { windowSec: this.spec.windowSec, overlapSec: this.spec.overlapSec },
                signal
            );
            const timer = startStep('transcribe.windows', { total: windows.length });
            const perWindow: RawSegment[][] = [];
            for (const w of windows) {
                const outPath = path.join(dir, `window_${String(w.index).padStart(4, '0')}.json`);
                perWindow.push(await this.runWindow(w.path, outPath, w.index, language, signal));
                timer.eta(w.index + 1, windows.length);
            }
            timer.end();
            return normalizeSegments(mergeWindowSegments(windows, perWindow), this.id);
        });
    }
}
