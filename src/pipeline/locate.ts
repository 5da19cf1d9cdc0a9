import fs from 'fs-extra';
import path from 'path';
import { PermanentInputError, errorMessage } from './errors';
import { toMediaId } from './ids';
import { debug, info, warn } from './log';
import { runPool } from './pool';
import type { MediaProbe } from './probe';
import type { MediaKind } from './types';

export interface LocatedMedia {
  id: string;
  /** absolute, normalized */
  path: string;
  sizeBytes: number;
  durationSec: number;
  format: string;
  kind: MediaKind;
}

export interface RejectedMedia {
  path: string;
  id: string;
  sizeBytes: number;
  error: PermanentInputError;
}

/** A file whose content is byte-identical to one located earlier in path order. */
export interface DuplicateMedia {
  path: string;
  id: string;
  duplicateOf: string;
}

export interface LocateResult {
  items: LocatedMedia[];
  rejected: RejectedMedia[];
  duplicates: DuplicateMedia[];
}

export interface LocateOptions {
  /** lowercase, without the dot */
  extensions: readonly string[];
  concurrency?: number;
  signal?: AbortSignal;
}

const VIDEO_EXTENSIONS = new Set(['mp4', 'm4v', 'mkv', 'mov', 'avi', 'webm', 'wmv', 'flv', 'mpg', 'mpeg', 'ts']);

/** Best guess from the extension, for files the probe never described. */
export function kindFromExtension(file: string): MediaKind {
  return VIDEO_EXTENSIONS.has(path.extname(file).slice(1).toLowerCase()) ? 'video' : 'audio';
}

function hasExtension(file: string, extensions: ReadonlySet<string>): boolean {
  return extensions.has(path.extname(file).slice(1).toLowerCase());
}

async function walk(dir: string, extensions: ReadonlySet<string>, out: string[]): Promise<void> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) await walk(full, extensions, out);
    else if (entry.isFile() && hasExtension(entry.name, extensions)) out.push(full);
  }
}

/** Media files under root (or root itself when it is a file), sorted by path. */
export async function findMediaFiles(root: string, extensions: readonly string[]): Promise<string[]> {
  const abs = path.resolve(root);
  if (!(await fs.pathExists(abs))) {
    throw new PermanentInputError(`Media path not found: ${abs}`, 'PATH_NOT_FOUND', { path: abs });
  }
  const exts = new Set(extensions.map((e) => e.toLowerCase().replace(/^\./, '')));
  const stat = await fs.stat(abs);
  if (stat.isFile()) return [abs];
  const files: string[] = [];
  await walk(abs, exts, files);
  return files.sort();
}

/**
 * Discover media under root, identify each file by content hash and probe it.
 * Files the probe cannot read land in `rejected`; other failures propagate.
 * Files sharing a content hash are located once, under the first path in sort order.
 */
export async function locateMedia(root: string, probe: MediaProbe, options: LocateOptions): Promise<LocateResult> {
  const files = await findMediaFiles(root, options.extensions);
  info('locate.found', { root: path.resolve(root), files: files.length });

  const rejected: RejectedMedia[] = [];
  const located = await runPool(files, options.concurrency ?? 4, async (file): Promise<LocatedMedia | null> => {
    const [stat, id] = await Promise.all([fs.stat(file), toMediaId(file)]);
    try {
      const probed = await probe.probe(file, options.signal);
      debug('locate.item', { path: file, id, durationSec: probed.durationSec, format: probed.format });
      return { id, path: file, sizeBytes: stat.size, ...probed };
    } catch (e) {
      if (!(e instanceof PermanentInputError)) throw e;
      warn('locate.rejected', { path: file, id, error: errorMessage(e) });
      rejected.push({ path: file, id, sizeBytes: stat.size, error: e });
      return null;
    }
  });

  // runPool keeps input order, so the first path seen for an id is the smallest
  const firstPath = new Map<string, string>();
  const items: LocatedMedia[] = [];
  const duplicates: DuplicateMedia[] = [];
  for (const m of located) {
    if (!m) continue;
    const first = firstPath.get(m.id);
    if (first !== undefined) {
      info('locate.duplicate', { path: m.path, id: m.id, duplicateOf: first });
      duplicates.push({ path: m.path, id: m.id, duplicateOf: first });
      continue;
    }
    firstPath.set(m.id, m.path);
    items.push(m);
  }
  return { items, rejected: rejected.sort((a, b) => (a.path < b.path ? -1 : 1)), duplicates };
}
