import { describe, it, expect, beforeEach } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { PermanentInputError } from '../src/pipeline/errors';
import { sha256 } from '../src/pipeline/ids';
import { findMediaFiles, kindFromExtension, locateMedia } from '../src/pipeline/locate';
import { FakeProbe, makeTempDir } from './helpers/fakes';

const EXTS = ['wav', 'mp4'];

describe('locateMedia', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    await fs.outputFile(path.join(root, 'b.wav'), 'second recording');
    await fs.outputFile(path.join(root, 'nested', 'a.MP4'), 'first recording');
    await fs.outputFile(path.join(root, 'notes.txt'), 'not media');
    await fs.outputFile(path.join(root, '.hidden', 'c.wav'), 'hidden');
    await fs.outputFile(path.join(root, 'broken.wav'), 'corrupt bytes');
  });

  it('should walk the tree, filter by extension and skip hidden entries', async () => {
    const files = await findMediaFiles(root, EXTS);
    expect(files).toEqual([
      path.join(root, 'b.wav'),
      path.join(root, 'broken.wav'),
      path.join(root, 'nested', 'a.MP4'),
    ]);
  });

  it('should accept a single file as root', async () => {
    const file = path.join(root, 'b.wav');
    expect(await findMediaFiles(file, EXTS)).toEqual([file]);
  });

  it('should fail for a missing path', async () => {
    const err = await findMediaFiles(path.join(root, 'missing'), EXTS).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(PermanentInputError);
    expect(err).toMatchObject({ code: 'PATH_NOT_FOUND' });
  });

  it('should identify media by content and collect rejects', async () => {
    const { items, rejected } = await locateMedia(root, new FakeProbe({ durationSec: 12.5, format: 'wav', kind: 'audio' }), {
      extensions: EXTS,
    });
    expect(items.map((m) => path.basename(m.path))).toEqual(['b.wav', 'a.MP4']);
    expect(items[0]).toEqual({
      id: sha256('second recording').slice(0, 32),
      path: path.join(root, 'b.wav'),
      sizeBytes: 'second recording'.length,
      durationSec: 12.5,
      format: 'wav',
      kind: 'audio',
    });
    expect(rejected.map((r) => path.basename(r.path))).toEqual(['broken.wav']);
    expect(rejected[0].error.code).toBe('UNSUPPORTED_FORMAT');
    expect(rejected[0]).toMatchObject({ id: sha256('corrupt bytes').slice(0, 32), sizeBytes: 'corrupt bytes'.length });
  });

  it('should locate byte-identical copies once and report the rest as duplicates', async () => {
    await fs.outputFile(path.join(root, 'a-copy.wav'), 'second recording');
    const { items, duplicates } = await locateMedia(root, new FakeProbe(), { extensions: EXTS, concurrency: 3 });

    expect(items.map((m) => path.basename(m.path))).toEqual(['a-copy.wav', 'a.MP4']);
    expect(duplicates).toEqual([
      { path: path.join(root, 'b.wav'), id: sha256('second recording').slice(0, 32), duplicateOf: path.join(root, 'a-copy.wav') },
    ]);
  });

  it('should keep the id when a file is renamed', async () => {
    const probe = new FakeProbe();
    const before = await locateMedia(path.join(root, 'b.wav'), probe, { extensions: EXTS });
    await fs.move(path.join(root, 'b.wav'), path.join(root, 'renamed.wav'));
    const after = await locateMedia(path.join(root, 'renamed.wav'), probe, { extensions: EXTS });
    expect(after.items[0].id).toBe(before.items[0].id);
  });

  it('should guess the kind of an unprobed file from its extension', () => {
    expect(kindFromExtension('/m/talk.MKV')).toBe('video');
    expect(kindFromExtension('/m/call.m4a')).toBe('audio');
  });
});
