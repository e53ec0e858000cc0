import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { isRotationError } from '../errors';
import { defaultOutputDir, ensureDir, isVideoFile, moveFile, resolveOutputPath, rotatedFileName } from '../paths';

describe('rotatedFileName', () => {
  it('inserts the suffix before the extension', () => {
    expect(rotatedFileName('clip.mp4')).toBe('clip_rotated.mp4');
    expect(rotatedFileName('/videos/my.holiday.mov')).toBe('my.holiday_rotated.mov');
  });

  it('appends the suffix when there is no extension', () => {
    expect(rotatedFileName('/videos/raw')).toBe('raw_rotated');
  });
});

describe('resolveOutputPath', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'paths-test-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('creates the target directory and is idempotent', async () => {
    const dir = path.join(root, 'nested', 'out');
    const first = await resolveOutputPath('/in/clip.mp4', dir);
    const second = await resolveOutputPath('/in/clip.mp4', dir);

    expect(first).toBe(path.join(dir, 'clip_rotated.mp4'));
    expect(second).toBe(first);
    expect((await fs.stat(dir)).isDirectory()).toBe(true);
  });

  it('reports a directory that cannot be created', async () => {
    const blocker = path.join(root, 'file');
    await fs.writeFile(blocker, 'x');

    const err = await ensureDir(path.join(blocker, 'out')).catch((e: unknown) => e);
    expect(isRotationError(err, 'OutputDirectoryUnavailable')).toBe(true);
  });

  it('moves files into place', async () => {
    const from = path.join(root, 'a.mp4');
    const to = path.join(root, 'b.mp4');
    await fs.writeFile(from, 'data');

    await moveFile(from, to);

    expect(await fs.readFile(to, 'utf8')).toBe('data');
    await expect(fs.access(from)).rejects.toThrow();
  });
});

describe('defaultOutputDir', () => {
  it('uses Videos on Windows and Movies elsewhere', () => {
    expect(defaultOutputDir('win32', '/home/test')).toBe(path.join('/home/test', 'Videos', 'rotated'));
    expect(defaultOutputDir('darwin', '/home/test')).toBe(path.join('/home/test', 'Movies', 'rotated'));
    expect(defaultOutputDir('linux', '/home/test')).toBe(path.join('/home/test', 'Movies', 'rotated'));
  });
});

describe('isVideoFile', () => {
  it('accepts common video containers', () => {
    expect(['a.mp4', 'b.mov', 'c.avi', 'd.mkv'].map(isVideoFile)).toEqual([true, true, true, true]);
  });

  it('rejects other files', () => {
    expect(isVideoFile('notes.txt')).toBe(false);
    expect(isVideoFile('frame.png')).toBe(false);
    expect(isVideoFile('noext')).toBe(false);
  });
});
