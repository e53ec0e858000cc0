import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { UnrecoverableError } from 'bullmq';
import { env } from '../env';
import { callbackUrl, handleRotateJob, type RotateJob } from '../rotateJob';
import type { RotateJobData } from '../types';
import { makeExecutable, resetFakeFfmpeg } from './helpers/fakeFfmpeg';

const post = vi.hoisted(() => vi.fn());

vi.mock('axios', () => ({ default: { post } }));
vi.mock('fluent-ffmpeg', async () => {
  const { fakeFfmpeg } = await import('./helpers/fakeFfmpeg');
  return { default: fakeFfmpeg };
});
vi.mock('@ffmpeg-installer/ffmpeg', () => ({ default: { path: '/nonexistent/bundled/ffmpeg' } }));

let root: string;

function makeJob(data: RotateJobData) {
  return { id: '7', data, updateProgress: vi.fn(async (_progress: unknown) => undefined) } satisfies RotateJob;
}

beforeEach(async () => {
  resetFakeFfmpeg();
  post.mockReset();
  root = await fs.mkdtemp(path.join(os.tmpdir(), 'job-test-'));
  env.FFMPEG_PATH = makeExecutable(path.join(root, 'ffmpeg'));
  env.ROTATE_DEFAULT_OUTPUT_DIR = undefined;
  env.BACKEND_API_URL = undefined;
  env.BACKEND_API_TOKEN = undefined;
  env.CALLBACK_MAX_RETRIES = 2;
});

afterEach(async () => {
  env.FFMPEG_PATH = undefined;
  await fs.rm(root, { recursive: true, force: true });
});

describe('handleRotateJob', () => {
  it('runs the batch and reports progress in percent', async () => {
    const outputDir = path.join(root, 'out');
    const job = makeJob({ inputs: ['/in/a.mp4', '/in/b.mp4'], rotation: '180', outputDir });

    const result = await handleRotateJob(job);

    expect(result).toEqual({
      outputDir,
      succeeded: 2,
      failed: 0,
      outcomes: [
        { ok: true, inputPath: '/in/a.mp4', outputPath: path.join(outputDir, 'a_rotated.mp4') },
        { ok: true, inputPath: '/in/b.mp4', outputPath: path.join(outputDir, 'b_rotated.mp4') },
      ],
    });
    expect(job.updateProgress.mock.calls.map((call) => call[0])).toEqual([0, 50, 100]);
    expect(post).not.toHaveBeenCalled();
  });

  it('falls back to the configured default output directory', async () => {
    env.ROTATE_DEFAULT_OUTPUT_DIR = path.join(root, 'default-out');

    const result = await handleRotateJob(makeJob({ inputs: ['/in/a.mp4'], rotation: '90' }));

    expect(result.outputDir).toBe(path.join(root, 'default-out'));
    expect(await fs.readdir(path.join(root, 'default-out'))).toEqual(['a_rotated.mp4']);
  });

  it('rejects malformed payloads without retrying', async () => {
    const data: RotateJobData = JSON.parse('{"inputs":["/in/a.mp4"],"rotation":"45"}');

    await expect(handleRotateJob(makeJob(data))).rejects.toBeInstanceOf(UnrecoverableError);
  });

  it('turns job-level errors into unrecoverable failures', async () => {
    const attempt = handleRotateJob(makeJob({ inputs: [], rotation: '90', outputDir: path.join(root, 'out') }));

    await expect(attempt).rejects.toBeInstanceOf(UnrecoverableError);
    await expect(attempt).rejects.toThrow('EmptyBatch: No files uploaded.');
  });

  it('posts the outcomes to the backend callback', async () => {
    env.BACKEND_API_URL = 'http://backend.test';
    env.BACKEND_API_TOKEN = 'test-secret';
    post.mockResolvedValue({ status: 200 });
    const outputDir = path.join(root, 'out');

    const result = await handleRotateJob(makeJob({ inputs: ['/in/a.mp4'], rotation: '90', outputDir }));

    expect(post).toHaveBeenCalledTimes(1);
    expect(post).toHaveBeenCalledWith(
      'http://backend.test/api/videos/rotate/callback',
      { jobId: '7', ...result },
      { headers: { Authorization: 'Bearer test-secret' }, timeout: 30000 },
    );
  });

  it('still returns the outcomes when the callback keeps failing', async () => {
    env.BACKEND_API_URL = 'http://backend.test/api';
    env.CALLBACK_MAX_RETRIES = 1;
    post.mockRejectedValue(new Error('connect ECONNREFUSED'));

    const result = await handleRotateJob(makeJob({ inputs: ['/in/a.mp4'], rotation: '90', outputDir: path.join(root, 'out') }));

    expect(result.succeeded).toBe(1);
    expect(post).toHaveBeenCalledTimes(1);
  });
});

describe('callbackUrl', () => {
  it('ends up with exactly one /api segment', () => {
    expect(callbackUrl('http://backend.test')).toBe('http://backend.test/api/videos/rotate/callback');
    expect(callbackUrl('http://backend.test/api/')).toBe('http://backend.test/api/videos/rotate/callback');
    expect(callbackUrl('http://backend.test/api/api')).toBe('http://backend.test/api/videos/rotate/callback');
  });
});
