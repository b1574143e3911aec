import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { withSource } from '../scope.js';
import { FakeBackend, makeTempDir, media, writeMedia } from '../../__tests__/fakes.js';

describe('withSource', () => {
  let dir: string;
  let clip: string;

  beforeEach(() => {
    dir = makeTempDir();
    clip = writeMedia(path.join(dir, 'clip.mp4'), media(10));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns the callback result and releases the handle', async () => {
    const backend = new FakeBackend();
    const duration = await withSource(backend, clip, async (source) => source.info.durationSeconds);
    expect(duration).toBe(10);
    expect(backend.opened).toBe(1);
    expect(backend.openHandles).toBe(0);
  });

  it('releases the handle when the callback throws', async () => {
    const backend = new FakeBackend();
    await expect(
      withSource(backend, clip, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(backend.openHandles).toBe(0);
  });

  it('keeps the callback result when closing fails', async () => {
    const backend = new FakeBackend({ failClose: true });
    await expect(withSource(backend, clip, async () => 'done')).resolves.toBe('done');
    expect(backend.openHandles).toBe(0);
  });

  it('propagates open failures without calling the callback', async () => {
    const backend = new FakeBackend();
    let called = false;
    await expect(
      withSource(backend, path.join(dir, 'missing.mp4'), async () => {
        called = true;
      }),
    ).rejects.toThrow('File not found');
    expect(called).toBe(false);
    expect(backend.opened).toBe(0);
  });
});
