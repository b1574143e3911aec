import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { acquire, downloadFileName, type AcquireOptions } from '../acquirer.js';
import { FakeBackend, FakeProvider, PROFILE, makeTempDir, media, type FakeEntry } from '../../__tests__/fakes.js';

describe('downloadFileName', () => {
  it('numbers downloads and keeps only safe id characters', () => {
    expect(downloadFileName(7, 'ab/c?d_e-f')).toBe('video_007_abcd_e-f.mp4');
  });

  it('falls back when nothing of the id survives', () => {
    expect(downloadFileName(1, '???')).toBe('video_001_entry.mp4');
  });
});

describe('acquire', () => {
  let workDir: string;
  let backend: FakeBackend;

  beforeEach(() => {
    workDir = makeTempDir();
    backend = new FakeBackend();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  const run = (entries: Array<FakeEntry | null>, count: number, extra: Partial<AcquireOptions> = {}) => {
    const provider = new FakeProvider(entries);
    const options: AcquireOptions = { provider, backend, workDir, maxAttempts: 2, baseDelayMs: 0, dedupe: false, ...extra };
    return { provider, result: acquire(PROFILE, count, options) };
  };

  it('downloads and validates up to the requested count', async () => {
    const { provider, result } = run([{ id: 'a', media: media(30) }, { id: 'b', media: media(8) }], 2);
    const { items, discovered, failures, listingError } = await result;

    expect(provider.listedLimit).toBe(2);
    expect(discovered).toBe(2);
    expect(failures).toEqual([]);
    expect(listingError).toBeNull();
    expect(items).toEqual([
      {
        id: 'a',
        remoteUrl: 'https://www.tiktok.com/@someone/video/a',
        title: 'clip a',
        localPath: path.join(workDir, 'video_001_a.mp4'),
        ordinal: 1,
      },
      {
        id: 'b',
        remoteUrl: 'https://www.tiktok.com/@someone/video/b',
        title: 'clip b',
        localPath: path.join(workDir, 'video_002_b.mp4'),
        ordinal: 2,
      },
    ]);
    expect(backend.openHandles).toBe(0);
  });

  it('skips unavailable entries without counting them', async () => {
    const { provider, result } = run(
      [null, { id: 'a', media: media(5) }, null, { id: 'b', media: media(5) }, { id: 'c', media: media(5) }],
      2,
    );
    const { items, discovered } = await result;

    expect(discovered).toBe(2);
    expect(items.map((i) => i.id)).toEqual(['a', 'b']);
    expect(provider.attempts.has('c')).toBe(false);
  });

  it('records a failed download and carries on with the next entry', async () => {
    const { provider, result } = run(
      [{ id: 'a', media: media(5), failures: Infinity }, { id: 'b', media: media(5) }],
      2,
    );
    const { items, failures } = await result;

    expect(provider.attempts.get('a')).toBe(2);
    expect(items.map((i) => [i.id, i.ordinal])).toEqual([['b', 2]]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.stage).toBe('acquire');
    expect(failures[0]?.subject).toBe('a');
    expect(failures[0]?.error.kind).toBe('FetchFailure');
    expect(failures[0]?.error.message).toBe('download failed: HTTP Error 403 for a');
    expect(fs.existsSync(path.join(workDir, 'video_001_a.mp4'))).toBe(false);
  });

  it('retries a download that fails once', async () => {
    const { provider, result } = run([{ id: 'a', media: media(5), failures: 1 }], 1);
    const { items, failures } = await result;

    expect(provider.attempts.get('a')).toBe(2);
    expect(items).toHaveLength(1);
    expect(failures).toEqual([]);
  });

  it('discards a download that fails validation', async () => {
    const { result } = run(
      [{ id: 'a', media: media(6, undefined, { corruptMidpoint: true }) }, { id: 'b', media: media(5) }],
      2,
    );
    const { items, failures } = await result;

    expect(items.map((i) => i.id)).toEqual(['b']);
    expect(failures.map((f) => [f.subject, f.error.kind])).toEqual([['a', 'InvalidAsset']]);
    expect(fs.readdirSync(workDir)).toEqual(['video_002_b.mp4']);
  });

  it('returns fewer items than requested when the profile runs out', async () => {
    const { result } = run([{ id: 'a', media: media(5) }], 5);
    const { items, discovered } = await result;

    expect(discovered).toBe(1);
    expect(items).toHaveLength(1);
  });

  it('keeps repeated entries unless deduplication is on', async () => {
    const entries = [{ id: 'a', media: media(5) }, { id: 'a', media: media(5) }];

    const plain = await run(entries, 2).result;
    expect(plain.items.map((i) => i.localPath)).toEqual([
      path.join(workDir, 'video_001_a.mp4'),
      path.join(workDir, 'video_002_a.mp4'),
    ]);
  });

  it('skips a repeated remote id when deduplicating', async () => {
    const { provider, result } = run(
      [{ id: 'a', media: media(5) }, { id: 'a', media: media(5) }, { id: 'b', media: media(7) }],
      3,
      { dedupe: true },
    );
    const { items, discovered } = await result;

    expect(discovered).toBe(3);
    expect(items.map((i) => i.id)).toEqual(['a', 'b']);
    expect(provider.attempts.get('a')).toBe(1);
  });

  it('discards a download whose content was already fetched when deduplicating', async () => {
    const { result } = run(
      [{ id: 'a', media: media(5) }, { id: 'reupload', media: media(5) }],
      2,
      { dedupe: true },
    );
    const { items, failures } = await result;

    expect(items.map((i) => i.id)).toEqual(['a']);
    expect(failures).toEqual([]);
    expect(fs.readdirSync(workDir)).toEqual(['video_001_a.mp4']);
  });

  it('keeps what it has when the listing breaks part way', async () => {
    const provider = new FakeProvider([{ id: 'a', media: media(5) }], new Error('listing broke'));
    const { items, failures, listingError } = await acquire(PROFILE, 3, { provider, backend, workDir, baseDelayMs: 0, dedupe: false });

    expect(items.map((i) => i.id)).toEqual(['a']);
    expect(listingError?.message).toBe('profile listing failed: listing broke');
    expect(failures).toHaveLength(1);
    expect(failures[0]?.subject).toBe(PROFILE.url);
    expect(failures[0]?.error.kind).toBe('FetchFailure');
    expect(failures[0]?.error.message).toBe('profile listing failed: listing broke');
  });

  it.each([0, 51, 2.5])('rejects a batch size of %s', async (count) => {
    const provider = new FakeProvider([]);
    await expect(acquire(PROFILE, count, { provider, backend, workDir })).rejects.toThrow(RangeError);
  });
});
