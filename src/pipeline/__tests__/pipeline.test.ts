import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runPipeline, type PipelineDeps } from '../index.js';
import {
  FakeBackend,
  FakeProvider,
  LANDSCAPE,
  PORTRAIT,
  PROFILE,
  makeTempDir,
  media,
  readMedia,
  writeImage,
  writeMedia,
  type FakeBackendOptions,
  type FakeEntry,
} from '../../__tests__/fakes.js';

describe('runPipeline', () => {
  let root: string;
  let dirs: { inputDir: string; overlayDir: string; tempDir: string; outputDir: string };

  beforeEach(() => {
    root = makeTempDir();
    dirs = {
      inputDir: path.join(root, 'input'),
      overlayDir: path.join(root, 'overlay'),
      tempDir: path.join(root, 'temp'),
      outputDir: path.join(root, 'output'),
    };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const setup = (entries: Array<FakeEntry | null>, backendOptions: FakeBackendOptions = {}) => {
    const backend = new FakeBackend(backendOptions);
    const provider = new FakeProvider(entries);
    const deps: PipelineDeps = {
      ...dirs,
      backend,
      provider,
      maxClipSeconds: 20,
      maxAttempts: 1,
      baseDelayMs: 0,
      dedupe: false,
    };
    return { backend, provider, deps };
  };

  const givenPayload = () => writeMedia(path.join(dirs.inputDir, 'payload.mp4'), media(10, LANDSCAPE));
  const givenOverlay = () => writeImage(path.join(dirs.overlayDir, 'card.png'), { width: 200, height: 50 });

  it('pairs every processed clip with the input video', async () => {
    givenPayload();
    givenOverlay();
    const { backend, deps } = setup([
      { id: 'long', media: media(30, PORTRAIT) },
      { id: 'short', media: media(8, PORTRAIT) },
    ]);

    const result = await runPipeline({ profile: PROFILE, count: 2 }, deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const report = result.value;
    expect(report.pairs).toEqual([
      { ordinal: 1, path: path.join(dirs.outputDir, 'video_pair_01.mp4'), durationSeconds: 30 },
      { ordinal: 2, path: path.join(dirs.outputDir, 'video_pair_02.mp4'), durationSeconds: 18 },
    ]);
    expect([report.requested, report.discovered, report.downloaded, report.processed]).toEqual([2, 2, 2, 2]);
    expect(report.failures).toEqual([]);

    for (const pair of report.pairs) {
      const written = readMedia(pair.path);
      expect([written.width, written.height]).toEqual([1920, 1080]);
    }
    expect(backend.clipJobs.map((j) => [j.overlay?.x, j.overlay?.y])).toEqual([[440, 935], [440, 935]]);

    expect(fs.readdirSync(dirs.outputDir).sort()).toEqual(['video_pair_01.mp4', 'video_pair_02.mp4']);
    expect(fs.readdirSync(dirs.tempDir)).toEqual([]);
    expect(backend.openHandles).toBe(0);
  });

  it('numbers pairs by position among the clips that survived', async () => {
    givenPayload();
    const { deps } = setup([
      { id: 'broken', media: media(6, PORTRAIT, { corruptMidpoint: true }) },
      { id: 'fine', media: media(6, PORTRAIT) },
    ]);

    const result = await runPipeline({ profile: PROFILE, count: 2 }, deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.pairs.map((p) => [p.ordinal, path.basename(p.path)])).toEqual([[1, 'video_pair_01.mp4']]);
    expect(result.value.failures.map((f) => [f.stage, f.subject, f.error.kind])).toEqual([
      ['acquire', 'broken', 'InvalidAsset'],
    ]);
  });

  it('processes clips without an overlay when none is provided', async () => {
    givenPayload();
    const { backend, deps } = setup([{ id: 'a', media: media(5, PORTRAIT) }]);

    const result = await runPipeline({ profile: PROFILE, count: 1 }, deps);

    expect(result.ok).toBe(true);
    expect(backend.clipJobs.map((j) => j.overlay)).toEqual([null]);
  });

  it('clears leftovers from an earlier run out of the staging area', async () => {
    givenPayload();
    writeMedia(path.join(dirs.tempDir, 'stale.mp4'), media(3));
    const { deps } = setup([{ id: 'a', media: media(5, PORTRAIT) }]);

    await runPipeline({ profile: PROFILE, count: 1 }, deps);

    expect(fs.readdirSync(dirs.tempDir)).toEqual([]);
  });

  it('fails with NO_PAYLOAD before listing when the input folder is empty', async () => {
    const { provider, deps } = setup([{ id: 'a', media: media(5) }]);

    const result = await runPipeline({ profile: PROFILE, count: 1 }, deps);

    expect(result.ok ? null : result.error.code).toBe('NO_PAYLOAD');
    expect(provider.listedLimit).toBeNull();
  });

  it('fails with INVALID_PAYLOAD when the input video does not decode', async () => {
    writeMedia(path.join(dirs.inputDir, 'payload.mp4'), media(0, LANDSCAPE));
    const { provider, deps } = setup([{ id: 'a', media: media(5) }]);

    const result = await runPipeline({ profile: PROFILE, count: 1 }, deps);

    expect(result.ok ? null : result.error.code).toBe('INVALID_PAYLOAD');
    expect(provider.listedLimit).toBeNull();
  });

  it('fails with NO_ENTRIES and writes nothing when the profile has no fetchable entries', async () => {
    givenPayload();
    const { deps } = setup([null, null]);

    const result = await runPipeline({ profile: PROFILE, count: 3 }, deps);

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'NO_ENTRIES',
        message: 'No videos found for profile https://www.tiktok.com/@someone',
        remediation: expect.any(Array),
      },
    });
    expect(fs.readdirSync(dirs.outputDir)).toEqual([]);
    expect(fs.readdirSync(dirs.tempDir)).toEqual([]);
  });

  it('fails with LISTING_FAILED when the listing throws before any entry', async () => {
    givenPayload();
    const { deps } = setup([]);
    const provider = new FakeProvider([], new Error('yt-dlp list failed: HTTP Error 429'));

    const result = await runPipeline({ profile: PROFILE, count: 3 }, { ...deps, provider });

    expect(result).toEqual({
      ok: false,
      error: {
        code: 'LISTING_FAILED',
        message:
          'Could not list videos for https://www.tiktok.com/@someone: ' +
          'profile listing failed: yt-dlp list failed: HTTP Error 429',
        remediation: expect.any(Array),
      },
    });
    expect(fs.readdirSync(dirs.outputDir)).toEqual([]);
  });

  it('fails with NO_DOWNLOADS when every download fails', async () => {
    givenPayload();
    const { deps } = setup([{ id: 'a', media: media(5), failures: Infinity }]);

    const result = await runPipeline({ profile: PROFILE, count: 1 }, deps);

    expect(result.ok ? null : result.error.code).toBe('NO_DOWNLOADS');
    expect(fs.readdirSync(dirs.outputDir)).toEqual([]);
  });

  it('fails with NO_PROCESSED when every clip render fails', async () => {
    givenPayload();
    const { deps } = setup([{ id: 'a', media: media(5) }], { failClipRender: () => true });

    const result = await runPipeline({ profile: PROFILE, count: 1 }, deps);

    expect(result.ok ? null : result.error.code).toBe('NO_PROCESSED');
    expect(fs.readdirSync(dirs.tempDir)).toEqual([]);
  });

  it('fails with NO_PAIRS when every pair render fails', async () => {
    givenPayload();
    const { backend, deps } = setup([{ id: 'a', media: media(5) }], { failPairRender: () => true });

    const result = await runPipeline({ profile: PROFILE, count: 1 }, deps);

    expect(result.ok ? null : result.error.code).toBe('NO_PAIRS');
    expect(fs.readdirSync(dirs.outputDir)).toEqual([]);
    expect(backend.openHandles).toBe(0);
  });
});
