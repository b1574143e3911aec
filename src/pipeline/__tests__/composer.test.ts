import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { compose, pairFileName } from '../composer.js';
import { FakeBackend, LANDSCAPE, PORTRAIT, makeTempDir, media, readMedia, writeMedia } from '../../__tests__/fakes.js';

describe('pairFileName', () => {
  it('zero-pads the ordinal to two digits', () => {
    expect(pairFileName(1)).toBe('video_pair_01.mp4');
    expect(pairFileName(12)).toBe('video_pair_12.mp4');
    expect(pairFileName(123)).toBe('video_pair_123.mp4');
  });
});

describe('compose', () => {
  let dir: string;
  let outputDir: string;
  let backend: FakeBackend;
  let processed: string;
  let payload: string;

  beforeEach(() => {
    dir = makeTempDir();
    outputDir = path.join(dir, 'output');
    backend = new FakeBackend();
    processed = writeMedia(path.join(dir, 'temp', 'processed_a.mp4'), media(20, PORTRAIT));
    payload = writeMedia(path.join(dir, 'input', 'payload.mp4'), media(10, LANDSCAPE));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fill-crops the clip to the input video frame and appends the input video', async () => {
    const result = await compose(processed, payload, 1, { backend, outputDir });

    expect(result).toEqual({
      ok: true,
      value: { ordinal: 1, path: path.join(outputDir, 'video_pair_01.mp4'), durationSeconds: 30 },
    });
    const job = backend.pairJobs[0];
    expect(job?.lead.info.path).toBe(processed);
    expect(job?.tail.info.path).toBe(payload);
    expect(job?.leadTransform).toEqual({
      scaledWidth: 1920,
      scaledHeight: 3413,
      cropX: 0,
      cropY: 1166,
      width: 1920,
      height: 1080,
    });

    const written = readMedia(path.join(outputDir, 'video_pair_01.mp4'));
    expect([written.width, written.height, written.durationSeconds]).toEqual([1920, 1080, 30]);
    expect(backend.opened).toBe(2);
    expect(backend.openHandles).toBe(0);
  });

  it('skips reconciliation when the frames already match', async () => {
    const sameSize = writeMedia(path.join(dir, 'temp', 'processed_b.mp4'), media(8, LANDSCAPE));
    await compose(sameSize, payload, 1, { backend, outputDir });
    expect(backend.pairJobs[0]?.leadTransform).toBeNull();
  });

  it('targets an even frame when the input video has odd dimensions', async () => {
    const oddPayload = writeMedia(path.join(dir, 'input', 'odd.mp4'), media(10, { width: 1921, height: 1081 }));
    const sameSize = writeMedia(path.join(dir, 'temp', 'processed_c.mp4'), media(8, LANDSCAPE));

    const result = await compose(sameSize, oddPayload, 1, { backend, outputDir });

    expect(result.ok).toBe(true);
    const job = backend.pairJobs[0];
    expect(job?.frame).toEqual({ width: 1920, height: 1080 });
    expect(job?.leadTransform).toBeNull();
    const written = readMedia(path.join(outputDir, 'video_pair_01.mp4'));
    expect([written.width, written.height]).toEqual([1920, 1080]);
  });

  it('gives the same result when the input video is reused', async () => {
    const before = fs.readFileSync(payload, 'utf-8');

    const first = await compose(processed, payload, 1, { backend, outputDir });
    const second = await compose(processed, payload, 2, { backend, outputDir });

    expect(first.ok && second.ok).toBe(true);
    if (!first.ok || !second.ok) return;
    expect(second.value.durationSeconds).toBe(first.value.durationSeconds);
    const a = readMedia(first.value.path);
    const b = readMedia(second.value.path);
    expect([b.width, b.height, b.durationSeconds]).toEqual([a.width, a.height, a.durationSeconds]);
    expect(fs.readFileSync(payload, 'utf-8')).toBe(before);
    expect(backend.openHandles).toBe(0);
  });

  it('reports a failed render without leaving an output file', async () => {
    backend = new FakeBackend({ failPairRender: () => true });
    const result = await compose(processed, payload, 3, { backend, outputDir });

    expect(result.ok ? null : [result.error.kind, result.error.message, result.error.subject]).toEqual([
      'EncodingFailure',
      'pair render failed: Conversion failed!',
      processed,
    ]);
    expect(fs.existsSync(path.join(outputDir, 'video_pair_03.mp4'))).toBe(false);
    expect(backend.openHandles).toBe(0);
  });

  it('rejects an input video with no duration', async () => {
    const empty = writeMedia(path.join(dir, 'input', 'empty.mp4'), media(0, LANDSCAPE));
    const result = await compose(processed, empty, 1, { backend, outputDir });

    expect(result.ok ? null : [result.error.kind, result.error.subject]).toEqual(['InvalidAsset', empty]);
    expect(backend.pairJobs).toEqual([]);
    expect(backend.openHandles).toBe(0);
  });

  it('releases the clip handle when the input video cannot be opened', async () => {
    const result = await compose(processed, path.join(dir, 'input', 'missing.mp4'), 1, { backend, outputDir });

    expect(result.ok ? null : result.error.kind).toBe('InvalidAsset');
    expect(backend.opened).toBe(1);
    expect(backend.openHandles).toBe(0);
  });
});
