/**
 * Clip processing — clamps a downloaded clip's duration, composites the run's
 * overlay at the center of the frame, and re-encodes it at a fixed frame rate
 * into the staging area.
 *
 * The source handle is scoped with withSource(), so it is released on every
 * exit path including early validation failures.
 */
import * as path from 'path';
import { CLIP_TIMING, ENCODING, OUTPUT_NAMING, env, type EncodingProfile } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError, fail, ok, PipelineError, type Result } from '../utils/errors.js';
import { withSource } from '../media/scope.js';
import { evenFrame } from '../media/geometry.js';
import { planOverlay, type OverlaySpec } from '../media/overlay.js';
import type { Dimensions, MediaBackend, OverlayPlacement } from '../media/types.js';
import type { ProcessedClip, SourceItem } from './types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ProcessOptions {
  backend: MediaBackend;
  /** Staging folder the processed clip is written to */
  workDir: string;
  overlay: OverlaySpec | null;
  maxDurationSeconds?: number;
  encoding?: EncodingProfile;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function assertMaxDuration(maxDurationSeconds: number): void {
  if (!Number.isFinite(maxDurationSeconds) || maxDurationSeconds < CLIP_TIMING.minClipSeconds) {
    throw new RangeError(
      `maxDurationSeconds must be at least ${CLIP_TIMING.minClipSeconds}, got ${maxDurationSeconds}`,
    );
  }
}

/**
 * Target duration for a clip of `durationSeconds`. Clips within the limit are
 * kept whole; longer ones are cut to the limit, but never closer than the
 * tail margin to their end and never below the minimum clip length.
 */
export function planTrim(durationSeconds: number, maxDurationSeconds: number): number {
  assertMaxDuration(maxDurationSeconds);
  if (durationSeconds <= maxDurationSeconds) return durationSeconds;
  const safe = Math.min(maxDurationSeconds, durationSeconds - CLIP_TIMING.tailMarginSeconds);
  return Math.max(safe, CLIP_TIMING.minClipSeconds);
}

export function processedFileName(sourcePath: string): string {
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  return `${OUTPUT_NAMING.processedPrefix}${stem}.${OUTPUT_NAMING.container}`;
}

async function placeOverlay(
  backend: MediaBackend,
  overlay: OverlaySpec,
  frame: Dimensions,
  sourcePath: string,
): Promise<Result<OverlayPlacement>> {
  try {
    const image = await backend.probeImage(overlay.imagePath);
    return ok(planOverlay(overlay, image, frame));
  } catch (err) {
    return fail(new PipelineError(
      'CompositingFailure',
      `overlay ${overlay.imagePath} could not be loaded: ${describeError(err)}`,
      sourcePath,
      err,
    ));
  }
}

// ── Public API ────────────────────────────────────────────────────────────────

export async function processClip(item: SourceItem, options: ProcessOptions): Promise<Result<ProcessedClip>> {
  const {
    backend,
    workDir,
    overlay,
    maxDurationSeconds = env.MAX_CLIP_SECONDS,
    encoding = ENCODING,
  } = options;
  assertMaxDuration(maxDurationSeconds);
  const sourcePath = item.localPath;
  const outputPath = path.join(workDir, processedFileName(sourcePath));

  logger.info('Process: starting', { ordinal: item.ordinal, sourcePath });

  try {
    return await withSource(backend, sourcePath, async (source): Promise<Result<ProcessedClip>> => {
      const { durationSeconds } = source.info;
      if (!(durationSeconds > 0)) {
        return fail(new PipelineError('InvalidAsset', `invalid duration ${durationSeconds}`, sourcePath));
      }

      const targetSeconds = planTrim(durationSeconds, maxDurationSeconds);
      if (targetSeconds < durationSeconds) {
        logger.info('Process: clamping duration', { sourcePath, from: durationSeconds, to: targetSeconds });
      }

      const frame = evenFrame(source.info);

      let placement: OverlayPlacement | null = null;
      if (overlay) {
        const placed = await placeOverlay(backend, overlay, frame, sourcePath);
        if (!placed.ok) return placed;
        placement = placed.value;
        logger.info('Process: overlay placed', {
          sourcePath,
          size: `${placement.width}x${placement.height}`,
          at: `${placement.x},${placement.y}`,
        });
      }

      try {
        await backend.renderClip({
          source,
          outputPath,
          durationSeconds: targetSeconds,
          frame,
          overlay: placement,
          encoding,
        });
      } catch (err) {
        return fail(new PipelineError('EncodingFailure', `encode failed: ${describeError(err)}`, sourcePath, err));
      }

      logger.info('Process: clip ready', { ordinal: item.ordinal, outputPath, durationSeconds: targetSeconds });
      return ok({
        sourceOrdinal:   item.ordinal,
        path:            outputPath,
        durationSeconds: targetSeconds,
        width:           frame.width,
        height:          frame.height,
      });
    });
  } catch (err) {
    return fail(new PipelineError('InvalidAsset', `cannot open: ${describeError(err)}`, sourcePath, err));
  }
}
