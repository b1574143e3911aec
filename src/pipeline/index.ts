/**
 * Pipeline orchestrator — acquires a profile's clips, processes each one and
 * pairs it with the run's input video.
 *
 * Stages run one after another over the whole batch. A failing item is
 * recorded and skipped; only an empty stage ends the run, as a BatchFailure.
 * The staging area is cleared on the way in and on the way out.
 */
import { IMAGE_EXTENSIONS, VIDEO_EXTENSIONS, env, type EncodingProfile } from '../config.js';
import { logger } from '../utils/logger.js';
import { BatchFailures, fail, ok, type BatchFailure, type Result } from '../utils/errors.js';
import { clearDir, ensureDirs, findFirstMatching } from '../utils/folders.js';
import { validate } from '../gates/validator.js';
import { ffmpegBackend } from '../media/ffmpeg.js';
import { resolveOverlay } from '../media/overlay.js';
import type { MediaBackend } from '../media/types.js';
import { YtDlpProvider } from '../platforms/ytdlp.js';
import type { ProfileLocator, SourceProvider } from '../platforms/types.js';
import { acquire } from './acquirer.js';
import { processClip } from './processor.js';
import { compose } from './composer.js';
import type { ItemFailure, ProcessedClip, RunReport, VideoPair } from './types.js';

export interface PipelineRequest {
  profile: ProfileLocator;
  count: number;
}

export interface PipelineDeps {
  backend: MediaBackend;
  provider: SourceProvider;
  inputDir: string;
  overlayDir: string;
  tempDir: string;
  outputDir: string;
  maxClipSeconds?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  dedupe?: boolean;
  encoding?: EncodingProfile;
}

export function defaultDeps(): PipelineDeps {
  return {
    backend:    ffmpegBackend,
    provider:   new YtDlpProvider(),
    inputDir:   env.INPUT_DIR,
    overlayDir: env.OVERLAY_DIR,
    tempDir:    env.TEMP_DIR,
    outputDir:  env.OUTPUT_DIR,
  };
}

function clearStaging(tempDir: string): void {
  const leftovers = clearDir(tempDir);
  if (leftovers.length > 0) {
    logger.warn('Pipeline: staging area not fully cleared', { tempDir, leftovers: leftovers.length });
  }
}

export async function runPipeline(
  request: PipelineRequest,
  deps: PipelineDeps = defaultDeps(),
): Promise<Result<RunReport, BatchFailure>> {
  const { profile, count } = request;
  const { backend, provider, inputDir, overlayDir, tempDir, outputDir } = deps;

  logger.info('Pipeline: starting run', { profile: profile.url, handle: profile.handle, count });

  ensureDirs(inputDir, overlayDir, tempDir, outputDir);
  clearStaging(tempDir);

  try {
    // Step 1: payload
    const payloadPath = findFirstMatching(inputDir, VIDEO_EXTENSIONS);
    if (!payloadPath) return fail(BatchFailures.noPayload(inputDir, VIDEO_EXTENSIONS));
    logger.info('Pipeline: input video', { payloadPath });
    if (!(await validate(payloadPath, backend))) return fail(BatchFailures.invalidPayload(payloadPath));

    // Step 2: overlay
    const overlay = resolveOverlay(overlayDir);
    if (overlay) {
      logger.info('Pipeline: overlay image', { imagePath: overlay.imagePath });
    } else {
      logger.warn('Pipeline: no overlay image found; clips are processed without one', { overlayDir });
    }

    // Step 3: acquire
    const acquired = await acquire(profile, count, {
      provider,
      backend,
      workDir: tempDir,
      maxAttempts: deps.maxAttempts,
      baseDelayMs: deps.baseDelayMs,
      dedupe: deps.dedupe,
    });
    const failures: ItemFailure[] = [...acquired.failures];
    if (acquired.discovered === 0 && acquired.listingError) {
      return fail(BatchFailures.listingFailed(profile.url, acquired.listingError.message));
    }
    if (acquired.discovered === 0) return fail(BatchFailures.noEntries(profile.url));
    if (acquired.items.length === 0) return fail(BatchFailures.noDownloads(profile.url));

    // Step 4: process
    const processed: ProcessedClip[] = [];
    for (const item of acquired.items) {
      const result = await processClip(item, {
        backend,
        workDir: tempDir,
        overlay,
        maxDurationSeconds: deps.maxClipSeconds,
        encoding: deps.encoding,
      });
      if (result.ok) {
        processed.push(result.value);
      } else {
        logger.warn('Pipeline: clip dropped', { ordinal: item.ordinal, kind: result.error.kind, reason: result.error.message });
        failures.push({ stage: 'process', subject: item.localPath, error: result.error });
      }
    }
    if (processed.length === 0) return fail(BatchFailures.noProcessed());

    // Step 5: compose
    const pairs: VideoPair[] = [];
    for (const [index, clip] of processed.entries()) {
      const ordinal = index + 1;
      const result = await compose(clip.path, payloadPath, ordinal, {
        backend,
        outputDir,
        encoding: deps.encoding,
      });
      if (result.ok) {
        pairs.push(result.value);
      } else {
        logger.warn('Pipeline: pair dropped', { ordinal, kind: result.error.kind, reason: result.error.message });
        failures.push({ stage: 'compose', subject: String(ordinal), error: result.error });
      }
    }
    if (pairs.length === 0) return fail(BatchFailures.noPairs());

    logger.info('Pipeline: complete', {
      requested: count,
      downloaded: acquired.items.length,
      processed: processed.length,
      pairs: pairs.length,
      failures: failures.length,
    });

    return ok({
      profile,
      requested: count,
      discovered: acquired.discovered,
      downloaded: acquired.items.length,
      processed: processed.length,
      pairs,
      failures,
    });
  } finally {
    clearStaging(tempDir);
  }
}
