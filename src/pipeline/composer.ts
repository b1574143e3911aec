/**
 * Pair composition: processed clip first, then the run's input video,
 * concatenated with no transition into `video_pair_NN.mp4`.
 *
 * When the two frames differ, the processed clip is filled and center-cropped
 * to the input video's resolution, trimmed to even. Both inputs are opened afresh and
 * released on every exit path, so the same input video can be composed
 * any number of times in a batch.
 */
import * as path from 'path';
import { ENCODING, OUTPUT_NAMING, type EncodingProfile } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError, fail, ok, PipelineError, type Result } from '../utils/errors.js';
import { withSource } from '../media/scope.js';
import { evenFrame, planFillCrop } from '../media/geometry.js';
import type { MediaBackend } from '../media/types.js';
import type { VideoPair } from './types.js';

export interface ComposeOptions {
  backend: MediaBackend;
  outputDir: string;
  encoding?: EncodingProfile;
}

export function pairFileName(ordinal: number): string {
  const index = String(ordinal).padStart(OUTPUT_NAMING.pairDigits, '0');
  return `${OUTPUT_NAMING.pairPrefix}${index}.${OUTPUT_NAMING.container}`;
}

export async function compose(
  processedPath: string,
  payloadPath: string,
  ordinal: number,
  options: ComposeOptions,
): Promise<Result<VideoPair>> {
  const { backend, outputDir, encoding = ENCODING } = options;
  const outputPath = path.join(outputDir, pairFileName(ordinal));

  logger.info('Compose: starting', { ordinal, processedPath, payloadPath });

  try {
    return await withSource(backend, processedPath, (lead) =>
      withSource(backend, payloadPath, async (tail): Promise<Result<VideoPair>> => {
        for (const source of [lead, tail]) {
          if (!(source.info.durationSeconds > 0)) {
            return fail(new PipelineError(
              'InvalidAsset',
              `invalid duration ${source.info.durationSeconds}`,
              source.info.path,
            ));
          }
        }

        const frame = evenFrame(tail.info);
        const leadTransform = planFillCrop(lead.info, frame);
        if (leadTransform) {
          logger.info('Compose: reconciling resolution', {
            ordinal,
            from: `${lead.info.width}x${lead.info.height}`,
            to: `${frame.width}x${frame.height}`,
          });
        }

        try {
          await backend.renderPair({ lead, tail, frame, leadTransform, outputPath, encoding });
        } catch (err) {
          return fail(new PipelineError('EncodingFailure', `pair render failed: ${describeError(err)}`, processedPath, err));
        }

        const durationSeconds = lead.info.durationSeconds + tail.info.durationSeconds;
        logger.info('Compose: pair ready', { ordinal, outputPath, durationSeconds });
        return ok({ ordinal, path: outputPath, durationSeconds });
      }),
    );
  } catch (err) {
    return fail(new PipelineError('InvalidAsset', `cannot open: ${describeError(err)}`, processedPath, err));
  }
}
