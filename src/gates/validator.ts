/**
 * Decodability gate.
 *
 * A partial or corrupted download usually still has a readable header, so a
 * plain open is not enough: the file must report positive duration, frame
 * rate and dimensions AND decode a frame at its temporal midpoint.
 * Never writes to the file.
 */
import { logger } from '../utils/logger.js';
import { describeError, fail, ok, PipelineError, type Result } from '../utils/errors.js';
import { withSource } from '../media/scope.js';
import type { MediaBackend, VideoAsset } from '../media/types.js';

function invalid(path: string, reason: string, cause?: unknown): Result<VideoAsset> {
  return fail(new PipelineError('InvalidAsset', reason, path, cause));
}

export async function inspect(path: string, backend: MediaBackend): Promise<Result<VideoAsset>> {
  try {
    return await withSource(backend, path, async (source) => {
      const { durationSeconds, frameRate, width, height } = source.info;
      logger.debug('Validator: stream info', { path, durationSeconds, frameRate, width, height });

      if (!(durationSeconds > 0)) return invalid(path, `invalid duration ${durationSeconds}`);
      if (!(frameRate > 0)) return invalid(path, `invalid frame rate ${frameRate}`);
      if (!(width > 0) || !(height > 0)) return invalid(path, `invalid size ${width}x${height}`);

      const midpoint = durationSeconds / 2;
      try {
        const frame = await source.readFrameAt(midpoint);
        if (frame.length === 0) return invalid(path, `empty frame at t=${midpoint.toFixed(3)}`);
      } catch (err) {
        return invalid(path, `cannot decode frame at t=${midpoint.toFixed(3)}: ${describeError(err)}`, err);
      }

      return ok({ ...source.info, decodable: true });
    });
  } catch (err) {
    return invalid(path, `cannot open: ${describeError(err)}`, err);
  }
}

export async function validate(path: string, backend: MediaBackend): Promise<boolean> {
  const result = await inspect(path, backend);
  if (result.ok) {
    const { durationSeconds, frameRate, width, height } = result.value;
    logger.info('Validator: passed', { path, durationSeconds, frameRate, size: `${width}x${height}` });
    return true;
  }
  logger.warn('Validator: rejected', { path, reason: result.error.message });
  return false;
}
