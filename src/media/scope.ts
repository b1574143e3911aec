import { logger } from '../utils/logger.js';
import type { MediaBackend, MediaSource } from './types.js';

/**
 * Open `path`, hand the handle to `fn`, and close it however `fn` exits.
 * A failing close is logged and does not replace the callback's outcome.
 */
export async function withSource<T>(
  backend: MediaBackend,
  path: string,
  fn: (source: MediaSource) => Promise<T>,
): Promise<T> {
  const source = await backend.open(path);
  try {
    return await fn(source);
  } finally {
    try {
      await source.close();
    } catch (err) {
      logger.warn('Media: failed to release handle', { path, err });
    }
  }
}
