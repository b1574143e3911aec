/**
 * Source acquisition — lists a profile, downloads up to `maxCount` entries into
 * the staging area, and keeps only the files that pass the decodability gate.
 *
 * A failed entry never aborts the batch: it is logged, recorded as an
 * ItemFailure and skipped. Returning fewer items than requested is normal.
 */
import * as path from 'path';
import { BATCH_LIMITS, OUTPUT_NAMING, RETRY_POLICY, env } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeError, fail, ok, PipelineError, type Result } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import { hashFile } from '../utils/hash.js';
import { discardFile } from '../utils/folders.js';
import { validate } from '../gates/validator.js';
import type { MediaBackend } from '../media/types.js';
import type { ProfileLocator, RemoteEntry, SourceProvider } from '../platforms/types.js';
import type { ItemFailure, SourceItem } from './types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface AcquireOptions {
  provider: SourceProvider;
  backend: MediaBackend;
  /** Staging folder the downloads are written to */
  workDir: string;
  maxAttempts?: number;
  baseDelayMs?: number;
  /** Skip entries already seen in this batch, by remote id and by content hash */
  dedupe?: boolean;
}

export interface AcquireResult {
  items: SourceItem[];
  /** Non-null entries considered, including ones that later failed */
  discovered: number;
  failures: ItemFailure[];
  /** Set when the listing itself threw; entries seen before the throw are kept */
  listingError: PipelineError | null;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

/** `video_007_<id>.mp4`; the counter keeps names unique within a batch. */
export function downloadFileName(counter: number, remoteId: string): string {
  const safeId = remoteId.replace(/[^A-Za-z0-9_-]/g, '').slice(0, 40) || 'entry';
  const index = String(counter).padStart(OUTPUT_NAMING.downloadDigits, '0');
  return `${OUTPUT_NAMING.downloadPrefix}${index}_${safeId}.${OUTPUT_NAMING.container}`;
}

export function assertBatchSize(maxCount: number): void {
  if (!Number.isInteger(maxCount) || maxCount < BATCH_LIMITS.minCount || maxCount > BATCH_LIMITS.maxCount) {
    throw new RangeError(
      `maxCount must be an integer between ${BATCH_LIMITS.minCount} and ${BATCH_LIMITS.maxCount}, got ${maxCount}`,
    );
  }
}

// ── Public API ────────────────────────────────────────────────────────────────

export async function acquire(
  profile: ProfileLocator,
  maxCount: number,
  options: AcquireOptions,
): Promise<AcquireResult> {
  assertBatchSize(maxCount);

  const {
    provider,
    backend,
    workDir,
    maxAttempts = RETRY_POLICY.maxAttempts,
    baseDelayMs = RETRY_POLICY.baseDelayMs,
    dedupe = env.DEDUPE_ENTRIES,
  } = options;

  logger.info('Acquire: starting', { profile: profile.url, maxCount, provider: provider.name, dedupe });

  const items: SourceItem[] = [];
  const failures: ItemFailure[] = [];
  const seenIds = new Set<string>();
  const seenHashes = new Set<string>();
  let discovered = 0;
  let counter = 0;
  let listingError: PipelineError | null = null;

  const recordFailure = (subject: string, error: PipelineError) => {
    logger.warn('Acquire: entry dropped', { subject, kind: error.kind, reason: error.message });
    failures.push({ stage: 'acquire', subject, error });
  };

  try {
    for await (const entry of provider.listEntries(profile, maxCount)) {
      if (discovered >= maxCount) break;
      if (entry === null) {
        logger.info('Acquire: skipping unavailable entry');
        continue;
      }
      discovered++;

      if (dedupe && seenIds.has(entry.id)) {
        logger.info('Acquire: skipping duplicate entry', { id: entry.id });
        continue;
      }
      seenIds.add(entry.id);

      counter++;
      const destination = path.join(workDir, downloadFileName(counter, entry.id));
      logger.info(`Acquire: downloading ${discovered}/${maxCount}`, { id: entry.id, title: entry.title });

      const fetched = await fetchEntry(entry, destination, maxAttempts, baseDelayMs);
      if (!fetched.ok) {
        recordFailure(entry.id, fetched.error);
        continue;
      }
      const localPath = fetched.value;

      if (!(await validate(localPath, backend))) {
        discardFile(localPath);
        recordFailure(entry.id, new PipelineError('InvalidAsset', 'downloaded file failed validation', localPath));
        continue;
      }

      if (dedupe) {
        const digest = await hashFile(localPath).catch((err: unknown) => {
          logger.warn('Acquire: could not hash download; keeping it', { localPath, err });
          return null;
        });
        if (digest !== null && seenHashes.has(digest)) {
          logger.info('Acquire: discarding duplicate download', { id: entry.id, localPath });
          discardFile(localPath);
          continue;
        }
        if (digest !== null) seenHashes.add(digest);
      }

      items.push({ id: entry.id, remoteUrl: entry.url, title: entry.title, localPath, ordinal: counter });
      logger.info('Acquire: entry ready', { id: entry.id, localPath });
    }
  } catch (err) {
    listingError = new PipelineError('FetchFailure', `profile listing failed: ${describeError(err)}`, profile.url, err);
    recordFailure(profile.url, listingError);
  }

  logger.info('Acquire: complete', { requested: maxCount, discovered, acquired: items.length });
  return { items, discovered, failures, listingError };
}

async function fetchEntry(
  entry: RemoteEntry,
  destination: string,
  maxAttempts: number,
  baseDelayMs: number,
): Promise<Result<string>> {
  try {
    return ok(await withRetry(() => entry.download(destination), {
      maxAttempts,
      baseDelayMs,
      label: `download ${entry.id}`,
    }));
  } catch (err) {
    discardFile(destination);
    return fail(new PipelineError('FetchFailure', `download failed: ${describeError(err)}`, entry.id, err));
  }
}
