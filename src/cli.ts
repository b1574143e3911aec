/**
 * Command-line arguments: `clipsplice [profile-url] [count]`.
 * Missing arguments are asked for when stdin is a terminal.
 */
import { createInterface } from 'readline/promises';
import { z } from 'zod';
import { BATCH_LIMITS } from './config.js';
import { fail, ok, type Result } from './utils/errors.js';
import { parseProfileLocator } from './platforms/profile.js';
import type { PipelineRequest } from './pipeline/index.js';

export const USAGE = `Usage: clipsplice <profile-url> <count>

  profile-url  TikTok profile, e.g. https://www.tiktok.com/@name
  count        number of videos to fetch (${BATCH_LIMITS.minCount}-${BATCH_LIMITS.maxCount})`;

const CountSchema = z.coerce
  .number({ invalid_type_error: 'Count must be a number' })
  .int('Count must be a whole number')
  .min(BATCH_LIMITS.minCount, `Count must be at least ${BATCH_LIMITS.minCount}`)
  .max(BATCH_LIMITS.maxCount, `Count must be at most ${BATCH_LIMITS.maxCount}`);

export function parseCount(raw: string): Result<number, string> {
  const trimmed = raw.trim();
  if (trimmed === '') return fail('Count is empty');
  const parsed = CountSchema.safeParse(trimmed);
  return parsed.success ? ok(parsed.data) : fail(parsed.error.issues[0]?.message ?? 'Invalid count');
}

/** Validate both raw arguments; the first problem found is reported. */
export function parseRequest(rawUrl: string, rawCount: string): Result<PipelineRequest, string> {
  const profile = parseProfileLocator(rawUrl);
  if (!profile.ok) return profile;
  const count = parseCount(rawCount);
  if (!count.ok) return count;
  return ok({ profile: profile.value, count: count.value });
}

async function prompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

/**
 * Collect the two arguments from argv, prompting for whichever is missing
 * on a TTY. Returns null when an argument is missing and nobody can be asked.
 */
export async function collectArgs(
  argv: readonly string[],
  interactive: boolean = process.stdin.isTTY === true,
): Promise<{ url: string; count: string } | null> {
  let [url, count] = argv;
  if (url === undefined) {
    if (!interactive) return null;
    url = await prompt('TikTok profile URL: ');
  }
  if (count === undefined) {
    if (!interactive) return null;
    count = await prompt(`How many videos (${BATCH_LIMITS.minCount}-${BATCH_LIMITS.maxCount}): `);
  }
  return { url, count };
}
