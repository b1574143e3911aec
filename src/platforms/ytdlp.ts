/**
 * yt-dlp source provider.
 *
 * Listing runs one flat-playlist dump (metadata only, nothing downloaded);
 * each entry then downloads on demand to the exact path the caller picks.
 * Every invocation is bounded by the per-fetch timeout.
 */
import { execFileSync } from 'child_process';
import * as fs from 'fs';
import { z } from 'zod';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { NonRetryableError } from '../utils/retry.js';
import type { ProfileLocator, RemoteEntry, SourceProvider } from './types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ListedEntry {
  id: string;
  url: string;
  title: string;
  durationSeconds?: number;
}

export interface YtDlpOptions {
  binary: string;
  timeoutMs: number;
  /** yt-dlp format selector */
  format: string;
}

const DEFAULT_OPTIONS: YtDlpOptions = {
  binary:    env.YTDLP_PATH,
  timeoutMs: env.FETCH_TIMEOUT_MS,
  format:    'best[ext=mp4]/best',
};

const MAX_BUFFER = 64 * 1024 * 1024;

// ── Playlist parsing ──────────────────────────────────────────────────────────

const EntrySchema = z.object({
  id:          z.string().min(1),
  url:         z.string().optional(),
  webpage_url: z.string().optional(),
  title:       z.string().nullable().optional(),
  duration:    z.number().nullable().optional(),
});

const PlaylistSchema = z.object({
  entries: z.array(z.unknown()).nullable().optional(),
});

/**
 * Parse a `--dump-single-json` playlist. Entries that are null, malformed or
 * carry no fetchable URL come back as null, keeping their position.
 */
export function parsePlaylistDump(raw: string): Array<ListedEntry | null> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error('yt-dlp returned invalid JSON for the profile listing');
  }

  const playlist = PlaylistSchema.safeParse(json);
  if (!playlist.success) throw new Error('yt-dlp profile listing has an unexpected shape');

  return (playlist.data.entries ?? []).map((item) => {
    const entry = EntrySchema.safeParse(item);
    if (!entry.success) return null;
    const { id, url, webpage_url, title, duration } = entry.data;
    const fetchUrl = webpage_url ?? url;
    if (!fetchUrl) return null;
    return {
      id,
      url: fetchUrl,
      title: title ?? id,
      ...(typeof duration === 'number' ? { durationSeconds: duration } : {}),
    };
  });
}

// ── Process helpers ───────────────────────────────────────────────────────────

function errorField(err: unknown, field: 'code' | 'signal' | 'stdout' | 'stderr'): string {
  if (typeof err === 'object' && err !== null && field in err) {
    const value: unknown = Reflect.get(err, field);
    if (typeof value === 'string') return value;
    if (Buffer.isBuffer(value)) return value.toString('utf-8');
  }
  return '';
}

/**
 * Run yt-dlp and return stdout. With `acceptPartial`, a non-zero exit that
 * still printed output (some entries failed under --ignore-errors) is kept.
 */
function runYtDlp(
  options: YtDlpOptions,
  args: string[],
  label: string,
  acceptPartial = false,
): string {
  logger.debug(`yt-dlp [${label}]`, { args: args.join(' ') });
  try {
    return execFileSync(options.binary, args, {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: options.timeoutMs,
      killSignal: 'SIGKILL',
      maxBuffer: MAX_BUFFER,
    });
  } catch (err) {
    if (errorField(err, 'code') === 'ENOENT') {
      throw new NonRetryableError(`yt-dlp executable "${options.binary}" not found; install yt-dlp or set YTDLP_PATH`, err);
    }
    if (errorField(err, 'code') === 'ETIMEDOUT' || errorField(err, 'signal') === 'SIGKILL') {
      throw new Error(`yt-dlp ${label} timed out after ${options.timeoutMs}ms`);
    }
    const stdout = errorField(err, 'stdout').trim();
    if (acceptPartial && stdout) {
      logger.warn(`yt-dlp [${label}] exited non-zero; using partial output`, {
        stderr: errorField(err, 'stderr').trim().slice(0, 500),
      });
      return stdout;
    }
    throw new Error(`yt-dlp ${label} failed: ${errorField(err, 'stderr').trim() || String(err)}`);
  }
}

// ── Provider ──────────────────────────────────────────────────────────────────

export class YtDlpProvider implements SourceProvider {
  readonly name = 'yt-dlp';

  constructor(private readonly options: YtDlpOptions = DEFAULT_OPTIONS) {}

  private get socketTimeoutSeconds(): string {
    return String(Math.max(1, Math.ceil(this.options.timeoutMs / 1000)));
  }

  async *listEntries(profile: ProfileLocator, limit: number): AsyncIterable<RemoteEntry | null> {
    logger.info('yt-dlp: listing profile', { url: profile.url, limit });

    const raw = runYtDlp(
      this.options,
      [
        '--flat-playlist',
        '--dump-single-json',
        '--playlist-end', String(limit),
        '--ignore-errors',
        '--no-warnings',
        '--socket-timeout', this.socketTimeoutSeconds,
        profile.url,
      ],
      'list',
      true,
    );

    const listed = parsePlaylistDump(raw);
    logger.info('yt-dlp: profile listed', {
      entries: listed.length,
      unavailable: listed.filter((e) => e === null).length,
    });

    for (const entry of listed) {
      yield entry ? this.toRemoteEntry(entry) : null;
    }
  }

  private toRemoteEntry(entry: ListedEntry): RemoteEntry {
    return {
      ...entry,
      download: async (destination: string) => this.download(entry, destination),
    };
  }

  private async download(entry: ListedEntry, destination: string): Promise<string> {
    logger.info('yt-dlp: downloading entry', { id: entry.id, title: entry.title, destination });
    try {
      runYtDlp(
        this.options,
        [
          '-f', this.options.format,
          '--no-playlist',
          '--no-part',
          '--no-progress',
          '--quiet',
          '--no-warnings',
          '--socket-timeout', this.socketTimeoutSeconds,
          '-o', destination,
          entry.url,
        ],
        `download:${entry.id}`,
      );
      if (!fs.existsSync(destination) || fs.statSync(destination).size === 0) {
        throw new Error(`yt-dlp produced no file for ${entry.id}`);
      }
      return destination;
    } catch (err) {
      fs.rmSync(destination, { force: true });
      throw err;
    }
  }
}
