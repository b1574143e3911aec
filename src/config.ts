import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
  // Working folders
  INPUT_DIR:         z.string().min(1).default('input'),
  OVERLAY_DIR:       z.string().min(1).default('overlay'),
  TEMP_DIR:          z.string().min(1).default('temp'),
  OUTPUT_DIR:        z.string().min(1).default('output'),

  // Processing
  MAX_CLIP_SECONDS:  z.coerce.number().min(1).default(20),
  OUTPUT_FPS:        z.coerce.number().int().positive().default(30),
  VIDEO_CODEC:       z.string().min(1).default('libx264'),
  AUDIO_CODEC:       z.string().min(1).default('aac'),

  // Fetching
  FETCH_TIMEOUT_MS:  z.coerce.number().int().positive().default(120_000),
  FETCH_ATTEMPTS:    z.coerce.number().int().min(1).max(5).default(2),
  DEDUPE_ENTRIES:    flag.default('false'),

  // Executables
  FFMPEG_PATH:       z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:      z.string().min(1).default('ffprobe'),
  YTDLP_PATH:        z.string().min(1).default('yt-dlp'),

  // Logging
  LOG_LEVEL:         z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:        z.enum(['text', 'json']).default('text'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new Error(`Missing or invalid environment variables: ${invalid}`);
  }
  return parsed.data;
}

export const env = parseEnv(process.env);

// ── Folder Scanning ───────────────────────────────────────────────────────────

export const VIDEO_EXTENSIONS = ['.mp4', '.avi', '.mov', '.mkv', '.wmv', '.flv'] as const;
export const IMAGE_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.gif', '.bmp'] as const;

// ── Batch Limits ──────────────────────────────────────────────────────────────

export const BATCH_LIMITS = {
  minCount: 1,
  maxCount: 50,
} as const;

// ── Clip Timing ───────────────────────────────────────────────────────────────

export const CLIP_TIMING = {
  tailMarginSeconds: 0.1,  // stay clear of the last decodable frame when trimming
  minClipSeconds:    1.0,
} as const;

// ── Encoding ──────────────────────────────────────────────────────────────────

export interface EncodingProfile {
  videoCodec: string;
  audioCodec: string;
  fps: number;
  preset: string;
  crf: number;
  audioBitrate: string;
  audioSampleRate: number;
}

export const ENCODING: EncodingProfile = {
  videoCodec:      env.VIDEO_CODEC,
  audioCodec:      env.AUDIO_CODEC,
  fps:             env.OUTPUT_FPS,
  preset:          'fast',
  crf:             23,
  audioBitrate:    '128k',
  audioSampleRate: 44_100,
};

// ── Output Naming ─────────────────────────────────────────────────────────────

export const OUTPUT_NAMING = {
  pairPrefix:       'video_pair_',
  pairDigits:       2,
  downloadPrefix:   'video_',
  downloadDigits:   3,
  processedPrefix:  'processed_',
  container:        'mp4',
} as const;

// ── Retry Policy ──────────────────────────────────────────────────────────────

export const RETRY_POLICY = {
  maxAttempts: env.FETCH_ATTEMPTS,
  baseDelayMs: 2_000,
} as const;
