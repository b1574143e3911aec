/**
 * FFmpeg / FFprobe media backend: stream probing, single-frame decode,
 * clip renders (trim + overlay) and pair renders (fill-crop + concat).
 *
 * Every tool invocation is synchronous and throws on a non-zero exit with the
 * tool's stderr in the message. Renders write to a `.partial` file that is
 * renamed into place on success and removed on every path.
 */
import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { env, type EncodingProfile } from '../config.js';
import { logger } from '../utils/logger.js';
import { sameDimensions } from './geometry.js';
import type {
  ClipRenderJob,
  Dimensions,
  MediaBackend,
  MediaSource,
  PairRenderJob,
  StreamInfo,
} from './types.js';

// ── Helpers ────────────────────────────────────────────────────────────────────

const MAX_BUFFER = 64 * 1024 * 1024;

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string') return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8').trim();
  }
  return '';
}

export function runFfmpeg(args: string[], label: string): void {
  logger.debug(`FFmpeg [${label}]`, { args: args.join(' ') });
  try {
    execFileSync(env.FFMPEG_PATH, ['-y', '-hide_banner', '-loglevel', 'error', ...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: MAX_BUFFER,
    });
  } catch (err) {
    throw new Error(`FFmpeg ${label} failed: ${stderrOf(err) || String(err)}`);
  }
}

function runFfprobe(args: string[], label: string): string {
  logger.debug(`FFprobe [${label}]`, { args: args.join(' ') });
  try {
    return execFileSync(env.FFPROBE_PATH, args, {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: MAX_BUFFER,
    }).trim();
  } catch (err) {
    throw new Error(`FFprobe ${label} failed: ${stderrOf(err) || String(err)}`);
  }
}

// ── Probe parsing ──────────────────────────────────────────────────────────────

const ProbeStreamSchema = z.object({
  codec_type:     z.string().optional(),
  width:          z.number().optional(),
  height:         z.number().optional(),
  avg_frame_rate: z.string().optional(),
  r_frame_rate:   z.string().optional(),
  duration:       z.string().optional(),
  side_data_list: z.array(z.object({ rotation: z.number().optional() })).optional(),
  tags:           z.object({ rotate: z.string().optional() }).optional(),
});

const ProbeSchema = z.object({
  streams: z.array(ProbeStreamSchema).default([]),
  format:  z.object({ duration: z.string().optional() }).default({}),
});

/** ffprobe reports rates as "N/D"; "0/0" means unknown and maps to 0. */
export function parseFrameRate(raw: string | undefined): number {
  if (!raw) return 0;
  const [num, den] = raw.split('/');
  const n = parseFloat(num ?? '');
  const d = den === undefined ? 1 : parseFloat(den);
  if (!Number.isFinite(n) || !Number.isFinite(d) || d === 0) return 0;
  return n / d;
}

function parseSeconds(raw: string | undefined): number {
  const value = parseFloat(raw ?? '');
  return Number.isFinite(value) ? value : 0;
}

type ProbeStream = z.infer<typeof ProbeStreamSchema>;

/**
 * Display rotation in whole degrees, normalized to [0, 360). The display
 * matrix side data wins over the legacy `rotate` tag.
 */
export function rotationOf(stream: ProbeStream): number {
  const fromSideData = stream.side_data_list?.find((d) => d.rotation !== undefined)?.rotation;
  const raw = fromSideData ?? parseFloat(stream.tags?.rotate ?? '');
  if (!Number.isFinite(raw)) return 0;
  return ((Math.round(raw) % 360) + 360) % 360;
}

/**
 * Turn `ffprobe -of json` output into stream info. Container duration wins
 * over the stream's; the average frame rate wins over the nominal one.
 * Width and height are the displayed size: ffmpeg applies the rotation on
 * decode, so a quarter-turn swaps them.
 */
export function parseProbeOutput(filePath: string, raw: string): StreamInfo {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error(`FFprobe returned invalid JSON for ${filePath}`);
  }

  const parsed = ProbeSchema.safeParse(json);
  if (!parsed.success) throw new Error(`Unexpected ffprobe output for ${filePath}`);

  const { streams, format } = parsed.data;
  const video = streams.find((s) => s.codec_type === 'video');
  if (!video) throw new Error(`No video stream in ${filePath}`);

  const rotation = rotationOf(video);
  const quarterTurn = rotation === 90 || rotation === 270;
  const storedWidth = video.width ?? 0;
  const storedHeight = video.height ?? 0;

  return {
    path:            filePath,
    durationSeconds: parseSeconds(format.duration) || parseSeconds(video.duration),
    frameRate:       parseFrameRate(video.avg_frame_rate) || parseFrameRate(video.r_frame_rate),
    width:           quarterTurn ? storedHeight : storedWidth,
    height:          quarterTurn ? storedWidth : storedHeight,
    hasAudio:        streams.some((s) => s.codec_type === 'audio'),
  };
}

function probeFile(filePath: string): StreamInfo {
  const raw = runFfprobe(
    [
      '-v', 'error',
      '-show_entries',
      'format=duration' +
        ':stream=codec_type,width,height,avg_frame_rate,r_frame_rate,duration' +
        ':stream_side_data=rotation:stream_tags=rotate',
      '-of', 'json',
      filePath,
    ],
    'probe',
  );
  return parseProbeOutput(filePath, raw);
}

// ── Handles ────────────────────────────────────────────────────────────────────

/** One opened file. Owns a private scratch directory until closed. */
class FfmpegSource implements MediaSource {
  private closed = false;
  private frameCounter = 0;

  constructor(
    readonly info: StreamInfo,
    private readonly scratchDir: string,
  ) {}

  async readFrameAt(timeSeconds: number): Promise<Buffer> {
    if (this.closed) throw new Error(`Media handle for ${this.info.path} is closed`);

    const outFile = path.join(this.scratchDir, `frame_${++this.frameCounter}.png`);
    try {
      runFfmpeg(
        ['-xerror', '-ss', timeSeconds.toFixed(3), '-i', this.info.path, '-frames:v', '1', '-f', 'image2', outFile],
        'readFrameAt',
      );
      if (!fs.existsSync(outFile)) {
        throw new Error(`No frame decoded at t=${timeSeconds.toFixed(3)} in ${this.info.path}`);
      }
      return fs.readFileSync(outFile);
    } finally {
      fs.rmSync(outFile, { force: true });
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    fs.rmSync(this.scratchDir, { recursive: true, force: true });
  }
}

export async function openSource(filePath: string): Promise<MediaSource> {
  if (!fs.existsSync(filePath)) throw new Error(`File not found: ${filePath}`);
  const info = probeFile(filePath);
  const scratchDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipsplice-'));
  return new FfmpegSource(info, scratchDir);
}

export async function probeImage(imagePath: string): Promise<Dimensions> {
  if (!fs.existsSync(imagePath)) throw new Error(`File not found: ${imagePath}`);
  const { width, height } = probeFile(imagePath);
  if (width <= 0 || height <= 0) {
    throw new Error(`Image ${imagePath} reports invalid size ${width}x${height}`);
  }
  return { width, height };
}

// ── Argument builders ──────────────────────────────────────────────────────────

function silence(sampleRate: number): string {
  return `anullsrc=channel_layout=stereo:sample_rate=${sampleRate}`;
}

function encodeArgs(encoding: EncodingProfile): string[] {
  return [
    '-c:v', encoding.videoCodec,
    '-preset', encoding.preset,
    '-crf', String(encoding.crf),
    '-r', String(encoding.fps),
    '-pix_fmt', 'yuv420p',
    '-c:a', encoding.audioCodec,
    '-b:a', encoding.audioBitrate,
    '-ar', String(encoding.audioSampleRate),
    '-ac', '2',
    '-movflags', '+faststart',
    '-f', 'mp4',
  ];
}

/**
 * Trim the source to `durationSeconds`, optionally composite the overlay at
 * its planned size and offset, and normalize frame rate and pixel aspect.
 * A source without audio is paired with generated silence.
 */
export function buildClipArgs(job: ClipRenderJob, outFile: string): string[] {
  const { source, frame, overlay, encoding } = job;
  const duration = job.durationSeconds.toFixed(3);

  const inputs = ['-t', duration, '-i', source.info.path];
  let inputCount = 1;

  const overlayIndex = overlay ? inputCount++ : -1;
  if (overlay) inputs.push('-loop', '1', '-i', overlay.imagePath);

  const audioMap = source.info.hasAudio ? '0:a:0' : `${inputCount++}:a:0`;
  if (!source.info.hasAudio) {
    inputs.push('-f', 'lavfi', '-t', duration, '-i', silence(encoding.audioSampleRate));
  }

  const base = [
    ...(sameDimensions(frame, source.info) ? [] : [`crop=${frame.width}:${frame.height}:0:0`]),
    `fps=${encoding.fps}`,
    'setsar=1',
  ].join(',');

  const graph = overlay
    ? `[0:v]${base}[base];` +
      `[${overlayIndex}:v]scale=${overlay.width}:${overlay.height}[ovl];` +
      `[base][ovl]overlay=${overlay.x}:${overlay.y}:shortest=1[vout]`
    : `[0:v]${base}[vout]`;

  return [
    ...inputs,
    '-filter_complex', graph,
    '-map', '[vout]',
    '-map', audioMap,
    '-t', duration,
    ...encodeArgs(encoding),
    outFile,
  ];
}

/**
 * Concatenate lead then tail with no transition. The lead is filled and
 * center-cropped to the output frame when a transform is planned, and an
 * odd-sized tail loses its last row or column. Both
 * segments are brought to the same frame rate and audio layout first.
 */
export function buildPairArgs(job: PairRenderJob, outFile: string): string[] {
  const { lead, tail, frame, leadTransform, encoding } = job;

  const inputs = ['-i', lead.info.path, '-i', tail.info.path];
  let inputCount = 2;

  const audioLabel = (source: MediaSource, index: number): string => {
    if (source.info.hasAudio) return `${index}:a:0`;
    inputs.push('-f', 'lavfi', '-t', source.info.durationSeconds.toFixed(3), '-i', silence(encoding.audioSampleRate));
    return `${inputCount++}:a:0`;
  };
  const leadAudio = audioLabel(lead, 0);
  const tailAudio = audioLabel(tail, 1);

  const normalize = `fps=${encoding.fps},setsar=1`;
  const leadVideo = leadTransform
    ? `scale=${leadTransform.scaledWidth}:${leadTransform.scaledHeight},` +
      `crop=${leadTransform.width}:${leadTransform.height}:${leadTransform.cropX}:${leadTransform.cropY},` +
      normalize
    : normalize;
  const tailVideo = sameDimensions(frame, tail.info)
    ? normalize
    : `crop=${frame.width}:${frame.height}:0:0,${normalize}`;
  const audioFormat = `aformat=sample_rates=${encoding.audioSampleRate}:channel_layouts=stereo`;

  const graph = [
    `[0:v]${leadVideo}[v0]`,
    `[1:v]${tailVideo}[v1]`,
    `[${leadAudio}]${audioFormat}[a0]`,
    `[${tailAudio}]${audioFormat}[a1]`,
    '[v0][a0][v1][a1]concat=n=2:v=1:a=1[vout][aout]',
  ].join(';');

  return [
    ...inputs,
    '-filter_complex', graph,
    '-map', '[vout]',
    '-map', '[aout]',
    ...encodeArgs(encoding),
    outFile,
  ];
}

// ── Renders ────────────────────────────────────────────────────────────────────

function renderAtomically(outputPath: string, label: string, build: (outFile: string) => string[]): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  const partial = `${outputPath}.partial`;
  try {
    runFfmpeg(build(partial), label);
    fs.renameSync(partial, outputPath);
  } finally {
    fs.rmSync(partial, { force: true });
  }
}

export async function renderClip(job: ClipRenderJob): Promise<void> {
  logger.info('FFmpeg: rendering clip', {
    source: job.source.info.path,
    durationSeconds: job.durationSeconds,
    overlay: job.overlay?.imagePath ?? null,
    outputPath: job.outputPath,
  });
  renderAtomically(job.outputPath, 'renderClip', (outFile) => buildClipArgs(job, outFile));
}

export async function renderPair(job: PairRenderJob): Promise<void> {
  logger.info('FFmpeg: rendering pair', {
    lead: job.lead.info.path,
    tail: job.tail.info.path,
    reconciled: job.leadTransform !== null,
    outputPath: job.outputPath,
  });
  renderAtomically(job.outputPath, 'renderPair', (outFile) => buildPairArgs(job, outFile));
}

export const ffmpegBackend: MediaBackend = {
  open: openSource,
  probeImage,
  renderClip,
  renderPair,
};
