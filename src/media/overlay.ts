/**
 * Overlay resolution and placement. Finds the run's single overlay image,
 * fits it inside the clip frame and centers it. Also renders the example
 * caption card used to seed an empty overlay folder.
 */
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { IMAGE_EXTENSIONS } from '../config.js';
import { logger } from '../utils/logger.js';
import { findFirstMatching } from '../utils/folders.js';
import { centerOffset, fitWithin } from './geometry.js';
import { runFfmpeg } from './ffmpeg.js';
import type { Dimensions, OverlayPlacement } from './types.js';

export interface OverlaySpec {
  imagePath: string;
  placement: 'center';
  scalePolicy: 'fit-within';
}

export function resolveOverlay(overlayDir: string): OverlaySpec | null {
  const imagePath = findFirstMatching(overlayDir, IMAGE_EXTENSIONS);
  if (!imagePath) return null;
  return { imagePath, placement: 'center', scalePolicy: 'fit-within' };
}

/** Size and offset for `image` inside `frame`: shrunk to fit when too large, always centered. */
export function planOverlay(spec: OverlaySpec, image: Dimensions, frame: Dimensions): OverlayPlacement {
  const size = fitWithin(image, frame);
  const { x, y } = centerOffset(size, frame);
  return { imagePath: spec.imagePath, width: size.width, height: size.height, x, y };
}

// ── Example caption card ───────────────────────────────────────────────────────

export interface CaptionCardOptions {
  width?: number;
  height?: number;
  fontSize?: number;
  /** TrueType font file; ffmpeg's fontconfig default is used when absent */
  fontFile?: string;
}

const DEFAULT_FONT = '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf';

/** The caption is read from `textFile` so it needs no filtergraph escaping. */
export function buildCaptionCardArgs(textFile: string, outputPath: string, options: CaptionCardOptions = {}): string[] {
  const { width = 400, height = 100, fontSize = 36, fontFile } = options;
  const font = fontFile ? `fontfile=${fontFile}:` : '';
  const drawtext =
    `drawtext=${font}textfile=${textFile}:fontsize=${fontSize}:fontcolor=white:` +
    `borderw=2:bordercolor=black:box=1:boxcolor=black@0.5:boxborderw=10:` +
    `x=(w-text_w)/2:y=(h-text_h)/2`;

  return [
    '-f', 'lavfi',
    '-i', `color=c=black@0.0:s=${width}x${height}:d=1,format=rgba`,
    '-vf', drawtext,
    '-frames:v', '1',
    outputPath,
  ];
}

/** Render a translucent caption PNG for use as an overlay. */
export async function renderCaptionCard(
  text: string,
  outputPath: string,
  options: CaptionCardOptions = {},
): Promise<string> {
  const fontFile = options.fontFile ?? (fs.existsSync(DEFAULT_FONT) ? DEFAULT_FONT : undefined);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  logger.info('Overlay: rendering caption card', { text, outputPath });

  const workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'clipsplice-caption-'));
  const textFile = path.join(workDir, 'caption.txt');
  try {
    fs.writeFileSync(textFile, text, 'utf-8');
    runFfmpeg(buildCaptionCardArgs(textFile, outputPath, { ...options, fontFile }), 'renderCaptionCard');
  } finally {
    fs.rmSync(workDir, { recursive: true, force: true });
  }
  return outputPath;
}
