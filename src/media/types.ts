/**
 * The decoder/encoder contract the pipeline drives.
 *
 * Every decoded file is reached through a `MediaSource` handle obtained from
 * `open()` and released with `close()`. Stages acquire handles through
 * `withSource()` so release happens on every exit path.
 */
import type { EncodingProfile } from '../config.js';

export interface Dimensions {
  width: number;
  height: number;
}

export interface StreamInfo extends Dimensions {
  path: string;
  durationSeconds: number;
  frameRate: number;
  hasAudio: boolean;
}

/** Read-only snapshot of a file; a new asset is derived rather than mutating one. */
export interface VideoAsset extends StreamInfo {
  decodable: boolean;
}

export interface MediaSource {
  readonly info: StreamInfo;
  /** Decode one video frame at `timeSeconds` and return it as encoded image bytes. */
  readFrameAt(timeSeconds: number): Promise<Buffer>;
  close(): Promise<void>;
}

export interface OverlayPlacement extends Dimensions {
  imagePath: string;
  x: number;
  y: number;
}

/** Resize by a fill factor, then center-crop to exactly `width` × `height`. */
export interface FillCropPlan extends Dimensions {
  scaledWidth: number;
  scaledHeight: number;
  cropX: number;
  cropY: number;
}

export interface ClipRenderJob {
  source: MediaSource;
  outputPath: string;
  durationSeconds: number;
  /** Output frame; may be the source frame trimmed to even dimensions */
  frame: Dimensions;
  overlay: OverlayPlacement | null;
  encoding: EncodingProfile;
}

export interface PairRenderJob {
  lead: MediaSource;
  tail: MediaSource;
  /** Output size: the tail's size trimmed to even */
  frame: Dimensions;
  /** null when the lead already matches the output frame */
  leadTransform: FillCropPlan | null;
  outputPath: string;
  encoding: EncodingProfile;
}

export interface MediaBackend {
  open(path: string): Promise<MediaSource>;
  probeImage(path: string): Promise<Dimensions>;
  renderClip(job: ClipRenderJob): Promise<void>;
  renderPair(job: PairRenderJob): Promise<void>;
}
