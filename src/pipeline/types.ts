import type { ProfileLocator } from '../platforms/types.js';
import type { PipelineError } from '../utils/errors.js';

export interface SourceItem {
  id: string;
  remoteUrl: string;
  title: string;
  localPath: string;
  /** Per-batch download counter, starting at 1 */
  ordinal: number;
}

export interface ProcessedClip {
  sourceOrdinal: number;
  path: string;
  durationSeconds: number;
  width: number;
  height: number;
}

export interface VideoPair {
  ordinal: number;
  path: string;
  durationSeconds: number;
}

export type PipelineStage = 'acquire' | 'process' | 'compose';

export interface ItemFailure {
  stage: PipelineStage;
  subject: string;
  error: PipelineError;
}

export interface RunReport {
  profile: ProfileLocator;
  requested: number;
  discovered: number;
  downloaded: number;
  processed: number;
  pairs: VideoPair[];
  failures: ItemFailure[];
}
