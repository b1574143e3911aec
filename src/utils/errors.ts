/**
 * Per-item error taxonomy and the result values stages hand back to the
 * batch driver. Stages never throw across an item boundary; they return
 * `Result` and the driver decides whether to continue or abort.
 */

export type FailureKind =
  | 'FetchFailure'
  | 'InvalidAsset'
  | 'CompositingFailure'
  | 'EncodingFailure';

export class PipelineError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
    /** File path, ordinal or remote id identifying the dropped item */
    public readonly subject: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = kind;
  }
}

export type Result<T, E = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const fail = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Batch-level failures ──────────────────────────────────────────────────────

export type BatchFailureCode =
  | 'NO_PAYLOAD'
  | 'INVALID_PAYLOAD'
  | 'LISTING_FAILED'
  | 'NO_ENTRIES'
  | 'NO_DOWNLOADS'
  | 'NO_PROCESSED'
  | 'NO_PAIRS';

export interface BatchFailure {
  code: BatchFailureCode;
  message: string;
  remediation: string[];
}

export const BatchFailures = {
  noPayload: (inputDir: string, extensions: readonly string[]): BatchFailure => ({
    code: 'NO_PAYLOAD',
    message: `No input video found in "${inputDir}"`,
    remediation: [
      `Put the video to append after every clip in "${inputDir}"`,
      `Supported formats: ${extensions.join(', ')}`,
      'Rename the file if its extension is missing or unusual',
    ],
  }),

  invalidPayload: (file: string): BatchFailure => ({
    code: 'INVALID_PAYLOAD',
    message: `Input video "${file}" is corrupted or unreadable`,
    remediation: [
      'Re-copy or re-download the file; it may be only partially written',
      'Convert the video to MP4 (H.264/AAC)',
      'Make sure the video is not DRM-protected',
    ],
  }),

  listingFailed: (profile: string, cause: string): BatchFailure => ({
    code: 'LISTING_FAILED',
    message: `Could not list videos for ${profile}: ${cause}`,
    remediation: [
      'Check that yt-dlp is installed and up to date, or set YTDLP_PATH',
      'Check your network connection; if the platform is rate limiting, retry later',
      'Raise FETCH_TIMEOUT_MS for slow connections',
    ],
  }),

  noEntries: (profile: string): BatchFailure => ({
    code: 'NO_ENTRIES',
    message: `No videos found for profile ${profile}`,
    remediation: [
      'Check that the profile exists and is public',
      'Run `npm run list-profile -- <url>` to inspect what the extractor sees',
      'Update yt-dlp; platform extractors change often',
    ],
  }),

  noDownloads: (profile: string): BatchFailure => ({
    code: 'NO_DOWNLOADS',
    message: `No videos downloaded from ${profile}`,
    remediation: [
      'Check your network connection and retry',
      'Raise FETCH_TIMEOUT_MS or FETCH_ATTEMPTS for slow connections',
      'Update yt-dlp; platform extractors change often',
    ],
  }),

  noProcessed: (): BatchFailure => ({
    code: 'NO_PROCESSED',
    message: 'None of the downloaded videos could be processed',
    remediation: [
      'Run with LOG_LEVEL=debug to see the ffmpeg error for each clip',
      'Check that the overlay image is a valid PNG/JPEG',
    ],
  }),

  noPairs: (): BatchFailure => ({
    code: 'NO_PAIRS',
    message: 'Failed to create any video pairs',
    remediation: [
      'Run with LOG_LEVEL=debug to see the ffmpeg error for each pair',
      'Check that the output folder is writable and the disk is not full',
    ],
  }),
};
