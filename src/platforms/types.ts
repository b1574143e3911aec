/**
 * Upstream contract: whatever lists a profile's videos and
 * fetches them. The pipeline only ever sees these shapes.
 */

export interface ProfileLocator {
  /** Normalized profile URL handed to the extractor */
  url: string;
  /** Account handle or short-link code taken from the URL */
  handle: string;
}

export interface RemoteEntry {
  id: string;
  url: string;
  title: string;
  durationSeconds?: number;
  /** Fetch the media to exactly `destination`; resolves to that path. */
  download(destination: string): Promise<string>;
}

export interface SourceProvider {
  readonly name: string;
  /**
   * Entries most recent first, at most `limit` of them. Unavailable entries
   * come through as null so callers can count and skip them.
   */
  listEntries(profile: ProfileLocator, limit: number): AsyncIterable<RemoteEntry | null>;
}
