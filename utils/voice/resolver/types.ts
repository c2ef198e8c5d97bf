import type { SourceType } from '../../../types/voice';
import type { UrlType } from '../../sourceType';

export interface MediaMetadata {
  /** Canonical page URL of the item */
  sourceUrl: string;
  title?: string | null;
  thumbnailUrl?: string | null;
  /** Seconds */
  duration?: number | null;
  sourceType?: SourceType;
}

export interface ExtractionResult {
  metadata: MediaMetadata;
  /** What the voice transport should stream */
  playableUri: string;
}

/**
 * One playlist member, resolved later on its own. `input` is a URL or, for
 * Spotify collections, an "Artist - Name" search query.
 */
export interface PlaylistEntry {
  input: string;
  title?: string;
}

export interface ExtractOptions {
  signal: AbortSignal;
  urlType: UrlType;
}

export interface ListPlaylistOptions extends ExtractOptions {
  limit: number;
}

/**
 * Media extraction service. Implementations throw ResolutionError for the
 * failures they recognize; anything else is treated as internal.
 */
export interface ExtractionBackend {
  extract(url: string, options: ExtractOptions): Promise<ExtractionResult>;
  search(query: string, options: { signal: AbortSignal }): Promise<ExtractionResult>;
  listPlaylist(url: string, options: ListPlaylistOptions): Promise<PlaylistEntry[]>;
}
