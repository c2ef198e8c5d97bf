/**
 * Input classification shared by the resolver and the dashboard API
 */
import type { SourceType } from '../types/voice';
import { InputError } from './errors';

export type UrlType =
  | 'yt_video'
  | 'yt_playlist'
  | 'sp_track'
  | 'sp_playlist'
  | 'sp_album'
  | 'so_track'
  | 'so_playlist'
  | 'generic';

export type ClassifiedInput =
  | { kind: 'url'; url: string; urlType: UrlType }
  | { kind: 'search'; query: string };

const SPOTIFY_URI_PATTERN = /^spotify:(track|playlist|album):([a-zA-Z0-9]+)$/;
const SPOTIFY_PATH_PATTERN = /\/(track|playlist|album)\/[a-zA-Z0-9]+/;
const BARE_YOUTUBE_PREFIXES = ['youtu.be/', 'youtube.com/', 'www.youtube.com/', 'm.youtube.com/'];

function hostOf(url: URL): string {
  return url.hostname.toLowerCase().replace(/^www\./, '');
}

/**
 * Detect the source type of a URL from its host
 */
export function detectSourceType(url: string | null | undefined): SourceType {
  if (!url) return 'other';

  const lower = url.toLowerCase();
  if (lower.includes('youtube.com') || lower.includes('youtu.be')) return 'youtube';
  if (lower.includes('spotify.com') || lower.startsWith('spotify:')) return 'spotify';
  if (lower.includes('soundcloud.com')) return 'soundcloud';

  return 'other';
}

/**
 * Route a parsed URL to the extraction strategy it needs. Any YouTube URL
 * carrying `list=` is treated as a playlist, including watch URLs.
 */
export function detectUrlType(url: string): UrlType {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return 'generic';
  }
  const host = hostOf(parsed);

  if (host === 'youtu.be' || host === 'youtube.com' || host.endsWith('.youtube.com')) {
    return parsed.searchParams.has('list') ? 'yt_playlist' : 'yt_video';
  }

  if (host === 'open.spotify.com' || host === 'play.spotify.com') {
    const match = parsed.pathname.match(SPOTIFY_PATH_PATTERN);
    switch (match?.[1]) {
      case 'track':
        return 'sp_track';
      case 'playlist':
        return 'sp_playlist';
      case 'album':
        return 'sp_album';
      default:
        return 'generic';
    }
  }

  if (host === 'soundcloud.com' || host === 'm.soundcloud.com') {
    return parsed.pathname.includes('/sets/') ? 'so_playlist' : 'so_track';
  }

  return 'generic';
}

export function isPlaylistUrlType(urlType: UrlType): boolean {
  return (
    urlType === 'yt_playlist' ||
    urlType === 'sp_playlist' ||
    urlType === 'sp_album' ||
    urlType === 'so_playlist'
  );
}

/**
 * Classify raw user input as a URL or a search query.
 *
 * `spotify:` URIs become open.spotify.com URLs and scheme-less YouTube links
 * get `https://`. Text with an http(s) scheme that does not parse is rejected.
 */
export function classifyInput(input: string): ClassifiedInput {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InputError('Input must not be empty');
  }

  const spotifyUri = trimmed.match(SPOTIFY_URI_PATTERN);
  if (spotifyUri) {
    const url = `https://open.spotify.com/${spotifyUri[1]}/${spotifyUri[2]}`;
    return { kind: 'url', url, urlType: detectUrlType(url) };
  }

  let candidate = trimmed;
  if (BARE_YOUTUBE_PREFIXES.some((prefix) => trimmed.toLowerCase().startsWith(prefix))) {
    candidate = `https://${trimmed}`;
  }

  if (/^https?:\/\//i.test(candidate)) {
    let parsed: URL;
    try {
      parsed = new URL(candidate);
    } catch {
      throw new InputError(`Malformed URL: ${trimmed}`);
    }
    if (!parsed.hostname) {
      throw new InputError(`Malformed URL: ${trimmed}`);
    }
    const url = parsed.toString();
    return { kind: 'url', url, urlType: detectUrlType(url) };
  }

  return { kind: 'search', query: trimmed };
}
