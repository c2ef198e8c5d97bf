/**
 * play-dl extraction backend: YouTube, Spotify (matched to YouTube by
 * search), SoundCloud and direct media URLs.
 */
import play from 'play-dl';
import type { SoundCloudTrack, SpotifyTrack, YouTubeVideo } from 'play-dl';
import type { SourceType } from '../../../types/voice';
import { createLogger } from '../../logger';
import { throwIfAborted } from '../../async';
import {
  InputError,
  ResolutionError,
  TunedeckError,
  getErrorMessage,
  type ResolutionErrorKind,
} from '../../errors';
import { extractYouTubeVideoId, toCanonicalYouTubeUrl } from '../../youtubeUrl';
import type {
  ExtractOptions,
  ExtractionBackend,
  ExtractionResult,
  ListPlaylistOptions,
  PlaylistEntry,
} from './types';

const log = createLogger('PLAYDL');

type SpotifyData = Awaited<ReturnType<typeof play.spotify>>;
type SoundCloudData = Awaited<ReturnType<typeof play.soundcloud>>;

function isSpotifyTrack(info: SpotifyData): info is SpotifyTrack {
  return info.type === 'track';
}

function isSoundCloudTrack(info: SoundCloudData): info is SoundCloudTrack {
  return info.type === 'track';
}

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  market: string;
}

export interface PlayDlBackendOptions {
  youtubeCookie?: string;
  spotify?: SpotifyCredentials;
}

const ERROR_PATTERNS: [RegExp, ResolutionErrorKind][] = [
  [/\b429\b|too many requests|rate.?limit/i, 'RateLimited'],
  [/timed? ?out|ETIMEDOUT|ECONNRESET|socket hang up/i, 'Timeout'],
  [/not available in your country|region|geo.?restrict/i, 'RegionBlocked'],
  [
    /sign in|confirm your age|age.?restricted|private video|members.?only|login|cookie/i,
    'AuthRequired',
  ],
  [/\b404\b|not found|unavailable|no results|does not exist|removed|invalid url/i, 'NotFound'],
];

/**
 * Map a play-dl failure message onto a resolution error kind; null when the
 * message matches nothing known.
 */
export function classifyExtractionError(err: unknown): ResolutionErrorKind | null {
  const message = getErrorMessage(err);
  for (const [pattern, kind] of ERROR_PATTERNS) {
    if (pattern.test(message)) return kind;
  }
  return null;
}

/**
 * "Artist1, Artist2 - Name": the query a Spotify track is matched by on YouTube
 */
export function buildSpotifyQuery(track: { name: string; artists?: { name: string }[] }): string {
  const artistNames = track.artists
    ?.map((artist) => artist.name)
    .filter(Boolean)
    .join(', ');
  return artistNames ? `${artistNames} - ${track.name}` : track.name;
}

function buildSpotifyTitle(track: { name: string; artists?: { name: string }[] }): string {
  const artistNames = track.artists
    ?.map((artist) => artist.name)
    .filter(Boolean)
    .join(', ');
  return artistNames ? `${track.name} - ${artistNames}` : track.name;
}

function titleFromUrl(url: string): string | null {
  try {
    const segment = new URL(url).pathname.split('/').filter(Boolean).pop();
    return segment ? decodeURIComponent(segment) : null;
  } catch {
    return null;
  }
}

export class PlayDlBackend implements ExtractionBackend {
  private readonly spotify: SpotifyCredentials | undefined;
  private readonly youtubeCookie: string | undefined;
  private soundcloudReady: Promise<void> | null = null;

  constructor(options: PlayDlBackendOptions = {}) {
    this.spotify = options.spotify;
    this.youtubeCookie = options.youtubeCookie;
  }

  /**
   * Hand credentials to play-dl. Call once before the first extraction.
   */
  async init(): Promise<void> {
    if (this.youtubeCookie) {
      await play.setToken({ youtube: { cookie: this.youtubeCookie } });
      log.info('YouTube cookie configured');
    }
    if (this.spotify) {
      await play.setToken({
        spotify: {
          client_id: this.spotify.clientId,
          client_secret: this.spotify.clientSecret,
          refresh_token: this.spotify.refreshToken,
          market: this.spotify.market,
        },
      });
      log.info('Spotify credentials configured');
    } else {
      log.info('Spotify credentials not set; Spotify links will be rejected');
    }
  }

  async extract(url: string, { signal, urlType }: ExtractOptions): Promise<ExtractionResult> {
    return this.classified(async () => {
      switch (urlType) {
        case 'yt_video':
          return this.extractYouTube(url);
        case 'sp_track':
          return this.extractSpotify(url, signal);
        case 'so_track':
          return this.extractSoundCloud(url);
        case 'generic':
          return this.extractDirect(url);
        default:
          throw new InputError('Playlist URLs cannot be extracted as a single track', { url });
      }
    });
  }

  async search(query: string, { signal }: { signal: AbortSignal }): Promise<ExtractionResult> {
    return this.classified(async () => {
      throwIfAborted(signal);
      const results = await play.search(query, { limit: 1, source: { youtube: 'video' } });
      const video = results[0];
      if (!video) {
        throw new ResolutionError('NotFound', `No results found for: ${query}`);
      }
      return this.fromYouTubeVideo(video);
    });
  }

  async listPlaylist(
    url: string,
    { signal, urlType, limit }: ListPlaylistOptions
  ): Promise<PlaylistEntry[]> {
    return this.classified(async () => {
      switch (urlType) {
        case 'yt_playlist': {
          const playlist = await play.playlist_info(url, { incomplete: true });
          throwIfAborted(signal);
          const videos = await playlist.all_videos();
          return videos.slice(0, limit).map((video) => ({
            input: video.url,
            title: video.title,
          }));
        }
        case 'sp_playlist':
        case 'sp_album': {
          await this.ensureSpotify();
          const info = await play.spotify(url);
          throwIfAborted(signal);
          if (isSpotifyTrack(info)) {
            return [{ input: buildSpotifyQuery(info), title: buildSpotifyTitle(info) }];
          }
          const tracks = await info.all_tracks();
          // Same artist/title twice in one collection resolves to the same video
          const seen = new Set<string>();
          const entries: PlaylistEntry[] = [];
          for (const track of tracks) {
            const query = buildSpotifyQuery(track);
            if (seen.has(query)) continue;
            seen.add(query);
            entries.push({ input: query, title: buildSpotifyTitle(track) });
            if (entries.length >= limit) break;
          }
          return entries;
        }
        case 'so_playlist': {
          await this.ensureSoundCloud();
          const info = await play.soundcloud(url);
          throwIfAborted(signal);
          if (isSoundCloudTrack(info)) {
            return [{ input: info.permalink || info.url, title: info.name }];
          }
          const tracks = await info.all_tracks();
          return tracks.slice(0, limit).map((track) => ({
            input: track.permalink || track.url,
            title: track.name,
          }));
        }
        default:
          throw new InputError('Not a playlist URL', { url });
      }
    });
  }

  private async extractYouTube(url: string): Promise<ExtractionResult> {
    const canonical = toCanonicalYouTubeUrl(url) ?? url;
    const info = await play.video_basic_info(canonical);
    return this.fromYouTubeVideo(info.video_details);
  }

  private fromYouTubeVideo(video: YouTubeVideo): ExtractionResult {
    const sourceUrl = toCanonicalYouTubeUrl(video.url) ?? video.url;
    return {
      metadata: {
        sourceUrl,
        title: video.title ?? null,
        duration: video.durationInSec,
        // createTrack derives hqdefault from the video id
        thumbnailUrl: extractYouTubeVideoId(sourceUrl)
          ? null
          : (video.thumbnails[0]?.url ?? null),
        sourceType: 'youtube',
      },
      playableUri: sourceUrl,
    };
  }

  private async extractSpotify(url: string, signal: AbortSignal): Promise<ExtractionResult> {
    await this.ensureSpotify();
    const info = await play.spotify(url);
    if (!isSpotifyTrack(info)) {
      throw new InputError('Spotify collections must be resolved as playlists', { url });
    }
    throwIfAborted(signal);

    const query = buildSpotifyQuery(info);
    const results = await play.search(query, { limit: 1, source: { youtube: 'video' } });
    const match = results[0];
    if (!match) {
      throw new ResolutionError('NotFound', `No YouTube match for Spotify track: ${query}`);
    }
    log.debug(`Spotify "${query}" matched ${match.url}`);

    return {
      metadata: {
        sourceUrl: info.url,
        title: buildSpotifyTitle(info),
        duration: info.durationInSec,
        thumbnailUrl: info.thumbnail?.url ?? null,
        sourceType: 'spotify',
      },
      playableUri: toCanonicalYouTubeUrl(match.url) ?? match.url,
    };
  }

  private async extractSoundCloud(url: string): Promise<ExtractionResult> {
    await this.ensureSoundCloud();
    const info = await play.soundcloud(url);
    if (!isSoundCloudTrack(info)) {
      throw new InputError('SoundCloud sets must be resolved as playlists', { url });
    }
    return {
      metadata: {
        sourceUrl: info.permalink || info.url,
        title: info.name,
        duration: info.durationInSec,
        thumbnailUrl: info.thumbnail || null,
        sourceType: 'soundcloud',
      },
      playableUri: info.url,
    };
  }

  private async extractDirect(url: string): Promise<ExtractionResult> {
    const sourceType: SourceType = 'other';
    return {
      metadata: { sourceUrl: url, title: titleFromUrl(url), sourceType },
      playableUri: url,
    };
  }

  private async ensureSpotify(): Promise<void> {
    if (!this.spotify) {
      throw new ResolutionError('AuthRequired', 'Spotify support is not configured');
    }
    if (play.is_expired()) {
      await play.refreshToken();
    }
  }

  private ensureSoundCloud(): Promise<void> {
    if (!this.soundcloudReady) {
      this.soundcloudReady = play
        .getFreeClientID()
        .then((clientId) => play.setToken({ soundcloud: { client_id: clientId } }))
        .catch((err: unknown) => {
          this.soundcloudReady = null;
          throw err;
        });
    }
    return this.soundcloudReady;
  }

  /**
   * Run a play-dl call and translate recognizable failures into
   * ResolutionError kinds. Unrecognized errors pass through untouched.
   */
  private async classified<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof TunedeckError) throw err;
      const kind = classifyExtractionError(err);
      if (kind) {
        throw new ResolutionError(kind, getErrorMessage(err), { cause: err });
      }
      throw err;
    }
  }
}
