jest.mock('../../../logger', () => ({
  createLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    http: jest.fn(),
  }),
}));

const mockPlay = {
  search: jest.fn(),
  video_basic_info: jest.fn(),
  playlist_info: jest.fn(),
  spotify: jest.fn(),
  is_expired: jest.fn(() => false),
  refreshToken: jest.fn(),
  setToken: jest.fn(),
};

jest.mock('play-dl', () => ({
  __esModule: true,
  default: mockPlay,
}));

import { InputError, ResolutionError } from '../../../errors';
import { PlayDlBackend, buildSpotifyQuery, classifyExtractionError } from '../PlayDlBackend';

const VIDEO_URL = 'https://www.youtube.com/watch?v=abcdefghijk';

function video(overrides: Record<string, unknown> = {}) {
  return {
    url: VIDEO_URL,
    title: 'Test Video',
    durationInSec: 200,
    thumbnails: [{ url: 'https://i.ytimg.test/thumb.jpg' }],
    ...overrides,
  };
}

describe('classifyExtractionError', () => {
  it.each([
    ['Got 429 from server', 'RateLimited'],
    ['Too Many Requests', 'RateLimited'],
    ['connect ETIMEDOUT 10.0.0.1:443', 'Timeout'],
    ['socket hang up', 'Timeout'],
    ['This video is not available in your country', 'RegionBlocked'],
    ['Sign in to confirm your age', 'AuthRequired'],
    ['This is a private video', 'AuthRequired'],
    ['Video unavailable', 'NotFound'],
    ['Request failed with status 404', 'NotFound'],
  ])('%s -> %s', (message, kind) => {
    expect(classifyExtractionError(new Error(message))).toBe(kind);
  });

  it('returns null for unrecognized messages', () => {
    expect(classifyExtractionError(new Error('Unexpected token < in JSON'))).toBeNull();
  });
});

describe('buildSpotifyQuery', () => {
  it('joins artists before the track name', () => {
    expect(buildSpotifyQuery({ name: 'Song', artists: [{ name: 'A' }, { name: 'B' }] })).toBe(
      'A, B - Song'
    );
  });

  it('uses the bare name without artists', () => {
    expect(buildSpotifyQuery({ name: 'Song', artists: [] })).toBe('Song');
    expect(buildSpotifyQuery({ name: 'Song' })).toBe('Song');
  });
});

describe('PlayDlBackend', () => {
  const signal = new AbortController().signal;

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('returns the first search hit with a canonical URL', async () => {
    mockPlay.search.mockResolvedValue([
      video({ url: 'https://youtu.be/abcdefghijk', title: 'Hit' }),
    ]);

    const result = await new PlayDlBackend().search('hit song', { signal });

    expect(mockPlay.search).toHaveBeenCalledWith('hit song', {
      limit: 1,
      source: { youtube: 'video' },
    });
    expect(result).toEqual({
      metadata: {
        sourceUrl: VIDEO_URL,
        title: 'Hit',
        duration: 200,
        thumbnailUrl: null,
        sourceType: 'youtube',
      },
      playableUri: VIDEO_URL,
    });
  });

  it('reports NotFound for an empty search', async () => {
    mockPlay.search.mockResolvedValue([]);

    await expect(new PlayDlBackend().search('nothing', { signal })).rejects.toMatchObject({
      kind: 'NotFound',
      message: 'No results found for: nothing',
    });
  });

  it('extracts YouTube videos from their canonical URL', async () => {
    mockPlay.video_basic_info.mockResolvedValue({ video_details: video() });

    const result = await new PlayDlBackend().extract('https://youtu.be/abcdefghijk', {
      signal,
      urlType: 'yt_video',
    });

    expect(mockPlay.video_basic_info).toHaveBeenCalledWith(VIDEO_URL);
    expect(result.metadata.title).toBe('Test Video');
    expect(result.playableUri).toBe(VIDEO_URL);
  });

  it('takes direct media titles from the URL path', async () => {
    const result = await new PlayDlBackend().extract('https://media.test/music/my%20song.mp3', {
      signal,
      urlType: 'generic',
    });

    expect(result).toEqual({
      metadata: {
        sourceUrl: 'https://media.test/music/my%20song.mp3',
        title: 'my song.mp3',
        sourceType: 'other',
      },
      playableUri: 'https://media.test/music/my%20song.mp3',
    });
  });

  it('requires Spotify credentials', async () => {
    await expect(
      new PlayDlBackend().extract('https://open.spotify.com/track/abc', {
        signal,
        urlType: 'sp_track',
      })
    ).rejects.toMatchObject({ kind: 'AuthRequired', message: 'Spotify support is not configured' });
    expect(mockPlay.spotify).not.toHaveBeenCalled();
  });

  it('matches Spotify tracks on YouTube', async () => {
    mockPlay.spotify.mockResolvedValue({
      type: 'track',
      name: 'Song',
      url: 'https://open.spotify.com/track/abc',
      artists: [{ name: 'Artist' }],
      durationInSec: 180,
      thumbnail: { url: 'https://i.scdn.test/cover.jpg' },
    });
    mockPlay.search.mockResolvedValue([video()]);
    const backend = new PlayDlBackend({
      spotify: {
        clientId: 'test-client',
        clientSecret: 'test-secret',
        refreshToken: 'test-refresh',
        market: 'US',
      },
    });

    const result = await backend.extract('https://open.spotify.com/track/abc', {
      signal,
      urlType: 'sp_track',
    });

    expect(mockPlay.search).toHaveBeenCalledWith('Artist - Song', {
      limit: 1,
      source: { youtube: 'video' },
    });
    expect(result).toEqual({
      metadata: {
        sourceUrl: 'https://open.spotify.com/track/abc',
        title: 'Song - Artist',
        duration: 180,
        thumbnailUrl: 'https://i.scdn.test/cover.jpg',
        sourceType: 'spotify',
      },
      playableUri: VIDEO_URL,
    });
  });

  it('rejects playlist types for single extraction', async () => {
    await expect(
      new PlayDlBackend().extract('https://www.youtube.com/playlist?list=PL1', {
        signal,
        urlType: 'yt_playlist',
      })
    ).rejects.toBeInstanceOf(InputError);
  });

  it('classifies recognizable play-dl failures', async () => {
    const cause = new Error('Too Many Requests');
    mockPlay.search.mockRejectedValue(cause);

    const error = await new PlayDlBackend()
      .search('x', { signal })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResolutionError);
    expect(error).toMatchObject({ kind: 'RateLimited', message: 'Too Many Requests', cause });
  });

  it('passes unrecognized failures through', async () => {
    const cause = new Error('Unexpected token < in JSON');
    mockPlay.search.mockRejectedValue(cause);

    await expect(new PlayDlBackend().search('x', { signal })).rejects.toBe(cause);
  });

  it('lists YouTube playlists up to the limit', async () => {
    const all_videos = jest.fn(async () => [
      video({ url: 'https://www.youtube.com/watch?v=aaaaaaaaaaa', title: 'A' }),
      video({ url: 'https://www.youtube.com/watch?v=bbbbbbbbbbb', title: 'B' }),
    ]);
    mockPlay.playlist_info.mockResolvedValue({ all_videos });

    const entries = await new PlayDlBackend().listPlaylist(
      'https://www.youtube.com/playlist?list=PL1',
      { signal, urlType: 'yt_playlist', limit: 1 }
    );

    expect(mockPlay.playlist_info).toHaveBeenCalledWith('https://www.youtube.com/playlist?list=PL1', {
      incomplete: true,
    });
    expect(entries).toEqual([{ input: 'https://www.youtube.com/watch?v=aaaaaaaaaaa', title: 'A' }]);
  });
});
