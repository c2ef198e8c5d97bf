/**
 * YouTube URL helpers used when normalizing resolved tracks.
 */

const VIDEO_ID_PATTERN = /^[a-zA-Z0-9_-]{11}$/;
const PATH_ID_PATTERN = /^\/(?:v|embed|shorts|live)\/([a-zA-Z0-9_-]{11})/;

function isYouTubeHost(hostname: string): boolean {
  return hostname === 'youtube.com' || hostname.endsWith('.youtube.com');
}

/**
 * Extract the 11-character video id from watch, youtu.be, shorts, embed and
 * legacy /v/ URLs. Returns null for anything else (including playlist pages).
 */
export function extractYouTubeVideoId(url: string | null | undefined): string | null {
  if (!url) return null;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  const hostname = parsed.hostname.toLowerCase();

  if (hostname === 'youtu.be') {
    const id = parsed.pathname.slice(1).split('/')[0] ?? '';
    return VIDEO_ID_PATTERN.test(id) ? id : null;
  }

  if (!isYouTubeHost(hostname)) return null;

  if (parsed.pathname === '/watch') {
    const id = parsed.searchParams.get('v');
    return id && VIDEO_ID_PATTERN.test(id) ? id : null;
  }

  const match = parsed.pathname.match(PATH_ID_PATTERN);
  return match?.[1] ?? null;
}

/**
 * Playlist id from any YouTube URL carrying `list=`
 */
export function extractYouTubePlaylistId(url: string): string | null {
  try {
    const parsed = new URL(url);
    if (!isYouTubeHost(parsed.hostname.toLowerCase())) return null;
    return parsed.searchParams.get('list') || null;
  } catch {
    return null;
  }
}

/**
 * https://www.youtube.com/watch?v=ID for a video URL or raw id; null otherwise
 */
export function toCanonicalYouTubeUrl(urlOrId: string | null | undefined): string | null {
  if (!urlOrId) return null;
  const id = VIDEO_ID_PATTERN.test(urlOrId) ? urlOrId : extractYouTubeVideoId(urlOrId);
  return id ? `https://www.youtube.com/watch?v=${id}` : null;
}

export function getYouTubeThumbnailUrl(urlOrId: string | null | undefined): string | null {
  if (!urlOrId) return null;
  const id = VIDEO_ID_PATTERN.test(urlOrId) ? urlOrId : extractYouTubeVideoId(urlOrId);
  return id ? `https://img.youtube.com/vi/${id}/hqdefault.jpg` : null;
}
