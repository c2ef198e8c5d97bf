/**
 * Voice session constants
 */

/** Volume bounds (percent) */
export const MIN_VOLUME = 0;
export const MAX_VOLUME = 150;
export const DEFAULT_VOLUME = 100;

/** Fallback metadata for tracks the backend could not describe */
export const UNKNOWN_TITLE = 'Unknown Track';
export const DEFAULT_THUMBNAIL_URL = 'https://i.imgur.com/ufxvZ0j.png';

/** Timeout for direct-URL stream fetches */
export const FETCH_TIMEOUT_MS = 10000;

/** Grace period before a reconnecting voice connection is treated as gone */
export const RECONNECT_GRACE_MS = 5000;
