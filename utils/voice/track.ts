import { v4 as uuidv4 } from 'uuid';
import type { SourceType, Track } from '../../types/voice';
import { InputError } from '../errors';
import { detectSourceType } from '../sourceType';
import { getYouTubeThumbnailUrl } from '../youtubeUrl';
import { DEFAULT_THUMBNAIL_URL, MAX_VOLUME, MIN_VOLUME, UNKNOWN_TITLE } from './constants';

export interface TrackInit {
  sourceUrl: string;
  resolvedStreamUri?: string;
  title?: string | null;
  thumbnailUrl?: string | null;
  duration?: number | null;
  requestedBy?: string | null;
  sourceType?: SourceType;
  volume?: number;
}

export function assertVolume(volume: number): void {
  if (!Number.isInteger(volume) || volume < MIN_VOLUME || volume > MAX_VOLUME) {
    throw new InputError(`Volume must be an integer between ${MIN_VOLUME} and ${MAX_VOLUME}`, {
      volume,
    });
  }
}

/**
 * Build a frozen Track with every field defaulted. Each call mints a new id,
 * so resolving the same URL twice yields two distinct tracks.
 */
export function createTrack(init: TrackInit): Track {
  const title = init.title?.trim() || UNKNOWN_TITLE;
  const thumbnailUrl =
    init.thumbnailUrl || getYouTubeThumbnailUrl(init.sourceUrl) || DEFAULT_THUMBNAIL_URL;
  const duration =
    typeof init.duration === 'number' && Number.isFinite(init.duration) && init.duration > 0
      ? Math.round(init.duration)
      : 0;

  if (init.volume !== undefined) {
    assertVolume(init.volume);
  }

  return Object.freeze({
    id: uuidv4(),
    sourceUrl: init.sourceUrl,
    title,
    thumbnailUrl,
    duration,
    requestedBy: init.requestedBy ?? null,
    resolvedStreamUri: init.resolvedStreamUri || init.sourceUrl,
    sourceType: init.sourceType ?? detectSourceType(init.sourceUrl),
    ...(init.volume !== undefined && { volume: init.volume }),
  });
}
