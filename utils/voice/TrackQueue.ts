/**
 * Ordered track queue owned by a single Session.
 *
 * Not synchronized on its own: every call happens under the owning session's
 * mutex.
 */
import type { DedupPolicy, Track } from '../../types/voice';
import { InputError } from '../errors';
import { toCanonicalYouTubeUrl } from '../youtubeUrl';

/**
 * Key used to compare tracks for duplicates. YouTube variants of the same
 * video (youtu.be, m.youtube.com, extra params) compare equal.
 */
export function dedupKey(sourceUrl: string): string {
  return toCanonicalYouTubeUrl(sourceUrl) ?? sourceUrl.trim();
}

export class TrackQueue {
  private items: Track[] = [];

  constructor(public readonly dedup: DedupPolicy = 'off') {}

  get length(): number {
    return this.items.length;
  }

  /**
   * Append a track and return the index it landed at.
   * @param currentUrl sourceUrl of the track playing now, checked by the dedup policy
   */
  enqueue(track: Track, currentUrl: string | null = null): number {
    if (this.dedup !== 'off') {
      const key = dedupKey(track.sourceUrl);

      if (currentUrl !== null && dedupKey(currentUrl) === key) {
        throw new InputError(`"${track.title}" is already playing`, { sourceUrl: track.sourceUrl });
      }

      const existing = this.items.findIndex((item) => dedupKey(item.sourceUrl) === key);
      if (existing !== -1) {
        if (this.dedup === 'reject') {
          throw new InputError(`"${track.title}" is already in the queue`, {
            sourceUrl: track.sourceUrl,
            index: existing,
          });
        }
        this.items.splice(existing, 1);
      }
    }

    this.items.push(track);
    return this.items.length - 1;
  }

  /**
   * Put a track back at the head (a track that never started playing)
   */
  requeueFront(track: Track): void {
    this.items.unshift(track);
  }

  remove(index: number): Track {
    this.assertIndex(index);
    const [removed] = this.items.splice(index, 1);
    if (!removed) {
      throw new InputError('Track not found at index', { index });
    }
    return removed;
  }

  /**
   * Remove the track at `index` so it can become the current track
   */
  take(index: number): Track {
    return this.remove(index);
  }

  shift(): Track | undefined {
    return this.items.shift();
  }

  peek(): Track | undefined {
    return this.items[0];
  }

  clear(): number {
    const cleared = this.items.length;
    this.items = [];
    return cleared;
  }

  toArray(): Track[] {
    return [...this.items];
  }

  /**
   * Drop duplicate entries and entries matching the current track, keeping
   * the first occurrence of each. Returns how many were removed.
   */
  prune(currentUrl: string | null = null): number {
    const seen = new Set<string>();
    if (currentUrl !== null) {
      seen.add(dedupKey(currentUrl));
    }

    const before = this.items.length;
    this.items = this.items.filter((track) => {
      const key = dedupKey(track.sourceUrl);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
    return before - this.items.length;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new InputError(`Invalid queue index: ${index}`, {
        index,
        length: this.items.length,
      });
    }
  }
}
