/**
 * MediaResolver - turns user input into playable Tracks.
 *
 * Every backend call is bounded by `attemptTimeoutMs`. RateLimited and
 * Timeout failures are retried with exponential backoff up to `maxAttempts`
 * invocations in total; everything else surfaces on the first failure.
 */
import type { Track } from '../../../types/voice';
import { createLogger } from '../../logger';
import { sleep, throwIfAborted, withTimeout } from '../../async';
import {
  CancelledError,
  InputError,
  ResolutionError,
  StateError,
  TunedeckError,
  formatError,
  toTunedeckError,
} from '../../errors';
import {
  classifyInput,
  isPlaylistUrlType,
  type ClassifiedInput,
  type UrlType,
} from '../../sourceType';
import { createTrack } from '../track';
import type { ExtractionBackend, ExtractionResult, PlaylistEntry } from './types';

const log = createLogger('RESOLVER');

export interface MediaResolverOptions {
  backend: ExtractionBackend;
  maxAttempts?: number;
  backoffMs?: number;
  attemptTimeoutMs?: number;
  maxPlaylistTracks?: number;
}

export interface ResolveOptions {
  requestedBy?: string | null;
  signal?: AbortSignal;
}

export type PlaylistItem =
  | { ok: true; track: Track }
  | { ok: false; entry: PlaylistEntry; error: TunedeckError };

export class MediaResolver {
  private readonly backend: ExtractionBackend;
  readonly maxAttempts: number;
  readonly backoffMs: number;
  readonly attemptTimeoutMs: number;
  readonly maxPlaylistTracks: number;

  constructor(options: MediaResolverOptions) {
    this.backend = options.backend;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffMs = Math.max(0, options.backoffMs ?? 500);
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? 15000;
    this.maxPlaylistTracks = options.maxPlaylistTracks ?? 50;
  }

  /**
   * True for inputs that resolvePlaylist handles (any YouTube URL with
   * `list=`, Spotify playlists and albums, SoundCloud sets)
   */
  isPlaylist(input: string): boolean {
    try {
      const classified = classifyInput(input);
      return classified.kind === 'url' && isPlaylistUrlType(classified.urlType);
    } catch (err) {
      if (err instanceof InputError) return false;
      throw err;
    }
  }

  /**
   * Resolve a single URL or search query. Empty input and malformed URLs are
   * rejected with InputError before the backend is called.
   */
  async resolve(input: string, options: ResolveOptions = {}): Promise<Track> {
    const classified = classifyInput(input);
    if (classified.kind === 'url' && isPlaylistUrlType(classified.urlType)) {
      throw new InputError('Playlist URLs must be resolved as playlists', { input });
    }
    return this.resolveClassified(classified, options);
  }

  /**
   * Lazily resolve a playlist, one entry at a time. Listing failures reject
   * the first `next()`; per-entry failures are yielded as `{ ok: false }`.
   * The sequence can be iterated once.
   */
  resolvePlaylist(input: string, options: ResolveOptions = {}): AsyncIterable<PlaylistItem> {
    const classified = classifyInput(input);
    if (classified.kind !== 'url' || !isPlaylistUrlType(classified.urlType)) {
      throw new InputError('Not a playlist URL', { input });
    }

    const { url, urlType } = classified;
    let consumed = false;
    return {
      [Symbol.asyncIterator]: () => {
        if (consumed) {
          throw new StateError('Playlist sequence has already been consumed');
        }
        consumed = true;
        return this.ingest(url, urlType, options);
      },
    };
  }

  private async *ingest(
    url: string,
    urlType: UrlType,
    options: ResolveOptions
  ): AsyncGenerator<PlaylistItem, void, undefined> {
    const entries = await this.withRetry(
      `playlist ${url}`,
      (signal) =>
        this.backend.listPlaylist(url, { signal, urlType, limit: this.maxPlaylistTracks }),
      options.signal
    );
    if (entries.length === 0) {
      throw new ResolutionError('NotFound', 'Playlist is empty');
    }

    const capped = entries.slice(0, this.maxPlaylistTracks);
    log.info(`Resolving ${capped.length} playlist entries from ${url}`);

    for (const entry of capped) {
      throwIfAborted(options.signal);
      try {
        const track = await this.resolveClassified(classifyInput(entry.input), options);
        yield { ok: true, track };
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        const error = toTunedeckError(err);
        log.warn(`Playlist entry "${entry.title ?? entry.input}" failed: ${error.message}`);
        yield { ok: false, entry, error };
      }
    }
  }

  private async resolveClassified(
    classified: ClassifiedInput,
    options: ResolveOptions
  ): Promise<Track> {
    const result: ExtractionResult =
      classified.kind === 'url'
        ? await this.withRetry(
            classified.url,
            (signal) =>
              this.backend.extract(classified.url, { signal, urlType: classified.urlType }),
            options.signal
          )
        : await this.withRetry(
            `search "${classified.query}"`,
            (signal) => this.backend.search(classified.query, { signal }),
            options.signal
          );

    // Late abort: never hand back a track for a superseded request
    throwIfAborted(options.signal);

    const { metadata } = result;
    return createTrack({
      sourceUrl: metadata.sourceUrl,
      resolvedStreamUri: result.playableUri,
      title: metadata.title || (classified.kind === 'search' ? classified.query : null),
      thumbnailUrl: metadata.thumbnailUrl,
      duration: metadata.duration,
      sourceType: metadata.sourceType,
      requestedBy: options.requestedBy ?? null,
    });
  }

  private async withRetry<T>(
    label: string,
    attempt: (signal: AbortSignal) => Promise<T>,
    signal: AbortSignal | undefined
  ): Promise<T> {
    for (let attemptNo = 1; ; attemptNo++) {
      throwIfAborted(signal);
      try {
        return await withTimeout(
          attempt,
          this.attemptTimeoutMs,
          () => new ResolutionError('Timeout', `Timed out after ${this.attemptTimeoutMs}ms`),
          signal
        );
      } catch (err) {
        if (signal?.aborted) throw new CancelledError();

        const error = toTunedeckError(err);
        if (!(error instanceof ResolutionError) || !error.retryable) {
          if (!(err instanceof TunedeckError)) {
            log.error(`Unexpected backend failure for ${label}: ${formatError(err).message}`);
          }
          throw error;
        }
        if (attemptNo >= this.maxAttempts) {
          log.warn(`Giving up on ${label} after ${attemptNo} attempts (${error.kind})`);
          throw error;
        }

        const wait = this.backoffMs * 2 ** (attemptNo - 1);
        log.warn(
          `${error.kind} resolving ${label}, retrying in ${wait}ms (attempt ${attemptNo}/${this.maxAttempts})`
        );
        await sleep(wait, signal);
      }
    }
  }
}
