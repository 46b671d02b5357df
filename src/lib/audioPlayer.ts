/**
 * AudioPlayer
 *
 * State-tracking facade over one platform audio engine. Owns at most one
 * loaded track, runs the progress notifier and forwards finish, progress and
 * metadata events to a weakly held delegate.
 *
 * Transport operations are synchronous and run on the event loop like the
 * notifier ticks, so a tick never sees a handle mid-mutation. Only loading
 * is asynchronous, and a load commits in a single synchronous step.
 */

import { LoadError, toLoadError } from './loadError';
import type {
  AudioEngine,
  AudioPlayerDelegate,
  AudioPlayerOptions,
  AudioSession,
  LoadResult,
  NativeAudioHandle,
  PlayerState,
  TrackMetadata,
} from './types/audioEngine';

// ============================================================================
// CONFIGURATION
// ============================================================================

export const DEFAULT_AUDIO_PLAYER_OPTIONS: Required<AudioPlayerOptions> = {
  progressIntervalMs: 1000,
  sessionCategory: 'playback',
  initialVolume: 1,
};

function clampVolume(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

// ============================================================================
// PLAYER
// ============================================================================

export class AudioPlayer {
  private readonly engine: AudioEngine;
  private readonly session: AudioSession;
  private readonly options: Required<AudioPlayerOptions>;

  private loadedTrack: NativeAudioHandle | null = null;
  private loadedSource: string | null = null;
  private unsubscribeFinished: (() => void) | null = null;
  private progressTimer: ReturnType<typeof setInterval> | null = null;
  private delegateRef: WeakRef<AudioPlayerDelegate> | null = null;
  private loadGeneration = 0;
  private playbackState: PlayerState = 'empty';
  private storedVolume: number;
  private muted = false;
  private paused = false;

  constructor(engine: AudioEngine, session: AudioSession, options: AudioPlayerOptions = {}) {
    this.engine = engine;
    this.session = session;
    this.options = { ...DEFAULT_AUDIO_PLAYER_OPTIONS, ...options };
    this.storedVolume = clampVolume(this.options.initialVolume);
  }

  // ============================================================================
  // STATE
  // ============================================================================

  get delegate(): AudioPlayerDelegate | null {
    return this.delegateRef?.deref() ?? null;
  }

  set delegate(delegate: AudioPlayerDelegate | null) {
    this.delegateRef = delegate ? new WeakRef(delegate) : null;
  }

  get state(): PlayerState {
    return this.playbackState;
  }

  get source(): string | null {
    return this.loadedSource;
  }

  get isPlaying(): boolean {
    return this.loadedTrack?.isPlaying ?? false;
  }

  get isAudioLoaded(): boolean {
    return this.loadedTrack !== null;
  }

  /** Whether the last pause() actually paused a playing track. */
  get wasPaused(): boolean {
    return this.paused;
  }

  get volume(): number {
    return this.loadedTrack ? this.storedVolume : 0;
  }

  set volume(value: number) {
    this.storedVolume = clampVolume(value);
    if (this.loadedTrack && !this.muted) {
      this.loadedTrack.volume = this.storedVolume;
    }
  }

  get isMuted(): boolean {
    return this.muted;
  }

  set isMuted(muted: boolean) {
    this.muted = muted;
    if (this.loadedTrack) {
      this.loadedTrack.volume = this.effectiveVolume();
    }
  }

  currentPosition(): number | null {
    return this.loadedTrack?.currentTime ?? null;
  }

  totalDuration(): number | null {
    return this.loadedTrack?.duration ?? null;
  }

  // ============================================================================
  // LOADING
  // ============================================================================

  /**
   * Load a track. Never rejects: failures come back as `{ ok: false }`, are
   * logged and reported to `onLoadFailed`, and leave the previously loaded
   * track in place.
   */
  async loadTrack(source: string): Promise<LoadResult> {
    const generation = ++this.loadGeneration;
    let handle: NativeAudioHandle | null = null;
    console.log('[AudioPlayer] loadTrack:', source);

    try {
      if (source.trim() === '') {
        throw new LoadError('Audio source is empty', 'source');
      }

      try {
        handle = await this.engine.createHandle(source);
      } catch (error) {
        throw toLoadError(error, 'unknown');
      }
      handle.prepareToPlay();

      const metadata = await this.readMetadata(source);

      try {
        await this.session.setCategory(this.options.sessionCategory);
        await this.session.setActive(true);
      } catch (error) {
        throw toLoadError(error, 'session');
      }

      if (generation !== this.loadGeneration) {
        handle.release();
        return this.superseded(source);
      }

      this.commit(handle, source);

      if (Object.keys(metadata).length > 0) {
        this.notify((delegate) => delegate.onMetadataUpdated(this, metadata));
      }
      return { ok: true };
    } catch (error) {
      handle?.release();
      if (generation !== this.loadGeneration) {
        return this.superseded(source);
      }
      const loadError = toLoadError(error, 'unknown');
      console.error('[AudioPlayer] Error loading audio:', loadError.message);
      this.notify((delegate) => delegate.onLoadFailed?.(this, loadError));
      return { ok: false, error: loadError };
    }
  }

  private superseded(source: string): LoadResult {
    console.log('[AudioPlayer] Load superseded, discarding:', source);
    return { ok: false, error: new LoadError(`Load of ${source} was superseded`, 'superseded') };
  }

  private async readMetadata(source: string): Promise<TrackMetadata> {
    try {
      return await this.engine.readCommonMetadata(source);
    } catch (error) {
      console.warn('[AudioPlayer] Metadata unavailable:', error);
      return {};
    }
  }

  private commit(handle: NativeAudioHandle, source: string): void {
    this.stopProgressNotifier();
    this.unsubscribeFinished?.();
    this.loadedTrack?.release();

    this.loadedTrack = handle;
    this.loadedSource = source;
    this.paused = false;
    this.playbackState = 'loaded';
    handle.volume = this.effectiveVolume();
    this.unsubscribeFinished = handle.onFinished((successfully) =>
      this.handleEngineFinished(handle, successfully)
    );
  }

  // ============================================================================
  // PLAYBACK CONTROL
  // ============================================================================

  play(): void {
    const track = this.loadedTrack;
    if (!track) return;

    console.log('[AudioPlayer] play:', this.loadedSource);
    track.play();
    this.playbackState = 'playing';
    this.startProgressNotifier();
  }

  pause(): void {
    const track = this.loadedTrack;
    if (!track) return;

    if (track.isPlaying) {
      console.log('[AudioPlayer] pause:', this.loadedSource);
      track.pause();
      this.paused = true;
      this.playbackState = 'paused';
    } else {
      this.paused = false;
    }
    this.stopProgressNotifier();
  }

  replay(): void {
    const track = this.loadedTrack;
    if (!track) return;

    console.log('[AudioPlayer] replay:', this.loadedSource);
    track.stop();
    track.currentTime = 0;
    track.play();
    this.playbackState = 'playing';
    this.startProgressNotifier();
  }

  /** Halts playback. Unlike replay(), the position is left where the engine leaves it. */
  stop(): void {
    const track = this.loadedTrack;
    if (!track) return;

    console.log('[AudioPlayer] stop:', this.loadedSource);
    track.stop();
    this.playbackState = 'stopped';
    this.stopProgressNotifier();
  }

  /** Out-of-range positions go to the engine unclamped. */
  seek(position: number): void {
    const track = this.loadedTrack;
    if (!track) return;

    console.log('[AudioPlayer] seek:', position);
    track.currentTime = position;
    this.restartNotifierIfPlaying(track);
  }

  skipBackward(delta: number): void {
    const track = this.loadedTrack;
    if (!track) return;

    track.currentTime = Math.max(track.currentTime - delta, 0);
    this.restartNotifierIfPlaying(track);
  }

  skipForward(delta: number): void {
    const track = this.loadedTrack;
    if (!track) return;

    track.currentTime = Math.min(track.currentTime + delta, track.duration);
    this.restartNotifierIfPlaying(track);
  }

  /**
   * Release the loaded track and stop notifying. Pending loads are
   * discarded when they complete.
   */
  destroy(): void {
    this.loadGeneration++;
    this.stopProgressNotifier();
    this.unsubscribeFinished?.();
    this.unsubscribeFinished = null;
    this.loadedTrack?.release();
    this.loadedTrack = null;
    this.loadedSource = null;
    this.playbackState = 'empty';
    this.delegateRef = null;
  }

  // ============================================================================
  // PROGRESS NOTIFIER
  // ============================================================================

  private startProgressNotifier(): void {
    this.stopProgressNotifier();
    this.progressTimer = setInterval(() => this.updateProgress(), this.options.progressIntervalMs);
  }

  private stopProgressNotifier(): void {
    if (this.progressTimer !== null) {
      clearInterval(this.progressTimer);
      this.progressTimer = null;
    }
  }

  private restartNotifierIfPlaying(track: NativeAudioHandle): void {
    if (track.isPlaying) {
      this.startProgressNotifier();
    }
  }

  private updateProgress(): void {
    const track = this.loadedTrack;
    if (!track) {
      this.stopProgressNotifier();
      return;
    }

    const currentTime = track.currentTime;
    const remaining = track.duration - currentTime;

    if (remaining <= 0) {
      // Stop first: a delegate may restart playback from onFinished.
      this.stopProgressNotifier();
      this.playbackState = 'finished';
      this.notify((delegate) => delegate.onFinished(this));
    } else {
      this.notify((delegate) => delegate.onProgress(this, currentTime, remaining));
    }
  }

  private handleEngineFinished(handle: NativeAudioHandle, successfully: boolean): void {
    if (handle !== this.loadedTrack) return;

    this.stopProgressNotifier();
    if (successfully) {
      this.playbackState = 'finished';
      this.notify((delegate) => delegate.onFinished(this));
    } else {
      console.warn('[AudioPlayer] Playback ended abnormally:', this.loadedSource);
      this.playbackState = 'stopped';
      this.notify((delegate) => delegate.onPlaybackError?.(this));
    }
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private effectiveVolume(): number {
    return this.muted ? 0 : this.storedVolume;
  }

  private notify(callback: (delegate: AudioPlayerDelegate) => void): void {
    const delegate = this.delegate;
    if (!delegate) return;

    try {
      callback(delegate);
    } catch (error) {
      console.error('[AudioPlayer] Delegate callback failed:', error);
    }
  }
}
