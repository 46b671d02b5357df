/**
 * Audio Engine Type Definitions
 *
 * The contract between the AudioPlayer facade and the platform audio engine
 * (HTMLAudioElement on the web, the NativeAudioPlayer plugin inside a
 * Capacitor app), plus the delegate contract the facade exposes.
 */

import type { AudioPlayer } from '../audioPlayer';
import type { LoadError } from '../loadError';

// ============================================================================
// ERROR TYPES
// ============================================================================

export type LoadErrorCategory =
  | 'source'
  | 'network'
  | 'decode'
  | 'unsupported'
  | 'aborted'
  | 'session'
  | 'superseded'
  | 'unknown';

export type LoadResult =
  | { ok: true }
  | { ok: false; error: LoadError };

// ============================================================================
// PLAYBACK STATE
// ============================================================================

export type PlayerState =
  | 'empty'
  | 'loaded'
  | 'playing'
  | 'paused'
  | 'stopped'
  | 'finished';

// ============================================================================
// TRACK INFO
// ============================================================================

/**
 * Common metadata tags keyed by tag name (title, artist, albumName, ...).
 * Tags the engine does not recognize are simply absent.
 */
export type TrackMetadata = Record<string, string>;

// ============================================================================
// ENGINE INTERFACE
// ============================================================================

export type FinishListener = (successfully: boolean) => void;

/**
 * One loaded, playable track inside the platform engine.
 * Times are in seconds, volume in [0, 1].
 */
export interface NativeAudioHandle {
  readonly duration: number;
  currentTime: number;
  volume: number;
  readonly isPlaying: boolean;

  play(): void;
  pause(): void;
  stop(): void;
  prepareToPlay(): void;

  /** Returns an unsubscribe function. */
  onFinished(listener: FinishListener): () => void;

  release(): void;
}

export interface AudioEngine {
  readonly name: string;
  createHandle(source: string): Promise<NativeAudioHandle>;
  readCommonMetadata(source: string): Promise<TrackMetadata>;
}

export type AudioSessionCategory = 'playback' | 'ambient' | 'play-and-record';

/**
 * Process-wide audio output session. Configured once per successful load.
 */
export interface AudioSession {
  setCategory(category: AudioSessionCategory): Promise<void>;
  setActive(active: boolean): Promise<void>;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface AudioPlayerOptions {
  /** Progress notifier period in milliseconds (default: 1000) */
  progressIntervalMs?: number;
  /** Category applied to the shared session on every load (default: 'playback') */
  sessionCategory?: AudioSessionCategory;
  /** Stored volume before the first write (default: 1) */
  initialVolume?: number;
}

// ============================================================================
// CALLBACKS
// ============================================================================

/**
 * Receives player events. The player holds its delegate weakly.
 */
export interface AudioPlayerDelegate {
  onFinished(player: AudioPlayer): void;
  onProgress(player: AudioPlayer, currentPosition: number, remaining: number): void;
  onMetadataUpdated(player: AudioPlayer, metadata: TrackMetadata): void;
  onLoadFailed?(player: AudioPlayer, error: LoadError): void;
  /** The engine ended playback abnormally. */
  onPlaybackError?(player: AudioPlayer): void;
}
