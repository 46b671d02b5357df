/**
 * HTML5 Audio Engine
 *
 * Web implementation of the platform audio engine. Each handle wraps its own
 * audio element; HLS sources are attached through hls.js unless the element
 * plays HLS natively (Safari/iOS).
 */

import Hls from 'hls.js';
import type { ErrorData, HlsConfig } from 'hls.js';
import { LoadError } from './loadError';
import type {
  AudioEngine,
  FinishListener,
  NativeAudioHandle,
  TrackMetadata,
} from './types/audioEngine';

// ============================================================================
// TYPES
// ============================================================================

/**
 * The part of HTMLAudioElement the engine relies on.
 */
export interface MediaElementLike {
  src: string;
  currentTime: number;
  readonly duration: number;
  volume: number;
  readonly paused: boolean;
  readonly ended: boolean;
  preload: string;
  readonly error: { readonly code: number; readonly message: string } | null;
  play(): Promise<void>;
  pause(): void;
  load(): void;
  removeAttribute(name: string): void;
  addEventListener(type: string, listener: () => void): void;
  removeEventListener(type: string, listener: () => void): void;
}

export interface HtmlAudioEngineOptions {
  /** Element factory (default: `new Audio()`) */
  createElement?: () => MediaElementLike;
  /**
   * Tag reader. Browsers expose no common-metadata API, so without one
   * tracks load with no metadata.
   */
  readMetadata?: (source: string) => Promise<Record<string, unknown>>;
  /** Passed to every hls.js instance */
  hlsConfig?: Partial<HlsConfig>;
}

const HLS_MIME_TYPE = 'application/vnd.apple.mpegurl';

// ============================================================================
// ERROR MAPPING
// ============================================================================

const MEDIA_ERR_ABORTED = 1;
const MEDIA_ERR_NETWORK = 2;
const MEDIA_ERR_DECODE = 3;
const MEDIA_ERR_SRC_NOT_SUPPORTED = 4;

export function categorizeMediaError(error: MediaElementLike['error']): LoadError {
  const detail = error?.message ? `: ${error.message}` : '';

  switch (error?.code) {
    case MEDIA_ERR_ABORTED:
      return new LoadError(`Loading aborted${detail}`, 'aborted');
    case MEDIA_ERR_NETWORK:
      return new LoadError(`Network error while loading media${detail}`, 'network');
    case MEDIA_ERR_DECODE:
      return new LoadError(`Media decoding error${detail}`, 'decode');
    case MEDIA_ERR_SRC_NOT_SUPPORTED:
      return new LoadError(`Media format not supported${detail}`, 'unsupported');
    default:
      return new LoadError(`Unknown media error${detail}`, 'unknown');
  }
}

export function categorizeHlsError(data: ErrorData): LoadError {
  switch (data.type) {
    case Hls.ErrorTypes.NETWORK_ERROR:
      return new LoadError(`HLS network error: ${data.details}`, 'network');
    case Hls.ErrorTypes.MEDIA_ERROR:
      return new LoadError(`HLS media error: ${data.details}`, 'decode');
    default:
      return new LoadError(`HLS error: ${data.details}`, 'unknown');
  }
}

export function isHlsSource(source: string): boolean {
  const path = source.split(/[?#]/)[0];
  return path.toLowerCase().endsWith('.m3u8');
}

function isMediaElement(element: MediaElementLike): element is MediaElementLike & HTMLMediaElement {
  return typeof HTMLMediaElement !== 'undefined' && element instanceof HTMLMediaElement;
}

function waitForMetadata(element: MediaElementLike, hls: Hls | null): Promise<void> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      element.removeEventListener('loadedmetadata', onLoadedMetadata);
      element.removeEventListener('error', onError);
      hls?.off(Hls.Events.ERROR, onHlsError);
    };

    const onLoadedMetadata = () => {
      cleanup();
      resolve();
    };

    const onError = () => {
      cleanup();
      reject(categorizeMediaError(element.error));
    };

    const onHlsError = (_event: unknown, data: ErrorData) => {
      if (!data.fatal) return;
      cleanup();
      reject(categorizeHlsError(data));
    };

    element.addEventListener('loadedmetadata', onLoadedMetadata);
    element.addEventListener('error', onError);
    hls?.on(Hls.Events.ERROR, onHlsError);
  });
}

// ============================================================================
// HANDLE
// ============================================================================

export class HtmlAudioHandle implements NativeAudioHandle {
  private element: MediaElementLike;
  private hls: Hls | null;
  private finishListeners: Set<FinishListener> = new Set();

  constructor(element: MediaElementLike, hls: Hls | null) {
    this.element = element;
    this.hls = hls;
    this.element.addEventListener('ended', this.handleEnded);
    this.element.addEventListener('error', this.handleError);
    this.hls?.on(Hls.Events.ERROR, this.handleHlsError);
  }

  get duration(): number {
    const duration = this.element.duration;
    return Number.isNaN(duration) ? 0 : duration;
  }

  get currentTime(): number {
    return this.element.currentTime;
  }

  set currentTime(value: number) {
    this.element.currentTime = value;
  }

  get volume(): number {
    return this.element.volume;
  }

  set volume(value: number) {
    this.element.volume = value;
  }

  get isPlaying(): boolean {
    return !this.element.paused && !this.element.ended;
  }

  play(): void {
    void this.element.play().catch((error: unknown) => {
      // pause() before play() settles rejects with AbortError; that is not a failure
      if (error instanceof Error && error.name === 'AbortError') return;
      console.warn('[HtmlAudioEngine] Play rejected:', error);
      this.emitFinished(false);
    });
  }

  pause(): void {
    this.element.pause();
  }

  stop(): void {
    this.element.pause();
  }

  prepareToPlay(): void {
    this.element.preload = 'auto';
  }

  onFinished(listener: FinishListener): () => void {
    this.finishListeners.add(listener);
    return () => {
      this.finishListeners.delete(listener);
    };
  }

  release(): void {
    this.element.removeEventListener('ended', this.handleEnded);
    this.element.removeEventListener('error', this.handleError);
    this.finishListeners.clear();

    if (this.hls) {
      this.hls.off(Hls.Events.ERROR, this.handleHlsError);
      this.hls.destroy();
      this.hls = null;
    }

    this.element.pause();
    this.element.removeAttribute('src');
    this.element.load();
  }

  private handleEnded = (): void => {
    this.emitFinished(true);
  };

  private handleError = (): void => {
    console.error('[HtmlAudioEngine] Playback error:', categorizeMediaError(this.element.error).message);
    this.emitFinished(false);
  };

  private handleHlsError = (_event: unknown, data: ErrorData): void => {
    if (!data.fatal) {
      console.log('[HtmlAudioEngine] Non-fatal HLS error:', data.details);
      return;
    }
    console.error('[HtmlAudioEngine] Fatal HLS error:', data.details);
    this.emitFinished(false);
  };

  private emitFinished(successfully: boolean): void {
    this.finishListeners.forEach((listener) => listener(successfully));
  }
}

// ============================================================================
// ENGINE
// ============================================================================

export class HtmlAudioEngine implements AudioEngine {
  readonly name = 'html5';

  private createElement: () => MediaElementLike;
  private readMetadata: (source: string) => Promise<Record<string, unknown>>;
  private hlsConfig: Partial<HlsConfig>;

  constructor(options: HtmlAudioEngineOptions = {}) {
    this.createElement = options.createElement ?? (() => new Audio());
    this.readMetadata = options.readMetadata ?? (async () => ({}));
    this.hlsConfig = options.hlsConfig ?? {};
  }

  async createHandle(source: string): Promise<NativeAudioHandle> {
    const element = this.createElement();
    element.preload = 'metadata';

    const hls = this.attachSource(element, source);
    try {
      await waitForMetadata(element, hls);
    } catch (error) {
      hls?.destroy();
      element.removeAttribute('src');
      throw error;
    }

    console.log('[HtmlAudioEngine] Metadata loaded, duration:', element.duration);
    return new HtmlAudioHandle(element, hls);
  }

  async readCommonMetadata(source: string): Promise<TrackMetadata> {
    const raw = await this.readMetadata(source);
    const metadata: TrackMetadata = {};

    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === 'string' && value.trim() !== '') {
        metadata[key] = value;
      }
    }
    return metadata;
  }

  private attachSource(element: MediaElementLike, source: string): Hls | null {
    if (
      isHlsSource(source) &&
      isMediaElement(element) &&
      !element.canPlayType(HLS_MIME_TYPE) &&
      Hls.isSupported()
    ) {
      console.log('[HtmlAudioEngine] Attaching HLS source via hls.js:', source);
      const hls = new Hls(this.hlsConfig);
      hls.attachMedia(element);
      hls.loadSource(source);
      return hls;
    }

    element.src = source;
    element.load();
    return null;
  }
}
