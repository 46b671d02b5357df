/**
 * Native Audio Bridge
 *
 * Platform audio engine for Capacitor apps. Playback runs in the host app's
 * NativeAudioPlayer plugin (AVAudioPlayer/AVAudioSession on iOS, ExoPlayer on
 * Android); this module adapts the plugin's asynchronous API to the
 * synchronous handle contract the AudioPlayer expects.
 *
 * Handles keep a local copy of position, volume and the playing flag. Writes
 * update the copy immediately and are sent to the plugin in the background;
 * the plugin pushes `positionUpdate` and `playbackFinished` events back.
 */

import { registerPlugin } from '@capacitor/core';
import type { PluginListenerHandle } from '@capacitor/core';
import { LoadError } from './loadError';
import type {
  AudioEngine,
  AudioSession,
  AudioSessionCategory,
  FinishListener,
  LoadErrorCategory,
  NativeAudioHandle,
  TrackMetadata,
} from './types/audioEngine';

// ============================================================================
// TYPES
// ============================================================================

export interface HandleOptions {
  handleId: string;
}

export interface PlaybackFinishedEvent {
  handleId: string;
  successfully: boolean;
}

export interface PositionUpdateEvent {
  handleId: string;
  /** Position in seconds */
  position: number;
}

export interface NativeAudioEventMap {
  playbackFinished: PlaybackFinishedEvent;
  positionUpdate: PositionUpdateEvent;
}

export interface NativeAudioPlayerPlugin {
  /** Check if native audio is available */
  isAvailable(): Promise<{ available: boolean }>;
  /** Create a player for `url`; rejects when the source cannot be decoded */
  load(options: { url: string }): Promise<{ handleId: string; duration: number }>;
  prepareToPlay(options: HandleOptions): Promise<void>;
  play(options: HandleOptions): Promise<void>;
  pause(options: HandleOptions): Promise<void>;
  /** Halt playback; the native player keeps its position */
  stop(options: HandleOptions): Promise<void>;
  seek(options: HandleOptions & { position: number }): Promise<void>;
  setVolume(options: HandleOptions & { volume: number }): Promise<void>;
  release(options: HandleOptions): Promise<void>;
  /** Common metadata tags (title, artist, albumName, ...) of `url` */
  readMetadata(options: { url: string }): Promise<{ metadata: Record<string, unknown> }>;
  configureSession(options: { category: AudioSessionCategory }): Promise<void>;
  setSessionActive(options: { active: boolean }): Promise<void>;
  addListener<E extends keyof NativeAudioEventMap>(
    eventName: E,
    listener: (event: NativeAudioEventMap[E]) => void
  ): Promise<PluginListenerHandle>;
}

// ============================================================================
// PLUGIN REGISTRATION
// ============================================================================

// Implemented by the host app's native code; there is no web implementation.
const NativeAudioPlayer = registerPlugin<NativeAudioPlayerPlugin>('NativeAudioPlayer');

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Plugin rejections may carry one of these as their `code`
const NATIVE_LOAD_ERROR_CATEGORIES: readonly LoadErrorCategory[] = ['network', 'decode', 'unsupported', 'aborted'];

function loadErrorCategory(error: unknown): LoadErrorCategory {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    const category = NATIVE_LOAD_ERROR_CATEGORIES.find((known) => known === code);
    if (category) return category;
  }
  return 'unknown';
}

// ============================================================================
// HANDLE
// ============================================================================

export class NativeAudioPlayerHandle implements NativeAudioHandle {
  readonly handleId: string;
  readonly duration: number;

  private plugin: NativeAudioPlayerPlugin;
  private onRelease: (handle: NativeAudioPlayerHandle) => void;
  private position = 0;
  private level = 1;
  private playing = false;
  private released = false;
  private finishListeners: Set<FinishListener> = new Set();

  constructor(
    plugin: NativeAudioPlayerPlugin,
    handleId: string,
    duration: number,
    onRelease: (handle: NativeAudioPlayerHandle) => void
  ) {
    this.plugin = plugin;
    this.handleId = handleId;
    this.duration = duration;
    this.onRelease = onRelease;
  }

  get currentTime(): number {
    return this.position;
  }

  set currentTime(value: number) {
    this.position = value;
    this.send('seek', this.plugin.seek({ handleId: this.handleId, position: value }));
  }

  get volume(): number {
    return this.level;
  }

  set volume(value: number) {
    this.level = value;
    this.send('setVolume', this.plugin.setVolume({ handleId: this.handleId, volume: value }));
  }

  get isPlaying(): boolean {
    return this.playing;
  }

  play(): void {
    this.playing = true;
    void this.plugin.play({ handleId: this.handleId }).catch((error: unknown) => {
      console.error(`[NativeAudioBridge] play failed for ${this.handleId}:`, errorMessage(error));
      if (this.released) return;
      this.handleFinished(false);
    });
  }

  pause(): void {
    this.playing = false;
    this.send('pause', this.plugin.pause({ handleId: this.handleId }));
  }

  stop(): void {
    this.playing = false;
    this.send('stop', this.plugin.stop({ handleId: this.handleId }));
  }

  prepareToPlay(): void {
    this.send('prepareToPlay', this.plugin.prepareToPlay({ handleId: this.handleId }));
  }

  onFinished(listener: FinishListener): () => void {
    this.finishListeners.add(listener);
    return () => {
      this.finishListeners.delete(listener);
    };
  }

  release(): void {
    if (this.released) return;
    this.released = true;
    this.playing = false;
    this.finishListeners.clear();
    this.onRelease(this);
    this.send('release', this.plugin.release({ handleId: this.handleId }));
  }

  /** @internal */
  handlePositionUpdate(position: number): void {
    this.position = position;
  }

  /** @internal */
  handleFinished(successfully: boolean): void {
    this.playing = false;
    if (successfully) {
      this.position = this.duration;
    }
    this.finishListeners.forEach((listener) => listener(successfully));
  }

  private send(action: string, call: Promise<void>): void {
    void call.catch((error: unknown) => {
      console.error(`[NativeAudioBridge] ${action} failed for ${this.handleId}:`, errorMessage(error));
    });
  }
}

// ============================================================================
// BRIDGE CLASS
// ============================================================================

export class NativeAudioBridge implements AudioEngine {
  readonly name = 'native';

  private plugin: NativeAudioPlayerPlugin;
  private handles: Map<string, NativeAudioPlayerHandle> = new Map();
  private listenersReady: Promise<void> | null = null;
  private listenerHandles: PluginListenerHandle[] = [];

  constructor(plugin: NativeAudioPlayerPlugin = NativeAudioPlayer) {
    this.plugin = plugin;
  }

  getPlugin(): NativeAudioPlayerPlugin {
    return this.plugin;
  }

  /**
   * Whether the host app ships the plugin. Never rejects.
   */
  async isAvailable(): Promise<boolean> {
    try {
      const { available } = await this.plugin.isAvailable();
      console.log('[NativeAudioBridge] Native audio available:', available);
      return available;
    } catch (error) {
      console.warn('[NativeAudioBridge] Failed to query native audio:', errorMessage(error));
      return false;
    }
  }

  async createHandle(source: string): Promise<NativeAudioHandle> {
    await this.ensureListeners();

    let loaded: { handleId: string; duration: number };
    try {
      loaded = await this.plugin.load({ url: source });
    } catch (error) {
      const message = `Native player could not open ${source}: ${errorMessage(error)}`;
      throw new LoadError(message, loadErrorCategory(error), { cause: error });
    }

    const handle = new NativeAudioPlayerHandle(this.plugin, loaded.handleId, loaded.duration, (released) =>
      this.handles.delete(released.handleId)
    );
    this.handles.set(handle.handleId, handle);
    return handle;
  }

  async readCommonMetadata(source: string): Promise<TrackMetadata> {
    const { metadata: raw } = await this.plugin.readMetadata({ url: source });
    const metadata: TrackMetadata = {};

    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === 'string') {
        metadata[key] = value;
      }
    }
    return metadata;
  }

  getHandleCount(): number {
    return this.handles.size;
  }

  /**
   * Cleanup
   */
  async destroy(): Promise<void> {
    this.handles.forEach((handle) => handle.release());
    this.handles.clear();

    const listenerHandles = this.listenerHandles;
    this.listenerHandles = [];
    this.listenersReady = null;
    await Promise.all(listenerHandles.map((listener) => listener.remove()));
  }

  private ensureListeners(): Promise<void> {
    if (!this.listenersReady) {
      const ready: Promise<void> = Promise.all([
        this.plugin.addListener('playbackFinished', (event) => {
          this.handles.get(event.handleId)?.handleFinished(event.successfully);
        }),
        this.plugin.addListener('positionUpdate', (event) => {
          this.handles.get(event.handleId)?.handlePositionUpdate(event.position);
        }),
      ]).then(
        async (listenerHandles) => {
          // destroy() ran while registering
          if (this.listenersReady !== ready) {
            await Promise.all(listenerHandles.map((listener) => listener.remove()));
            return;
          }
          this.listenerHandles = listenerHandles;
        },
        (error: unknown) => {
          if (this.listenersReady === ready) {
            this.listenersReady = null;
          }
          throw error;
        }
      );
      this.listenersReady = ready;
    }
    return this.listenersReady;
  }
}

// ============================================================================
// SESSION
// ============================================================================

export class NativeAudioSession implements AudioSession {
  private plugin: NativeAudioPlayerPlugin;

  constructor(plugin: NativeAudioPlayerPlugin = NativeAudioPlayer) {
    this.plugin = plugin;
  }

  async setCategory(category: AudioSessionCategory): Promise<void> {
    await this.plugin.configureSession({ category });
  }

  async setActive(active: boolean): Promise<void> {
    await this.plugin.setSessionActive({ active });
  }
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

let bridgeInstance: NativeAudioBridge | null = null;

/**
 * Get the native audio bridge singleton
 */
export function getNativeAudioBridge(): NativeAudioBridge {
  if (!bridgeInstance) {
    bridgeInstance = new NativeAudioBridge();
  }
  return bridgeInstance;
}
