export { createAudioPlayer, createPlatformAudio, resolvePlatform } from './player';
export type { AudioPlatform, CreateAudioPlayerOptions, PlatformAudio } from './player';

export { AudioPlayer, DEFAULT_AUDIO_PLAYER_OPTIONS } from './lib/audioPlayer';
export { LoadError } from './lib/loadError';
export {
  HtmlAudioEngine,
  HtmlAudioHandle,
  categorizeHlsError,
  categorizeMediaError,
  isHlsSource,
} from './lib/htmlAudioEngine';
export type { HtmlAudioEngineOptions, MediaElementLike } from './lib/htmlAudioEngine';
export {
  NativeAudioBridge,
  NativeAudioPlayerHandle,
  NativeAudioSession,
  getNativeAudioBridge,
} from './lib/nativeAudioBridge';
export type {
  NativeAudioEventMap,
  NativeAudioPlayerPlugin,
  PlaybackFinishedEvent,
  PositionUpdateEvent,
} from './lib/nativeAudioBridge';
export { WebAudioSession } from './lib/webAudioSession';
export type {
  AudioEngine,
  AudioPlayerDelegate,
  AudioPlayerOptions,
  AudioSession,
  AudioSessionCategory,
  FinishListener,
  LoadErrorCategory,
  LoadResult,
  NativeAudioHandle,
  PlayerState,
  TrackMetadata,
} from './lib/types/audioEngine';
