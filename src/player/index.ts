/**
 * Audio Player Router
 *
 * Selects the platform audio engine and session:
 * - Capacitor native app with the NativeAudioPlayer plugin: NativeAudioBridge
 * - Everything else: HtmlAudioEngine (HTML5 Audio + hls.js)
 *
 * Application code builds players through createAudioPlayer() and never
 * picks an engine itself.
 */

import { Capacitor } from '@capacitor/core';
import { AudioPlayer } from '../lib/audioPlayer';
import { HtmlAudioEngine } from '../lib/htmlAudioEngine';
import type { HtmlAudioEngineOptions } from '../lib/htmlAudioEngine';
import { NativeAudioSession, getNativeAudioBridge } from '../lib/nativeAudioBridge';
import type { NativeAudioBridge } from '../lib/nativeAudioBridge';
import { WebAudioSession } from '../lib/webAudioSession';
import type { AudioEngine, AudioPlayerOptions, AudioSession } from '../lib/types/audioEngine';

/**
 * Platform selector.
 * - 'web': HtmlAudioEngine
 * - 'native': NativeAudioBridge
 * - 'auto': native when running inside a Capacitor app that ships the plugin
 */
export type AudioPlatform = 'web' | 'native' | 'auto';

export interface PlatformAudio {
  platform: 'web' | 'native';
  engine: AudioEngine;
  session: AudioSession;
}

export interface CreateAudioPlayerOptions extends AudioPlayerOptions {
  platform?: AudioPlatform;
  /** Only used by the web engine */
  web?: HtmlAudioEngineOptions;
}

/**
 * Determine which engine to use.
 */
export async function resolvePlatform(
  platform: AudioPlatform,
  bridge: NativeAudioBridge = getNativeAudioBridge()
): Promise<'web' | 'native'> {
  if (platform !== 'auto') return platform;

  if (!Capacitor.isNativePlatform()) {
    return 'web';
  }
  return (await bridge.isAvailable()) ? 'native' : 'web';
}

/**
 * Create the engine and session for the current platform.
 */
export async function createPlatformAudio(
  platform: AudioPlatform = 'auto',
  webOptions: HtmlAudioEngineOptions = {},
  bridge: NativeAudioBridge = getNativeAudioBridge()
): Promise<PlatformAudio> {
  const resolved = await resolvePlatform(platform, bridge);

  if (resolved === 'native') {
    console.log('[Player Router] Using NativeAudioBridge on', Capacitor.getPlatform());
    return {
      platform: 'native',
      engine: bridge,
      session: new NativeAudioSession(bridge.getPlugin()),
    };
  }

  console.log('[Player Router] Using HtmlAudioEngine (HTML5 Audio)');
  return {
    platform: 'web',
    engine: new HtmlAudioEngine(webOptions),
    session: new WebAudioSession(),
  };
}

export async function createAudioPlayer(options: CreateAudioPlayerOptions = {}): Promise<AudioPlayer> {
  const { platform = 'auto', web, ...playerOptions } = options;
  const { engine, session } = await createPlatformAudio(platform, web);
  return new AudioPlayer(engine, session, playerOptions);
}

export { AudioPlayer } from '../lib/audioPlayer';
export { HtmlAudioEngine } from '../lib/htmlAudioEngine';
export { NativeAudioBridge, NativeAudioSession } from '../lib/nativeAudioBridge';
export { WebAudioSession } from '../lib/webAudioSession';
