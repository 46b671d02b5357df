/**
 * Tests for the audio player router
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

const capacitor = vi.hoisted(() => ({
  isNativePlatform: vi.fn(() => false),
  getPlatform: vi.fn(() => 'web'),
}));

vi.mock('@capacitor/core', () => ({
  registerPlugin: vi.fn(() => ({})),
  Capacitor: capacitor,
}));

import { createAudioPlayer, createPlatformAudio, resolvePlatform } from '../index';
import { AudioPlayer } from '../../lib/audioPlayer';
import { HtmlAudioEngine } from '../../lib/htmlAudioEngine';
import { NativeAudioBridge, NativeAudioSession } from '../../lib/nativeAudioBridge';
import { WebAudioSession } from '../../lib/webAudioSession';
import { FakeNativeAudioPlugin } from '../../lib/__tests__/fakeNativeAudioPlugin';

describe('Player Router', () => {
  let plugin: FakeNativeAudioPlugin;
  let bridge: NativeAudioBridge;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    capacitor.isNativePlatform.mockReturnValue(false);
    capacitor.getPlatform.mockReturnValue('web');
    plugin = new FakeNativeAudioPlugin();
    bridge = new NativeAudioBridge(plugin);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('resolvePlatform', () => {
    it('should honor an explicit platform', async () => {
      await expect(resolvePlatform('web', bridge)).resolves.toBe('web');
      await expect(resolvePlatform('native', bridge)).resolves.toBe('native');
      expect(plugin.isAvailable).not.toHaveBeenCalled();
    });

    it('should pick web outside a native app without asking the plugin', async () => {
      await expect(resolvePlatform('auto', bridge)).resolves.toBe('web');
      expect(plugin.isAvailable).not.toHaveBeenCalled();
    });

    it('should pick native inside a native app that ships the plugin', async () => {
      capacitor.isNativePlatform.mockReturnValue(true);

      await expect(resolvePlatform('auto', bridge)).resolves.toBe('native');
    });

    it('should fall back to web when the plugin is missing', async () => {
      capacitor.isNativePlatform.mockReturnValue(true);
      plugin.isAvailable.mockRejectedValueOnce(new Error('not implemented'));

      await expect(resolvePlatform('auto', bridge)).resolves.toBe('web');
    });
  });

  describe('createPlatformAudio', () => {
    it('should pair the native bridge with the native session', async () => {
      capacitor.isNativePlatform.mockReturnValue(true);
      capacitor.getPlatform.mockReturnValue('ios');

      const audio = await createPlatformAudio('auto', {}, bridge);

      expect(audio.platform).toBe('native');
      expect(audio.engine).toBe(bridge);
      expect(audio.session).toBeInstanceOf(NativeAudioSession);
      expect(console.log).toHaveBeenCalledWith('[Player Router] Using NativeAudioBridge on', 'ios');

      await audio.session.setCategory('playback');
      expect(plugin.configureSession).toHaveBeenCalledWith({ category: 'playback' });
    });

    it('should pair the HTML engine with the web session', async () => {
      const audio = await createPlatformAudio('auto', {}, bridge);

      expect(audio.platform).toBe('web');
      expect(audio.engine).toBeInstanceOf(HtmlAudioEngine);
      expect(audio.session).toBeInstanceOf(WebAudioSession);
      expect(console.log).toHaveBeenCalledWith('[Player Router] Using HtmlAudioEngine (HTML5 Audio)');
    });
  });

  describe('createAudioPlayer', () => {
    it('should build an empty player on the web engine', async () => {
      const player = await createAudioPlayer({ platform: 'web', progressIntervalMs: 500 });

      expect(player).toBeInstanceOf(AudioPlayer);
      expect(player.state).toBe('empty');
      expect(player.isAudioLoaded).toBe(false);
    });
  });
});
