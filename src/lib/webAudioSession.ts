/**
 * Web Audio Session
 *
 * Shared output session for browsers. Where the Audio Session API exists
 * (Safari 16.4+), the category becomes `navigator.audioSession.type`;
 * elsewhere the session only records what it was asked for.
 */

import type { AudioSession, AudioSessionCategory } from './types/audioEngine';

function getNavigatorAudioSession(): object | null {
  if (typeof navigator === 'undefined' || !('audioSession' in navigator)) return null;
  const session = navigator.audioSession;
  return typeof session === 'object' && session !== null ? session : null;
}

export class WebAudioSession implements AudioSession {
  private category: AudioSessionCategory | null = null;
  private active = false;

  async setCategory(category: AudioSessionCategory): Promise<void> {
    this.category = category;

    const session = getNavigatorAudioSession();
    if (session && 'type' in session) {
      session.type = category;
      console.log('[WebAudioSession] audioSession.type set to', category);
    }
  }

  async setActive(active: boolean): Promise<void> {
    this.active = active;
  }

  getCategory(): AudioSessionCategory | null {
    return this.category;
  }

  isActive(): boolean {
    return this.active;
  }
}
