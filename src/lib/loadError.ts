import type { LoadErrorCategory } from './types/audioEngine';

export class LoadError extends Error {
  readonly category: LoadErrorCategory;

  constructor(message: string, category: LoadErrorCategory, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LoadError';
    this.category = category;
  }
}

/**
 * Wrap anything thrown during a load. LoadErrors pass through with their
 * own category; everything else takes `fallback`.
 */
export function toLoadError(error: unknown, fallback: LoadErrorCategory): LoadError {
  if (error instanceof LoadError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new LoadError(message, fallback, { cause: error });
}
