/**
 * Transcription Backend Contract
 *
 * One call per utterance, no streaming partials. Implementations must throw
 * TransientBackendError or PermanentBackendError so the dispatcher can decide
 * whether to retry.
 */

import type { Utterance } from '../audio/segmenter.js';

export interface TranscribeOptions {
  /** Aborted when the dispatcher's per-call timeout fires */
  signal: AbortSignal;
}

export interface TranscriptionBackend {
  readonly name: string;
  transcribe(utterance: Utterance, options: TranscribeOptions): Promise<string>;
}

export type BackendKind = 'openai' | 'deepgram';

export function isBackendKind(value: string): value is BackendKind {
  return value === 'openai' || value === 'deepgram';
}

/** HTTP statuses worth another attempt */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}
