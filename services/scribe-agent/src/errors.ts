/**
 * Scribe Error Types
 *
 * Per-utterance failures (backend errors, duplicates, unknown speakers) are
 * contained and never end a session. Only an audio source disconnect or an
 * explicit stop does.
 */

import type { SessionState } from '@voice-scribe/types';

// =============================================================================
// Base Error
// =============================================================================

export class ScribeError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.context = context;
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Transcription Backend
// =============================================================================

/** Network failure, timeout, rate limit or 5xx - retried */
export class TransientBackendError extends ScribeError {
  constructor(backend: string, message: string, cause?: unknown) {
    super(`[${backend}] ${message}`, 'TRANSIENT_BACKEND_ERROR', { backend });
    this.cause = cause;
  }
}

/** Malformed payload, auth failure - surfaces as a failed fragment */
export class PermanentBackendError extends ScribeError {
  constructor(backend: string, message: string, cause?: unknown) {
    super(`[${backend}] ${message}`, 'PERMANENT_BACKEND_ERROR', { backend });
    this.cause = cause;
  }
}

// =============================================================================
// Session
// =============================================================================

export class AudioSourceDisconnectError extends ScribeError {
  constructor(reason: string) {
    super(`Audio source disconnected: ${reason}`, 'AUDIO_SOURCE_DISCONNECT', { reason });
  }
}

export class InvalidStateTransitionError extends ScribeError {
  public readonly from: SessionState;
  public readonly to: SessionState;

  constructor(from: SessionState, to: SessionState, command?: string) {
    super(
      command
        ? `Cannot ${command} while ${from}`
        : `Illegal session transition ${from} -> ${to}`,
      'INVALID_STATE_TRANSITION',
      { from, to, command }
    );
    this.from = from;
    this.to = to;
  }
}

// =============================================================================
// Transcript
// =============================================================================

export class DuplicateFragmentError extends ScribeError {
  constructor(speakerId: string, startTimestamp: number) {
    super(
      `Fragment for ${speakerId} at ${startTimestamp} already in transcript`,
      'DUPLICATE_FRAGMENT',
      { speakerId, startTimestamp }
    );
  }
}

export class UnknownSpeakerError extends ScribeError {
  constructor(speakerId: string) {
    super(`No display name for speaker ${speakerId}`, 'UNKNOWN_SPEAKER', { speakerId });
  }
}

// =============================================================================
// Configuration
// =============================================================================

export class ConfigurationError extends ScribeError {
  constructor(message: string, missing: string[] = []) {
    super(message, 'CONFIGURATION_ERROR', { missing });
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
