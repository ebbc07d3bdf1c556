/**
 * Deepgram Pre-recorded Backend
 *
 * Posts each utterance to the Listen REST API (speech-to-text only).
 * Reference: https://developers.deepgram.com/docs/pre-recorded-audio
 */

import { encodeWav } from '../audio/pcm.js';
import type { Utterance } from '../audio/segmenter.js';
import { PermanentBackendError, TransientBackendError, errorMessage } from '../errors.js';
import { isRetryableStatus, type TranscribeOptions, type TranscriptionBackend } from './backend.js';

// =============================================================================
// Types
// =============================================================================

export interface DeepgramConfig {
  apiKey: string;
  model?: string;
  language?: string;
  fetch?: typeof fetch;
}

const BACKEND_NAME = 'deepgram';
const DEEPGRAM_LISTEN_URL = 'https://api.deepgram.com/v1/listen';

/**
 * Deepgram Listen API URL for a single utterance
 */
export function getDeepgramListenUrl(model: string = 'nova-3', language: string = 'en'): string {
  const params = new URLSearchParams({
    model,
    language,
    punctuate: 'true',
    smart_format: 'true',
  });

  return `${DEEPGRAM_LISTEN_URL}?${params.toString()}`;
}

// =============================================================================
// Deepgram Backend Class
// =============================================================================

export class DeepgramBackend implements TranscriptionBackend {
  readonly name = BACKEND_NAME;
  private config: DeepgramConfig;
  private fetchImpl: typeof fetch;

  constructor(config: DeepgramConfig) {
    this.config = config;
    this.fetchImpl = config.fetch ?? fetch;
  }

  async transcribe(utterance: Utterance, options: TranscribeOptions): Promise<string> {
    const wav = encodeWav(utterance.samples, utterance.sampleRate, utterance.channels);

    let response: Response;
    try {
      response = await this.fetchImpl(getDeepgramListenUrl(this.config.model, this.config.language), {
        method: 'POST',
        headers: {
          'Authorization': `Token ${this.config.apiKey}`,
          'Content-Type': 'audio/wav',
        },
        body: wav,
        signal: options.signal,
      });
    } catch (error) {
      // fetch only rejects on network failure or abort
      throw new TransientBackendError(BACKEND_NAME, errorMessage(error), error);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      const message = `${response.status} ${response.statusText}${detail ? `: ${detail.slice(0, 200)}` : ''}`;
      if (isRetryableStatus(response.status)) {
        throw new TransientBackendError(BACKEND_NAME, message);
      }
      throw new PermanentBackendError(BACKEND_NAME, message);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new PermanentBackendError(BACKEND_NAME, `Unreadable response: ${errorMessage(error)}`, error);
    }

    return extractTranscript(body);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function firstOf(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : undefined;
}

/**
 * results.channels[0].alternatives[0].transcript
 */
function extractTranscript(body: unknown): string {
  const results = isRecord(body) ? body.results : undefined;
  const channel = isRecord(results) ? firstOf(results.channels) : undefined;
  const alternative = isRecord(channel) ? firstOf(channel.alternatives) : undefined;
  const transcript = isRecord(alternative) ? alternative.transcript : undefined;

  if (typeof transcript !== 'string') {
    throw new PermanentBackendError(BACKEND_NAME, 'Response has no transcript');
  }
  return transcript.trim();
}
