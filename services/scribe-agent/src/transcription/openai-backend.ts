/**
 * OpenAI Whisper Backend
 *
 * Uploads each utterance as a WAV file to the audio transcriptions endpoint.
 * SDK-level retries are disabled; the dispatcher owns retry policy.
 */

import OpenAI, { toFile } from 'openai';
import { encodeWav } from '../audio/pcm.js';
import type { Utterance } from '../audio/segmenter.js';
import { PermanentBackendError, TransientBackendError, errorMessage } from '../errors.js';
import { isRetryableStatus, type TranscribeOptions, type TranscriptionBackend } from './backend.js';

type WhisperUpload = Awaited<ReturnType<typeof toFile>>;

/**
 * The slice of the OpenAI client this backend calls
 */
export interface WhisperClient {
  audio: {
    transcriptions: {
      create(
        body: { file: WhisperUpload; model: string; language?: string },
        options?: { signal?: AbortSignal }
      ): PromiseLike<{ text: string }>;
    };
  };
}

export interface OpenAIWhisperConfig {
  apiKey?: string;
  model: string;
  language?: string;
  /** Pre-built client, mainly for tests */
  client?: WhisperClient;
}

const BACKEND_NAME = 'openai-whisper';

export class OpenAIWhisperBackend implements TranscriptionBackend {
  readonly name = BACKEND_NAME;
  private client: WhisperClient;
  private config: OpenAIWhisperConfig;

  constructor(config: OpenAIWhisperConfig) {
    this.config = config;
    this.client = config.client ?? new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async transcribe(utterance: Utterance, options: TranscribeOptions): Promise<string> {
    const wav = encodeWav(utterance.samples, utterance.sampleRate, utterance.channels);

    try {
      const file = await toFile(wav, `utterance-${utterance.startTimestamp}.wav`, { type: 'audio/wav' });
      const result = await this.client.audio.transcriptions.create(
        {
          file,
          model: this.config.model,
          language: this.config.language,
        },
        { signal: options.signal }
      );
      return result.text.trim();
    } catch (error) {
      throw classifyOpenAIError(error);
    }
  }
}

/**
 * Map SDK errors onto the retry taxonomy
 */
export function classifyOpenAIError(error: unknown): TransientBackendError | PermanentBackendError {
  if (error instanceof TransientBackendError || error instanceof PermanentBackendError) {
    return error;
  }

  if (error instanceof OpenAI.APIError) {
    // Connection failures and aborts carry no status
    if (error.status === undefined || isRetryableStatus(error.status)) {
      return new TransientBackendError(BACKEND_NAME, error.message, error);
    }
    return new PermanentBackendError(BACKEND_NAME, error.message, error);
  }

  return new TransientBackendError(BACKEND_NAME, errorMessage(error), error);
}
