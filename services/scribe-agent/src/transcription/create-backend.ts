import type { ScribeConfig } from '../config/env.js';
import { ConfigurationError } from '../errors.js';
import type { TranscriptionBackend } from './backend.js';
import { DeepgramBackend } from './deepgram-backend.js';
import { OpenAIWhisperBackend } from './openai-backend.js';

/**
 * Build the backend selected by TRANSCRIPTION_BACKEND
 */
export function createTranscriptionBackend(
  config: Pick<ScribeConfig, 'backend' | 'openaiApiKey' | 'deepgramApiKey' | 'whisperModel' | 'whisperLanguage' | 'deepgramModel'>
): TranscriptionBackend {
  switch (config.backend) {
    case 'deepgram':
      if (!config.deepgramApiKey) {
        throw new ConfigurationError('[Scribe] DEEPGRAM_API_KEY is not set', ['DEEPGRAM_API_KEY']);
      }
      return new DeepgramBackend({
        apiKey: config.deepgramApiKey,
        model: config.deepgramModel,
        language: config.whisperLanguage,
      });

    case 'openai':
      if (!config.openaiApiKey) {
        throw new ConfigurationError('[Scribe] OPENAI_API_KEY is not set', ['OPENAI_API_KEY']);
      }
      return new OpenAIWhisperBackend({
        apiKey: config.openaiApiKey,
        model: config.whisperModel,
        language: config.whisperLanguage,
      });
  }
}
