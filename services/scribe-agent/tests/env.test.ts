import { describe, expect, it } from 'vitest';
import {
  getBackendKind,
  loadFileTranscriptionConfig,
  loadScribeConfig,
  validateEnvironment,
} from '../src/config/env.js';
import { createTranscriptionBackend } from '../src/transcription/create-backend.js';
import { DeepgramBackend } from '../src/transcription/deepgram-backend.js';
import { ConfigurationError } from '../src/errors.js';

const BASE_ENV = {
  LIVEKIT_URL: 'ws://localhost:7880',
  LIVEKIT_API_KEY: 'devkey',
  LIVEKIT_API_SECRET: 'test-secret',
  OPENAI_API_KEY: 'test-secret',
};

describe('environment', () => {
  it('lists every missing variable', () => {
    let caught: unknown;
    try {
      validateEnvironment({ LIVEKIT_URL: 'ws://localhost:7880', LIVEKIT_API_KEY: '  ' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      context: { missing: ['LIVEKIT_API_KEY', 'LIVEKIT_API_SECRET', 'OPENAI_API_KEY'] },
    });
  });

  it('requires the Deepgram key only for the Deepgram backend', () => {
    const env = { ...BASE_ENV, OPENAI_API_KEY: undefined, TRANSCRIPTION_BACKEND: 'deepgram' };

    expect(() => validateEnvironment(env)).toThrow('  - DEEPGRAM_API_KEY');
    expect(() => validateEnvironment({ ...env, DEEPGRAM_API_KEY: 'test-secret' })).not.toThrow();
  });

  it('rejects an unknown backend', () => {
    expect(getBackendKind({})).toBe('openai');
    expect(getBackendKind({ TRANSCRIPTION_BACKEND: 'Deepgram' })).toBe('deepgram');
    expect(() => getBackendKind({ TRANSCRIPTION_BACKEND: 'vosk' })).toThrow(ConfigurationError);
  });

  it('applies defaults', () => {
    const config = loadScribeConfig(BASE_ENV);

    expect(config).toMatchObject({
      backend: 'openai',
      whisperModel: 'whisper-1',
      whisperLanguage: 'en',
      deepgramModel: 'nova-3',
      summaryModel: 'gpt-4o-mini',
      outputDir: '.logs',
      sampleRate: 16000,
      emptyRoomGraceMs: 60_000,
      verbose: false,
      segmenter: { silenceThresholdMs: 800, maxUtteranceMs: 30_000, energyThreshold: 0.015 },
      dispatcher: { concurrency: 4, maxRetries: 3, retryDelayMs: 500, maxRetryDelayMs: 8000, callTimeoutMs: 30_000 },
    });
    expect(config.participantMapPath).toBeUndefined();
  });

  it('parses overrides and ignores unparseable numbers', () => {
    const config = loadScribeConfig({
      ...BASE_ENV,
      SILENCE_THRESHOLD_MS: '1200',
      VOICE_ENERGY_THRESHOLD: '0.02',
      TRANSCRIPTION_CONCURRENCY: 'lots',
      PARTICIPANT_MAP_PATH: './participants.json',
      VERBOSE: 'true',
    });

    expect(config.segmenter.silenceThresholdMs).toBe(1200);
    expect(config.segmenter.energyThreshold).toBe(0.02);
    expect(config.dispatcher.concurrency).toBe(4);
    expect(config.participantMapPath).toBe('./participants.json');
    expect(config.verbose).toBe(true);
    expect(config.dispatcher.verbose).toBe(true);
  });

  it('builds the selected backend', () => {
    const config = loadScribeConfig({
      ...BASE_ENV,
      TRANSCRIPTION_BACKEND: 'deepgram',
      DEEPGRAM_API_KEY: 'test-secret',
    });

    const backend = createTranscriptionBackend(config);

    expect(backend).toBeInstanceOf(DeepgramBackend);
    expect(backend.name).toBe('deepgram');
    expect(() => createTranscriptionBackend({ ...config, deepgramApiKey: undefined })).toThrow(
      '[Scribe] DEEPGRAM_API_KEY is not set'
    );
  });

  it('needs only the backend key to transcribe a file', () => {
    const config = loadFileTranscriptionConfig({ OPENAI_API_KEY: 'test-secret', TRANSCRIPTION_CONCURRENCY: '2' });

    expect(config).toMatchObject({
      backend: 'openai',
      openaiApiKey: 'test-secret',
      whisperModel: 'whisper-1',
      dispatcher: { concurrency: 2, maxRetries: 3 },
    });
  });

  it('lets the file tool pick its own backend', () => {
    const env = { OPENAI_API_KEY: 'test-secret', TRANSCRIPTION_BACKEND: 'openai' };

    expect(() => loadFileTranscriptionConfig(env, 'deepgram')).toThrow('  - DEEPGRAM_API_KEY');
    expect(loadFileTranscriptionConfig({ ...env, DEEPGRAM_API_KEY: 'test-secret' }, 'deepgram').backend).toBe('deepgram');
    expect(() => loadFileTranscriptionConfig(env, 'local')).toThrow(ConfigurationError);
  });
});
