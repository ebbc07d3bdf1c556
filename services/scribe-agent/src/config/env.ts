/**
 * Environment Configuration
 *
 * Validates required variables and parses the capture / dispatch policy.
 * Numeric settings fall back to their defaults when unset or unparseable.
 */

import { DEFAULT_SEGMENTER_CONFIG, type SegmenterConfig } from '../audio/segmenter.js';
import { DEFAULT_DISPATCHER_CONFIG, type DispatcherConfig } from '../transcription/dispatcher.js';
import { isBackendKind, type BackendKind } from '../transcription/backend.js';
import { ConfigurationError } from '../errors.js';

type Env = Record<string, string | undefined>;

export interface ScribeConfig {
  livekit: {
    url: string;
    apiKey: string;
    apiSecret: string;
  };
  backend: BackendKind;
  openaiApiKey?: string;
  deepgramApiKey?: string;
  whisperModel: string;
  whisperLanguage: string;
  deepgramModel: string;
  summaryModel: string;
  participantMapPath?: string;
  outputDir: string;
  sampleRate: number;
  emptyRoomGraceMs: number;
  segmenter: SegmenterConfig;
  dispatcher: DispatcherConfig;
  verbose: boolean;
}

/** Settings of the standalone file transcription tool */
export interface FileTranscriptionConfig {
  backend: BackendKind;
  openaiApiKey?: string;
  deepgramApiKey?: string;
  whisperModel: string;
  whisperLanguage: string;
  deepgramModel: string;
  dispatcher: DispatcherConfig;
  verbose: boolean;
}

function numEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const n = Number.parseInt(raw, 10);
  return Number.isFinite(n) ? n : fallback;
}

function floatEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  const n = Number.parseFloat(raw);
  return Number.isFinite(n) ? n : fallback;
}

function boolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
}

function strEnv(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Selected transcription backend, defaulting to OpenAI
 */
export function getBackendKind(env: Env = process.env): BackendKind {
  const raw = strEnv(env, 'TRANSCRIPTION_BACKEND')?.toLowerCase() ?? 'openai';
  if (!isBackendKind(raw)) {
    throw new ConfigurationError(
      `[Scribe] TRANSCRIPTION_BACKEND must be "openai" or "deepgram", got "${raw}"`
    );
  }
  return raw;
}

function backendKeyName(backend: BackendKind): string {
  return backend === 'deepgram' ? 'DEEPGRAM_API_KEY' : 'OPENAI_API_KEY';
}

function requireVariables(env: Env, required: string[]): void {
  const missing = required.filter((key) => !strEnv(env, key));

  if (missing.length > 0) {
    throw new ConfigurationError(
      `[Scribe] Missing required environment variables:\n` +
      missing.map((v) => `  - ${v}`).join('\n') +
      `\n\nPlease check your .env file.`,
      missing
    );
  }
}

/**
 * Check required variables. Throws a ConfigurationError listing every
 * missing one.
 */
export function validateEnvironment(env: Env = process.env): void {
  requireVariables(env, [
    'LIVEKIT_URL',
    'LIVEKIT_API_KEY',
    'LIVEKIT_API_SECRET',
    backendKeyName(getBackendKind(env)),
  ]);
}

function dispatcherEnv(env: Env, verbose: boolean): DispatcherConfig {
  return {
    concurrency: numEnv(env, 'TRANSCRIPTION_CONCURRENCY', DEFAULT_DISPATCHER_CONFIG.concurrency),
    maxRetries: numEnv(env, 'TRANSCRIPTION_MAX_RETRIES', DEFAULT_DISPATCHER_CONFIG.maxRetries),
    retryDelayMs: numEnv(env, 'TRANSCRIPTION_RETRY_DELAY_MS', DEFAULT_DISPATCHER_CONFIG.retryDelayMs),
    maxRetryDelayMs: numEnv(env, 'TRANSCRIPTION_MAX_RETRY_DELAY_MS', DEFAULT_DISPATCHER_CONFIG.maxRetryDelayMs),
    callTimeoutMs: numEnv(env, 'TRANSCRIPTION_TIMEOUT_MS', DEFAULT_DISPATCHER_CONFIG.callTimeoutMs),
    verbose,
  };
}

export function loadScribeConfig(env: Env = process.env): ScribeConfig {
  validateEnvironment(env);

  const verbose = boolEnv(env, 'VERBOSE', false);

  return {
    livekit: {
      url: strEnv(env, 'LIVEKIT_URL') ?? '',
      apiKey: strEnv(env, 'LIVEKIT_API_KEY') ?? '',
      apiSecret: strEnv(env, 'LIVEKIT_API_SECRET') ?? '',
    },
    backend: getBackendKind(env),
    openaiApiKey: strEnv(env, 'OPENAI_API_KEY'),
    deepgramApiKey: strEnv(env, 'DEEPGRAM_API_KEY'),
    whisperModel: strEnv(env, 'WHISPER_MODEL') ?? 'whisper-1',
    whisperLanguage: strEnv(env, 'WHISPER_LANGUAGE') ?? 'en',
    deepgramModel: strEnv(env, 'DEEPGRAM_MODEL') ?? 'nova-3',
    summaryModel: strEnv(env, 'SUMMARY_MODEL') ?? 'gpt-4o-mini',
    participantMapPath: strEnv(env, 'PARTICIPANT_MAP_PATH'),
    outputDir: strEnv(env, 'SCRIBE_OUTPUT_DIR') ?? '.logs',
    sampleRate: numEnv(env, 'AUDIO_SAMPLE_RATE', 16000),
    emptyRoomGraceMs: numEnv(env, 'EMPTY_ROOM_GRACE_MS', 60_000),
    segmenter: {
      silenceThresholdMs: numEnv(env, 'SILENCE_THRESHOLD_MS', DEFAULT_SEGMENTER_CONFIG.silenceThresholdMs),
      maxUtteranceMs: numEnv(env, 'MAX_UTTERANCE_MS', DEFAULT_SEGMENTER_CONFIG.maxUtteranceMs),
      energyThreshold: floatEnv(env, 'VOICE_ENERGY_THRESHOLD', DEFAULT_SEGMENTER_CONFIG.energyThreshold),
      verbose,
    },
    dispatcher: dispatcherEnv(env, verbose),
    verbose,
  };
}

/**
 * Backend settings for transcribing a file. Needs only the selected
 * backend's key; `backend` overrides TRANSCRIPTION_BACKEND.
 */
export function loadFileTranscriptionConfig(env: Env = process.env, backend?: string): FileTranscriptionConfig {
  const kind = getBackendKind(backend === undefined ? env : { ...env, TRANSCRIPTION_BACKEND: backend });
  requireVariables(env, [backendKeyName(kind)]);

  const verbose = boolEnv(env, 'VERBOSE', false);

  return {
    backend: kind,
    openaiApiKey: strEnv(env, 'OPENAI_API_KEY'),
    deepgramApiKey: strEnv(env, 'DEEPGRAM_API_KEY'),
    whisperModel: strEnv(env, 'WHISPER_MODEL') ?? 'whisper-1',
    whisperLanguage: strEnv(env, 'WHISPER_LANGUAGE') ?? 'en',
    deepgramModel: strEnv(env, 'DEEPGRAM_MODEL') ?? 'nova-3',
    dispatcher: dispatcherEnv(env, verbose),
    verbose,
  };
}
