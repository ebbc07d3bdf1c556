/**
 * Scribe Agent Entry Point
 *
 * Joins a LiveKit room and transcribes every speaker into an ordered,
 * attributed meeting transcript.
 *
 * Usage:
 *   npm start -- room-name                # Join and wait for scribe_start
 *   npm start -- room-name --auto-start   # Start capturing immediately
 *
 * Room data messages (JSON, "type" field):
 *   scribe_connect, scribe_start, scribe_stop,
 *   scribe_reload_participants, scribe_summarize, scribe_status,
 *   scribe_disconnect
 */

import dotenv from 'dotenv';
import { join } from 'path';

// npm scripts run from the monorepo root
dotenv.config({ path: join(process.cwd(), '.env') });

import { createScribeAgent, type ScribeAgent } from './scribe-agent.js';
import { loadScribeConfig } from './config/env.js';
import type { StopResult } from './session/controller.js';
import type { SessionStateChange } from '@voice-scribe/types';

// =============================================================================
// Banner
// =============================================================================

console.log('='.repeat(60));
console.log('📝 Voice Scribe - LiveKit Transcription Agent');
console.log('   Version: 0.1.0');
console.log('='.repeat(60));

// =============================================================================
// CLI Interface
// =============================================================================

interface CliOptions {
  roomName: string;
  autoStart: boolean;
  quiet: boolean;
}

const HELP = `
Usage: node dist/services/scribe-agent/src/index.js [room-name] [options]

Arguments:
  room-name           LiveKit room name to join (default: LIVEKIT_ROOM or test-room)

Options:
  --room <name>       LiveKit room name to join
  --auto-start        Start capturing as soon as the room is joined
  -q, --quiet         Reduce logging verbosity
  -h, --help          Show this help message

Environment Variables:
  LIVEKIT_URL                   LiveKit server URL (required)
  LIVEKIT_API_KEY               LiveKit API key (required)
  LIVEKIT_API_SECRET            LiveKit API secret (required)
  TRANSCRIPTION_BACKEND         openai | deepgram (default: openai)
  OPENAI_API_KEY                Required for the openai backend and summaries
  DEEPGRAM_API_KEY              Required for the deepgram backend
  WHISPER_MODEL                 Whisper model (default: whisper-1)
  WHISPER_LANGUAGE              Spoken language (default: en)
  DEEPGRAM_MODEL                Deepgram model (default: nova-3)
  SUMMARY_MODEL                 Summary model (default: gpt-4o-mini)
  PARTICIPANT_MAP_PATH          JSON file mapping identities to names
  SCRIBE_OUTPUT_DIR             Transcript output directory (default: .logs)
  SILENCE_THRESHOLD_MS          Silence that ends an utterance (default: 800)
  MAX_UTTERANCE_MS              Longest utterance (default: 30000)
  VOICE_ENERGY_THRESHOLD        Voiced-frame RMS threshold, 0..1 (default: 0.015)
  AUDIO_SAMPLE_RATE             Capture sample rate (default: 16000)
  TRANSCRIPTION_CONCURRENCY     Parallel backend calls (default: 4)
  TRANSCRIPTION_MAX_RETRIES     Retries per utterance (default: 3)
  TRANSCRIPTION_RETRY_DELAY_MS  First retry delay (default: 500)
  TRANSCRIPTION_MAX_RETRY_DELAY_MS  Backoff cap (default: 8000)
  TRANSCRIPTION_TIMEOUT_MS      Per-call timeout (default: 30000)
  EMPTY_ROOM_GRACE_MS           Stop capture after an empty room (default: 60000)
  VERBOSE                       Enable verbose logging (true/false)

Examples:
  npm start -- standup
  npm start -- --room standup --auto-start
`;

function parseArgs(argv: string[]): CliOptions {
  let roomName = process.env.LIVEKIT_ROOM || 'test-room';
  let autoStart = false;
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      console.log(HELP);
      process.exit(0);
    }

    if (arg === '--room' && argv[i + 1]) {
      roomName = argv[i + 1];
      i++;
    } else if (arg === '--auto-start') {
      autoStart = true;
    } else if (arg === '--quiet' || arg === '-q') {
      quiet = true;
    } else if (!arg.startsWith('-')) {
      // First non-flag argument is the room name
      roomName = arg;
    }
  }

  return { roomName, autoStart, quiet };
}

// =============================================================================
// Agent Runner
// =============================================================================

let agent: ScribeAgent | null = null;

async function runAgent(options: CliOptions): Promise<void> {
  const config = loadScribeConfig();
  if (options.quiet) {
    config.verbose = false;
    config.segmenter.verbose = false;
    config.dispatcher.verbose = false;
  }

  console.log(`[Scribe] 🚀 Starting for room ${options.roomName} (backend: ${config.backend})`);

  agent = await createScribeAgent(options.roomName, config);
  const controller = agent.getController();

  controller.on('state-change', (change: SessionStateChange) => {
    console.log(`[Scribe] 🔄 Session ${change.from} -> ${change.to}`);
  });

  controller.on('finalized', (result: StopResult) => {
    if (result.export) {
      console.log(`[Scribe] 💾 Transcript: ${result.export.transcriptPath}`);
    } else {
      console.warn(`[Scribe] ⚠️ Finalized without export: ${result.exportError ?? 'unknown error'}`);
    }
  });

  await agent.connect();

  if (options.autoStart) {
    agent.startSession();
  }

  console.log('[Scribe] 🏃 Running. Press Ctrl+C to stop.');

  let shuttingDown = false;
  const cleanup = async (): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('[Scribe] 🛑 Shutdown signal received');
    await agent?.disconnect();
    process.exit(0);
  };

  const onSignal = (): void => {
    cleanup().catch((error) => {
      console.error('[Scribe] ❌ Shutdown failed:', error);
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  await runAgent(options);
}

main().catch((error) => {
  console.error('[Scribe] ❌ Fatal error:', error);
  process.exit(1);
});
