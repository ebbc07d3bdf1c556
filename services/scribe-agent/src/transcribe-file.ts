/**
 * File Transcription Entry Point
 *
 * Transcribes a recorded 16-bit PCM WAV file with the configured backend.
 *
 * Usage:
 *   npm run transcribe -- meeting.wav
 *   npm run transcribe -- meeting.wav -o meeting.txt --backend deepgram
 */

import dotenv from 'dotenv';
import { join } from 'path';
import { writeFile } from 'fs/promises';

// npm scripts run from the monorepo root
dotenv.config({ path: join(process.cwd(), '.env') });

import { loadFileTranscriptionConfig } from './config/env.js';
import { createTranscriptionBackend } from './transcription/create-backend.js';
import { parseTranscribeFileArgs, transcribeFile } from './file/file-transcriber.js';
import { errorMessage } from './errors.js';

const HELP = `
Usage: npm run transcribe -- <audio-file> [options]

Arguments:
  audio-file              16-bit PCM WAV file to transcribe

Options:
  -o, --output <file>     Write the transcript here instead of the console
  -b, --backend <name>    openai | deepgram (default: TRANSCRIPTION_BACKEND or openai)
  -h, --help              Show this help message

Environment Variables:
  OPENAI_API_KEY          Required for the openai backend
  DEEPGRAM_API_KEY        Required for the deepgram backend
  WHISPER_MODEL, WHISPER_LANGUAGE, DEEPGRAM_MODEL, TRANSCRIPTION_* as for the agent
`;

async function main(): Promise<void> {
  const args = parseTranscribeFileArgs(process.argv.slice(2));
  if (args.help || !args.audioFile) {
    console.log(HELP);
    process.exit(args.help ? 0 : 1);
  }

  const config = loadFileTranscriptionConfig(process.env, args.backend ?? undefined);
  const result = await transcribeFile(args.audioFile, {
    backend: createTranscriptionBackend(config),
    dispatcher: config.dispatcher,
    verbose: config.verbose,
  });

  if (args.output) {
    await writeFile(args.output, result.text, 'utf-8');
    console.log(`Transcript saved to: ${args.output}`);
  } else {
    console.log('\n' + '='.repeat(50));
    console.log('TRANSCRIPT:');
    console.log('='.repeat(50));
    console.log(result.text);
  }
}

main().catch((error) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
