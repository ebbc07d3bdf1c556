/**
 * File Transcriber
 *
 * Transcribes a recorded WAV file through the same dispatcher and assembler
 * the live session uses. The file is cut into fixed-length chunks, each
 * chunk becomes one utterance of a single "file" speaker.
 *
 *   file.wav ─▶ decodeWav ─▶ chunkRecording ─▶ TranscriptionDispatcher
 *                                                      │
 *                                    TranscriptAssembler ◀┘ ─▶ joined text
 */

import { readFile } from 'fs/promises';
import type { Transcript, TranscriptFragment } from '@voice-scribe/types';
import { decodeWav, type DecodedWav } from '../audio/pcm.js';
import { utteranceId, type Utterance } from '../audio/segmenter.js';
import { TranscriptionDispatcher, type DispatcherConfig } from '../transcription/dispatcher.js';
import type { TranscriptionBackend } from '../transcription/backend.js';
import { TranscriptAssembler } from '../transcript/assembler.js';
import { FAILED_FRAGMENT_TEXT } from '../export/transcript-exporter.js';
import { ScribeError } from '../errors.js';

// =============================================================================
// Types & Constants
// =============================================================================

export const FILE_SPEAKER_ID = 'file';
export const DEFAULT_CHUNK_MS = 10 * 60 * 1000;
/** Upload limit is 25 MB; keep a margin for the WAV header */
export const MAX_CHUNK_BYTES = 24 * 1024 * 1024;
export const MIN_DURATION_MS = 100;

export interface ChunkOptions {
  chunkMs?: number;
  speakerId?: string;
}

export interface FileTranscriberOptions extends ChunkOptions {
  backend: TranscriptionBackend;
  dispatcher?: Partial<DispatcherConfig>;
  verbose?: boolean;
}

export interface FileTranscriptionResult {
  text: string;
  transcript: Transcript;
  durationMs: number;
  chunks: number;
  failed: number;
}

// =============================================================================
// Chunking
// =============================================================================

export function durationMs(wav: DecodedWav): number {
  return (wav.samples.length / wav.channels / wav.sampleRate) * 1000;
}

/**
 * Longest chunk whose 16-bit body stays under MAX_CHUNK_BYTES
 */
export function maxChunkMs(sampleRate: number, channels: number): number {
  const seconds = Math.floor(MAX_CHUNK_BYTES / (sampleRate * channels * 2));
  return seconds * 1000;
}

/**
 * Cut a recording into consecutive utterances timed from 0
 */
export function chunkRecording(wav: DecodedWav, options: ChunkOptions = {}): Utterance[] {
  const speakerId = options.speakerId ?? FILE_SPEAKER_ID;
  const chunkMs = Math.min(options.chunkMs ?? DEFAULT_CHUNK_MS, maxChunkMs(wav.sampleRate, wav.channels));
  const framesPerChunk = Math.max(1, Math.round((chunkMs * wav.sampleRate) / 1000));
  const totalFrames = Math.floor(wav.samples.length / wav.channels);

  const chunks: Utterance[] = [];
  for (let frame = 0; frame < totalFrames; frame += framesPerChunk) {
    const endFrame = Math.min(frame + framesPerChunk, totalFrames);
    const startTimestamp = Math.round((frame / wav.sampleRate) * 1000);
    chunks.push({
      id: utteranceId(speakerId, startTimestamp),
      speakerId,
      startTimestamp,
      endTimestamp: Math.round((endFrame / wav.sampleRate) * 1000),
      samples: wav.samples.subarray(frame * wav.channels, endFrame * wav.channels),
      sampleRate: wav.sampleRate,
      channels: wav.channels,
      reason: endFrame === totalFrames ? 'flush' : 'max-duration',
    });
  }
  return chunks;
}

function fragmentText(fragment: TranscriptFragment): string {
  return fragment.status === 'failed' ? FAILED_FRAGMENT_TEXT : fragment.text;
}

// =============================================================================
// Transcription
// =============================================================================

/**
 * Transcribe decoded audio. Chunks run concurrently; the text follows
 * audio order whatever order the backend answers in.
 */
export async function transcribeRecording(
  wav: DecodedWav,
  options: FileTranscriberOptions
): Promise<FileTranscriptionResult> {
  const duration = durationMs(wav);
  if (duration <= MIN_DURATION_MS) {
    throw new ScribeError('Audio file is too short or empty', 'AUDIO_TOO_SHORT', { durationMs: duration });
  }

  const verbose = options.verbose ?? false;
  const dispatcher = new TranscriptionDispatcher(options.backend, { ...options.dispatcher, verbose });
  const assembler = new TranscriptAssembler({ verbose });
  assembler.setSessionStart(0);

  dispatcher.on('fragment', (fragment: TranscriptFragment) => {
    assembler.addFragment(fragment);
  });

  const chunks = chunkRecording(wav, options);
  console.log(
    `[FileTranscriber] 🎧 ${(duration / 1000).toFixed(1)}s of audio in ${chunks.length} chunk(s) via ${options.backend.name}`
  );

  for (const chunk of chunks) {
    dispatcher.submit(chunk);
  }
  await dispatcher.drain();

  const transcript = assembler.seal();
  const failed = transcript.fragments.filter((fragment) => fragment.status === 'failed').length;
  if (failed > 0) {
    console.warn(`[FileTranscriber] ⚠️ ${failed} of ${chunks.length} chunk(s) failed`);
  }

  return {
    text: transcript.fragments.map(fragmentText).filter((text) => text.length > 0).join(' '),
    transcript,
    durationMs: duration,
    chunks: chunks.length,
    failed,
  };
}

export async function transcribeFile(
  filePath: string,
  options: FileTranscriberOptions
): Promise<FileTranscriptionResult> {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new ScribeError(`Audio file not found: ${filePath}`, 'AUDIO_NOT_FOUND', { cause: error });
  }

  console.log(`[FileTranscriber] 📂 Processing ${filePath}`);
  return transcribeRecording(decodeWav(buffer), options);
}

// =============================================================================
// CLI Arguments
// =============================================================================

export interface TranscribeFileArgs {
  audioFile: string | null;
  output: string | null;
  backend: string | null;
  help: boolean;
}

export function parseTranscribeFileArgs(argv: string[]): TranscribeFileArgs {
  const parsed: TranscribeFileArgs = { audioFile: null, output: null, backend: null, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      parsed.help = true;
    } else if ((arg === '-o' || arg === '--output') && i + 1 < argv.length) {
      parsed.output = argv[++i];
    } else if ((arg === '-b' || arg === '--backend') && i + 1 < argv.length) {
      parsed.backend = argv[++i];
    } else if (!arg.startsWith('-') && parsed.audioFile === null) {
      parsed.audioFile = arg;
    }
  }

  return parsed;
}
