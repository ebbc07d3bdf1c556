/**
 * PCM Frame Handling
 *
 * LiveKit delivers decoded linear16 frames per subscribed track. Each frame is
 * tagged with its speaker and a per-speaker sequence number before it reaches
 * the segmenter.
 */

import { endianness } from 'os';
import { ScribeError } from '../errors.js';

// =============================================================================
// Audio Configuration
// =============================================================================

export interface AudioConfig {
  encoding: 'linear16';
  sampleRate: number;
  channels: number;
}

/** 16kHz mono is what both transcription backends are happiest with */
export const LINEAR16_CONFIG: AudioConfig = {
  encoding: 'linear16',
  sampleRate: 16000,
  channels: 1,
};

const INT16_MAX = 32768;

// =============================================================================
// Audio Frame
// =============================================================================

export interface AudioFrame {
  speakerId: string;
  /** Monotonically increasing per speaker */
  frameIndex: number;
  /** Wall-clock ms when the frame was captured */
  captureTimestamp: number;
  samples: Int16Array;
  sampleRate: number;
  channels: number;
}

/**
 * Create an audio frame from raw samples
 */
export function createAudioFrame(
  samples: Int16Array,
  speakerId: string,
  frameIndex: number,
  captureTimestamp: number = Date.now(),
  config: AudioConfig = LINEAR16_CONFIG
): AudioFrame {
  return {
    speakerId,
    frameIndex,
    captureTimestamp,
    samples,
    sampleRate: config.sampleRate,
    channels: config.channels,
  };
}

export function frameDurationMs(frame: Pick<AudioFrame, 'samples' | 'sampleRate' | 'channels'>): number {
  if (frame.sampleRate <= 0 || frame.channels <= 0) return 0;
  return (frame.samples.length / frame.channels / frame.sampleRate) * 1000;
}

/**
 * Root-mean-square energy normalized to 0..1
 */
export function frameEnergy(samples: Int16Array): number {
  if (samples.length === 0) return 0;

  let sumSquares = 0;
  for (let i = 0; i < samples.length; i++) {
    const normalized = samples[i] / INT16_MAX;
    sumSquares += normalized * normalized;
  }

  return Math.sqrt(sumSquares / samples.length);
}

export function isVoicedFrame(frame: AudioFrame, energyThreshold: number): boolean {
  return frameEnergy(frame.samples) >= energyThreshold;
}

/**
 * Concatenate frame payloads into one contiguous buffer
 */
export function concatSamples(frames: readonly AudioFrame[]): Int16Array {
  const total = frames.reduce((sum, f) => sum + f.samples.length, 0);
  const combined = new Int16Array(total);

  let offset = 0;
  for (const frame of frames) {
    combined.set(frame.samples, offset);
    offset += frame.samples.length;
  }

  return combined;
}

// =============================================================================
// WAV Container
// =============================================================================

const WAV_HEADER_BYTES = 44;

/**
 * Wrap linear16 samples in a RIFF/WAVE container for upload
 */
export function encodeWav(samples: Int16Array, sampleRate: number, channels: number): Buffer {
  const dataBytes = samples.length * 2;
  const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataBytes);

  buffer.write('RIFF', 0, 'ascii');
  buffer.writeUInt32LE(36 + dataBytes, 4);
  buffer.write('WAVE', 8, 'ascii');
  buffer.write('fmt ', 12, 'ascii');
  buffer.writeUInt32LE(16, 16); // PCM chunk size
  buffer.writeUInt16LE(1, 20); // PCM format
  buffer.writeUInt16LE(channels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(sampleRate * channels * 2, 28); // byte rate
  buffer.writeUInt16LE(channels * 2, 32); // block align
  buffer.writeUInt16LE(16, 34); // bits per sample
  buffer.write('data', 36, 'ascii');
  buffer.writeUInt32LE(dataBytes, 40);

  if (endianness() === 'LE') {
    Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength).copy(buffer, WAV_HEADER_BYTES);
  } else {
    for (let i = 0; i < samples.length; i++) {
      buffer.writeInt16LE(samples[i], WAV_HEADER_BYTES + i * 2);
    }
  }

  return buffer;
}

export interface DecodedWav {
  samples: Int16Array;
  sampleRate: number;
  channels: number;
}

function unsupported(message: string): ScribeError {
  return new ScribeError(`Unsupported audio: ${message}`, 'UNSUPPORTED_AUDIO');
}

/**
 * Read a 16-bit PCM RIFF/WAVE file. Compressed formats are rejected.
 */
export function decodeWav(buffer: Buffer): DecodedWav {
  if (
    buffer.length < 12 ||
    buffer.toString('ascii', 0, 4) !== 'RIFF' ||
    buffer.toString('ascii', 8, 12) !== 'WAVE'
  ) {
    throw unsupported('not a RIFF/WAVE file');
  }

  let format: { sampleRate: number; channels: number } | null = null;
  let offset = 12;

  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4);
    const size = buffer.readUInt32LE(offset + 4);
    const body = offset + 8;

    if (id === 'fmt ') {
      const audioFormat = buffer.readUInt16LE(body);
      const bitsPerSample = buffer.readUInt16LE(body + 14);
      if (audioFormat !== 1 || bitsPerSample !== 16) {
        throw unsupported(`format ${audioFormat} at ${bitsPerSample} bits, expected 16-bit PCM`);
      }
      format = {
        channels: buffer.readUInt16LE(body + 2),
        sampleRate: buffer.readUInt32LE(body + 4),
      };
    } else if (id === 'data') {
      if (!format) {
        throw unsupported('data chunk before fmt chunk');
      }
      const end = Math.min(body + size, buffer.length);
      const samples = new Int16Array(Math.floor((end - body) / 2));
      for (let i = 0; i < samples.length; i++) {
        samples[i] = buffer.readInt16LE(body + i * 2);
      }
      return { samples, ...format };
    }

    // Chunks are word aligned
    offset = body + size + (size % 2);
  }

  throw unsupported('no data chunk');
}
