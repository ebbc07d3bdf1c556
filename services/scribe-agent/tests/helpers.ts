import type { ParticipantNames, Transcript, TranscriptFragment } from '@voice-scribe/types';
import { createAudioFrame, type AudioFrame } from '../src/audio/pcm.js';
import { utteranceId, type Utterance } from '../src/audio/segmenter.js';
import type { TranscribeOptions, TranscriptionBackend } from '../src/transcription/backend.js';
import type { ExportResult, TranscriptExporter } from '../src/export/transcript-exporter.js';

export const FRAME_MS = 20;
/** 20ms at 16kHz mono */
export const SAMPLES_PER_FRAME = 320;

export function voicedSamples(amplitude = 8000): Int16Array {
  return new Int16Array(SAMPLES_PER_FRAME).fill(amplitude);
}

export function silentSamples(): Int16Array {
  return new Int16Array(SAMPLES_PER_FRAME);
}

/**
 * Produces consecutive 20ms frames for one speaker
 */
export class FrameFeeder {
  readonly speakerId: string;
  private index = 0;
  private timestamp: number;

  constructor(speakerId: string, startTimestamp = 0) {
    this.speakerId = speakerId;
    this.timestamp = startTimestamp;
  }

  private next(samples: Int16Array): AudioFrame {
    const frame = createAudioFrame(samples, this.speakerId, this.index, this.timestamp);
    this.index++;
    this.timestamp += FRAME_MS;
    return frame;
  }

  voiced(count: number): AudioFrame[] {
    return Array.from({ length: count }, () => this.next(voicedSamples()));
  }

  silent(count: number): AudioFrame[] {
    return Array.from({ length: count }, () => this.next(silentSamples()));
  }
}

export function makeUtterance(speakerId: string, startTimestamp: number, endTimestamp = startTimestamp + 1000): Utterance {
  return {
    id: utteranceId(speakerId, startTimestamp),
    speakerId,
    startTimestamp,
    endTimestamp,
    samples: voicedSamples(),
    sampleRate: 16000,
    channels: 1,
    reason: 'silence',
  };
}

export function makeFragment(
  speakerId: string,
  startTimestamp: number,
  text: string,
  overrides: Partial<TranscriptFragment> = {}
): TranscriptFragment {
  return {
    speakerId,
    startTimestamp,
    endTimestamp: startTimestamp + 1000,
    text,
    status: 'ok',
    attempts: 1,
    ...overrides,
  };
}

type TranscribeHandler = (utterance: Utterance, options: TranscribeOptions, attempt: number) => Promise<string>;

/**
 * Backend whose behavior is scripted per call; tracks concurrency
 */
export class FakeBackend implements TranscriptionBackend {
  readonly name = 'fake';
  readonly calls: Utterance[] = [];
  readonly signals: AbortSignal[] = [];
  inFlight = 0;
  peakInFlight = 0;
  private attempts = new Map<string, number>();
  private handler: TranscribeHandler;

  constructor(handler: TranscribeHandler = async (u) => `text for ${u.id}`) {
    this.handler = handler;
  }

  async transcribe(utterance: Utterance, options: TranscribeOptions): Promise<string> {
    const attempt = (this.attempts.get(utterance.id) ?? 0) + 1;
    this.attempts.set(utterance.id, attempt);
    this.calls.push(utterance);
    this.signals.push(options.signal);

    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    try {
      return await this.handler(utterance, options, attempt);
    } finally {
      this.inFlight--;
    }
  }
}

export class MemoryExporter implements TranscriptExporter {
  readonly renders: Array<{ transcript: Transcript; names: ParticipantNames }> = [];
  failWith: Error | null = null;

  async render(transcript: Transcript, names: ParticipantNames): Promise<ExportResult> {
    this.renders.push({ transcript, names });
    if (this.failWith) {
      throw this.failWith;
    }
    return {
      transcriptPath: `/tmp/session-${this.renders.length}.log`,
      documentPath: `/tmp/session-${this.renders.length}.md`,
    };
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
