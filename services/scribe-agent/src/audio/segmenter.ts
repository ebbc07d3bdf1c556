/**
 * Audio Segmenter
 *
 * One instance per speaker. Accumulates that speaker's frames and cuts them
 * into utterances at silence boundaries:
 *
 *   frames ──▶ [ leading silence dropped ] ──▶ pending buffer
 *                                                  │
 *                    silence >= threshold ─────────┤
 *                    span >= max duration ─────────┼──▶ Utterance
 *                    flush() (leave / stop) ───────┘
 *
 * ingest() and flush() are synchronous, so a flush can never interleave with
 * a half-applied ingest on the same stream.
 */

import {
  concatSamples,
  frameDurationMs,
  isVoicedFrame,
  type AudioFrame,
} from './pcm.js';

// =============================================================================
// Types
// =============================================================================

export interface SegmenterConfig {
  /** Trailing silence that closes an utterance */
  silenceThresholdMs: number;
  /** Hard cap on utterance length, closes even mid-speech */
  maxUtteranceMs: number;
  /** Normalized RMS (0..1) at or above which a frame counts as voiced */
  energyThreshold: number;
  verbose: boolean;
}

export const DEFAULT_SEGMENTER_CONFIG: SegmenterConfig = {
  silenceThresholdMs: 800,
  maxUtteranceMs: 30_000,
  energyThreshold: 0.015,
  verbose: false,
};

export type UtteranceReason = 'silence' | 'max-duration' | 'flush';

export interface Utterance {
  id: string;
  speakerId: string;
  startTimestamp: number;
  endTimestamp: number;
  samples: Int16Array;
  sampleRate: number;
  channels: number;
  reason: UtteranceReason;
}

/**
 * Per-speaker buffering state
 */
export interface SpeakerStream {
  speakerId: string;
  frames: AudioFrame[];
  lastVoiceFrameIndex: number | null;
  /** Consecutive silent frames since the last voiced one */
  silenceRunLength: number;
}

export interface SegmenterStats {
  framesIngested: number;
  framesDropped: number;
  utterancesEmitted: number;
}

export function utteranceId(speakerId: string, startTimestamp: number): string {
  return `${speakerId}@${startTimestamp}`;
}

// =============================================================================
// Audio Segmenter Class
// =============================================================================

export class AudioSegmenter {
  public readonly speakerId: string;
  private config: SegmenterConfig;
  private stream: SpeakerStream;
  private silenceRunMs: number = 0;
  private lastFrameIndex: number | null = null;
  private lastEmittedEnd: number | null = null;
  private stats: SegmenterStats = {
    framesIngested: 0,
    framesDropped: 0,
    utterancesEmitted: 0,
  };

  constructor(speakerId: string, config: Partial<SegmenterConfig> = {}) {
    this.speakerId = speakerId;
    this.config = { ...DEFAULT_SEGMENTER_CONFIG, ...config };
    this.stream = {
      speakerId,
      frames: [],
      lastVoiceFrameIndex: null,
      silenceRunLength: 0,
    };
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[Segmenter:${this.speakerId}] ${message}`);
    }
  }

  /**
   * Add a frame. Returns the utterance it completed, if any.
   */
  ingest(frame: AudioFrame): Utterance | null {
    if (frame.speakerId !== this.speakerId) {
      console.warn(`[Segmenter:${this.speakerId}] ⚠️ Frame for ${frame.speakerId} rejected`);
      this.stats.framesDropped++;
      return null;
    }

    if (this.lastFrameIndex !== null && frame.frameIndex <= this.lastFrameIndex) {
      console.warn(
        `[Segmenter:${this.speakerId}] ⚠️ Out-of-order frame ${frame.frameIndex} (last ${this.lastFrameIndex}) dropped`
      );
      this.stats.framesDropped++;
      return null;
    }
    this.lastFrameIndex = frame.frameIndex;

    if (frame.samples.length === 0) {
      this.stats.framesDropped++;
      return null;
    }

    const voiced = isVoicedFrame(frame, this.config.energyThreshold);

    // Nothing audible yet - don't start a buffer on silence
    if (!voiced && this.stream.frames.length === 0) {
      this.stats.framesDropped++;
      return null;
    }

    this.stream.frames.push(frame);
    this.stats.framesIngested++;

    if (voiced) {
      this.stream.lastVoiceFrameIndex = frame.frameIndex;
      this.stream.silenceRunLength = 0;
      this.silenceRunMs = 0;
    } else {
      this.stream.silenceRunLength++;
      this.silenceRunMs += frameDurationMs(frame);

      if (this.silenceRunMs >= this.config.silenceThresholdMs) {
        return this.seal('silence');
      }
    }

    const first = this.stream.frames[0];
    const span = frame.captureTimestamp + frameDurationMs(frame) - first.captureTimestamp;
    if (span >= this.config.maxUtteranceMs) {
      return this.seal('max-duration');
    }

    return null;
  }

  /**
   * Seal whatever voiced audio is buffered, regardless of silence state
   */
  flush(): Utterance | null {
    return this.seal('flush');
  }

  private seal(reason: UtteranceReason): Utterance | null {
    const frames = this.stream.frames;
    const lastVoiceIndex = this.stream.lastVoiceFrameIndex;
    const cut = lastVoiceIndex === null
      ? -1
      : frames.findIndex((f) => f.frameIndex === lastVoiceIndex);

    this.reset();

    if (cut < 0) {
      return null;
    }

    const voicedFrames = frames.slice(0, cut + 1);
    const first = voicedFrames[0];
    const last = voicedFrames[voicedFrames.length - 1];

    // Same-speaker utterances never overlap, even if capture clocks jitter
    const startTimestamp = this.lastEmittedEnd === null
      ? first.captureTimestamp
      : Math.max(first.captureTimestamp, this.lastEmittedEnd);
    const endTimestamp = Math.max(
      last.captureTimestamp + frameDurationMs(last),
      startTimestamp + 1
    );
    this.lastEmittedEnd = endTimestamp;

    const utterance: Utterance = {
      id: utteranceId(this.speakerId, startTimestamp),
      speakerId: this.speakerId,
      startTimestamp,
      endTimestamp,
      samples: concatSamples(voicedFrames),
      sampleRate: first.sampleRate,
      channels: first.channels,
      reason,
    };

    this.stats.utterancesEmitted++;
    this.log(
      `✂️ Utterance ${utterance.id} (${reason}, ${Math.round(endTimestamp - startTimestamp)}ms, ${voicedFrames.length} frames)`
    );

    return utterance;
  }

  private reset(): void {
    this.stream.frames = [];
    this.stream.lastVoiceFrameIndex = null;
    this.stream.silenceRunLength = 0;
    this.silenceRunMs = 0;
  }

  /**
   * Copy of the buffering state
   */
  getState(): SpeakerStream {
    return {
      ...this.stream,
      frames: [...this.stream.frames],
    };
  }

  hasPendingAudio(): boolean {
    return this.stream.lastVoiceFrameIndex !== null;
  }

  getStats(): SegmenterStats {
    return { ...this.stats };
  }
}

export default AudioSegmenter;
