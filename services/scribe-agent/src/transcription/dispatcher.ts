/**
 * Transcription Dispatcher
 *
 * Sends sealed utterances to the transcription backend without ever blocking
 * frame ingestion. Every submitted utterance ends in exactly one 'fragment'
 * event, either ok or failed.
 *
 *   submit() ──▶ per-speaker FIFO ──round robin──▶ [ N in flight ] ──▶ 'fragment'
 *                                                      │    ▲
 *                                        transient / timeout └─ backoff
 *
 * Fragments are emitted in completion order. Reordering is the assembler's job.
 */

import { EventEmitter } from 'events';
import type { TranscriptFragment } from '@voice-scribe/types';
import type { Utterance } from '../audio/segmenter.js';
import { PermanentBackendError, TransientBackendError, errorMessage } from '../errors.js';
import type { TranscriptionBackend } from './backend.js';

// =============================================================================
// Types
// =============================================================================

export interface DispatcherConfig {
  /** Max backend calls in flight at once */
  concurrency: number;
  /** Retries after the first attempt; transient failures only */
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  /** Per-attempt cap; exceeding it aborts the call */
  callTimeoutMs: number;
  verbose: boolean;
}

export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
  concurrency: 4,
  maxRetries: 3,
  retryDelayMs: 500,
  maxRetryDelayMs: 8000,
  callTimeoutMs: 30_000,
  verbose: false,
};

export interface DispatcherStatus {
  queued: number;
  inFlight: number;
  peakInFlight: number;
  submitted: number;
  completed: number;
  failed: number;
  retries: number;
  averageLatencyMs: number;
}

/**
 * Backoff before the given retry (1-based)
 */
export function retryDelay(attempt: number, config: Pick<DispatcherConfig, 'retryDelayMs' | 'maxRetryDelayMs'>): number {
  return Math.min(config.retryDelayMs * 2 ** (attempt - 1), config.maxRetryDelayMs);
}

// =============================================================================
// Transcription Dispatcher Class
// =============================================================================

export class TranscriptionDispatcher extends EventEmitter {
  private backend: TranscriptionBackend;
  private config: DispatcherConfig;

  private queues: Map<string, Utterance[]> = new Map();
  /** Speakers with queued work, in round-robin order */
  private speakerOrder: string[] = [];
  private cursor: number = 0;
  private inFlight: number = 0;
  private drainWaiters: Array<() => void> = [];

  private stats = {
    peakInFlight: 0,
    submitted: 0,
    completed: 0,
    failed: 0,
    retries: 0,
    totalLatencyMs: 0,
  };

  constructor(backend: TranscriptionBackend, config: Partial<DispatcherConfig> = {}) {
    super();
    this.backend = backend;
    this.config = { ...DEFAULT_DISPATCHER_CONFIG, ...config };

    if (this.config.concurrency < 1) {
      this.config.concurrency = 1;
    }
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[Dispatcher] ${message}`);
    }
  }

  /**
   * Queue an utterance for transcription. Never blocks, never drops.
   */
  submit(utterance: Utterance): void {
    let queue = this.queues.get(utterance.speakerId);
    if (!queue) {
      queue = [];
      this.queues.set(utterance.speakerId, queue);
      this.speakerOrder.push(utterance.speakerId);
    }
    queue.push(utterance);
    this.stats.submitted++;

    this.log(`📥 Queued ${utterance.id} (${this.queuedCount()} waiting, ${this.inFlight} in flight)`);
    this.pump();
  }

  /**
   * Resolves once nothing is queued or in flight
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  isIdle(): boolean {
    return this.inFlight === 0 && this.speakerOrder.length === 0;
  }

  private pump(): void {
    while (this.inFlight < this.config.concurrency) {
      const next = this.takeNext();
      if (!next) break;

      this.inFlight++;
      this.stats.peakInFlight = Math.max(this.stats.peakInFlight, this.inFlight);

      this.process(next).catch((error) => {
        console.error(`[Dispatcher] ❌ Unexpected failure for ${next.id}:`, error);
      });
    }
  }

  /**
   * Next utterance: FIFO within a speaker, round robin across speakers
   */
  private takeNext(): Utterance | null {
    if (this.speakerOrder.length === 0) return null;

    const index = this.cursor % this.speakerOrder.length;
    const speakerId = this.speakerOrder[index];
    const queue = this.queues.get(speakerId);
    const utterance = queue?.shift();

    if (!queue || queue.length === 0) {
      this.queues.delete(speakerId);
      this.speakerOrder.splice(index, 1);
      this.cursor = index;
    } else {
      this.cursor = index + 1;
    }

    return utterance ?? null;
  }

  private async process(utterance: Utterance): Promise<void> {
    const startedAt = Date.now();
    let attempts = 0;

    try {
      for (;;) {
        attempts++;
        let text: string;
        try {
          text = await this.attempt(utterance);
        } catch (error) {
          const retryable = !(error instanceof PermanentBackendError);

          if (!retryable || attempts > this.config.maxRetries) {
            console.warn(
              `[Dispatcher] ⚠️ ${utterance.id} failed after ${attempts} attempt(s): ${errorMessage(error)}`
            );
            this.finish(utterance, { text: '', status: 'failed', attempts, error: errorMessage(error) }, startedAt);
            return;
          }

          const delay = retryDelay(attempts, this.config);
          this.stats.retries++;
          this.log(`🔁 Retrying ${utterance.id} in ${delay}ms (${errorMessage(error)})`);
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        this.finish(utterance, { text, status: 'ok', attempts }, startedAt);
        return;
      }
    } finally {
      this.inFlight--;
      this.pump();
      this.notifyIfIdle();
    }
  }

  /**
   * One backend call, capped by callTimeoutMs
   */
  private async attempt(utterance: Utterance): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TransientBackendError(
          this.backend.name,
          `No response within ${this.config.callTimeoutMs}ms`
        );
        controller.abort(error);
        reject(error);
      }, this.config.callTimeoutMs);
    });

    try {
      return await Promise.race([
        this.backend.transcribe(utterance, { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }

  private finish(
    utterance: Utterance,
    result: Pick<TranscriptFragment, 'text' | 'status' | 'attempts' | 'error'>,
    startedAt: number
  ): void {
    this.stats.totalLatencyMs += Date.now() - startedAt;
    if (result.status === 'ok') {
      this.stats.completed++;
    } else {
      this.stats.failed++;
    }

    const fragment: TranscriptFragment = {
      speakerId: utterance.speakerId,
      startTimestamp: utterance.startTimestamp,
      endTimestamp: utterance.endTimestamp,
      ...result,
    };

    this.log(`📝 ${utterance.id} -> ${fragment.status} after ${fragment.attempts} attempt(s)`);
    this.emit('fragment', fragment);
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;

    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private queuedCount(): number {
    let count = 0;
    for (const queue of this.queues.values()) {
      count += queue.length;
    }
    return count;
  }

  getStatus(): DispatcherStatus {
    const done = this.stats.completed + this.stats.failed;
    return {
      queued: this.queuedCount(),
      inFlight: this.inFlight,
      peakInFlight: this.stats.peakInFlight,
      submitted: this.stats.submitted,
      completed: this.stats.completed,
      failed: this.stats.failed,
      retries: this.stats.retries,
      averageLatencyMs: done === 0 ? 0 : Math.round(this.stats.totalLatencyMs / done),
    };
  }
}

export default TranscriptionDispatcher;
