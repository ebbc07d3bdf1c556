/**
 * Transcript Assembler
 *
 * Single owner of the growing transcript. Fragments arrive in completion order
 * from the dispatcher and are inserted by (startTimestamp, speakerId), so a
 * snapshot is always chronological no matter which backend call finished first.
 */

import { EventEmitter } from 'events';
import type { Transcript, TranscriptFragment } from '@voice-scribe/types';
import { DuplicateFragmentError } from '../errors.js';

export interface AssemblerConfig {
  verbose: boolean;
}

export interface AssemblerStats {
  fragments: number;
  failed: number;
  duplicates: number;
  lateFragments: number;
}

function fragmentKey(speakerId: string, startTimestamp: number): string {
  return `${speakerId}@${startTimestamp}`;
}

/**
 * Total order used for the transcript. Speaker ids compare by code unit,
 * independent of locale.
 */
export function compareFragments(
  a: Pick<TranscriptFragment, 'startTimestamp' | 'speakerId'>,
  b: Pick<TranscriptFragment, 'startTimestamp' | 'speakerId'>
): number {
  if (a.startTimestamp !== b.startTimestamp) {
    return a.startTimestamp - b.startTimestamp;
  }
  if (a.speakerId === b.speakerId) return 0;
  return a.speakerId < b.speakerId ? -1 : 1;
}

export class TranscriptAssembler extends EventEmitter {
  private config: AssemblerConfig;
  private fragments: TranscriptFragment[] = [];
  private keys: Set<string> = new Set();
  private sealed: boolean = false;
  private sessionStartedAt: number | null = null;
  private stats: AssemblerStats = {
    fragments: 0,
    failed: 0,
    duplicates: 0,
    lateFragments: 0,
  };

  constructor(config: Partial<AssemblerConfig> = {}) {
    super();
    this.config = { verbose: false, ...config };
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[Assembler] ${message}`);
    }
  }

  setSessionStart(timestamp: number): void {
    this.sessionStartedAt = timestamp;
  }

  /**
   * Insert a fragment in order. Returns false for a duplicate, which is
   * reported and otherwise ignored.
   */
  addFragment(fragment: TranscriptFragment): boolean {
    const key = fragmentKey(fragment.speakerId, fragment.startTimestamp);
    if (this.keys.has(key)) {
      const error = new DuplicateFragmentError(fragment.speakerId, fragment.startTimestamp);
      this.stats.duplicates++;
      console.warn(`[Assembler] ⚠️ ${error.message}, ignoring`);
      this.emit('duplicate', error);
      return false;
    }

    const late = this.sealed;
    const index = this.upperBound(fragment);
    this.fragments.splice(index, 0, Object.freeze({ ...fragment }));
    this.keys.add(key);

    this.stats.fragments++;
    if (fragment.status === 'failed') {
      this.stats.failed++;
    }

    if (late) {
      this.stats.lateFragments++;
      console.warn(`[Assembler] ⚠️ Late fragment ${key} added after seal`);
      this.emit('late-fragment', fragment);
    } else {
      this.log(`➕ ${key} at position ${index}/${this.fragments.length}`);
    }

    return true;
  }

  /**
   * First index whose fragment sorts after the new one
   */
  private upperBound(fragment: TranscriptFragment): number {
    let lo = 0;
    let hi = this.fragments.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareFragments(this.fragments[mid], fragment) <= 0) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }

  has(speakerId: string, startTimestamp: number): boolean {
    return this.keys.has(fragmentKey(speakerId, startTimestamp));
  }

  /**
   * Frozen copy of the current ordered transcript
   */
  snapshot(): Transcript {
    return Object.freeze({
      fragments: Object.freeze([...this.fragments]),
      sealed: this.sealed,
      sessionStartedAt: this.sessionStartedAt,
    });
  }

  seal(): Transcript {
    this.sealed = true;
    this.log(`🔒 Sealed with ${this.fragments.length} fragments`);
    return this.snapshot();
  }

  isSealed(): boolean {
    return this.sealed;
  }

  get size(): number {
    return this.fragments.length;
  }

  getStats(): AssemblerStats {
    return { ...this.stats };
  }
}

export default TranscriptAssembler;
