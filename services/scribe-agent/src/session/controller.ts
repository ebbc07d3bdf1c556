/**
 * Session Controller
 *
 * Governs when capture is active and owns everything a session allocates:
 * the per-speaker segmenters, the dispatcher and the assembler.
 *
 *   idle ──connect──▶ connecting ──startCapture──▶ capturing ──stopCapture──▶ stopping ──▶ finalized
 *     ▲                   │                            │                                      │
 *     └── source lost ────┘              source lost ──┘ (same path as stop)                  │
 *                                                                                             │
 *                              connecting ◀──────────── connect (new session) ────────────────┘
 *
 * A finalized transcript always exists once stopCapture() resolves, even when
 * the export fails.
 */

import { EventEmitter } from 'events';
import type {
  ParticipantNames,
  SessionState,
  SessionStateChange,
  Transcript,
  TranscriptFragment,
} from '@voice-scribe/types';
import type { AudioFrame } from '../audio/pcm.js';
import { AudioSegmenter, type SegmenterConfig, type Utterance } from '../audio/segmenter.js';
import type { TranscriptionBackend } from '../transcription/backend.js';
import {
  TranscriptionDispatcher,
  type DispatcherConfig,
  type DispatcherStatus,
} from '../transcription/dispatcher.js';
import { TranscriptAssembler, type AssemblerStats } from '../transcript/assembler.js';
import type { ParticipantRegistry } from '../registry/participant-registry.js';
import type { ExportResult, TranscriptExporter } from '../export/transcript-exporter.js';
import {
  AudioSourceDisconnectError,
  InvalidStateTransitionError,
  ScribeError,
  errorMessage,
} from '../errors.js';

// =============================================================================
// Types
// =============================================================================

export interface SessionControllerConfig {
  segmenter: Partial<SegmenterConfig>;
  dispatcher: Partial<DispatcherConfig>;
  verbose: boolean;
}

export interface SessionControllerDeps {
  backend: TranscriptionBackend;
  registry: ParticipantRegistry;
  exporter: TranscriptExporter;
}

export interface StopResult {
  transcript: Transcript;
  export: ExportResult | null;
  exportError?: string;
}

export interface SessionStatus {
  state: SessionState;
  sessionStartedAt: number | null;
  activeSpeakers: string[];
  framesDropped: number;
  utterances: number;
  transcript: AssemblerStats;
  dispatcher: DispatcherStatus | null;
  lastExport: ExportResult | null;
}

/** Allowed moves; anything else is an InvalidStateTransitionError */
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ['connecting'],
  connecting: ['capturing', 'idle'],
  capturing: ['stopping'],
  stopping: ['finalized'],
  finalized: ['connecting'],
};

const EMPTY_TRANSCRIPT: Transcript = Object.freeze({
  fragments: Object.freeze([]),
  sealed: false,
  sessionStartedAt: null,
});

const EMPTY_ASSEMBLER_STATS: AssemblerStats = {
  fragments: 0,
  failed: 0,
  duplicates: 0,
  lateFragments: 0,
};

/**
 * Everything one session allocates
 */
interface Session {
  segmenters: Map<string, AudioSegmenter>;
  dispatcher: TranscriptionDispatcher;
  assembler: TranscriptAssembler;
  names: ParticipantNames;
  startedAt: number | null;
  utterances: number;
}

// =============================================================================
// Session Controller Class
// =============================================================================

export class SessionController extends EventEmitter {
  private config: SessionControllerConfig;
  private deps: SessionControllerDeps;
  private state: SessionState = 'idle';
  private session: Session | null = null;
  private framesDropped: number = 0;
  private lastResult: StopResult | null = null;

  constructor(deps: SessionControllerDeps, config: Partial<SessionControllerConfig> = {}) {
    super();
    this.deps = deps;
    this.config = {
      segmenter: {},
      dispatcher: {},
      verbose: false,
      ...config,
    };
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[Session] ${message}`);
    }
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Begin a session. Allocates no speaker streams yet.
   */
  connect(): void {
    this.transition('connecting', 'connect');
    this.session = this.createSession();
    this.framesDropped = 0;
  }

  /**
   * Audio source is ready. Freezes the participant names for this session.
   */
  startCapture(): void {
    this.transition('capturing', 'start capture');

    const session = this.requireSession();
    session.names = this.deps.registry.snapshot();
    session.startedAt = Date.now();
    session.assembler.setSessionStart(session.startedAt);

    console.log(`[Session] 🎙️ Capture started (${session.names.size} named participant(s))`);
  }

  /**
   * Stop intake, flush every speaker, wait for in-flight transcriptions,
   * then seal and export once.
   */
  async stopCapture(): Promise<StopResult> {
    this.transition('stopping', 'stop capture');
    return this.finalize();
  }

  /**
   * The room connection went away. While capturing this takes the stop path
   * with whatever audio was received; while connecting it just resets.
   */
  async handleAudioSourceDisconnect(reason: string): Promise<StopResult | null> {
    const error = new AudioSourceDisconnectError(reason);

    switch (this.state) {
      case 'capturing':
        console.error(`[Session] ❌ ${error.message}, finalizing what was captured`);
        this.transition('stopping');
        return this.finalize();

      case 'connecting':
        console.warn(`[Session] ⚠️ ${error.message} before capture started`);
        this.transition('idle');
        this.session = null;
        return null;

      default:
        this.log(`${error.message} while ${this.state}, nothing to do`);
        return null;
    }
  }

  private async finalize(): Promise<StopResult> {
    const session = this.requireSession();

    for (const [speakerId, segmenter] of session.segmenters) {
      const utterance = segmenter.flush();
      if (utterance) {
        this.log(`🚿 Flushed ${speakerId} on stop`);
        this.submit(session, utterance);
      }
    }
    session.segmenters.clear();

    const pending = session.dispatcher.getStatus();
    if (pending.queued + pending.inFlight > 0) {
      console.log(`[Session] ⏳ Waiting for ${pending.queued + pending.inFlight} transcription(s)...`);
    }
    await session.dispatcher.drain();

    const transcript = session.assembler.seal();
    this.transition('finalized');

    let result: StopResult;
    try {
      const exported = await this.deps.exporter.render(transcript, session.names);
      result = { transcript, export: exported };
    } catch (error) {
      console.error('[Session] ❌ Export failed:', error);
      result = { transcript, export: null, exportError: errorMessage(error) };
    }

    console.log(
      `[Session] ✅ Finalized with ${transcript.fragments.length} fragment(s)` +
      (session.startedAt !== null ? ` over ${Math.round((Date.now() - session.startedAt) / 1000)}s` : '')
    );

    this.lastResult = result;
    this.emit('finalized', result);
    return result;
  }

  private transition(to: SessionState, command?: string): void {
    const from = this.state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new InvalidStateTransitionError(from, to, command);
    }

    this.state = to;
    const change: SessionStateChange = { from, to, timestamp: new Date() };
    this.log(`🔄 ${from} -> ${to}`);
    this.emit('state-change', change);
  }

  private createSession(): Session {
    const dispatcher = new TranscriptionDispatcher(this.deps.backend, {
      verbose: this.config.verbose,
      ...this.config.dispatcher,
    });
    const assembler = new TranscriptAssembler({ verbose: this.config.verbose });

    const session: Session = {
      segmenters: new Map(),
      dispatcher,
      assembler,
      names: new Map(),
      startedAt: null,
      utterances: 0,
    };

    // Bound to this session so stragglers never land in a later one
    dispatcher.on('fragment', (fragment: TranscriptFragment) => {
      if (session.assembler.addFragment(fragment)) {
        this.emit('fragment', fragment);
      }
    });
    assembler.on('late-fragment', (fragment: TranscriptFragment) => {
      this.emit('late-fragment', fragment);
    });

    return session;
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new ScribeError(`No session while ${this.state}`, 'NO_SESSION');
    }
    return this.session;
  }

  // ===========================================================================
  // Audio Intake
  // ===========================================================================

  /**
   * Accept a frame while capturing. Returns false when it was dropped.
   */
  ingest(frame: AudioFrame): boolean {
    if (this.state !== 'capturing' || !this.session) {
      this.framesDropped++;
      return false;
    }

    const session = this.session;
    let segmenter = session.segmenters.get(frame.speakerId);
    if (!segmenter) {
      segmenter = new AudioSegmenter(frame.speakerId, {
        verbose: this.config.verbose,
        ...this.config.segmenter,
      });
      session.segmenters.set(frame.speakerId, segmenter);
      console.log(`[Session] 👤 New speaker stream: ${this.resolveName(frame.speakerId)}`);
    }

    const utterance = segmenter.ingest(frame);
    if (utterance) {
      this.submit(session, utterance);
    }
    return true;
  }

  /**
   * Flush and drop one speaker's stream. Other speakers are untouched.
   */
  speakerLeft(speakerId: string): Utterance | null {
    const session = this.session;
    const segmenter = session?.segmenters.get(speakerId);
    if (!session || !segmenter) {
      return null;
    }

    session.segmenters.delete(speakerId);
    const utterance = segmenter.flush();
    if (utterance) {
      this.log(`🚿 Flushed ${speakerId} on leave`);
      this.submit(session, utterance);
    }
    return utterance;
  }

  private submit(session: Session, utterance: Utterance): void {
    session.utterances++;
    this.emit('utterance', utterance);
    session.dispatcher.submit(utterance);
  }

  // ===========================================================================
  // Participants
  // ===========================================================================

  /**
   * Reload the participant map. Not allowed mid-session.
   */
  async updateParticipantMap(path?: string): Promise<number> {
    if (this.state === 'capturing' || this.state === 'stopping') {
      throw new InvalidStateTransitionError(this.state, this.state, 'reload the participant map');
    }
    return this.deps.registry.reload(path);
  }

  resolveName(speakerId: string): string {
    return this.session?.names.get(speakerId) ?? this.deps.registry.resolve(speakerId);
  }

  // ===========================================================================
  // Status
  // ===========================================================================

  getState(): SessionState {
    return this.state;
  }

  getTranscript(): Transcript {
    return this.session?.assembler.snapshot() ?? EMPTY_TRANSCRIPT;
  }

  getLastResult(): StopResult | null {
    return this.lastResult;
  }

  getStatus(): SessionStatus {
    const session = this.session;
    return {
      state: this.state,
      sessionStartedAt: session?.startedAt ?? null,
      activeSpeakers: session ? Array.from(session.segmenters.keys()) : [],
      framesDropped: this.framesDropped,
      utterances: session?.utterances ?? 0,
      transcript: session?.assembler.getStats() ?? { ...EMPTY_ASSEMBLER_STATS },
      dispatcher: session?.dispatcher.getStatus() ?? null,
      lastExport: this.lastResult?.export ?? null,
    };
  }
}

export default SessionController;
