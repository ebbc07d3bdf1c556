/**
 * LiveKit Scribe Agent
 *
 * Joins a LiveKit room as a silent participant, subscribes to every audio
 * track and feeds each speaker's PCM into the session controller. Room data
 * messages drive the session lifecycle.
 *
 * Architecture:
 * ┌──────────────────────────────────────────────────────────────────────┐
 * │                            LiveKit Room                              │
 * │  ┌──────────┐  ┌──────────┐  ┌──────────┐                            │
 * │  │ Speaker  │  │ Speaker  │  │  Scribe  │                            │
 * │  │  (audio) │  │  (audio) │  │  (this)  │ ◀── scribe_* data messages │
 * │  └────┬─────┘  └────┬─────┘  └────┬─────┘                            │
 * │       └─────────────┴─────────────┘ subscribes to all audio          │
 * └─────────────────────────────────────┼────────────────────────────────┘
 *                                       ▼
 *                    ┌────────────────────────────────────┐
 *                    │         SessionController          │
 *                    │  segmenters ─▶ dispatcher ─▶ assembler │
 *                    └────────────────────────────────────┘
 */

import { EventEmitter } from 'events';
import path from 'path';
import {
  Room,
  RoomEvent,
  TrackKind,
  AudioStream,
  ConnectionState,
  type RemoteParticipant,
  type RemoteTrack,
  type RemoteTrackPublication,
} from '@livekit/rtc-node';
import { AccessToken, type VideoGrant } from 'livekit-server-sdk';
import type {
  ScribeCommand,
  ScribeCommandType,
  ScribeEventMessage,
  SessionState,
} from '@voice-scribe/types';
import { createAudioFrame, frameDurationMs } from './audio/pcm.js';
import { SessionController, type SessionStatus } from './session/controller.js';
import { generateMeetingSummary, type SummaryResult } from './services/summary-generator.js';
import { ParticipantRegistry } from './registry/participant-registry.js';
import { FileTranscriptExporter } from './export/transcript-exporter.js';
import { createTranscriptionBackend } from './transcription/create-backend.js';
import type { ScribeConfig } from './config/env.js';
import { errorMessage } from './errors.js';

// =============================================================================
// Types
// =============================================================================

export interface ScribeAgentConfig {
  roomName: string;
  livekitUrl: string;
  apiKey: string;
  apiSecret: string;
  identity: string;
  sampleRate: number;
  /** How long capture survives an empty room */
  emptyRoomGraceMs: number;
  outputDir: string;
  verbose: boolean;
}

export type Summarizer = (transcriptPath: string) => Promise<SummaryResult>;

export interface ScribeAgentStatus {
  room: {
    connected: boolean;
    name: string;
    participantCount: number;
  };
  audio: {
    activeStreams: number;
    framesReceived: number;
  };
  gracePeriodActive: boolean;
  session: SessionStatus;
}

const COMMAND_TYPES: readonly ScribeCommandType[] = [
  'scribe_connect',
  'scribe_start',
  'scribe_stop',
  'scribe_reload_participants',
  'scribe_summarize',
  'scribe_status',
  'scribe_disconnect',
];

function isCommandType(value: unknown): value is ScribeCommandType {
  return typeof value === 'string' && COMMAND_TYPES.some((type) => type === value);
}

/**
 * Parse a data message into a command, or null when it isn't one
 */
export function parseScribeCommand(payload: Uint8Array): ScribeCommand | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(new TextDecoder().decode(payload));
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed)) {
    return null;
  }
  if (!isCommandType(parsed.type)) {
    return null;
  }

  const command: ScribeCommand = { type: parsed.type };
  if ('path' in parsed && typeof parsed.path === 'string') {
    command.path = parsed.path;
  }
  return command;
}

/** Per-speaker frame sequencing */
interface SpeakerClock {
  frameIndex: number;
  nextTimestamp: number;
}

// =============================================================================
// Scribe Agent
// =============================================================================

export class ScribeAgent extends EventEmitter {
  private config: ScribeAgentConfig;
  private controller: SessionController;
  private summarize: Summarizer;
  private room: Room | null = null;
  private audioTracks: Set<string> = new Set();
  private clocks: Map<string, SpeakerClock> = new Map();
  private framesReceived: number = 0;
  private shutdownTimer: NodeJS.Timeout | null = null;

  constructor(config: ScribeAgentConfig, controller: SessionController, summarize: Summarizer) {
    super();
    this.config = config;
    this.controller = controller;
    this.summarize = summarize;
  }

  private log(message: string): void {
    if (this.config.verbose) {
      console.log(`[ScribeAgent] ${message}`);
    }
  }

  /**
   * Generate access token for this agent
   */
  private async generateToken(): Promise<string> {
    const token = new AccessToken(this.config.apiKey, this.config.apiSecret, {
      identity: this.config.identity,
      name: 'Scribe',
      ttl: '4h',
    });

    const grant: VideoGrant = {
      room: this.config.roomName,
      roomJoin: true,
      canPublish: false,
      canSubscribe: true,
      canPublishData: true,
    };

    token.addGrant(grant);
    return await token.toJwt();
  }

  /**
   * Join the room. Capture starts on scribe_start (or startSession()).
   */
  async connect(): Promise<void> {
    console.log(`[ScribeAgent] 🚀 Connecting to room: ${this.config.roomName}`);

    try {
      const token = await this.generateToken();
      this.room = new Room();
      this.setupRoomEvents();

      await this.room.connect(this.config.livekitUrl, token);
      console.log(`[ScribeAgent] ✅ Connected to room as ${this.config.identity}`);

      this.emit('connected');
    } catch (error) {
      console.error('[ScribeAgent] ❌ Connection failed:', error);
      this.room = null;
      throw error;
    }
  }

  /**
   * connect + startCapture in one go (CLI --auto-start)
   */
  startSession(): void {
    this.controller.connect();
    this.controller.startCapture();
  }

  private isConnected(): boolean {
    return this.room?.connectionState === ConnectionState.CONN_CONNECTED;
  }

  /**
   * Set up LiveKit room event handlers
   */
  private setupRoomEvents(): void {
    if (!this.room) return;

    this.room.on(RoomEvent.ParticipantConnected, (participant: RemoteParticipant) => {
      console.log(`[ScribeAgent] 👤 Participant connected: ${participant.identity}`);
      this.emit('participant-joined', { identity: participant.identity });
      this.checkRoomStatus();
    });

    this.room.on(RoomEvent.ParticipantDisconnected, (participant: RemoteParticipant) => {
      console.log(`[ScribeAgent] 👋 Participant disconnected: ${participant.identity}`);
      this.controller.speakerLeft(participant.identity);
      this.emit('participant-left', { identity: participant.identity });
      this.checkRoomStatus();
    });

    this.room.on(RoomEvent.TrackSubscribed, (
      track: RemoteTrack,
      _publication: RemoteTrackPublication,
      participant: RemoteParticipant
    ) => {
      if (track.kind !== TrackKind.KIND_AUDIO) return;

      console.log(`[ScribeAgent] 🎤 Audio track subscribed from ${participant.identity}`);
      this.handleAudioTrack(track, participant).catch((err) => {
        console.error(`[ScribeAgent] ❌ Error handling audio track:`, err);
      });
    });

    this.room.on(RoomEvent.TrackUnsubscribed, (
      track: RemoteTrack,
      _publication: RemoteTrackPublication,
      participant: RemoteParticipant
    ) => {
      if (track.kind !== TrackKind.KIND_AUDIO) return;

      console.log(`[ScribeAgent] 🔇 Audio track unsubscribed from ${participant.identity}`);
      this.audioTracks.delete(track.sid ?? participant.identity);
      this.controller.speakerLeft(participant.identity);
    });

    this.room.on(RoomEvent.DataReceived, (payload: Uint8Array, participant?: RemoteParticipant) => {
      const command = parseScribeCommand(payload);
      if (!command) return;

      console.log(`[ScribeAgent] 📨 ${command.type} from ${participant?.identity ?? 'server'}`);
      this.handleCommand(command)
        .then(async (reply) => {
          await this.publishEvent(reply);
          // Reply first, the data channel closes with the room
          if (command.type === 'scribe_disconnect' && reply.ok) {
            await this.disconnect();
          }
        })
        .catch((err) => {
          console.error(`[ScribeAgent] ❌ Failed to answer ${command.type}:`, err);
        });
    });

    this.room.on(RoomEvent.Disconnected, () => {
      console.log('[ScribeAgent] 📴 Disconnected from room');
      this.clearGracePeriod();
      this.controller
        .handleAudioSourceDisconnect('room connection closed')
        .catch((err) => {
          console.error('[ScribeAgent] ❌ Finalize after disconnect failed:', err);
        });
      this.emit('disconnected');
    });
  }

  /**
   * Read one speaker's audio until the track ends
   */
  private async handleAudioTrack(track: RemoteTrack, participant: RemoteParticipant): Promise<void> {
    const trackKey = track.sid ?? participant.identity;
    if (this.audioTracks.has(trackKey)) {
      this.log(`⚠️ Audio stream already exists for track ${trackKey}, skipping`);
      return;
    }
    this.audioTracks.add(trackKey);

    const speakerId = participant.identity;
    const audioStream = new AudioStream(track, this.config.sampleRate, 1);
    let frameCount = 0;

    try {
      for await (const frame of audioStream) {
        // Unsubscribed or torn down; leaving the loop releases the stream
        if (!this.audioTracks.has(trackKey)) break;

        frameCount++;
        this.framesReceived++;
        this.ingestFrame(speakerId, frame.data, frame.sampleRate, frame.channels);

        if (frameCount % 500 === 0) {
          this.log(`📊 Processed ${frameCount} frames from ${speakerId}`);
        }
      }
    } finally {
      this.audioTracks.delete(trackKey);
      // Frames still buffered in the stream keep the speaker's clock until here
      this.clocks.delete(speakerId);
      console.log(`[ScribeAgent] 🔇 Audio stream ended for ${speakerId} - ${frameCount} frames`);
    }
  }

  /**
   * Stamp a frame with a per-speaker index and a capture time that never
   * runs backwards for that speaker
   */
  private ingestFrame(speakerId: string, samples: Int16Array, sampleRate: number, channels: number): void {
    const clock = this.clocks.get(speakerId) ?? { frameIndex: 0, nextTimestamp: 0 };
    const captureTimestamp = Math.max(Date.now(), clock.nextTimestamp);

    const frame = createAudioFrame(samples, speakerId, clock.frameIndex, captureTimestamp, {
      encoding: 'linear16',
      sampleRate,
      channels,
    });

    clock.frameIndex++;
    clock.nextTimestamp = captureTimestamp + frameDurationMs(frame);
    this.clocks.set(speakerId, clock);

    this.controller.ingest(frame);
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Run a command against the session and describe the outcome
   */
  async handleCommand(command: ScribeCommand): Promise<ScribeEventMessage> {
    try {
      const message = await this.runCommand(command);
      return this.event(command.type, true, message);
    } catch (error) {
      console.warn(`[ScribeAgent] ⚠️ ${command.type} rejected: ${errorMessage(error)}`);
      return this.event(command.type, false, errorMessage(error));
    }
  }

  private async runCommand(command: ScribeCommand): Promise<string> {
    switch (command.type) {
      case 'scribe_connect':
        this.controller.connect();
        return 'Session ready, send scribe_start to begin capture';

      case 'scribe_start':
        if (!this.isConnected()) {
          throw new Error('Not connected to the room');
        }
        this.controller.startCapture();
        this.checkRoomStatus();
        return 'Capture started';

      case 'scribe_stop': {
        this.clearGracePeriod();
        const result = await this.controller.stopCapture();
        return this.describeStop(result.transcript.fragments.length, result.export?.transcriptPath, result.exportError);
      }

      case 'scribe_reload_participants': {
        const count = await this.controller.updateParticipantMap();
        return `Loaded ${count} participant name(s)`;
      }

      case 'scribe_summarize': {
        const transcriptPath = this.resolveTranscriptPath(command.path);
        if (!transcriptPath) {
          throw new Error('No exported transcript to summarize yet');
        }
        const summary = await this.summarize(transcriptPath);
        return `Summary saved to ${summary.summaryPath}`;
      }

      case 'scribe_status': {
        const status = this.controller.getStatus();
        return (
          `${status.state}: ${status.transcript.fragments} fragment(s), ` +
          `${status.activeSpeakers.length} active speaker(s), ` +
          `${status.dispatcher?.queued ?? 0} queued, ${status.dispatcher?.inFlight ?? 0} in flight`
        );
      }

      case 'scribe_disconnect': {
        if (this.controller.getState() !== 'capturing') {
          return 'Leaving the room';
        }
        this.clearGracePeriod();
        const result = await this.controller.stopCapture();
        const stopped = this.describeStop(
          result.transcript.fragments.length,
          result.export?.transcriptPath,
          result.exportError
        );
        return `${stopped}; leaving the room`;
      }
    }
  }

  /**
   * A named log file under <outputDir>/transcripts, or the last export
   */
  private resolveTranscriptPath(name?: string): string | null {
    if (name) {
      const fileName = path.basename(name.endsWith('.log') ? name : `${name}.log`);
      return path.join(this.config.outputDir, 'transcripts', fileName);
    }
    return this.controller.getLastResult()?.export?.transcriptPath ?? null;
  }

  private describeStop(fragments: number, transcriptPath?: string, exportError?: string): string {
    if (exportError) {
      return `Finalized ${fragments} fragment(s), export failed: ${exportError}`;
    }
    return `Finalized ${fragments} fragment(s), saved to ${transcriptPath ?? 'nowhere'}`;
  }

  private event(command: ScribeEventMessage['command'], ok: boolean, message: string): ScribeEventMessage {
    return {
      type: 'scribe_event',
      command,
      ok,
      state: this.controller.getState(),
      message,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Broadcast a scribe_event to all participants
   */
  private async publishEvent(event: ScribeEventMessage): Promise<void> {
    if (!this.room?.localParticipant) return;

    const data = new TextEncoder().encode(JSON.stringify(event));
    await this.room.localParticipant.publishData(data, { reliable: true });
    this.emit('event', event);
  }

  // ===========================================================================
  // Grace Period
  // ===========================================================================

  /**
   * Count human participants in the room (excludes agents)
   */
  private getHumanCount(): number {
    if (!this.room) return 0;

    let count = 0;
    this.room.remoteParticipants.forEach((participant) => {
      if (!participant.identity.startsWith('ai-')) {
        count++;
      }
    });
    return count;
  }

  /**
   * Start or cancel the empty-room countdown while capturing
   */
  private checkRoomStatus(): void {
    if (!this.room) return;

    const humanCount = this.getHumanCount();
    this.log(`👥 Human participants in room: ${humanCount}`);

    if (humanCount === 0 && this.controller.getState() === 'capturing') {
      if (!this.shutdownTimer) {
        console.log(
          `[ScribeAgent] ⏳ Room is empty. Stopping capture in ${this.config.emptyRoomGraceMs / 1000}s unless someone returns...`
        );
        this.shutdownTimer = setTimeout(() => {
          this.handleGracePeriodExpired().catch((err) => {
            console.error('[ScribeAgent] ❌ Grace period stop failed:', err);
          });
        }, this.config.emptyRoomGraceMs);
      }
    } else if (humanCount > 0) {
      this.clearGracePeriod();
    }
  }

  private clearGracePeriod(): void {
    if (this.shutdownTimer) {
      this.log('✅ Cancelling empty-room countdown');
      clearTimeout(this.shutdownTimer);
      this.shutdownTimer = null;
    }
  }

  private async handleGracePeriodExpired(): Promise<void> {
    this.shutdownTimer = null;
    if (this.controller.getState() !== 'capturing') return;

    console.log('[ScribeAgent] 🛑 Grace period expired with nobody in the room');
    const result = await this.controller.stopCapture();
    await this.publishEvent(
      this.event(
        'grace_period',
        true,
        this.describeStop(result.transcript.fragments.length, result.export?.transcriptPath, result.exportError)
      )
    );
  }

  // ===========================================================================
  // Status & Teardown
  // ===========================================================================

  getSessionState(): SessionState {
    return this.controller.getState();
  }

  getController(): SessionController {
    return this.controller;
  }

  getStatus(): ScribeAgentStatus {
    return {
      room: {
        connected: this.isConnected(),
        name: this.config.roomName,
        participantCount: this.room?.remoteParticipants.size ?? 0,
      },
      audio: {
        activeStreams: this.audioTracks.size,
        framesReceived: this.framesReceived,
      },
      gracePeriodActive: this.shutdownTimer !== null,
      session: this.controller.getStatus(),
    };
  }

  /**
   * Finalize any running capture, then leave the room
   */
  async disconnect(): Promise<void> {
    console.log('[ScribeAgent] 🔌 Disconnecting...');
    this.clearGracePeriod();

    if (this.controller.getState() === 'capturing') {
      try {
        await this.controller.stopCapture();
      } catch (error) {
        console.error('[ScribeAgent] ❌ Failed to finalize before disconnect:', error);
      }
    }

    this.audioTracks.clear();
    this.clocks.clear();

    const room = this.room;
    this.room = null;
    await room?.disconnect();

    console.log('[ScribeAgent] ✅ Disconnected');
  }
}

// =============================================================================
// Factory Function
// =============================================================================

/**
 * Wire backend, registry, exporter and controller from loaded config.
 * The participant map is read before the agent is returned.
 */
export async function createScribeAgent(
  roomName: string,
  config: ScribeConfig,
  identity: string = 'ai-scribe'
): Promise<ScribeAgent> {
  const registry = new ParticipantRegistry({ path: config.participantMapPath });
  await registry.reload();

  const controller = new SessionController(
    {
      backend: createTranscriptionBackend(config),
      registry,
      exporter: new FileTranscriptExporter(config.outputDir),
    },
    {
      segmenter: config.segmenter,
      dispatcher: config.dispatcher,
      verbose: config.verbose,
    }
  );

  const summarize: Summarizer = (transcriptPath) =>
    generateMeetingSummary(transcriptPath, {
      apiKey: config.openaiApiKey,
      model: config.summaryModel,
      outputDir: config.outputDir,
    });

  return new ScribeAgent(
    {
      roomName,
      livekitUrl: config.livekit.url,
      apiKey: config.livekit.apiKey,
      apiSecret: config.livekit.apiSecret,
      identity,
      sampleRate: config.sampleRate,
      emptyRoomGraceMs: config.emptyRoomGraceMs,
      outputDir: config.outputDir,
      verbose: config.verbose,
    },
    controller,
    summarize
  );
}

export default ScribeAgent;
