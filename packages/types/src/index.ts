export type { FragmentStatus, TranscriptFragment, Transcript, ParticipantNames } from './transcript.js';
export type {
  SessionState,
  SessionStateChange,
  ScribeCommandType,
  ScribeCommand,
  ScribeEventMessage,
} from './session.js';
