export type FragmentStatus = 'ok' | 'failed';

export interface TranscriptFragment {
  speakerId: string;
  /** Wall-clock ms of the first sample */
  startTimestamp: number;
  /** Wall-clock ms just past the last voiced sample */
  endTimestamp: number;
  text: string;
  status: FragmentStatus;
  attempts: number;
  error?: string;
}

export interface Transcript {
  fragments: readonly TranscriptFragment[];
  sealed: boolean;
  sessionStartedAt: number | null;
}

/** speakerId -> display name */
export type ParticipantNames = ReadonlyMap<string, string>;
