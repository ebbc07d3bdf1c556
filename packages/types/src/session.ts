export type SessionState = 'idle' | 'connecting' | 'capturing' | 'stopping' | 'finalized';

export interface SessionStateChange {
  from: SessionState;
  to: SessionState;
  timestamp: Date;
}

export type ScribeCommandType =
  | 'scribe_connect'
  | 'scribe_start'
  | 'scribe_stop'
  | 'scribe_reload_participants'
  | 'scribe_summarize'
  | 'scribe_status'
  | 'scribe_disconnect';

export interface ScribeCommand {
  type: ScribeCommandType;
  /** scribe_summarize: transcript log file name instead of the last export */
  path?: string;
}

export interface ScribeEventMessage {
  type: 'scribe_event';
  command: ScribeCommandType | 'grace_period';
  ok: boolean;
  state: SessionState;
  message: string;
  timestamp: string;
}
