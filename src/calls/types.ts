export type CallId = string;

export type CallDirection = 'inbound' | 'outbound';

export type CallSessionState = 'GREETING' | 'GATHERING' | 'ENDED';

export interface CallTurn {
  user: string;
  agent: string;
}

export interface CallSessionConfig {
  callId: CallId;
  direction: CallDirection;
  from?: string;
  to?: string;
  requestId?: string;
}

export interface CallSessionSnapshot {
  callId: CallId;
  direction: CallDirection;
  state: CallSessionState;
  from?: string;
  to?: string;
  turns: CallTurn[];
  createdAt: string;
  lastActivityAt: string;
  endedAt?: string;
  endedReason?: string;
}
