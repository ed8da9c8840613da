import { log } from '../log';
import type {
  CallDirection,
  CallId,
  CallSessionConfig,
  CallSessionSnapshot,
  CallSessionState,
  CallTurn,
} from './types';

export class CallSession {
  public readonly callId: CallId;
  public readonly direction: CallDirection;
  public readonly from?: string;
  public readonly to?: string;
  public readonly requestId?: string;

  private state: CallSessionState = 'GREETING';
  private readonly turns: CallTurn[] = [];
  private readonly createdAt: Date;
  private lastActivityAt: Date;
  private endedAt?: Date;
  private endedReason?: string;
  private readonly logContext: Record<string, unknown>;

  constructor(config: CallSessionConfig, now: Date = new Date()) {
    this.callId = config.callId;
    this.direction = config.direction;
    this.from = config.from;
    this.to = config.to;
    this.requestId = config.requestId;
    this.createdAt = now;
    this.lastActivityAt = now;

    this.logContext = {
      call_id: this.callId,
      direction: this.direction,
      requestId: this.requestId,
    };
  }

  public getState(): CallSessionState {
    return this.state;
  }

  public isEnded(): boolean {
    return this.state === 'ENDED';
  }

  /** Moves a live call into input gathering. Returns false once the call has ended. */
  public beginGathering(now: Date = new Date()): boolean {
    if (this.state === 'ENDED') {
      return false;
    }

    this.lastActivityAt = now;
    if (this.state === 'GREETING') {
      this.state = 'GATHERING';
      log.debug({ event: 'call_state_changed', from: 'GREETING', to: 'GATHERING', ...this.logContext }, 'call state changed');
    }
    return true;
  }

  public recordTurn(turn: CallTurn, now: Date = new Date()): void {
    if (this.state === 'ENDED') {
      return;
    }
    this.turns.push({ ...turn });
    this.lastActivityAt = now;
  }

  /** Terminal transition. Returns true only for the call that actually ended the session. */
  public end(reason: string, now: Date = new Date()): boolean {
    if (this.state === 'ENDED') {
      return false;
    }

    const previous = this.state;
    this.state = 'ENDED';
    this.endedAt = now;
    this.endedReason = reason;
    this.lastActivityAt = now;
    log.info({ event: 'call_state_changed', from: previous, to: 'ENDED', reason, ...this.logContext }, 'call ended');
    return true;
  }

  public touch(now: Date = new Date()): void {
    this.lastActivityAt = now;
  }

  public getTurns(): CallTurn[] {
    return this.turns.map((turn) => ({ ...turn }));
  }

  public getLastActivityAt(): Date {
    return this.lastActivityAt;
  }

  public getEndInfo(): { endedAt?: Date; endedReason?: string } {
    return {
      endedAt: this.endedAt,
      endedReason: this.endedReason,
    };
  }

  public snapshot(): CallSessionSnapshot {
    return {
      callId: this.callId,
      direction: this.direction,
      state: this.state,
      from: this.from,
      to: this.to,
      turns: this.getTurns(),
      createdAt: this.createdAt.toISOString(),
      lastActivityAt: this.lastActivityAt.toISOString(),
      endedAt: this.endedAt?.toISOString(),
      endedReason: this.endedReason,
    };
  }
}
