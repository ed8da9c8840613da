import type { ReplyResult } from '../ai/replyEngine';
import { SessionQueue } from '../concurrency/sessionQueue';
import { log } from '../log';
import { recordCallMetrics } from '../metrics';
import { buildCallScript, isTerminationRequest, type CallScript } from './callScript';
import { CallSession } from './callSession';
import { gather, hangup, redirect, say, webhookUrl, type CallInstruction } from './instructions';
import type { CallDirection, CallId } from './types';

const DEFAULT_IDLE_TTL_MINUTES = 60;
const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

export interface Responder {
  respond(sessionId: string, utterance: string): Promise<ReplyResult>;
  reset(sessionId: string): Promise<void>;
}

export interface SessionLogContext {
  requestId?: string;
}

export interface SessionManagerOptions {
  responder: Responder;
  publicBaseUrl: string;
  agentName?: string;
  /** 0 keeps sessions for the life of the process. */
  idleTtlMinutes?: number;
  sweepIntervalMs?: number;
  now?: () => Date;
}

/**
 * Per-call state machine: GREETING -> GATHERING -> ENDED. Every event for a
 * call id is serialized, and each returns the instructions to send back to
 * the telephony provider.
 */
export class SessionManager {
  private readonly sessions = new Map<CallId, CallSession>();
  // Call ids evicted by the idle sweep. They stay ended.
  private readonly retiredCallIds = new Set<CallId>();
  private readonly queue = new SessionQueue();
  private readonly responder: Responder;
  private readonly publicBaseUrl: string;
  private readonly script: CallScript;
  private readonly idleTtlMs: number;
  private readonly sweepTimer?: NodeJS.Timeout;
  private readonly now: () => Date;

  constructor(options: SessionManagerOptions) {
    this.responder = options.responder;
    this.publicBaseUrl = options.publicBaseUrl;
    this.script = buildCallScript(options.agentName ?? 'Nova');
    this.now = options.now ?? (() => new Date());

    const idleMinutes = options.idleTtlMinutes ?? DEFAULT_IDLE_TTL_MINUTES;
    this.idleTtlMs = Math.max(idleMinutes, 0) * 60_000;

    if (this.idleTtlMs > 0) {
      const sweepInterval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
      this.sweepTimer = setInterval(() => this.sweepIdleSessions(), sweepInterval);
      this.sweepTimer.unref?.();
    }
  }

  public onIncomingCall(
    callId: CallId,
    details: { from?: string; to?: string } = {},
    context: SessionLogContext = {},
  ): Promise<CallInstruction[]> {
    return this.queue.run(callId, 'incoming_call', () => this.greet(callId, 'inbound', details, context));
  }

  public onOutboundAnswered(
    callId: CallId,
    details: { from?: string; to?: string } = {},
    context: SessionLogContext = {},
  ): Promise<CallInstruction[]> {
    return this.queue.run(callId, 'outbound_answered', () => this.greet(callId, 'outbound', details, context));
  }

  public onGatheredSpeech(
    callId: CallId,
    transcript: string,
    context: SessionLogContext = {},
  ): Promise<CallInstruction[]> {
    return this.queue.run(callId, 'gathered_speech', async () => {
      if (this.retiredCallIds.has(callId)) {
        return [hangup()];
      }
      let session = this.sessions.get(callId);
      if (!session) {
        log.warn(
          { event: 'call_session_missing_on_gather', call_id: callId, requestId: context.requestId },
          'gathered speech for unknown call; creating session',
        );
        session = this.createSession(callId, 'inbound', {}, context);
      }

      if (session.isEnded()) {
        return [hangup()];
      }

      log.info(
        { event: 'call_speech_gathered', call_id: callId, transcript, requestId: context.requestId },
        'caller speech gathered',
      );

      if (isTerminationRequest(transcript)) {
        this.endSession(session, 'caller_farewell');
        return [say(this.script.farewell), hangup()];
      }

      session.beginGathering(this.now());
      const reply = await this.responder.respond(callId, transcript);
      session.recordTurn({ user: transcript, agent: reply.text }, this.now());

      log.info(
        { event: 'call_reply', call_id: callId, source: reply.source, requestId: context.requestId },
        'call reply generated',
      );

      return [say(reply.text), ...this.awaitInput(this.script.reprompt)];
    });
  }

  public onSilence(callId: CallId, context: SessionLogContext = {}): Promise<CallInstruction[]> {
    return this.queue.run(callId, 'silence', () => {
      const session = this.sessions.get(callId);
      if (!session || session.isEnded() || this.retiredCallIds.has(callId)) {
        return [hangup()];
      }

      log.info(
        {
          event: 'call_silence',
          call_id: callId,
          state: session.getState(),
          direction: session.direction,
          requestId: context.requestId,
        },
        'caller silent',
      );

      if (session.direction === 'outbound') {
        this.endSession(session, 'no_response');
        return [say(this.script.outboundNoResponse), hangup()];
      }

      session.touch(this.now());
      if (session.getState() === 'GREETING') {
        return this.greetingInstructions('inbound');
      }
      return this.awaitInput(this.script.reprompt);
    });
  }

  public onHangup(callId: CallId, reason = 'hangup', context: SessionLogContext = {}): Promise<void> {
    return this.queue.run(callId, 'hangup', () => {
      const session = this.sessions.get(callId);
      if (!session) {
        if (this.retiredCallIds.has(callId)) {
          return;
        }
        log.warn(
          { event: 'call_session_hangup_missing', call_id: callId, reason, requestId: context.requestId },
          'call session missing on hangup',
        );
        return;
      }
      this.endSession(session, reason);
    });
  }

  public getSession(callId: CallId): CallSession | undefined {
    return this.sessions.get(callId);
  }

  public isRetired(callId: CallId): boolean {
    return this.retiredCallIds.has(callId);
  }

  public sessionCount(): number {
    return this.sessions.size;
  }

  public activeSessionCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (!session.isEnded()) {
        count += 1;
      }
    }
    return count;
  }

  public stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
    }
  }

  public sweepIdleSessions(): number {
    if (this.idleTtlMs <= 0) {
      return 0;
    }

    const nowMs = this.now().getTime();
    let removed = 0;
    for (const [callId, session] of this.sessions.entries()) {
      const idleMs = nowMs - session.getLastActivityAt().getTime();
      if (idleMs <= this.idleTtlMs) {
        continue;
      }

      this.endSession(session, 'idle_timeout');
      this.sessions.delete(callId);
      this.retiredCallIds.add(callId);
      void this.responder.reset(callId).catch((error: unknown) => {
        log.warn({ err: error, call_id: callId }, 'conversation reset failed during sweep');
      });
      removed += 1;
    }

    if (removed > 0) {
      log.info({ event: 'call_sessions_swept', removed, remaining: this.sessions.size }, 'idle call sessions swept');
    }
    return removed;
  }

  private async greet(
    callId: CallId,
    direction: CallDirection,
    details: { from?: string; to?: string },
    context: SessionLogContext,
  ): Promise<CallInstruction[]> {
    if (this.retiredCallIds.has(callId)) {
      return [hangup()];
    }
    const existing = this.sessions.get(callId);
    if (existing) {
      if (existing.isEnded()) {
        return [hangup()];
      }
      existing.touch(this.now());
      log.info(
        { event: 'call_regreet', call_id: callId, state: existing.getState(), requestId: context.requestId },
        'call greeting repeated',
      );
      return this.greetingInstructions(existing.direction);
    }

    this.createSession(callId, direction, details, context);
    await this.responder.reset(callId);
    return this.greetingInstructions(direction);
  }

  private createSession(
    callId: CallId,
    direction: CallDirection,
    details: { from?: string; to?: string },
    context: SessionLogContext,
  ): CallSession {
    const session = new CallSession(
      { callId, direction, from: details.from, to: details.to, requestId: context.requestId },
      this.now(),
    );
    this.sessions.set(callId, session);

    log.info(
      {
        event: 'call_session_created',
        call_id: callId,
        direction,
        from: details.from,
        to: details.to,
        requestId: context.requestId,
      },
      'call session created',
    );
    return session;
  }

  private endSession(session: CallSession, reason: string): void {
    const changed = session.end(reason, this.now());
    if (!changed) {
      return;
    }
    const summary = session.snapshot();
    recordCallMetrics({ direction: summary.direction, reason, turns: summary.turns.length });
    log.info({ event: 'call_summary', ...summary }, 'call summary');
  }

  private greetingInstructions(direction: CallDirection): CallInstruction[] {
    if (direction === 'outbound') {
      // Outbound silence hangs up, so no "try again" prompt before the redirect.
      return [say(this.script.outboundGreeting), ...this.awaitInput()];
    }
    return [say(this.script.inboundGreeting), ...this.awaitInput(this.script.noInput)];
  }

  private awaitInput(promptOnSilence?: string): CallInstruction[] {
    return [
      gather(webhookUrl(this.publicBaseUrl, 'gather')),
      ...(promptOnSilence ? [say(promptOnSilence)] : []),
      redirect(webhookUrl(this.publicBaseUrl, 'silence')),
    ];
  }
}
