import type { ReplyEngine, ReplySource } from '../ai/replyEngine';
import type { CallInstruction } from '../calls/instructions';
import { webhookUrl } from '../calls/instructions';
import type { SessionLogContext, SessionManager } from '../calls/sessionManager';
import type { WorkerPool } from '../concurrency/workerPool';
import { DialogueError, errorMessage } from '../errors';
import { log } from '../log';
import type { AudioStore } from '../storage/audioStore';
import type { Transcriber } from '../stt/provider';
import type { STTAudioInput } from '../stt/types';
import type { TelephonyClient } from '../telnyx/types';
import type { Synthesizer } from '../tts/types';

export const WEB_SESSION_ID = 'web';

export interface ChatResult {
  user_input: string;
  agent_reply: string;
  status: 'success';
  source: ReplySource;
}

export interface SpeakResult {
  status: 'success' | 'error';
  message: string;
  audio_url?: string;
  error?: string;
}

export type ListenResult = { status: 'success'; recognized_text: string } | { status: 'error'; error: string };

export interface InteractResult {
  status: 'success';
  user_input: string;
  agent_reply: string;
  spoken: boolean;
}

export interface FeatureFlags {
  completion: boolean;
  telephony: boolean;
  speech_recognition: boolean;
  text_to_speech: boolean;
}

export interface OutboundCallResult {
  status: 'success';
  message: string;
  call_id: string;
}

export interface DialogueOrchestratorOptions {
  engine: ReplyEngine;
  sessions: SessionManager;
  transcriber: Transcriber;
  synthesizer: Synthesizer;
  pool: WorkerPool;
  telephony: TelephonyClient | null;
  audioStore?: AudioStore | null;
  publicBaseUrl: string;
}

function requireText(text: string, field = 'text'): string {
  if (text.trim() === '') {
    throw new DialogueError('EmptyInput', `${field} cannot be empty`, { status: 400 });
  }
  return text;
}

/**
 * Entry point for both surfaces: web chat/speech requests and telephony
 * call events.
 */
export class DialogueOrchestrator {
  private readonly engine: ReplyEngine;
  private readonly sessions: SessionManager;
  private readonly transcriber: Transcriber;
  private readonly synthesizer: Synthesizer;
  private readonly pool: WorkerPool;
  private readonly telephony: TelephonyClient | null;
  private readonly audioStore: AudioStore | null;
  private readonly publicBaseUrl: string;

  constructor(options: DialogueOrchestratorOptions) {
    this.engine = options.engine;
    this.sessions = options.sessions;
    this.transcriber = options.transcriber;
    this.synthesizer = options.synthesizer;
    this.pool = options.pool;
    this.telephony = options.telephony;
    this.audioStore = options.audioStore ?? null;
    this.publicBaseUrl = options.publicBaseUrl;
  }

  public async chat(text: string, sessionId: string = WEB_SESSION_ID): Promise<ChatResult> {
    requireText(text);
    const reply = await this.engine.respond(sessionId, text);
    return {
      user_input: text,
      agent_reply: reply.text,
      status: 'success',
      source: reply.source,
    };
  }

  public async speak(text: string): Promise<SpeakResult> {
    requireText(text);
    const result = await this.pool.run('tts', () => this.synthesizer.synthesize({ text }));
    if (!result.ok) {
      log.warn({ event: 'speak_failed', provider_id: this.synthesizer.id, reason: result.message }, 'speak failed');
      return { status: 'error', message: 'TTS failed', error: result.message };
    }

    if (!this.audioStore) {
      return { status: 'success', message: 'Text spoken successfully' };
    }

    try {
      const asset = await this.audioStore.save({ data: result.audio, contentType: result.contentType, label: 'tts' });
      return { status: 'success', message: 'Text spoken successfully', audio_url: asset.publicUrl };
    } catch (error) {
      log.error({ event: 'speak_store_failed', err: error }, 'synthesized audio could not be stored');
      return { status: 'error', message: 'TTS failed', error: errorMessage(error) };
    }
  }

  public async listen(audio: STTAudioInput): Promise<ListenResult> {
    const result = await this.pool.run('stt', () => this.transcriber.transcribe(audio));
    if (!result.ok) {
      log.info(
        { event: 'listen_failed', provider_id: this.transcriber.id, code: result.code, bytes: audio.audio.length },
        'speech not recognized',
      );
      return { status: 'error', error: result.message };
    }
    return { status: 'success', recognized_text: result.text };
  }

  public async interact(text: string, sessionId: string = WEB_SESSION_ID): Promise<InteractResult> {
    const chat = await this.chat(text, sessionId);
    const spoken = await this.speak(chat.agent_reply);
    return {
      status: 'success',
      user_input: chat.user_input,
      agent_reply: chat.agent_reply,
      spoken: spoken.status === 'success',
    };
  }

  public reset(sessionId: string = WEB_SESSION_ID): Promise<void> {
    return this.engine.reset(sessionId);
  }

  public features(): FeatureFlags {
    return {
      completion: this.engine.isAvailable(),
      telephony: this.telephony !== null,
      speech_recognition: this.transcriber.id !== 'disabled',
      text_to_speech: this.synthesizer.id !== 'disabled',
    };
  }

  public async placeOutboundCall(toNumber: string): Promise<OutboundCallResult> {
    if (!this.telephony) {
      throw new DialogueError('TelephonyConfigurationMissing', 'Telnyx is not configured', { status: 503 });
    }
    const to = requireText(toNumber, 'to_number').trim();

    const { callId } = await this.telephony.placeCall(to, webhookUrl(this.publicBaseUrl, 'outbound'));
    log.info({ event: 'outbound_call_started', call_id: callId, to }, 'outbound call started');
    return { status: 'success', message: `Calling ${to}`, call_id: callId };
  }

  public onIncomingCall(
    callId: string,
    details: { from?: string; to?: string },
    context?: SessionLogContext,
  ): Promise<CallInstruction[]> {
    return this.sessions.onIncomingCall(callId, details, context);
  }

  public onOutboundAnswered(
    callId: string,
    details: { from?: string; to?: string },
    context?: SessionLogContext,
  ): Promise<CallInstruction[]> {
    return this.sessions.onOutboundAnswered(callId, details, context);
  }

  public onGatheredSpeech(callId: string, transcript: string, context?: SessionLogContext): Promise<CallInstruction[]> {
    return this.sessions.onGatheredSpeech(callId, transcript, context);
  }

  public onSilence(callId: string, context?: SessionLogContext): Promise<CallInstruction[]> {
    return this.sessions.onSilence(callId, context);
  }

  public onHangup(callId: string, reason?: string, context?: SessionLogContext): Promise<void> {
    return this.sessions.onHangup(callId, reason, context);
  }

  public activeCallCount(): number {
    return this.sessions.activeSessionCount();
  }

  public stop(): void {
    this.sessions.stop();
    this.audioStore?.stop();
  }
}
