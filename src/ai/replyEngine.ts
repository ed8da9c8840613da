import { SessionQueue } from '../concurrency/sessionQueue';
import { WorkerPool } from '../concurrency/workerPool';
import { createTurn, type ConversationStore } from '../conversation/conversationStore';
import type { Intent } from '../dialogue/intents';
import type { VariantPicker } from '../dialogue/picker';
import { EMPTY_INPUT_REPLY, replyFor } from '../dialogue/responses';
import { DialogueError } from '../errors';
import { log } from '../log';
import { incReplySource, incStageError, startStageTimer } from '../metrics';
import type { CompletionClient } from './completionClient';

export type ReplySource = 'empty_input' | 'completion' | 'rules' | 'fallback_error';

export interface ReplyResult {
  text: string;
  source: ReplySource;
  intent?: Intent;
}

export const CONNECTION_TROUBLE_REPLY = "I'm having trouble connecting to AI. Please try again.";

export function buildPreamble(agentName: string): string {
  return (
    `You are ${agentName}, a helpful voice assistant. Be concise and friendly. ` +
    "Keep responses short (1-2 sentences) for voice calls. Don't use markdown or special formatting."
  );
}

export interface ReplyEngineOptions {
  store: ConversationStore;
  completion: CompletionClient | null;
  pool: WorkerPool;
  queue?: SessionQueue;
  agentName?: string;
  completionTimeoutMs?: number;
  picker?: VariantPicker;
  now?: () => Date;
}

/**
 * Produces the agent's next line for a session: remote completion first,
 * rule-based replies when the backend is missing or fails.
 */
export class ReplyEngine {
  private readonly store: ConversationStore;
  private readonly completion: CompletionClient | null;
  private readonly pool: WorkerPool;
  private readonly queue: SessionQueue;
  private readonly agentName: string;
  private readonly completionTimeoutMs: number;
  private readonly picker?: VariantPicker;
  private readonly now?: () => Date;

  constructor(options: ReplyEngineOptions) {
    this.store = options.store;
    this.completion = options.completion;
    this.pool = options.pool;
    this.queue = options.queue ?? new SessionQueue();
    this.agentName = options.agentName ?? 'Nova';
    this.completionTimeoutMs = options.completionTimeoutMs ?? 8000;
    this.picker = options.picker;
    this.now = options.now;
  }

  public isAvailable(): boolean {
    return this.completion !== null;
  }

  public async respond(sessionId: string, utterance: string): Promise<ReplyResult> {
    if (utterance.trim() === '') {
      incReplySource('empty_input');
      return { text: EMPTY_INPUT_REPLY, source: 'empty_input' };
    }

    const result = await this.queue.run(sessionId, 'respond', async () => {
      const completed = await this.tryCompletion(sessionId, utterance);
      return completed ?? this.ruleBasedReply(sessionId, utterance);
    });
    incReplySource(result.source);
    return result;
  }

  public reset(sessionId: string): Promise<void> {
    return this.queue.run(sessionId, 'reset', () => {
      this.store.reset(sessionId);
      log.info({ event: 'conversation_reset', session_id: sessionId }, 'conversation reset');
    });
  }

  private async tryCompletion(sessionId: string, utterance: string): Promise<ReplyResult | null> {
    const completion = this.completion;
    if (!completion) {
      return null;
    }

    this.store.append(sessionId, createTurn('user', utterance));
    const history = this.store.history(sessionId);
    const controller = new AbortController();
    const endTimer = startStageTimer('completion');
    const deadline = setTimeout(() => controller.abort(), this.completionTimeoutMs);

    try {
      // The deadline covers the wait for a pool slot as well as the call itself.
      const raw = await this.withTimeout(
        this.pool.run('completion', () => {
          if (controller.signal.aborted) {
            throw new DialogueError('CompletionBackendError', 'completion deadline passed while queued');
          }
          return completion.complete({
            preamble: buildPreamble(this.agentName),
            history,
            signal: controller.signal,
          });
        }),
        controller.signal,
      );

      const text = raw.trim();
      if (!text) {
        throw new DialogueError('CompletionBackendError', 'completion reply was empty');
      }

      this.store.append(sessionId, createTurn('assistant', text));
      log.info(
        { event: 'completion_reply', session_id: sessionId, backend: completion.id, reply_len: text.length },
        'completion reply',
      );
      return { text, source: 'completion' };
    } catch (error) {
      incStageError('completion');
      log.warn(
        { err: error, event: 'completion_failed', session_id: sessionId, backend: completion.id },
        'completion failed; falling back to rules',
      );
      return null;
    } finally {
      clearTimeout(deadline);
      endTimer();
    }
  }

  // Backends that ignore the abort signal still lose the race.
  private withTimeout<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        reject(new DialogueError('CompletionBackendError', `completion timed out after ${this.completionTimeoutMs}ms`));
      };
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
      work.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }

  private ruleBasedReply(sessionId: string, utterance: string): ReplyResult {
    try {
      const { intent, text } = replyFor(utterance, {
        picker: this.picker,
        now: this.now,
        agentName: this.agentName,
      });
      log.info({ event: 'rules_reply', session_id: sessionId, intent }, 'rule-based reply');
      return intent ? { text, source: 'rules', intent } : { text, source: 'rules' };
    } catch (error) {
      log.error({ err: error, event: 'rules_reply_failed', session_id: sessionId }, 'rule-based reply failed');
      return { text: CONNECTION_TROUBLE_REPLY, source: 'fallback_error' };
    }
  }
}
