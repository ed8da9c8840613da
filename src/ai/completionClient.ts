import OpenAI from 'openai';
import { z } from 'zod';
import type { ConversationTurn } from '../conversation/conversationStore';
import type { Env } from '../env';
import { DialogueError } from '../errors';
import { log } from '../log';

export interface CompletionRequest {
  preamble: string;
  history: ConversationTurn[];
  signal?: AbortSignal;
}

/** Remote completion backend. Rejects on any failure; never returns blank text. */
export interface CompletionClient {
  readonly id: 'openai_compatible' | 'brain_http';
  complete(request: CompletionRequest): Promise<string>;
}

function requireText(raw: unknown, source: string): string {
  const text = typeof raw === 'string' ? raw.trim() : '';
  if (!text) {
    throw new DialogueError('CompletionBackendError', `${source} reply missing text`);
  }
  return text;
}

export class OpenAiCompletionClient implements CompletionClient {
  public readonly id = 'openai_compatible';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: {
    apiKey: string;
    baseURL?: string;
    model: string;
    temperature: number;
    maxTokens: number;
    client?: OpenAI;
  }) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        ...(options.baseURL ? { baseURL: options.baseURL } : {}),
        maxRetries: 0,
      });
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  public async complete(request: CompletionRequest): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: request.preamble },
      ...request.history.map((turn): OpenAI.Chat.ChatCompletionMessageParam =>
        turn.role === 'user'
          ? { role: 'user', content: turn.content }
          : { role: 'assistant', content: turn.content },
      ),
    ];

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        },
        { signal: request.signal },
      );
    } catch (error) {
      throw new DialogueError('CompletionBackendError', 'chat completion request failed', { cause: error });
    }

    return requireText(completion.choices[0]?.message.content, 'chat completion');
  }
}

async function readResponseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

const BrainReplySchema = z.object({ text: z.string() });

function buildBrainUrl(base: string): string {
  const trimmed = base.replace(/\/$/, '');
  return trimmed.endsWith('/reply') ? trimmed : `${trimmed}/reply`;
}

/**
 * Completion through an external "brain" service: POST {base}/reply with the
 * preamble and history, expecting `{ text }` back.
 */
export class BrainHttpCompletionClient implements CompletionClient {
  public readonly id = 'brain_http';
  private readonly url: string;

  constructor(baseUrl: string) {
    this.url = buildBrainUrl(baseUrl);
  }

  public async complete(request: CompletionRequest): Promise<string> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          preamble: request.preamble,
          history: request.history.map((turn) => ({ role: turn.role, content: turn.content })),
        }),
        signal: request.signal,
      });
    } catch (error) {
      throw new DialogueError('CompletionBackendError', 'brain request failed', { cause: error });
    }

    if (!response.ok) {
      const body = await readResponseText(response);
      const preview = body.length > 500 ? `${body.slice(0, 500)}...` : body;
      throw new DialogueError('CompletionBackendError', `brain reply failed ${response.status}: ${preview}`, {
        status: response.status,
      });
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new DialogueError('CompletionBackendError', 'brain reply was not json', { cause: error });
    }

    const parsed = BrainReplySchema.safeParse(data);
    return requireText(parsed.success ? parsed.data.text : undefined, 'brain');
  }
}

/**
 * Picks the configured completion backend. `null` means the agent runs on the
 * rule-based replies only.
 */
export function createCompletionClient(
  config: Pick<Env, 'LLM_API_KEY' | 'LLM_BASE_URL' | 'LLM_MODEL' | 'LLM_TEMPERATURE' | 'LLM_MAX_TOKENS' | 'BRAIN_URL'>,
): CompletionClient | null {
  if (config.BRAIN_URL) {
    log.info({ event: 'completion_backend_selected', backend: 'brain_http' }, 'completion backend selected');
    return new BrainHttpCompletionClient(config.BRAIN_URL);
  }

  if (config.LLM_API_KEY) {
    try {
      const client = new OpenAiCompletionClient({
        apiKey: config.LLM_API_KEY,
        baseURL: config.LLM_BASE_URL,
        model: config.LLM_MODEL,
        temperature: config.LLM_TEMPERATURE,
        maxTokens: config.LLM_MAX_TOKENS,
      });
      log.info(
        { event: 'completion_backend_selected', backend: 'openai_compatible', model: config.LLM_MODEL },
        'completion backend selected',
      );
      return client;
    } catch (error) {
      log.error({ err: error, event: 'completion_backend_init_failed' }, 'completion backend init failed');
      return null;
    }
  }

  log.warn({ event: 'completion_backend_unavailable' }, 'no completion backend configured; using rule-based replies');
  return null;
}
