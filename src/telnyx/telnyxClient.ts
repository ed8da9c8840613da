import { z } from 'zod';
import type { Env } from '../env';
import { DialogueError } from '../errors';
import { log } from '../log';
import type { PlaceCallResult, TelephonyClient, TelnyxRequestOptions } from './types';

export interface TelnyxPreparedRequest {
  url: string;
  options: TelnyxRequestOptions & { headers: Record<string, string>; method: string };
}

export interface TelnyxClientConfig {
  apiKey: string;
  connectionId: string;
  fromNumber: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

const TELNYX_BASE_URL = 'https://api.telnyx.com/v2/';
const TELNYX_TIMEOUT_MS = 8000;
const TELNYX_MAX_RETRIES = 2;

// Retry backoff tuning (keep small; call setup is latency-sensitive)
const TELNYX_RETRY_BASE_MS = 250;
const TELNYX_RETRY_MAX_MS = 1500;

const PlaceCallResponseSchema = z.object({
  data: z
    .object({
      call_sid: z.string().optional(),
      sid: z.string().optional(),
      call_control_id: z.string().optional(),
    })
    .passthrough(),
});

function maskTelnyxKey(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length <= 8) {
    return `${trimmed.slice(0, 2)}...${trimmed.slice(-2)}`;
  }
  return `${trimmed.slice(0, 4)}...${trimmed.slice(-4)}`;
}

function shouldRetry(status: number): boolean {
  return status === 429 || status >= 500;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoffMs(attempt: number): number {
  const exp = Math.min(TELNYX_RETRY_MAX_MS, TELNYX_RETRY_BASE_MS * Math.pow(2, attempt));
  const jitter = Math.floor(Math.random() * 120);
  return exp + jitter;
}

function truncateForLog(value: unknown, max = 800): string {
  try {
    const s = typeof value === 'string' ? value : JSON.stringify(value);
    if (s.length <= max) return s;
    return `${s.slice(0, max)}…(truncated)`;
  } catch {
    return '[unserializable]';
  }
}

async function safeReadBody(response: Response): Promise<unknown> {
  const contentType = response.headers.get('content-type') ?? '';
  if (contentType.includes('application/json')) {
    try {
      return await response.json();
    } catch {
      // fall through to text
    }
  }
  try {
    return await response.text();
  } catch (e) {
    return `<<failed to read response body: ${String(e)}>>`;
  }
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || /aborted|AbortError/i.test(err.message));
}

class TelnyxHttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'TelnyxHttpError';
  }
}

/** Telnyx REST client for TeXML call origination. */
export class TelnyxClient implements TelephonyClient {
  private readonly apiKey: string;
  private readonly connectionId: string;
  private readonly fromNumber: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly logContext: Record<string, unknown>;

  constructor(config: TelnyxClientConfig, context: Record<string, unknown> = {}) {
    this.apiKey = config.apiKey;
    this.connectionId = config.connectionId;
    this.fromNumber = config.fromNumber;
    this.baseUrl = config.baseUrl ?? TELNYX_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? TELNYX_TIMEOUT_MS;
    this.maxRetries = config.maxRetries ?? TELNYX_MAX_RETRIES;
    this.logContext = { telnyx_api_key_fingerprint: maskTelnyxKey(config.apiKey), ...context };
  }

  public buildRequest(path: string, options: TelnyxRequestOptions = {}): TelnyxPreparedRequest {
    const url = new URL(path.replace(/^\//, ''), this.baseUrl).toString();

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.apiKey}`,
      Accept: 'application/json',
      'User-Agent': 'voice-dialogue-runtime/1.0.0',
      ...options.headers,
    };

    if (options.body && !('Content-Type' in headers) && !('content-type' in headers)) {
      headers['Content-Type'] = 'application/json';
    }

    return {
      url,
      options: {
        ...options,
        method: options.method ?? 'GET',
        headers,
      },
    };
  }

  public async request(path: string, options: TelnyxRequestOptions = {}): Promise<unknown> {
    return this.requestWithRetry(path, options, 0);
  }

  public async placeCall(toNumber: string, callbackUrl: string): Promise<PlaceCallResult> {
    let body: unknown;
    try {
      body = await this.request(`texml/calls/${encodeURIComponent(this.connectionId)}`, {
        method: 'POST',
        body: JSON.stringify({
          To: toNumber,
          From: this.fromNumber,
          Url: callbackUrl,
          UrlMethod: 'POST',
        }),
      });
    } catch (error) {
      throw new DialogueError('TelephonyCallFailed', `outbound call to ${toNumber} failed`, {
        status: 502,
        cause: error,
      });
    }

    const parsed = PlaceCallResponseSchema.safeParse(body);
    const callId = parsed.success
      ? parsed.data.data.call_sid ?? parsed.data.data.sid ?? parsed.data.data.call_control_id
      : undefined;
    if (!callId) {
      throw new DialogueError('TelephonyCallFailed', 'telnyx response missing call id', { status: 502 });
    }

    log.info({ event: 'telnyx_call_placed', call_id: callId, to: toNumber, ...this.logContext }, 'outbound call placed');
    return { callId };
  }

  private async requestWithRetry(path: string, options: TelnyxRequestOptions, attempt: number): Promise<unknown> {
    const prepared = this.buildRequest(path, options);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    const startedAt = Date.now();

    try {
      const response = await fetch(prepared.url, {
        method: prepared.options.method,
        headers: prepared.options.headers,
        body: prepared.options.body,
        signal: controller.signal,
      });

      const body = await safeReadBody(response);
      const durationMs = Date.now() - startedAt;

      if (!response.ok) {
        const logBody = truncateForLog(body, 1000);

        if (shouldRetry(response.status) && attempt < this.maxRetries) {
          const waitMs = backoffMs(attempt);
          log.warn(
            {
              event: 'telnyx_request_retry',
              url: prepared.url,
              status: response.status,
              attempt,
              wait_ms: waitMs,
              duration_ms: durationMs,
              body: logBody,
              ...this.logContext,
            },
            'telnyx request retry',
          );
          await sleep(waitMs);
          return this.requestWithRetry(path, options, attempt + 1);
        }

        log.error(
          {
            event: 'telnyx_request_failed',
            url: prepared.url,
            status: response.status,
            duration_ms: durationMs,
            body: logBody,
            ...this.logContext,
          },
          'telnyx request failed',
        );
        throw new TelnyxHttpError(`Telnyx request failed: ${response.status} ${logBody}`, response.status);
      }

      log.info(
        {
          event: 'telnyx_request_completed',
          url: prepared.url,
          status: response.status,
          duration_ms: durationMs,
          ...this.logContext,
        },
        'telnyx request completed',
      );

      return body;
    } catch (error) {
      // HTTP failures were already retried above; aborts mean the API is slow, not flaky.
      if (!(error instanceof TelnyxHttpError) && !isAbortError(error) && attempt < this.maxRetries) {
        const waitMs = backoffMs(attempt);
        log.warn(
          {
            event: 'telnyx_request_error_retry',
            url: prepared.url,
            attempt,
            wait_ms: waitMs,
            err: error,
            ...this.logContext,
          },
          'telnyx request error retry',
        );
        await sleep(waitMs);
        return this.requestWithRetry(path, options, attempt + 1);
      }

      log.error({ event: 'telnyx_request_error', url: prepared.url, err: error, ...this.logContext }, 'telnyx request error');
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}

/** `null` when the account credentials or origin number are missing. */
export function createTelephonyClient(
  config: Pick<Env, 'TELNYX_API_KEY' | 'TELNYX_CONNECTION_ID' | 'TELNYX_PHONE_NUMBER'>,
): TelnyxClient | null {
  if (!config.TELNYX_API_KEY || !config.TELNYX_CONNECTION_ID || !config.TELNYX_PHONE_NUMBER) {
    log.warn({ event: 'telephony_unconfigured' }, 'telnyx credentials missing; outbound calling disabled');
    return null;
  }

  return new TelnyxClient({
    apiKey: config.TELNYX_API_KEY,
    connectionId: config.TELNYX_CONNECTION_ID,
    fromNumber: config.TELNYX_PHONE_NUMBER,
  });
}
