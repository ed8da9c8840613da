// src/stt/providers/whisperHttp.ts
import { z } from 'zod';
import { log } from '../../log';
import { incStageError, startStageTimer } from '../../metrics';
import type { Transcriber } from '../provider';
import type { STTAudioInput, STTOptions, TranscriptionResult } from '../types';

/**
 * Whisper servers vary a lot:
 * - { text: "..." }
 * - { transcription: "..." }
 * - { result: { text: "..." } }
 * - { segments: [{ text: "..." }, ...] }
 */
const WhisperResponseSchema = z.object({
  text: z.string().optional(),
  transcription: z.string().optional(),
  result: z
    .object({
      text: z.string().optional(),
      transcription: z.string().optional(),
    })
    .optional(),
  segments: z.array(z.object({ text: z.string().optional() })).optional(),
});

export function extractText(result: unknown): string {
  const parsed = WhisperResponseSchema.safeParse(result);
  if (!parsed.success) return '';
  const data = parsed.data;

  if (data.text !== undefined) return data.text;
  if (data.transcription !== undefined) return data.transcription;
  if (data.result?.text !== undefined) return data.result.text;
  if (data.result?.transcription !== undefined) return data.result.transcription;

  if (data.segments) {
    return data.segments
      .map((seg) => seg.text?.trim() ?? '')
      .filter((text) => text !== '')
      .join(' ')
      .trim();
  }

  return '';
}

function buildWhisperUrl(whisperUrl: string, language?: string): string {
  if (!language) return whisperUrl;
  const separator = whisperUrl.includes('?') ? '&' : '?';
  return `${whisperUrl}${separator}language=${encodeURIComponent(language)}`;
}

function previewText(text: string, max = 140): string {
  const t = text.replace(/\s+/g, ' ').trim();
  if (t.length <= max) return t;
  return `${t.slice(0, max)}…`;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class WhisperHttpTranscriber implements Transcriber {
  public readonly id = 'whisper_http';

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {}

  public async transcribe(audio: STTAudioInput, opts: STTOptions = {}): Promise<TranscriptionResult> {
    if (audio.audio.length === 0) {
      return { ok: false, code: 'NoAudioDetected', message: 'no audio received' };
    }

    const whisperUrl = buildWhisperUrl(this.baseUrl, opts.language);
    const end = startStageTimer('stt');
    const startedAtMs = Date.now();

    try {
      // Raw bytes in the body (curl --data-binary), no multipart.
      const response = await fetch(whisperUrl, {
        method: 'POST',
        headers: {
          'Content-Type': audio.contentType,
          Accept: 'application/json, text/plain;q=0.9, */*;q=0.1',
        },
        body: audio.audio,
        signal: opts.signal ?? AbortSignal.timeout(this.timeoutMs),
      });

      const contentType = response.headers.get('content-type') ?? '';
      const respText = await response.text().catch(() => '');

      if (!response.ok) {
        incStageError('stt');
        const preview = respText.length > 700 ? `${respText.slice(0, 700)}...` : respText;
        log.error(
          { event: 'whisper_error', status: response.status, body_preview: preview, ...(opts.logContext ?? {}) },
          'whisper request failed',
        );
        return { ok: false, code: 'RecognitionBackendError', message: `whisper error ${response.status}` };
      }

      let text = respText;
      if (contentType.includes('application/json')) {
        let data: unknown;
        try {
          data = JSON.parse(respText);
        } catch {
          data = { text: '' };
        }
        text = extractText(data);
      }
      text = text.trim();

      log.info(
        {
          event: 'whisper_response',
          status: response.status,
          duration_ms: Date.now() - startedAtMs,
          transcript_length: text.length,
          transcript_preview: previewText(text),
          ...(opts.logContext ?? {}),
        },
        'whisper response',
      );

      if (!text) {
        return { ok: false, code: 'UnintelligibleAudio', message: 'Could not recognize audio' };
      }
      return { ok: true, text };
    } catch (error) {
      incStageError('stt');
      log.error({ event: 'whisper_request_error', err: error, ...(opts.logContext ?? {}) }, 'whisper request error');
      return { ok: false, code: 'RecognitionBackendError', message: 'speech recognition backend unreachable' };
    } finally {
      end();
    }
  }
}
