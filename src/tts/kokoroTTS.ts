import type { Env } from '../env';
import { errorMessage } from '../errors';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import type { Synthesizer, SynthesisResult, TTSRequest, TTSResult } from './types';

export async function synthesizeSpeech(url: string, request: TTSRequest, signal?: AbortSignal): Promise<TTSResult> {
  const response = await fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify({
      text: request.text,
      voice: request.voice,
    }),
    signal,
  });

  if (!response.ok) {
    const body = await response.text();
    log.error({ event: 'kokoro_tts_error', status: response.status, body }, 'kokoro tts error');
    throw new Error(`kokoro tts error ${response.status}`);
  }

  const arrayBuffer = await response.arrayBuffer();
  return {
    audio: Buffer.from(arrayBuffer),
    contentType: response.headers.get('content-type') ?? 'audio/wav',
  };
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class KokoroSynthesizer implements Synthesizer {
  public readonly id = 'kokoro_http';

  constructor(
    private readonly url: string,
    private readonly defaultVoice?: string,
    private readonly timeoutMs: number = DEFAULT_TIMEOUT_MS,
  ) {}

  public async synthesize(request: TTSRequest, signal?: AbortSignal): Promise<SynthesisResult> {
    const end = startStageTimer('tts');
    try {
      const result = await synthesizeSpeech(
        this.url,
        { text: request.text, voice: request.voice ?? this.defaultVoice },
        signal ?? AbortSignal.timeout(this.timeoutMs),
      );
      if (result.audio.length === 0) {
        incStageError('tts');
        return { ok: false, code: 'SynthesisError', message: 'kokoro returned no audio' };
      }
      return { ok: true, ...result };
    } catch (error) {
      incStageError('tts');
      log.warn({ event: 'tts_failed', err: error }, 'tts failed');
      return { ok: false, code: 'SynthesisError', message: errorMessage(error) };
    } finally {
      end();
    }
  }
}

export class DisabledSynthesizer implements Synthesizer {
  public readonly id = 'disabled';

  public async synthesize(_request: TTSRequest): Promise<SynthesisResult> {
    return { ok: false, code: 'SynthesisError', message: 'text-to-speech is not configured' };
  }
}

export function createSynthesizer(
  config: Pick<Env, 'KOKORO_URL' | 'KOKORO_VOICE_ID' | 'SPEECH_TIMEOUT_MS'>,
): Synthesizer {
  const provider: Synthesizer = config.KOKORO_URL
    ? new KokoroSynthesizer(config.KOKORO_URL, config.KOKORO_VOICE_ID, config.SPEECH_TIMEOUT_MS)
    : new DisabledSynthesizer();

  log.info({ event: 'tts_provider_selected', provider_id: provider.id }, 'tts provider selected');
  return provider;
}
