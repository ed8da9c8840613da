import type { Env } from '../env';
import { log } from '../log';
import type { Transcriber } from './provider';
import { DisabledTranscriber } from './providers/disabled';
import { WhisperHttpTranscriber } from './providers/whisperHttp';

export function createTranscriber(config: Pick<Env, 'WHISPER_URL' | 'SPEECH_TIMEOUT_MS'>): Transcriber {
  const provider: Transcriber = config.WHISPER_URL
    ? new WhisperHttpTranscriber(config.WHISPER_URL, config.SPEECH_TIMEOUT_MS)
    : new DisabledTranscriber();

  log.info({ event: 'stt_provider_selected', provider_id: provider.id }, 'stt provider selected');
  return provider;
}
