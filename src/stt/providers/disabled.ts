import type { Transcriber } from '../provider';
import type { STTAudioInput, STTOptions, TranscriptionResult } from '../types';

export class DisabledTranscriber implements Transcriber {
  public readonly id = 'disabled';

  public async transcribe(_audio: STTAudioInput, _opts: STTOptions = {}): Promise<TranscriptionResult> {
    return { ok: false, code: 'RecognitionBackendError', message: 'speech recognition is not configured' };
  }
}
