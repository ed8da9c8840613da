import type { STTAudioInput, STTMode, STTOptions, TranscriptionResult } from './types';

/** Speech-to-text backend. Failures come back as results, never as rejections. */
export interface Transcriber {
  readonly id: STTMode;
  transcribe(audio: STTAudioInput, opts?: STTOptions): Promise<TranscriptionResult>;
}
