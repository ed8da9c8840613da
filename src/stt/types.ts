export type STTMode = 'disabled' | 'whisper_http';

export interface STTAudioInput {
  audio: Buffer;
  /** MIME type as received, e.g. audio/wav. */
  contentType: string;
}

export interface STTOptions {
  language?: string;
  signal?: AbortSignal;
  logContext?: Record<string, unknown>;
}

export type TranscriptionFailureCode = 'NoAudioDetected' | 'UnintelligibleAudio' | 'RecognitionBackendError';

export type TranscriptionResult =
  | { ok: true; text: string }
  | { ok: false; code: TranscriptionFailureCode; message: string };
