export type TTSMode = 'disabled' | 'kokoro_http';

export interface TTSRequest {
  text: string;
  voice?: string;
}

export interface TTSResult {
  audio: Buffer;
  contentType: string;
}

export type SynthesisResult = ({ ok: true } & TTSResult) | { ok: false; code: 'SynthesisError'; message: string };

/** Text-to-speech backend. Failures come back as results, never as rejections. */
export interface Synthesizer {
  readonly id: TTSMode;
  synthesize(request: TTSRequest, signal?: AbortSignal): Promise<SynthesisResult>;
}
