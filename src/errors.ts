export type DialogueErrorCode =
  | 'NoAudioDetected'
  | 'UnintelligibleAudio'
  | 'RecognitionBackendError'
  | 'CompletionBackendUnavailable'
  | 'CompletionBackendError'
  | 'SynthesisError'
  | 'TelephonyConfigurationMissing'
  | 'TelephonyCallFailed'
  | 'EmptyInput';

export class DialogueError extends Error {
  public readonly code: DialogueErrorCode;
  public readonly status?: number;

  constructor(code: DialogueErrorCode, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'DialogueError';
    this.code = code;
    this.status = options.status;
  }
}

export function isDialogueError(error: unknown, code?: DialogueErrorCode): error is DialogueError {
  if (!(error instanceof DialogueError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'unknown';
}
