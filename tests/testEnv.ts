const defaults: Record<string, string> = {
  LOG_LEVEL: 'silent',
  PORT: '3000',
  HOST: '127.0.0.1',
  PUBLIC_BASE_URL: 'https://voice.test',
  AGENT_NAME: 'Nova',
  CALL_SESSION_IDLE_TTL_MINUTES: '0',
};

// Collaborator settings a developer's .env may carry; tests wire fakes instead.
const cleared = [
  'LLM_API_KEY',
  'BRAIN_URL',
  'TELNYX_API_KEY',
  'TELNYX_CONNECTION_ID',
  'TELNYX_PHONE_NUMBER',
  'TELNYX_PUBLIC_KEY',
  'WHISPER_URL',
  'KOKORO_URL',
  'AUDIO_STORAGE_DIR',
  'AUDIO_PUBLIC_BASE_URL',
];

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    process.env[key] = value;
  }
  for (const key of cleared) {
    process.env[key] = '';
  }
}
