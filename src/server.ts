import express from 'express';
import http from 'http';
import { createCompletionClient, type CompletionClient } from './ai/completionClient';
import { ReplyEngine } from './ai/replyEngine';
import { SessionManager } from './calls/sessionManager';
import { WorkerPool } from './concurrency/workerPool';
import { InMemoryConversationStore, type ConversationStore } from './conversation/conversationStore';
import { DialogueOrchestrator } from './dialogue/orchestrator';
import type { VariantPicker } from './dialogue/picker';
import { env, type Env } from './env';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createChatRouter } from './routes/chat';
import { createHealthRouter } from './routes/health';
import { asyncRoute, captureRawBody, errorHandler, requestIdMiddleware } from './routes/middleware';
import { createTelephonyRouter } from './routes/telephonyWebhook';
import { AudioStore } from './storage/audioStore';
import type { Transcriber } from './stt/provider';
import { createTranscriber } from './stt/registry';
import { createTelephonyClient } from './telnyx/telnyxClient';
import type { TelephonyClient } from './telnyx/types';
import { createSynthesizer } from './tts/kokoroTTS';
import type { Synthesizer } from './tts/types';

export const SERVICE_NAME = 'voice-dialogue-runtime';
export const SERVICE_VERSION = '1.0.0';

/** Collaborators built from config unless a caller supplies them. */
export interface ServerDependencies {
  completion: CompletionClient | null;
  transcriber: Transcriber;
  synthesizer: Synthesizer;
  telephony: TelephonyClient | null;
  store: ConversationStore;
  audioStore: AudioStore | null;
  picker: VariantPicker;
  now: () => Date;
}

export interface BuiltServer {
  app: express.Express;
  server: http.Server;
  orchestrator: DialogueOrchestrator;
  sessionManager: SessionManager;
}

function createAudioStore(config: Env): AudioStore | null {
  if (!config.AUDIO_STORAGE_DIR) {
    return null;
  }
  return new AudioStore({
    dir: config.AUDIO_STORAGE_DIR,
    publicBaseUrl: config.AUDIO_PUBLIC_BASE_URL ?? `${config.PUBLIC_BASE_URL.replace(/\/$/, '')}/audio`,
  });
}

export function buildServer(overrides: Partial<ServerDependencies> = {}, config: Env = env): BuiltServer {
  const completion = overrides.completion !== undefined ? overrides.completion : createCompletionClient(config);
  const telephony = overrides.telephony !== undefined ? overrides.telephony : createTelephonyClient(config);
  const audioStore = overrides.audioStore !== undefined ? overrides.audioStore : createAudioStore(config);
  const store = overrides.store ?? new InMemoryConversationStore({ maxTurns: config.HISTORY_MAX_TURNS });
  const pool = new WorkerPool(config.WORKER_POOL_SIZE);

  const engine = new ReplyEngine({
    store,
    completion,
    pool,
    agentName: config.AGENT_NAME,
    completionTimeoutMs: config.COMPLETION_TIMEOUT_MS,
    picker: overrides.picker,
    now: overrides.now,
  });

  const sessionManager = new SessionManager({
    responder: engine,
    publicBaseUrl: config.PUBLIC_BASE_URL,
    agentName: config.AGENT_NAME,
    idleTtlMinutes: config.CALL_SESSION_IDLE_TTL_MINUTES,
    now: overrides.now,
  });

  const orchestrator = new DialogueOrchestrator({
    engine,
    sessions: sessionManager,
    transcriber: overrides.transcriber ?? createTranscriber(config),
    synthesizer: overrides.synthesizer ?? createSynthesizer(config),
    pool,
    telephony,
    audioStore,
    publicBaseUrl: config.PUBLIC_BASE_URL,
  });

  const app = express();
  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);
  app.use(express.json({ verify: captureRawBody }));

  app.get('/', (_req, res) => {
    res.json({ status: 'success', message: `${config.AGENT_NAME} voice agent is running`, version: SERVICE_VERSION });
  });

  app.get('/info', (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      agent: config.AGENT_NAME,
      features: orchestrator.features(),
      endpoints: {
        'GET /health': 'Health check',
        'GET /metrics': 'Prometheus metrics',
        'POST /chat': 'Text chat',
        'POST /process': 'Text chat (alias)',
        'POST /speak': 'Text-to-speech',
        'POST /listen': 'Speech recognition',
        'POST /interact': 'Chat and speak the reply',
        'POST /reset': 'Reset conversation history',
        'POST /telephony/voice': 'Incoming call webhook',
        'POST /telephony/call': 'Place an outbound call',
        'GET /telephony/status': 'Telephony configuration',
      },
    });
  });

  app.get('/metrics', asyncRoute(metricsHandler));
  app.use('/health', createHealthRouter(orchestrator, { service: SERVICE_NAME, version: SERVICE_VERSION }));
  app.use(createChatRouter(orchestrator));
  app.use(
    createTelephonyRouter(orchestrator, {
      publicBaseUrl: config.PUBLIC_BASE_URL,
      agentName: config.AGENT_NAME,
      texml: { voice: config.TEXML_VOICE, language: config.TEXML_LANGUAGE },
      publicKey: config.TELNYX_PUBLIC_KEY,
      phoneNumber: config.TELNYX_PHONE_NUMBER,
    }),
  );

  if (audioStore) {
    app.use('/audio', express.static(audioStore.directory));
  }

  app.use(errorHandler);

  const server = http.createServer(app);
  server.on('close', () => orchestrator.stop());

  return { app, server, orchestrator, sessionManager };
}
