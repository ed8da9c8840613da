import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import type { AudioStore } from '../src/storage/audioStore';
import type { Transcriber } from '../src/stt/provider';
import type { PlaceCallResult, TelephonyClient } from '../src/telnyx/types';
import type { Synthesizer, SynthesisResult } from '../src/tts/types';
import { setTestEnv } from './testEnv';

setTestEnv();

class StaticSynthesizer implements Synthesizer {
  public readonly id = 'kokoro_http';

  constructor(private readonly result: SynthesisResult) {}

  public async synthesize(): Promise<SynthesisResult> {
    return this.result;
  }
}

class RecordingTelephony implements TelephonyClient {
  public readonly calls: string[] = [];

  public async placeCall(toNumber: string): Promise<PlaceCallResult> {
    this.calls.push(toNumber);
    return { callId: 'CA42' };
  }
}

async function buildOrchestrator(options: {
  synthesizer: Synthesizer;
  transcriber?: Transcriber;
  telephony?: TelephonyClient | null;
  audioStore?: AudioStore | null;
}) {
  const { DialogueOrchestrator } = await import('../src/dialogue/orchestrator');
  const { ReplyEngine } = await import('../src/ai/replyEngine');
  const { SessionManager } = await import('../src/calls/sessionManager');
  const { InMemoryConversationStore } = await import('../src/conversation/conversationStore');
  const { WorkerPool } = await import('../src/concurrency/workerPool');
  const { fixedPicker } = await import('../src/dialogue/picker');
  const { DisabledTranscriber } = await import('../src/stt/providers/disabled');

  const pool = new WorkerPool(2);
  const engine = new ReplyEngine({
    store: new InMemoryConversationStore({ maxTurns: 10 }),
    completion: null,
    pool,
    agentName: 'Nova',
    completionTimeoutMs: 8000,
    picker: fixedPicker(0),
  });
  const sessions = new SessionManager({ responder: engine, publicBaseUrl: 'https://voice.test', idleTtlMinutes: 0 });

  return new DialogueOrchestrator({
    engine,
    sessions,
    transcriber: options.transcriber ?? new DisabledTranscriber(),
    synthesizer: options.synthesizer,
    pool,
    telephony: options.telephony ?? null,
    audioStore: options.audioStore,
    publicBaseUrl: 'https://voice.test',
  });
}

test('speak stores synthesized audio and returns its public url', async () => {
  const { AudioStore } = await import('../src/storage/audioStore');
  const dir = await mkdtemp(path.join(tmpdir(), 'orchestrator-audio-'));
  const audioStore = new AudioStore({ dir, publicBaseUrl: 'https://voice.test/audio/' });
  const orchestrator = await buildOrchestrator({
    synthesizer: new StaticSynthesizer({ ok: true, audio: Buffer.from('RIFFdata'), contentType: 'audio/wav' }),
    audioStore,
  });

  try {
    const result = await orchestrator.speak('Hello');

    assert.equal(result.status, 'success');
    assert.equal(result.message, 'Text spoken successfully');
    const fileName = result.audio_url?.replace('https://voice.test/audio/', '') ?? '';
    assert.match(fileName, /^tts_[0-9a-f-]{36}\.wav$/);
    assert.equal(await readFile(path.join(dir, fileName), 'utf8'), 'RIFFdata');
  } finally {
    orchestrator.stop();
    await rm(dir, { recursive: true, force: true });
  }
});

test('speak reports synthesis failures without throwing', async () => {
  const orchestrator = await buildOrchestrator({
    synthesizer: new StaticSynthesizer({ ok: false, code: 'SynthesisError', message: 'kokoro tts error 500' }),
  });

  assert.deepEqual(await orchestrator.speak('Hello'), {
    status: 'error',
    message: 'TTS failed',
    error: 'kokoro tts error 500',
  });
  await assert.rejects(orchestrator.speak('  '), { name: 'DialogueError', message: 'text cannot be empty' });
});

test('listen reports an unconfigured recognizer as an error result', async () => {
  const orchestrator = await buildOrchestrator({
    synthesizer: new StaticSynthesizer({ ok: false, code: 'SynthesisError', message: 'unused' }),
  });

  assert.deepEqual(await orchestrator.listen({ audio: Buffer.from('RIFF'), contentType: 'audio/wav' }), {
    status: 'error',
    error: 'speech recognition is not configured',
  });
  assert.equal(orchestrator.features().speech_recognition, false);
});

test('placeOutboundCall validates configuration and number', async () => {
  const synthesizer = new StaticSynthesizer({ ok: false, code: 'SynthesisError', message: 'unused' });

  const unconfigured = await buildOrchestrator({ synthesizer });
  await assert.rejects(unconfigured.placeOutboundCall('+15550001111'), {
    code: 'TelephonyConfigurationMissing',
    status: 503,
  });

  const telephony = new RecordingTelephony();
  const configured = await buildOrchestrator({ synthesizer, telephony });
  await assert.rejects(configured.placeOutboundCall('   '), { code: 'EmptyInput', status: 400 });
  assert.deepEqual(await configured.placeOutboundCall(' +15550001111 '), {
    status: 'success',
    message: 'Calling +15550001111',
    call_id: 'CA42',
  });
  assert.deepEqual(telephony.calls, ['+15550001111']);
});
