import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { CompletionClient, CompletionRequest } from '../src/ai/completionClient';
import type { WorkerPool as WorkerPoolType } from '../src/concurrency/workerPool';
import { setTestEnv } from './testEnv';

setTestEnv();

class FakeCompletion implements CompletionClient {
  public readonly id = 'openai_compatible';
  public readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: (request: CompletionRequest) => Promise<string>) {}

  public complete(request: CompletionRequest): Promise<string> {
    this.requests.push({ ...request, history: [...request.history] });
    return this.reply(request);
  }
}

async function buildEngine(completion: CompletionClient | null, completionTimeoutMs = 8000, pool?: WorkerPoolType) {
  const { ReplyEngine } = await import('../src/ai/replyEngine');
  const { InMemoryConversationStore } = await import('../src/conversation/conversationStore');
  const { WorkerPool } = await import('../src/concurrency/workerPool');
  const { fixedPicker } = await import('../src/dialogue/picker');

  const store = new InMemoryConversationStore({ maxTurns: 10 });
  const engine = new ReplyEngine({
    store,
    completion,
    pool: pool ?? new WorkerPool(2),
    agentName: 'Nova',
    completionTimeoutMs,
    picker: fixedPicker(0),
  });
  return { engine, store };
}

test('empty input returns the repeat prompt without touching history', async () => {
  const completion = new FakeCompletion(async () => 'should not be used');
  const { engine, store } = await buildEngine(completion);

  const result = await engine.respond('s1', '   ');

  assert.deepEqual(result, { text: "I didn't catch that. Could you please repeat?", source: 'empty_input' });
  assert.equal(completion.requests.length, 0);
  assert.deepEqual(store.history('s1'), []);
});

test('completion replies are recorded with the preamble and full history', async () => {
  const completion = new FakeCompletion(async () => '  Sure thing!  ');
  const { engine, store } = await buildEngine(completion);

  await engine.respond('s1', 'first');
  const result = await engine.respond('s1', 'second');

  assert.deepEqual(result, { text: 'Sure thing!', source: 'completion' });
  assert.equal(
    completion.requests[1]?.preamble,
    "You are Nova, a helpful voice assistant. Be concise and friendly. Keep responses short (1-2 sentences) for voice calls. Don't use markdown or special formatting.",
  );
  assert.deepEqual(
    completion.requests[1]?.history.map((turn) => [turn.role, turn.content]),
    [
      ['user', 'first'],
      ['assistant', 'Sure thing!'],
      ['user', 'second'],
    ],
  );
  assert.equal(store.history('s1').length, 4);
});

test('completion failure falls back to rules and keeps the user turn', async () => {
  const completion = new FakeCompletion(async () => {
    throw new Error('backend down');
  });
  const { engine, store } = await buildEngine(completion);

  const result = await engine.respond('s1', 'hello');

  assert.deepEqual(result, { text: 'Hello! How can I help you today?', source: 'rules', intent: 'greeting' });
  assert.deepEqual(
    store.history('s1').map((turn) => turn.content),
    ['hello'],
  );
});

test('blank completion text counts as a failure', async () => {
  const { engine, store } = await buildEngine(new FakeCompletion(async () => '   '));

  const result = await engine.respond('s1', 'tell me a joke');
  assert.equal(result.source, 'rules');
  assert.equal(result.text, "Why don't scientists trust atoms? Because they make up everything!");
  assert.equal(store.history('s1').length, 1);
});

test('slow completions time out and fall back', async () => {
  const completion = new FakeCompletion(() => new Promise<string>(() => undefined));
  const { engine } = await buildEngine(completion, 20);

  const result = await engine.respond('s1', 'Who are you?');

  assert.equal(result.source, 'rules');
  assert.equal(
    result.text,
    "I'm Nova, your voice assistant. I can chat, tell the time, share a joke, and answer simple questions.",
  );
});

test('a saturated worker pool counts against the completion deadline', async () => {
  const { WorkerPool } = await import('../src/concurrency/workerPool');
  const pool = new WorkerPool(1);
  void pool.run('stt', () => new Promise<never>(() => undefined));
  const completion = new FakeCompletion(async () => 'should not be used');
  const { engine, store } = await buildEngine(completion, 20, pool);

  const result = await engine.respond('s1', 'hello');

  assert.deepEqual(result, { text: 'Hello! How can I help you today?', source: 'rules', intent: 'greeting' });
  assert.equal(completion.requests.length, 0);
  assert.equal(pool.waitingCount, 1);
  assert.deepEqual(
    store.history('s1').map((turn) => turn.content),
    ['hello'],
  );
});

test('without a completion client the rules answer directly', async () => {
  const { engine, store } = await buildEngine(null);

  assert.equal(engine.isAvailable(), false);
  const result = await engine.respond('s1', 'Goodbye');
  assert.deepEqual(result, { text: 'Goodbye! It was nice talking with you.', source: 'rules', intent: 'farewell' });
  assert.deepEqual(store.history('s1'), []);
});

test('concurrent turns for one session append in arrival order', async () => {
  let call = 0;
  const completion = new FakeCompletion(async () => {
    call += 1;
    const current = call;
    // The first reply resolves last if requests were not serialized.
    await new Promise((resolve) => setTimeout(resolve, current === 1 ? 30 : 1));
    return `reply ${current}`;
  });
  const { engine, store } = await buildEngine(completion);

  await Promise.all([engine.respond('s1', 'one'), engine.respond('s1', 'two')]);

  assert.deepEqual(
    store.history('s1').map((turn) => turn.content),
    ['one', 'reply 1', 'two', 'reply 2'],
  );
});

test('reset clears the session history', async () => {
  const { engine, store } = await buildEngine(new FakeCompletion(async () => 'ok'));

  await engine.respond('s1', 'hi');
  await engine.reset('s1');

  assert.deepEqual(store.history('s1'), []);
});
