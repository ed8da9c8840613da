import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('history is capped and evicts the oldest turns first', async () => {
  const { InMemoryConversationStore, createTurn } = await import('../src/conversation/conversationStore');
  const store = new InMemoryConversationStore({ maxTurns: 10 });

  for (let i = 1; i <= 12; i += 1) {
    store.append('s1', createTurn(i % 2 === 1 ? 'user' : 'assistant', `turn ${i}`));
  }

  const history = store.history('s1');
  assert.equal(history.length, 10);
  assert.equal(history[0]?.content, 'turn 3');
  assert.equal(history[9]?.content, 'turn 12');
});

test('sessions are isolated and reset clears only one', async () => {
  const { InMemoryConversationStore, createTurn } = await import('../src/conversation/conversationStore');
  const store = new InMemoryConversationStore();

  store.append('a', createTurn('user', 'hello'));
  store.append('b', createTurn('user', 'hi'));
  assert.equal(store.sessionCount(), 2);

  store.reset('a');
  assert.deepEqual(store.history('a'), []);
  assert.equal(store.history('b').length, 1);
  assert.equal(store.sessionCount(), 1);
});

test('history returns a copy and turns are frozen', async () => {
  const { InMemoryConversationStore, createTurn } = await import('../src/conversation/conversationStore');
  const store = new InMemoryConversationStore();

  store.append('s', createTurn('user', 'hello'));
  const copy = store.history('s');
  copy.pop();

  assert.equal(store.history('s').length, 1);
  assert.ok(Object.isFrozen(store.history('s')[0]));
});

test('an unknown session has an empty history', async () => {
  const { InMemoryConversationStore } = await import('../src/conversation/conversationStore');
  const store = new InMemoryConversationStore();

  assert.deepEqual(store.history('missing'), []);
  assert.equal(store.sessionCount(), 0);
});
