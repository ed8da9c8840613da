import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

const fixedNow = (): Date => new Date(2026, 9, 18, 15, 45);

test('empty input short-circuits to the repeat prompt', async () => {
  const { generateResponse, replyFor } = await import('../src/dialogue/responses');

  assert.equal(generateResponse('greeting', '   '), "I didn't catch that. Could you please repeat?");
  assert.deepEqual(replyFor(''), { intent: null, text: "I didn't catch that. Could you please repeat?" });
});

test('time and date use the injected clock', async () => {
  const { replyFor } = await import('../src/dialogue/responses');

  assert.equal(replyFor('what time is it', { now: fixedNow }).text, "It's 3:45 PM right now.");
  assert.equal(replyFor("what's the date", { now: fixedNow }).text, 'Today is Sunday, October 18, 2026.');
});

test('clock formatting covers midnight and noon', async () => {
  const { formatClockTime, formatCalendarDate } = await import('../src/dialogue/responses');

  assert.equal(formatClockTime(new Date(2024, 0, 1, 0, 5)), '12:05 AM');
  assert.equal(formatClockTime(new Date(2024, 0, 1, 12, 0)), '12:00 PM');
  assert.equal(formatCalendarDate(new Date(2024, 0, 1)), 'Monday, January 1, 2024');
});

test('identity names the agent', async () => {
  const { replyFor } = await import('../src/dialogue/responses');

  assert.equal(
    replyFor('who are you', { agentName: 'Aria' }).text,
    "I'm Aria, your voice assistant. I can chat, tell the time, share a joke, and answer simple questions.",
  );
});

test('multi-variant intents go through the picker', async () => {
  const { replyFor } = await import('../src/dialogue/responses');
  const { fixedPicker } = await import('../src/dialogue/picker');

  assert.equal(replyFor('hello', { picker: fixedPicker(0) }).text, 'Hello! How can I help you today?');
  assert.equal(replyFor('hello', { picker: fixedPicker(3) }).text, 'Greetings! How may I assist you?');
  assert.equal(replyFor('hello', { picker: fixedPicker(99) }).text, 'Greetings! How may I assist you?');
  assert.equal(
    replyFor('tell me a joke', { picker: fixedPicker(0) }).text,
    "Why don't scientists trust atoms? Because they make up everything!",
  );
});

test('random picker only returns listed variants', async () => {
  const { replyFor, TEMPLATES } = await import('../src/dialogue/responses');

  for (let i = 0; i < 20; i += 1) {
    assert.ok(TEMPLATES.greeting.includes(replyFor('hi').text));
  }
});

test('question intents use the topic when there is one', async () => {
  const { replyFor } = await import('../src/dialogue/responses');

  assert.equal(
    replyFor('What is photosynthesis').text,
    "Good question about is photosynthesis. Could you tell me a bit more about what you'd like to know?",
  );
  assert.equal(replyFor('what').text, 'What would you like to know? Ask me anything.');
  assert.equal(replyFor('Who').text, 'Who are you asking about?');
});

test('fallback echoes the first word of the utterance', async () => {
  const { replyFor } = await import('../src/dialogue/responses');
  const { fixedPicker } = await import('../src/dialogue/picker');

  assert.deepEqual(replyFor('Pizza tonight', { picker: fixedPicker(0) }), {
    intent: 'fallback',
    text: 'Tell me more about "pizza". What would you like to know?',
  });
  assert.equal(
    replyFor('Bananas', { picker: fixedPicker(1) }).text,
    'Interesting, you mentioned "bananas". Could you elaborate?',
  );
});

test('generateResponse accepts a bare intent', async () => {
  const { generateResponse } = await import('../src/dialogue/responses');

  assert.equal(generateResponse('farewell', 'anything'), 'Goodbye! It was nice talking with you.');
  assert.equal(
    generateResponse('help', 'anything'),
    'I can chat with you, tell you the time and date, share a joke, and answer simple questions. Just ask!',
  );
});
