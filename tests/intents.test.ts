import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('classifyIntent maps keywords to intents in rule order', async () => {
  const { classifyIntent } = await import('../src/dialogue/intents');

  const cases: Array<[string, string]> = [
    ['Hello there', 'greeting'],
    ['hey', 'greeting'],
    ['Who are you?', 'identity'],
    ["What's your name", 'identity'],
    ['What time is it?', 'time'],
    ["What's the date", 'date'],
    ['What day is it', 'date'],
    ['How are you', 'wellbeing'],
    ["What's the weather like", 'weather'],
    ['Tell me a joke', 'joke'],
    ['Can you help me', 'help'],
    ['Thanks a lot', 'thanks'],
    ['ty', 'thanks'],
    ['Goodbye', 'farewell'],
    ['see you later', 'farewell'],
    ['What is the meaning of life', 'life_meaning'],
    ['You are awesome', 'compliment'],
    ['What is the capital of France', 'question_what'],
    ['how does a rainbow form', 'question_how'],
    ['Why is the sky blue', 'question_why'],
    ['When does the store open', 'question_when'],
    ['Where is the library', 'question_where'],
    ['Who invented the telephone', 'question_who'],
    ['Is this real?', 'generic_question'],
    ['Bananas', 'fallback'],
  ];

  for (const [utterance, expected] of cases) {
    assert.equal(classifyIntent(utterance), expected, utterance);
  }
});

test('short keywords match whole words only', async () => {
  const { classifyIntent } = await import('../src/dialogue/intents');

  assert.equal(classifyIntent('this is it'), 'fallback');
  assert.equal(classifyIntent('that was quite something'), 'fallback');
  assert.equal(classifyIntent('sometimes I wonder'), 'fallback');
});

test('classification is case-insensitive and trims whitespace', async () => {
  const { classifyIntent } = await import('../src/dialogue/intents');

  assert.equal(classifyIntent('   HELLO   '), 'greeting');
  assert.equal(classifyIntent('TELL ME A JOKE'), 'joke');
});

test('classify extracts the keyword, first word and question topic', async () => {
  const { classify } = await import('../src/dialogue/intents');

  assert.deepEqual(classify('Why is the sky blue'), {
    intent: 'question_why',
    keyword: 'why',
    firstWord: 'why',
    topic: 'is the sky blue',
  });
  assert.deepEqual(classify("what's up"), {
    intent: 'question_what',
    keyword: 'what',
    firstWord: "what's",
    topic: 'up',
  });
  assert.deepEqual(classify('What'), { intent: 'question_what', keyword: 'what', firstWord: 'what', topic: null });
  assert.deepEqual(classify('Pizza tonight'), { intent: 'fallback', keyword: null, firstWord: 'pizza', topic: null });
});

test('empty input classifies as fallback', async () => {
  const { classify } = await import('../src/dialogue/intents');

  assert.deepEqual(classify('   '), { intent: 'fallback', keyword: null, firstWord: '', topic: null });
});

test('"sometimes" suppresses the time intent even when "time" also appears', async () => {
  const { classify, classifyIntent } = await import('../src/dialogue/intents');
  const utterance = "what's your favorite time to reminisce, sometimes I wonder";

  assert.notEqual(classifyIntent(utterance), 'time');
  assert.deepEqual(classify(utterance), {
    intent: 'question_what',
    keyword: 'what',
    firstWord: "what's",
    topic: 'your favorite time to reminisce sometimes i wonder',
  });
});
