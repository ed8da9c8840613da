import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

type FetchCall = { url: string; method?: string; headers: Headers; body?: string };

function stubFetch(responses: Array<() => Response>): { calls: FetchCall[]; restore: () => void } {
  const originalFetch = globalThis.fetch;
  const calls: FetchCall[] = [];
  let index = 0;

  globalThis.fetch = async (input, init) => {
    calls.push({
      url: String(input),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });
    const next = responses[Math.min(index, responses.length - 1)];
    index += 1;
    if (!next) {
      throw new Error('no stubbed response');
    }
    return next();
  };

  return {
    calls,
    restore: () => {
      globalThis.fetch = originalFetch;
    },
  };
}

const jsonResponse = (status: number, body: unknown): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const clientConfig = {
  apiKey: 'test-secret',
  connectionId: 'conn-1',
  fromNumber: '+15550001111',
  maxRetries: 2,
};

test('placeCall posts a TeXML call and returns the call sid', async () => {
  const { TelnyxClient } = await import('../src/telnyx/telnyxClient');
  const stub = stubFetch([() => jsonResponse(200, { data: { call_sid: 'CA777', status: 'queued' } })]);

  try {
    const client = new TelnyxClient(clientConfig);
    const result = await client.placeCall('+15550002222', 'https://voice.test/telephony/outbound');

    assert.deepEqual(result, { callId: 'CA777' });
    assert.equal(stub.calls.length, 1);
    assert.equal(stub.calls[0]?.url, 'https://api.telnyx.com/v2/texml/calls/conn-1');
    assert.equal(stub.calls[0]?.method, 'POST');
    assert.equal(stub.calls[0]?.headers.get('authorization'), 'Bearer test-secret');
    assert.deepEqual(JSON.parse(stub.calls[0]?.body ?? '{}'), {
      To: '+15550002222',
      From: '+15550001111',
      Url: 'https://voice.test/telephony/outbound',
      UrlMethod: 'POST',
    });
  } finally {
    stub.restore();
  }
});

test('placeCall retries server errors before succeeding', async () => {
  const { TelnyxClient } = await import('../src/telnyx/telnyxClient');
  const stub = stubFetch([
    () => jsonResponse(503, { errors: [{ detail: 'busy' }] }),
    () => jsonResponse(200, { data: { call_sid: 'CA778' } }),
  ]);

  try {
    const client = new TelnyxClient(clientConfig);
    const result = await client.placeCall('+15550002222', 'https://voice.test/telephony/outbound');

    assert.deepEqual(result, { callId: 'CA778' });
    assert.equal(stub.calls.length, 2);
  } finally {
    stub.restore();
  }
});

test('placeCall surfaces client errors as TelephonyCallFailed without retrying', async () => {
  const { TelnyxClient } = await import('../src/telnyx/telnyxClient');
  const { isDialogueError } = await import('../src/errors');
  const stub = stubFetch([() => jsonResponse(422, { errors: [{ detail: 'invalid number' }] })]);

  try {
    const client = new TelnyxClient(clientConfig);
    await assert.rejects(client.placeCall('bogus', 'https://voice.test/telephony/outbound'), (error: unknown) => {
      assert.ok(isDialogueError(error, 'TelephonyCallFailed'));
      assert.equal(error.status, 502);
      return true;
    });
    assert.equal(stub.calls.length, 1);
  } finally {
    stub.restore();
  }
});

test('placeCall rejects a response without a call id', async () => {
  const { TelnyxClient } = await import('../src/telnyx/telnyxClient');
  const { isDialogueError } = await import('../src/errors');
  const stub = stubFetch([() => jsonResponse(200, { data: {} })]);

  try {
    const client = new TelnyxClient(clientConfig);
    await assert.rejects(client.placeCall('+15550002222', 'https://voice.test/telephony/outbound'), (error: unknown) =>
      isDialogueError(error, 'TelephonyCallFailed'),
    );
  } finally {
    stub.restore();
  }
});

test('createTelephonyClient requires key, connection and number', async () => {
  const { createTelephonyClient, TelnyxClient } = await import('../src/telnyx/telnyxClient');

  assert.equal(
    createTelephonyClient({ TELNYX_API_KEY: 'test-secret', TELNYX_CONNECTION_ID: undefined, TELNYX_PHONE_NUMBER: '+1' }),
    null,
  );
  assert.ok(
    createTelephonyClient({ TELNYX_API_KEY: 'test-secret', TELNYX_CONNECTION_ID: 'conn', TELNYX_PHONE_NUMBER: '+1' }) instanceof
      TelnyxClient,
  );
});
