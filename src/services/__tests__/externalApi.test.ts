import assert from 'node:assert/strict';
import { UpstreamHttpError, UpstreamTimeoutError } from '../../shared/errors.js';
import { createExternalApiClient } from '../externalApi.js';
import { createFakeFetch, headerOf, jsonOf } from '../../../tests/support/fakes.js';

let passed = 0;
let failed = 0;

const test = async (name: string, fn: () => Promise<void> | void) => {
  try {
    await fn();
    passed += 1;
  } catch (error) {
    failed += 1;
    console.error(`FAIL: ${name}`);
    console.error(`  ${error}`);
  }
};

const ENDPOINT = 'https://collector.example.test/mail';

await test('mail data is posted as JSON', async () => {
  const { fetchImpl, queue, calls } = createFakeFetch();
  queue.push(new Response('accepted', { status: 200 }));

  const client = createExternalApiClient({ fetchImpl });
  const result = await client.sendMailData(ENDPOINT, { messageId: 'msg-1', subject: 'Hello' }, 30_000);

  assert.deepEqual(result, { status: 200, body: 'accepted' });
  assert.equal(calls[0]?.url, ENDPOINT);
  assert.equal(calls[0]?.init.method, 'POST');
  assert.equal(headerOf(calls[0]?.init ?? {}, 'content-type'), 'application/json');
  assert.deepEqual(jsonOf(calls[0]?.init ?? {}), { messageId: 'msg-1', subject: 'Hello' });
});

await test('long response bodies are truncated', async () => {
  const { fetchImpl, queue } = createFakeFetch();
  queue.push(new Response('x'.repeat(5000), { status: 201 }));

  const result = await createExternalApiClient({ fetchImpl }).sendMailData(ENDPOINT, {}, 30_000);
  assert.equal(result.status, 201);
  assert.equal(result.body.length, 4000);
});

await test('a failed delivery carries status, body and retry-after', async () => {
  const { fetchImpl, queue } = createFakeFetch();
  queue.push(new Response('maintenance', { status: 503, headers: { 'Retry-After': '3' } }));

  await assert.rejects(createExternalApiClient({ fetchImpl }).sendMailData(ENDPOINT, {}, 30_000), (error: unknown) => {
    assert.ok(error instanceof UpstreamHttpError);
    assert.equal(error.status, 503);
    assert.equal(error.providerDescription, 'maintenance');
    assert.equal(error.retryAfterMs, 3000);
    assert.equal(error.retryable, true);
    return true;
  });
});

await test('a rejected payload is not retryable', async () => {
  const { fetchImpl, queue } = createFakeFetch();
  queue.push(new Response('', { status: 422 }));

  await assert.rejects(createExternalApiClient({ fetchImpl }).sendMailData(ENDPOINT, {}, 30_000), (error: unknown) => {
    assert.ok(error instanceof UpstreamHttpError);
    assert.equal(error.providerDescription, null);
    assert.equal(error.retryable, false);
    return true;
  });
});

await test('a slow endpoint times out', async () => {
  const { fetchImpl, queue } = createFakeFetch();
  queue.push(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }));

  await assert.rejects(
    createExternalApiClient({ fetchImpl }).sendMailData(ENDPOINT, {}, 1500),
    (error: unknown) => error instanceof UpstreamTimeoutError && error.details.timeoutMs === 1500,
  );
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
