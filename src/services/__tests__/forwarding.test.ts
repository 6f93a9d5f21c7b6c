import assert from 'node:assert/strict';
import { ExternalCallNotFoundError, UpstreamHttpError, UpstreamTimeoutError } from '../../shared/errors.js';
import { createForwarder, STALE_PENDING_MS } from '../forwarding.js';
import type { RetrySweepResult } from '../forwarding.js';
import { toMailMessage } from '../graphMessages.js';
import { createMemoryStore } from '../../../tests/support/memoryStore.js';
import {
  createClock,
  createFakeForwarding,
  graphMessage,
  silentLogger,
  testConfig,
} from '../../../tests/support/fakes.js';

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

const account = { id: '11111111-1111-4111-8111-111111111111', email: 'owner@example.test' };

const setup = async (env: Record<string, string> = {}) => {
  const clock = createClock();
  const memory = createMemoryStore({ now: clock.now });
  const forwarding = createFakeForwarding();
  const forwarder = createForwarder({
    store: memory.store,
    client: forwarding.client,
    config: testConfig(env),
    logger: silentLogger(),
    now: clock.now,
  });
  const { message } = await memory.store.insertMessageIfAbsent(toMailMessage(account, 'inbox', graphMessage()));
  return { clock, memory, forwarding, forwarder, message };
};

await test('a successful forward completes the call', async () => {
  const { forwarder, message, clock } = await setup();

  const call = await forwarder.forwardMessage(account, message);
  assert.ok(call);
  assert.equal(call.success, true);
  assert.equal(call.responseStatus, 200);
  assert.equal(call.retryCount, 0);
  assert.equal(call.completedAt?.getTime(), clock.now());
  assert.equal(call.endpointUrl, 'https://collector.example.test/mail');
  assert.equal(call.requestPayload.subject, 'Quarterly report');
});

await test('retries stop at the configured ceiling', async () => {
  const { forwarder, forwarding, message, memory } = await setup();
  forwarding.queue.push(
    new UpstreamHttpError('forward mail data', 502),
    new UpstreamHttpError('forward mail data', 502),
    new UpstreamTimeoutError('forward mail data', 30_000),
    new UpstreamHttpError('forward mail data', 503),
  );

  const call = await forwarder.forwardMessage(account, message);
  assert.ok(call);
  assert.equal(call.success, false);

  const sweeps: RetrySweepResult[] = [];
  for (let round = 0; round < 4; round += 1) {
    sweeps.push(await forwarder.retryFailedCalls());
  }
  assert.deepEqual(sweeps, [
    { attempted: 1, succeeded: 0, failed: 1 },
    { attempted: 1, succeeded: 0, failed: 1 },
    { attempted: 1, succeeded: 0, failed: 1 },
    { attempted: 0, succeeded: 0, failed: 0 },
  ]);

  const stored = memory.tables.externalCalls.get(call.id);
  assert.equal(stored?.retryCount, 3);
  assert.equal(stored?.responseStatus, 503);
  assert.equal(forwarding.calls.length, 4);

  const manual = await forwarder.retryCall(call.id);
  assert.equal(manual.retried, false);
  assert.equal(forwarding.calls.length, 4);
});

await test('a retry that succeeds is not retried again', async () => {
  const { forwarder, forwarding, message } = await setup();
  forwarding.queue.push(new UpstreamHttpError('forward mail data', 500));

  const call = await forwarder.forwardMessage(account, message);
  assert.ok(call);
  const retried = await forwarder.retryCall(call.id);
  assert.equal(retried.retried, true);
  assert.equal(retried.call.success, true);
  assert.equal(retried.call.retryCount, 1);

  assert.deepEqual(await forwarder.retryFailedCalls(), { attempted: 0, succeeded: 0, failed: 0 });
  assert.equal((await forwarder.retryCall(call.id)).retried, false);
  assert.equal((await forwarder.listCalls({ success: true })).length, 1);
});

await test('a pending call is retried only once it is stale', async () => {
  const { forwarder, forwarding, memory, clock, message } = await setup();
  const pending = await memory.store.createExternalCall({
    accountId: account.id,
    messageId: message.messageId,
    endpointUrl: 'https://collector.example.test/mail',
    requestPayload: { messageId: message.messageId },
    maxRetries: 3,
  });

  assert.deepEqual(await forwarder.retryFailedCalls(), { attempted: 0, succeeded: 0, failed: 0 });
  assert.equal((await forwarder.retryCall(pending.id)).retried, false);

  clock.advance(STALE_PENDING_MS + 1);
  assert.deepEqual(await forwarder.retryFailedCalls(), { attempted: 1, succeeded: 1, failed: 0 });
  assert.equal(forwarding.calls.length, 1);
  assert.equal(memory.tables.externalCalls.get(pending.id)?.retryCount, 1);
});

await test('a zero retry ceiling never retries', async () => {
  const { forwarder, forwarding, message } = await setup({ EXTERNAL_API_MAX_RETRIES: '0' });
  forwarding.queue.push(new UpstreamHttpError('forward mail data', 500));

  const call = await forwarder.forwardMessage(account, message);
  assert.equal(call?.maxRetries, 0);
  assert.deepEqual(await forwarder.retryFailedCalls(), { attempted: 0, succeeded: 0, failed: 0 });
});

await test('forwarding is disabled without an endpoint', async () => {
  const { forwarder, forwarding, message, memory } = await setup({ EXTERNAL_API_ENDPOINT: '' });
  assert.equal(forwarder.isEnabled(), false);
  assert.equal(await forwarder.forwardMessage(account, message), null);
  assert.equal(forwarding.calls.length, 0);
  assert.equal(memory.tables.externalCalls.size, 0);
});

await test('retrying an unknown call raises', async () => {
  const { forwarder } = await setup();
  await assert.rejects(
    forwarder.retryCall('22222222-2222-4222-8222-222222222222'),
    ExternalCallNotFoundError,
  );
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
