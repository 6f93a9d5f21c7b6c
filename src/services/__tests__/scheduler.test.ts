import assert from 'node:assert/strict';
import { setImmediate as flush } from 'node:timers/promises';
import { AuthenticationFailedError, ErrorCodes } from '../../shared/errors.js';
import { createScheduler } from '../scheduler.js';
import type { ScheduledTask, WaitFn } from '../scheduler.js';
import { createHarness, createRecordingTrigger } from '../../../tests/support/harness.js';
import { silentLogger } from '../../../tests/support/fakes.js';

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

const DAY_MS = 24 * 60 * 60_000;

// Waits park until tick() releases them or the scheduler aborts.
const createManualWait = () => {
  const parked: Array<() => void> = [];
  const wait: WaitFn = (_ms, signal) => new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    parked.push(resolve);
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
  const tick = async () => {
    for (const release of parked.splice(0)) {
      release();
    }
    await flush();
  };
  return { wait, tick, parkedCount: () => parked.length };
};

const countingTask = (name: ScheduledTask['name'], run: () => Promise<unknown> = async () => null) => {
  const counter = { calls: 0 };
  const task: ScheduledTask = {
    name,
    intervalMs: 1000,
    run: async () => {
      counter.calls += 1;
      return run();
    },
  };
  return { task, counter };
};

await test('each task runs at start and again after its interval', async () => {
  const manual = createManualWait();
  const refresh = countingTask('tokenRefresh');
  const cleanup = countingTask('cleanup');
  const scheduler = createScheduler({ tasks: [refresh.task, cleanup.task], logger: silentLogger(), wait: manual.wait });

  assert.deepEqual(scheduler.status().map((entry) => entry.state), ['stopped', 'stopped']);
  scheduler.start();
  await flush();
  assert.equal(refresh.counter.calls, 1);
  assert.equal(cleanup.counter.calls, 1);
  assert.equal(manual.parkedCount(), 2);
  assert.deepEqual(scheduler.status().map((entry) => [entry.state, entry.runs]), [['idle', 1], ['idle', 1]]);

  await manual.tick();
  assert.equal(refresh.counter.calls, 2);
  assert.equal(cleanup.counter.calls, 2);

  await scheduler.stop();
  assert.deepEqual(scheduler.status().map((entry) => entry.state), ['stopped', 'stopped']);
});

await test('start and stop are idempotent', async () => {
  const manual = createManualWait();
  const refresh = countingTask('tokenRefresh');
  const scheduler = createScheduler({ tasks: [refresh.task], logger: silentLogger(), wait: manual.wait });

  await scheduler.stop();
  assert.equal(scheduler.isRunning(), false);

  scheduler.start();
  scheduler.start();
  await flush();
  assert.equal(scheduler.isRunning(), true);
  assert.equal(refresh.counter.calls, 1);
  assert.equal(manual.parkedCount(), 1);

  await scheduler.stop();
  await scheduler.stop();
  assert.equal(scheduler.isRunning(), false);

  scheduler.start();
  await flush();
  assert.equal(refresh.counter.calls, 2);
  await scheduler.stop();
});

await test('a failing iteration is recorded and the loop continues', async () => {
  const manual = createManualWait();
  let shouldFail = true;
  const flaky = countingTask('webhookRenewal', async () => {
    if (shouldFail) {
      shouldFail = false;
      throw new Error('renewal backend down');
    }
    return null;
  });
  const scheduler = createScheduler({ tasks: [flaky.task], logger: silentLogger(), wait: manual.wait });

  scheduler.start();
  await flush();
  const [afterFailure] = scheduler.status();
  assert.equal(afterFailure?.failures, 1);
  assert.equal(afterFailure?.lastError, 'renewal backend down');

  await manual.tick();
  const [afterRecovery] = scheduler.status();
  assert.equal(afterRecovery?.runs, 2);
  assert.equal(afterRecovery?.failures, 1);
  assert.equal(afterRecovery?.lastError, null);
  await scheduler.stop();
});

await test('stop waits for an in-flight iteration', async () => {
  const manual = createManualWait();
  let finish = () => {};
  let finished = false;
  const slow = countingTask('failedCallRetry', () => new Promise<void>((resolve) => {
    finish = () => {
      finished = true;
      resolve();
    };
  }));
  const scheduler = createScheduler({ tasks: [slow.task], logger: silentLogger(), wait: manual.wait });

  scheduler.start();
  await flush();
  assert.equal(scheduler.status()[0]?.state, 'running');

  const stopping = scheduler.stop();
  finish();
  await stopping;
  assert.equal(finished, true);
  assert.equal(scheduler.status()[0]?.state, 'stopped');
  assert.equal(manual.parkedCount(), 0);
});

await test('token sweep refreshes only tokens inside the lead window', async () => {
  const h = createHarness({ trigger: createRecordingTrigger().trigger });
  const soon = await h.addAccount('soon@example.test', { tokenTtlMs: 2 * 60_000 });
  const later = await h.addAccount('later@example.test', { tokenTtlMs: 60 * 60_000 });
  const rejected = await h.addAccount('rejected@example.test', { tokenTtlMs: 60_000 });
  h.oauth.queues.refresh.push(new AuthenticationFailedError(
    null,
    'refresh token revoked',
    { code: 'invalid_grant' },
    undefined,
    ErrorCodes.TOKEN_REFRESH_FAILED,
  ));

  const result = await h.services.maintenance.refreshExpiringTokens();
  assert.deepEqual(result, { processed: 2, succeeded: 1, failed: 1 });

  assert.equal(h.memory.tables.tokens.get(rejected)?.status, 'invalid');
  assert.equal(h.memory.tables.tokens.get(soon)?.accessToken, 'test-access-token-refreshed');
  assert.equal(h.memory.tables.tokens.get(later)?.accessToken, 'token-later@example.test');
});

await test('webhook sweep renews subscriptions close to expiry', async () => {
  const h = createHarness({ trigger: createRecordingTrigger().trigger });
  const accountId = await h.addAccount('owner@example.test', { tokenTtlMs: 10 * DAY_MS });
  const webhook = await h.services.webhooks.setup({ accountId });

  assert.deepEqual(await h.services.maintenance.renewExpiringWebhooks(), { processed: 0, succeeded: 0, failed: 0 });

  h.clock.set(webhook.expiresAt.getTime() - 10 * 60_000);
  assert.deepEqual(await h.services.maintenance.renewExpiringWebhooks(), { processed: 1, succeeded: 1, failed: 0 });
  assert.equal(h.memory.tables.webhooks.get(webhook.subscriptionId)?.expiresAt.getTime(), h.clock.now() + 4200 * 60_000);
});

await test('cleanup purges expired states and aged rows', async () => {
  const h = createHarness({ trigger: createRecordingTrigger().trigger });
  const { accountId } = await h.services.auth.register({
    email: 'owner@example.test',
    userId: 'user-1',
    authenticationFlow: 'authorization_code',
  });
  await h.services.auth.beginAuthentication(accountId);
  h.clock.advance(91 * DAY_MS);

  const result = await h.services.maintenance.cleanup();
  assert.deepEqual(result, {
    oauthStates: 1,
    tokens: 0,
    authLogs: 2,
    queryHistory: 0,
    externalCalls: 0,
    webhooks: 0,
  });
  assert.equal(h.memory.tables.accounts.size, 1);
});

await test('the service graph exposes all four sweeps to the scheduler', async () => {
  const h = createHarness({ trigger: createRecordingTrigger().trigger });
  const scheduler = h.services.createScheduler();
  assert.deepEqual(
    scheduler.status().map((entry) => [entry.name, entry.intervalMs]),
    [['tokenRefresh', 60_000], ['webhookRenewal', 300_000], ['failedCallRetry', 120_000], ['cleanup', 3_600_000]],
  );
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
