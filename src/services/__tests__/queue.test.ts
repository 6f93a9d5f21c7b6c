import assert from 'node:assert/strict';
import { setImmediate as flush } from 'node:timers/promises';
import {
  DELTA_SYNC_TASK,
  createInProcessSyncTrigger,
  deltaSyncJobKey,
  deltaSyncPayloadSchema,
} from '../queue.js';
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

const ACCOUNT_A = '11111111-1111-4111-8111-111111111111';
const ACCOUNT_B = '22222222-2222-4222-8222-222222222222';

// Each run parks until the test releases it.
const createGatedRunner = () => {
  const runs: string[] = [];
  const gates: Array<() => void> = [];
  const runDeltaSync = (accountId: string, folderId: string) => {
    runs.push(`${accountId}:${folderId}`);
    return new Promise<void>((resolve) => {
      gates.push(resolve);
    });
  };
  const releaseNext = async () => {
    gates.shift()?.();
    await flush();
  };
  return { runs, runDeltaSync, releaseNext };
};

await test('job keys and payloads identify one account folder', () => {
  assert.equal(DELTA_SYNC_TASK, 'deltaSync');
  assert.equal(deltaSyncJobKey(ACCOUNT_A, 'inbox'), `delta:${ACCOUNT_A}:inbox`);
  assert.equal(deltaSyncPayloadSchema.safeParse({ accountId: ACCOUNT_A, folderId: 'inbox' }).success, true);
  assert.equal(deltaSyncPayloadSchema.safeParse({ accountId: 'not-a-uuid', folderId: 'inbox' }).success, false);
  assert.equal(deltaSyncPayloadSchema.safeParse({ accountId: ACCOUNT_A, folderId: '' }).success, false);
});

await test('requests during a run collapse into one follow-up run', async () => {
  const runner = createGatedRunner();
  const trigger = createInProcessSyncTrigger({ runDeltaSync: runner.runDeltaSync, logger: silentLogger() });

  await trigger.requestDeltaSync(ACCOUNT_A, 'inbox');
  assert.equal(runner.runs.length, 1);

  await trigger.requestDeltaSync(ACCOUNT_A, 'inbox');
  await trigger.requestDeltaSync(ACCOUNT_A, 'inbox');
  assert.equal(runner.runs.length, 1);

  await runner.releaseNext();
  assert.equal(runner.runs.length, 2);

  await runner.releaseNext();
  await trigger.whenIdle();
  assert.equal(runner.runs.length, 2);

  await trigger.requestDeltaSync(ACCOUNT_A, 'inbox');
  assert.equal(runner.runs.length, 3);
  await runner.releaseNext();
  await trigger.close();
});

await test('different folders and accounts run independently', async () => {
  const runner = createGatedRunner();
  const trigger = createInProcessSyncTrigger({ runDeltaSync: runner.runDeltaSync, logger: silentLogger() });

  await trigger.requestDeltaSync(ACCOUNT_A, 'inbox');
  await trigger.requestDeltaSync(ACCOUNT_A, 'archive');
  await trigger.requestDeltaSync(ACCOUNT_B, 'inbox');
  assert.deepEqual(runner.runs, [`${ACCOUNT_A}:inbox`, `${ACCOUNT_A}:archive`, `${ACCOUNT_B}:inbox`]);

  await runner.releaseNext();
  await runner.releaseNext();
  await runner.releaseNext();
  await trigger.whenIdle();
  assert.equal(runner.runs.length, 3);
});

await test('a failing run does not reach the requester or block later runs', async () => {
  let calls = 0;
  const trigger = createInProcessSyncTrigger({
    runDeltaSync: async () => {
      calls += 1;
      if (calls === 1) {
        throw new Error('graph unavailable');
      }
    },
    logger: silentLogger(),
  });

  await trigger.requestDeltaSync(ACCOUNT_A, 'inbox');
  await trigger.whenIdle();
  await trigger.requestDeltaSync(ACCOUNT_A, 'inbox');
  await trigger.whenIdle();
  assert.equal(calls, 2);
});

await test('close waits for in-flight runs', async () => {
  const runner = createGatedRunner();
  const trigger = createInProcessSyncTrigger({ runDeltaSync: runner.runDeltaSync, logger: silentLogger() });
  await trigger.requestDeltaSync(ACCOUNT_A, 'inbox');

  let closed = false;
  const closing = trigger.close().then(() => {
    closed = true;
  });
  await flush();
  assert.equal(closed, false);

  await runner.releaseNext();
  await closing;
  assert.equal(closed, true);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
