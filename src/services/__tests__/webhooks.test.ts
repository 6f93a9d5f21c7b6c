import assert from 'node:assert/strict';
import {
  AccountNotFoundError,
  ErrorCodes,
  InvalidWebhookNotificationError,
  UpstreamHttpError,
  ValidationError,
  WebhookSubscriptionError,
} from '../../shared/errors.js';
import { createInProcessSyncTrigger } from '../queue.js';
import { createHarness, createRecordingTrigger } from '../../../tests/support/harness.js';
import type { Harness } from '../../../tests/support/harness.js';
import { graphMessage, silentLogger } from '../../../tests/support/fakes.js';

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

const LIFETIME_MS = 4200 * 60_000;

const setup = async () => {
  const recording = createRecordingTrigger();
  const h = createHarness({ trigger: recording.trigger });
  const accountId = await h.addAccount('owner@example.test');
  return { h, accountId, requests: recording.requests };
};

await test('setup creates a subscription with a fresh client state', async () => {
  const { h, accountId } = await setup();

  const webhook = await h.services.webhooks.setup({ accountId });

  assert.equal(webhook.subscriptionId, 'sub-1');
  assert.equal(webhook.accountId, accountId);
  assert.equal(webhook.resource, "me/mailFolders('inbox')/messages");
  assert.equal(webhook.folderId, 'inbox');
  assert.deepEqual(webhook.changeTypes, ['created', 'updated']);
  assert.equal(webhook.notificationUrl, 'https://gateway.example.test/api/webhooks/notifications');
  assert.equal(webhook.isActive, true);
  assert.equal(webhook.expiresAt.getTime(), h.clock.now() + LIFETIME_MS);
  assert.match(webhook.clientState, /^[A-Za-z0-9_-]{43}$/);

  const call = h.graph.calls.createSubscription[0];
  assert.equal(call?.accessToken, 'token-owner@example.test');
  assert.equal(call?.params.clientState, webhook.clientState);

  const second = await h.services.webhooks.setup({ accountId, folder: 'archive', changeTypes: ['created'] });
  assert.notEqual(second.clientState, webhook.clientState);
  assert.equal(second.resource, "me/mailFolders('archive')/messages");
  assert.equal((await h.services.webhooks.list(accountId)).length, 2);
});

await test('setup needs a notification URL from the request or configuration', async () => {
  const recording = createRecordingTrigger();
  const h = createHarness({ trigger: recording.trigger, env: { WEBHOOK_NOTIFICATION_URL: '' } });
  const accountId = await h.addAccount('owner@example.test');

  await assert.rejects(h.services.webhooks.setup({ accountId }), (error: unknown) => {
    assert.ok(error instanceof ValidationError);
    assert.equal(error.code, ErrorCodes.MISSING_REQUIRED_FIELD);
    return true;
  });

  const webhook = await h.services.webhooks.setup({
    accountId,
    notificationUrl: 'https://other.example.test/hooks',
  });
  assert.equal(webhook.notificationUrl, 'https://other.example.test/hooks');
});

await test('setup for an unknown account raises', async () => {
  const { h } = await setup();
  await assert.rejects(
    h.services.webhooks.setup({ accountId: '00000000-0000-4000-8000-000000000000' }),
    AccountNotFoundError,
  );
});

await test('upstream rejection of a subscription stores nothing', async () => {
  const { h, accountId } = await setup();
  h.graph.queues.createSubscription.push(new UpstreamHttpError('createSubscription', 400, { code: 'InvalidRequest' }));

  await assert.rejects(h.services.webhooks.setup({ accountId }), (error: unknown) => {
    assert.ok(error instanceof WebhookSubscriptionError);
    assert.equal(error.code, ErrorCodes.WEBHOOK_SUBSCRIPTION_FAILED);
    return true;
  });
  assert.equal(h.memory.tables.webhooks.size, 0);
});

await test('a valid notification requests a delta sync for the subscribed folder', async () => {
  const { h, accountId, requests } = await setup();
  const webhook = await h.services.webhooks.setup({ accountId });

  const result = await h.services.webhooks.handleNotification(webhook.subscriptionId, webhook.clientState);
  assert.deepEqual(result, { accountId, folderId: 'inbox' });
  assert.deepEqual(requests, [{ accountId, folderId: 'inbox' }]);
});

await test('a client state mismatch is rejected without syncing', async () => {
  const { h, accountId, requests } = await setup();
  const webhook = await h.services.webhooks.setup({ accountId });

  for (const clientState of ['not-the-secret', null]) {
    await assert.rejects(
      h.services.webhooks.handleNotification(webhook.subscriptionId, clientState),
      (error: unknown) => {
        assert.ok(error instanceof InvalidWebhookNotificationError);
        assert.equal(error.details.reason, 'client_state_mismatch');
        return true;
      },
    );
  }
  assert.equal(requests.length, 0);
  assert.equal(h.graph.calls.getDeltaMessages.length, 0);
});

await test('batch notifications collapse per subscription and report rejections', async () => {
  const { h, accountId, requests } = await setup();
  const inbox = await h.services.webhooks.setup({ accountId });
  const archive = await h.services.webhooks.setup({ accountId, folder: 'archive' });

  const result = await h.services.webhooks.handleNotifications([
    { subscriptionId: inbox.subscriptionId, clientState: inbox.clientState, changeType: 'created' },
    { subscriptionId: inbox.subscriptionId, clientState: inbox.clientState, changeType: 'updated' },
    { subscriptionId: archive.subscriptionId, clientState: archive.clientState },
    { subscriptionId: archive.subscriptionId, clientState: 'forged' },
    { subscriptionId: 'sub-unknown', clientState: 'whatever' },
  ]);

  assert.deepEqual(result, {
    accepted: [inbox.subscriptionId],
    rejected: [
      { subscriptionId: archive.subscriptionId, reason: 'client_state_mismatch' },
      { subscriptionId: 'sub-unknown', reason: 'unknown_subscription' },
    ],
    failed: [],
  });
  assert.deepEqual(requests, [{ accountId, folderId: 'inbox' }]);
});

await test('a failed sync request does not stop the remaining groups', async () => {
  const requests: Array<{ accountId: string; folderId: string }> = [];
  const h = createHarness({
    trigger: {
      requestDeltaSync: async (accountId, folderId) => {
        if (folderId === 'inbox') {
          throw new Error('queue unavailable');
        }
        requests.push({ accountId, folderId });
      },
      close: async () => {},
    },
  });
  const accountId = await h.addAccount('owner@example.test');
  const inbox = await h.services.webhooks.setup({ accountId });
  const archive = await h.services.webhooks.setup({ accountId, folder: 'archive' });

  const result = await h.services.webhooks.handleNotifications([
    { subscriptionId: inbox.subscriptionId, clientState: inbox.clientState },
    { subscriptionId: archive.subscriptionId, clientState: archive.clientState },
  ]);

  assert.deepEqual(result, { accepted: [archive.subscriptionId], rejected: [], failed: [inbox.subscriptionId] });
  assert.deepEqual(requests, [{ accountId, folderId: 'archive' }]);
});

await test('renew extends the expiry from the current time', async () => {
  const { h, accountId } = await setup();
  const webhook = await h.services.webhooks.setup({ accountId });
  // stays inside the one-hour token lifetime addAccount grants
  h.clock.advance(1_800_000);

  const renewed = await h.services.webhooks.renew(webhook.subscriptionId);
  assert.equal(renewed.expiresAt.getTime(), h.clock.now() + LIFETIME_MS);
  assert.equal(renewed.expiresAt.getTime() - webhook.expiresAt.getTime(), 1_800_000);
  assert.equal(h.graph.calls.renewSubscription[0]?.subscriptionId, webhook.subscriptionId);
});

await test('renewing a subscription gone upstream deactivates it', async () => {
  const { h, accountId } = await setup();
  const webhook = await h.services.webhooks.setup({ accountId });
  h.graph.queues.renewSubscription.push(new UpstreamHttpError('renewSubscription', 404));

  await assert.rejects(h.services.webhooks.renew(webhook.subscriptionId), (error: unknown) => {
    assert.ok(error instanceof WebhookSubscriptionError);
    assert.equal(error.details.deactivated, true);
    return true;
  });
  assert.equal(h.memory.tables.webhooks.get(webhook.subscriptionId)?.isActive, false);
  await assert.rejects(h.services.webhooks.renew(webhook.subscriptionId), WebhookSubscriptionError);
});

await test('remove deactivates locally and later notifications are refused', async () => {
  const { h, accountId, requests } = await setup();
  const webhook = await h.services.webhooks.setup({ accountId });

  assert.deepEqual(await h.services.webhooks.remove(webhook.subscriptionId), {
    subscriptionId: webhook.subscriptionId,
    upstreamDeleted: true,
  });
  assert.equal(h.graph.calls.deleteSubscription.length, 1);

  const result = await h.services.webhooks.handleNotifications([
    { subscriptionId: webhook.subscriptionId, clientState: webhook.clientState },
  ]);
  assert.deepEqual(result.rejected, [{ subscriptionId: webhook.subscriptionId, reason: 'inactive_subscription' }]);
  assert.equal(requests.length, 0);
});

await test('remove treats an upstream failure as local-only deletion', async () => {
  const { h, accountId } = await setup();
  const webhook = await h.services.webhooks.setup({ accountId });
  h.graph.queues.deleteSubscription.push(new UpstreamHttpError('deleteSubscription', 500));

  const result = await h.services.webhooks.remove(webhook.subscriptionId);
  assert.equal(result.upstreamDeleted, false);
  assert.equal(h.memory.tables.webhooks.get(webhook.subscriptionId)?.isActive, false);
});

await test('a notification drives a delta sync that stores the new message', async () => {
  const holder: { harness?: Harness } = {};
  const trigger = createInProcessSyncTrigger({
    runDeltaSync: async (accountId, folderId) => {
      if (holder.harness) {
        await holder.harness.services.mail.deltaSync({ accountId, folder: folderId });
      }
    },
    logger: silentLogger(),
  });
  const h = createHarness({ trigger });
  holder.harness = h;
  const accountId = await h.addAccount('owner@example.test');
  const webhook = await h.services.webhooks.setup({ accountId });
  h.graph.queues.getDeltaMessages.push({
    messages: [graphMessage({ id: 'msg-pushed' })],
    removedIds: [],
    deltaLink: 'https://graph.example.test/delta?$deltatoken=token-after-push',
  });

  await h.services.webhooks.handleNotifications([
    { subscriptionId: webhook.subscriptionId, clientState: webhook.clientState, changeType: 'created' },
  ]);
  await trigger.whenIdle();

  assert.deepEqual(h.memory.tables.messages.map((message) => message.messageId), ['msg-pushed']);
  assert.equal(h.memory.tables.deltaLinks[0]?.deltaToken, 'token-after-push');
  assert.equal(h.forwarding.calls.length, 1);
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
