import assert from 'node:assert/strict';
import {
  AccountNotFoundError,
  DeltaLinkExpiredError,
  ErrorCodes,
  MailSendError,
  NoValidTokenError,
  UpstreamHttpError,
  ValidationError,
} from '../../shared/errors.js';
import { createHarness } from '../../../tests/support/harness.js';
import { graphMessage } from '../../../tests/support/fakes.js';

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

const deltaLink = (token: string) => `https://graph.example.test/me/mailFolders('inbox')/messages/delta?$deltatoken=${token}`;

await test('query stores each message once and forwards only new ones', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  const page = [graphMessage(), graphMessage({ id: 'msg-2', subject: 'Follow up' })];
  h.graph.queues.listMessages.push(page, page);

  const first = await h.services.mail.query({ accountId });
  assert.equal(first.totalFound, 2);
  assert.equal(first.newCount, 2);
  assert.deepEqual(first.accounts, [{ accountId, messagesFound: 2, newMessages: 2 }]);

  const second = await h.services.mail.query({ accountId });
  assert.equal(second.totalFound, 2);
  assert.equal(second.newCount, 0);

  assert.equal(h.memory.tables.messages.length, 2);
  assert.equal(h.forwarding.calls.length, 2);
  assert.equal(h.memory.tables.externalCalls.size, 2);

  const stored = h.memory.tables.messages[0];
  assert.equal(stored?.senderEmail, 'sender@example.test');
  assert.equal(stored?.senderName, 'Sender');
  assert.deepEqual(stored?.recipients, ['owner@example.test']);
  assert.equal(stored?.direction, 'received');
  assert.equal(stored?.bodyContentType, 'html');
  assert.equal(stored?.folderId, 'inbox');

  const listCall = h.graph.calls.listMessages[0];
  assert.equal(listCall?.accessToken, 'token-owner@example.test');
  assert.deepEqual(listCall?.params, {
    folder: 'inbox',
    filter: null,
    search: null,
    top: 50,
    orderBy: 'receivedDateTime desc',
  });

  const history = await h.services.mail.listQueryHistory({ accountId });
  assert.equal(history.length, 2);
  assert.ok(history.every((row) => row.queryType === 'manual' && row.success));
  assert.deepEqual(history[0]?.queryParameters, { folder: 'inbox', top: 50 });
});

await test('forwarded payload carries the account and message', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  h.graph.queues.listMessages.push([graphMessage()]);

  await h.services.mail.query({ accountId });

  const call = h.forwarding.calls[0];
  assert.equal(call?.endpoint, 'https://collector.example.test/mail');
  assert.equal(call?.timeoutMs, 30_000);
  assert.equal(call?.payload.accountId, accountId);
  assert.equal(call?.payload.accountEmail, 'owner@example.test');
  assert.equal(call?.payload.messageId, 'msg-1');
  assert.equal(call?.payload.receivedAt, '2024-01-15T08:30:00.000Z');

  const [record] = [...h.memory.tables.externalCalls.values()];
  assert.equal(record?.success, true);
  assert.equal(record?.responseStatus, 200);
  assert.equal(record?.responseBody, '{"ok":true}');
});

await test('filters become an OData expression and search drops ordering', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');

  await h.services.mail.query({
    accountId,
    folder: 'archive',
    top: 10,
    select: ['id', 'subject'],
    filters: { senderEmail: 'Boss@Example.test', isRead: false, search: 'report' },
  });

  assert.deepEqual(h.graph.calls.listMessages[0]?.params, {
    folder: 'archive',
    filter: "from/emailAddress/address eq 'boss@example.test' and isRead eq false",
    search: 'report',
    select: ['id', 'subject'],
    top: 10,
    orderBy: null,
  });
});

await test('query rejects an out-of-range top and an inverted date range', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');

  await assert.rejects(h.services.mail.query({ accountId, top: 0 }), ValidationError);
  await assert.rejects(h.services.mail.query({ accountId, top: 1001 }), ValidationError);
  await assert.rejects(
    h.services.mail.query({
      accountId,
      filters: { dateFrom: new Date('2024-02-01T00:00:00Z'), dateTo: new Date('2024-01-01T00:00:00Z') },
    }),
    ValidationError,
  );
  assert.equal(h.graph.calls.listMessages.length, 0);
});

await test('query for an unknown account raises', async () => {
  const h = createHarness();
  await assert.rejects(
    h.services.mail.query({ accountId: '00000000-0000-4000-8000-000000000000' }),
    AccountNotFoundError,
  );
});

await test('single-account query without a valid token raises and records history', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test', { tokenTtlMs: null });

  await assert.rejects(h.services.mail.query({ accountId }), NoValidTokenError);
  const [row] = h.memory.tables.history;
  assert.equal(row?.success, false);
  assert.equal(row?.errorMessage, 'Reauthentication required: no valid token');
  assert.equal(row?.messagesFound, 0);
});

await test('batch query skips inactive accounts and accounts needing reauthentication', async () => {
  const h = createHarness();
  const healthy = await h.addAccount('owner@example.test');
  const expired = await h.addAccount('expired@example.test', { tokenTtlMs: -1000 });
  const suspended = await h.addAccount('suspended@example.test', { status: 'suspended' });
  h.graph.queues.listMessages.push([graphMessage()]);

  const result = await h.services.mail.query({});

  assert.deepEqual(result.accounts, [{ accountId: healthy, messagesFound: 1, newMessages: 1 }]);
  assert.deepEqual(result.skipped, [
    { accountId: expired, reason: 'reauthentication_required', message: 'Reauthentication required: no valid token' },
    { accountId: suspended, reason: 'inactive', message: 'Account is suspended' },
  ]);
  assert.equal(h.graph.calls.listMessages.length, 1);
  assert.deepEqual(
    h.memory.tables.history.map((row) => [row.accountId, row.success]),
    [[healthy, true], [expired, false]],
  );
});

await test('a failed forward is recorded without failing the query', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  h.graph.queues.listMessages.push([graphMessage()]);
  h.forwarding.queue.push(new UpstreamHttpError('forward mail data', 500));

  const result = await h.services.mail.query({ accountId });
  assert.equal(result.newCount, 1);
  assert.equal(h.memory.tables.messages.length, 1);

  const [call] = [...h.memory.tables.externalCalls.values()];
  assert.equal(call?.success, false);
  assert.equal(call?.responseStatus, 500);
  assert.equal(call?.retryCount, 0);
  assert.equal(call?.maxRetries, 3);
  assert.equal(call?.completedAt?.getTime(), h.clock.now());
});

await test('nothing is forwarded when no endpoint is configured', async () => {
  const h = createHarness({ env: { EXTERNAL_API_ENDPOINT: '' } });
  const accountId = await h.addAccount('owner@example.test');
  h.graph.queues.listMessages.push([graphMessage()]);

  const result = await h.services.mail.query({ accountId });
  assert.equal(result.newCount, 1);
  assert.equal(h.forwarding.calls.length, 0);
  assert.equal(h.memory.tables.externalCalls.size, 0);
});

await test('concurrent queries for one account store a message once', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  h.graph.queues.listMessages.push([graphMessage()], [graphMessage()]);

  const [left, right] = await Promise.all([
    h.services.mail.query({ accountId }),
    h.services.mail.query({ accountId }),
  ]);

  assert.equal(left.newCount + right.newCount, 1);
  assert.equal(h.memory.tables.messages.length, 1);
  assert.equal(h.forwarding.calls.length, 1);
});

await test('delta sync runs a baseline round, then continues from the saved token', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  h.graph.queues.getDeltaMessages.push(
    { messages: [graphMessage()], removedIds: [], deltaLink: deltaLink('token-1') },
    {
      messages: [graphMessage({ isRead: true, categories: ['Blue'] }), graphMessage({ id: 'msg-2' })],
      removedIds: ['msg-0'],
      deltaLink: deltaLink('token-2'),
    },
  );

  const baseline = await h.services.mail.deltaSync({ accountId });
  assert.deepEqual(baseline, {
    accounts: [{ accountId, folder: 'inbox', new: 1, updated: 0, deleted: 0, baseline: true, nextToken: 'token-1' }],
    skipped: [],
  });
  assert.equal(h.graph.calls.getDeltaMessages[0]?.params.deltaToken, null);

  h.clock.advance(60_000);
  const incremental = await h.services.mail.deltaSync({ accountId });
  assert.deepEqual(incremental.accounts, [
    { accountId, folder: 'inbox', new: 1, updated: 1, deleted: 1, baseline: false, nextToken: 'token-2' },
  ]);
  assert.equal(h.graph.calls.getDeltaMessages[1]?.params.deltaToken, 'token-1');

  const links = h.memory.tables.deltaLinks;
  assert.deepEqual(links.map((link) => [link.deltaToken, link.isActive]), [['token-1', false], ['token-2', true]]);
  assert.equal(links[0]?.lastUsedAt?.getTime(), h.clock.now());

  const refreshed = h.memory.tables.messages.find((message) => message.messageId === 'msg-1');
  assert.equal(refreshed?.isRead, true);
  assert.deepEqual(refreshed?.categories, ['Blue']);
  assert.equal(h.memory.tables.messages.length, 2);
  assert.equal(h.forwarding.calls.length, 2);

  assert.deepEqual(
    h.memory.tables.history.map((row) => [row.queryType, row.queryParameters]),
    [['delta', { folder: 'inbox', baseline: true }], ['delta', { folder: 'inbox', baseline: false }]],
  );
});

await test('messages stored before a failed insert are still forwarded', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  const page = [graphMessage(), graphMessage({ id: 'msg-2' })];
  h.graph.queues.listMessages.push(page, page);

  const insert = h.memory.store.insertMessageIfAbsent;
  let inserts = 0;
  h.memory.store.insertMessageIfAbsent = async (message) => {
    inserts += 1;
    if (inserts === 2) {
      throw new Error('disk full');
    }
    return insert(message);
  };

  await assert.rejects(h.services.mail.query({ accountId }), /disk full/);
  assert.deepEqual(h.forwarding.calls.map((call) => call.payload.messageId), ['msg-1']);

  const retry = await h.services.mail.query({ accountId });
  assert.equal(retry.newCount, 1);
  assert.deepEqual(h.forwarding.calls.map((call) => call.payload.messageId), ['msg-1', 'msg-2']);
  assert.deepEqual(h.memory.tables.history.map((row) => row.success), [false, true]);
});

await test('a failed delta link save does not lose the forward', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  const page = { messages: [graphMessage({ id: 'msg-9' })], removedIds: [], deltaLink: deltaLink('token-1') };
  h.graph.queues.getDeltaMessages.push(page, page);

  const save = h.memory.store.saveDeltaLink;
  let saves = 0;
  h.memory.store.saveDeltaLink = async (account, folder, token) => {
    saves += 1;
    if (saves === 1) {
      throw new Error('connection reset');
    }
    return save(account, folder, token);
  };

  await assert.rejects(h.services.mail.deltaSync({ accountId }), /connection reset/);
  assert.deepEqual(h.forwarding.calls.map((call) => call.payload.messageId), ['msg-9']);

  const rerun = await h.services.mail.deltaSync({ accountId });
  assert.deepEqual(rerun.accounts, [
    { accountId, folder: 'inbox', new: 0, updated: 0, deleted: 0, baseline: true, nextToken: 'token-1' },
  ]);
  assert.equal(h.forwarding.calls.length, 1);
  assert.deepEqual(h.memory.tables.deltaLinks.map((link) => [link.deltaToken, link.isActive]), [['token-1', true]]);
});

await test('messages seen again with unchanged flags are not counted as updated', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  await h.memory.store.saveDeltaLink(accountId, 'inbox', 'token-1');
  h.graph.queues.getDeltaMessages.push(
    { messages: [graphMessage()], removedIds: [], deltaLink: deltaLink('token-2') },
    { messages: [graphMessage(), graphMessage({ id: 'msg-2' })], removedIds: [], deltaLink: deltaLink('token-3') },
    { messages: [graphMessage({ categories: ['Red'] })], removedIds: [], deltaLink: deltaLink('token-4') },
  );

  await h.services.mail.deltaSync({ accountId });
  const unchanged = await h.services.mail.deltaSync({ accountId });
  assert.equal(unchanged.accounts[0]?.new, 1);
  assert.equal(unchanged.accounts[0]?.updated, 0);

  const changed = await h.services.mail.deltaSync({ accountId });
  assert.equal(changed.accounts[0]?.updated, 1);
});

await test('concurrent delta syncs leave one active link per folder', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  h.graph.queues.getDeltaMessages.push(
    { messages: [], removedIds: [], deltaLink: deltaLink('token-a') },
    { messages: [], removedIds: [], deltaLink: deltaLink('token-b') },
  );

  await Promise.all([
    h.services.mail.deltaSync({ accountId }),
    h.services.mail.deltaSync({ accountId }),
  ]);

  const active = h.memory.tables.deltaLinks.filter((link) => link.accountId === accountId && link.isActive);
  assert.deepEqual(active.map((link) => link.deltaToken), ['token-b']);
  assert.deepEqual(h.graph.calls.getDeltaMessages.map((call) => call.params.deltaToken), [null, 'token-a']);

  await Promise.all([
    h.memory.store.saveDeltaLink(accountId, 'inbox', 'token-c'),
    h.memory.store.saveDeltaLink(accountId, 'inbox', 'token-d'),
  ]);
  assert.equal(h.memory.tables.deltaLinks.filter((link) => link.isActive).length, 1);
});

await test('an expired delta link falls back to a baseline round', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  await h.memory.store.saveDeltaLink(accountId, 'inbox', 'stale-token');
  h.graph.queues.getDeltaMessages.push(
    new DeltaLinkExpiredError({ status: 410 }),
    { messages: [], removedIds: [], deltaLink: deltaLink('token-fresh') },
  );

  const result = await h.services.mail.deltaSync({ accountId });
  assert.equal(result.accounts[0]?.baseline, true);
  assert.equal(result.accounts[0]?.nextToken, 'token-fresh');
  assert.deepEqual(
    h.graph.calls.getDeltaMessages.map((call) => call.params.deltaToken),
    ['stale-token', null],
  );
  assert.deepEqual(
    h.memory.tables.deltaLinks.map((link) => [link.deltaToken, link.isActive]),
    [['stale-token', false], ['token-fresh', true]],
  );
});

await test('a delta page without a delta link keeps the previous link', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  await h.memory.store.saveDeltaLink(accountId, 'inbox', 'token-1');
  h.graph.queues.getDeltaMessages.push({ messages: [], removedIds: [], deltaLink: null });

  const result = await h.services.mail.deltaSync({ accountId });
  assert.equal(result.accounts[0]?.nextToken, null);
  assert.deepEqual(h.memory.tables.deltaLinks.map((link) => [link.deltaToken, link.isActive]), [['token-1', true]]);
});

await test('batch delta sync reports a failing account and continues', async () => {
  const h = createHarness();
  const broken = await h.addAccount('broken@example.test');
  const healthy = await h.addAccount('owner@example.test');
  h.graph.queues.getDeltaMessages.push(new UpstreamHttpError('delta', 500));

  const result = await h.services.mail.deltaSync({});
  assert.equal(result.accounts.length, 1);
  assert.equal(result.accounts[0]?.accountId, healthy);
  assert.equal(result.skipped[0]?.accountId, broken);
  assert.equal(result.skipped[0]?.reason, 'error');
  assert.equal(result.skipped[0]?.message, 'delta failed with HTTP 500');
});

await test('send requires at least one recipient', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');

  await assert.rejects(
    h.services.mail.send({ accountId, to: [], subject: 'Hi', body: 'Hello', bodyType: 'text' }),
    (error: unknown) => {
      assert.ok(error instanceof ValidationError);
      assert.equal(error.code, ErrorCodes.MISSING_REQUIRED_FIELD);
      return true;
    },
  );
  assert.equal(h.graph.calls.sendMail.length, 0);
});

await test('send posts the message and saves to sent items by default', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');

  const result = await h.services.mail.send({
    accountId,
    to: ['first@example.test'],
    bcc: ['hidden@example.test'],
    subject: 'Hi',
    body: '<p>Hello</p>',
    bodyType: 'html',
  });

  assert.deepEqual(result, { accountId, messageId: null, sentAt: new Date(h.clock.now()) });
  const call = h.graph.calls.sendMail[0];
  assert.equal(call?.accessToken, 'token-owner@example.test');
  assert.deepEqual(call?.params, {
    saveToSentItems: true,
    message: {
      subject: 'Hi',
      body: { contentType: 'HTML', content: '<p>Hello</p>' },
      importance: 'normal',
      toRecipients: [{ emailAddress: { address: 'first@example.test' } }],
      ccRecipients: [],
      bccRecipients: [{ emailAddress: { address: 'hidden@example.test' } }],
    },
  });
});

await test('a Graph send failure surfaces as a mail send error', async () => {
  const h = createHarness();
  const accountId = await h.addAccount('owner@example.test');
  h.graph.queues.sendMail.push(new UpstreamHttpError('sendMail', 403, { code: 'ErrorAccessDenied' }));

  await assert.rejects(
    h.services.mail.send({ accountId, to: ['first@example.test'], subject: 'Hi', body: 'Hello', bodyType: 'text' }),
    (error: unknown) => {
      assert.ok(error instanceof MailSendError);
      assert.equal(error.code, ErrorCodes.MAIL_SEND_FAILED);
      assert.equal(error.message, 'Failed to send mail: sendMail failed with HTTP 403 (ErrorAccessDenied)');
      return true;
    },
  );
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
