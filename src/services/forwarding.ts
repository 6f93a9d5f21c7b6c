import type { AppConfig } from '../config/env.js';
import type { Logger } from '../config/logger.js';
import type { ExternalCallFilter, MailGatewayStore } from '../db/store.js';
import { ExternalCallNotFoundError, UpstreamHttpError, describeError } from '../shared/errors.js';
import type { AccountRecord, ExternalApiCallOutcome, ExternalApiCallRecord, MailMessageRecord } from '../shared/types.js';
import { toForwardPayload } from './graphMessages.js';
import type { ForwardingClient } from './ports.js';

// A pending call with no completion after this long is treated as abandoned.
export const STALE_PENDING_MS = 10 * 60_000;

export interface ForwarderDeps {
  store: MailGatewayStore;
  client: ForwardingClient;
  config: Pick<AppConfig, 'externalApi'>;
  logger: Logger;
  now?: () => number;
}

export interface RetrySweepResult {
  attempted: number;
  succeeded: number;
  failed: number;
}

export const createForwarder = (deps: ForwarderDeps) => {
  const { store, client } = deps;
  const { endpoint, timeoutMs, maxRetries } = deps.config.externalApi;
  const now = deps.now ?? Date.now;
  const log = deps.logger.child({ component: 'forwarding' });

  const dispatch = async (call: ExternalApiCallRecord): Promise<ExternalApiCallRecord> => {
    let outcome: ExternalApiCallOutcome;
    try {
      const response = await client.sendMailData(call.endpointUrl, call.requestPayload, timeoutMs);
      outcome = { success: true, responseStatus: response.status, responseBody: response.body };
    } catch (error) {
      outcome = {
        success: false,
        responseStatus: error instanceof UpstreamHttpError ? error.status : null,
        responseBody: describeError(error),
      };
      log.warn(
        { err: error, callId: call.id, accountId: call.accountId, retryCount: call.retryCount },
        'forwarding to external api failed',
      );
    }

    const completed = await store.completeExternalCall(call.id, outcome, new Date(now()));
    return completed ?? { ...call, ...outcome };
  };

  /**
   * Records a pending call, then dispatches it. Upstream failures are kept on
   * the call row for the retry sweep and never thrown; the stored message is
   * unaffected either way.
   */
  const forwardMessage = async (
    account: Pick<AccountRecord, 'id' | 'email'>,
    message: MailMessageRecord,
  ): Promise<ExternalApiCallRecord | null> => {
    if (!endpoint) {
      return null;
    }
    const call = await store.createExternalCall({
      accountId: account.id,
      messageId: message.messageId,
      endpointUrl: endpoint,
      requestPayload: toForwardPayload(account, message),
      maxRetries,
    });
    return dispatch(call);
  };

  const retryCall = async (callId: string): Promise<{ call: ExternalApiCallRecord; retried: boolean }> => {
    const existing = await store.getExternalCall(callId);
    if (!existing) {
      throw new ExternalCallNotFoundError(callId);
    }
    if (existing.success) {
      return { call: existing, retried: false };
    }
    const nowMs = now();
    const claimed = await store.claimExternalCallRetry(callId, new Date(nowMs), new Date(nowMs - STALE_PENDING_MS));
    if (!claimed) {
      log.info(
        { callId, retryCount: existing.retryCount, maxRetries: existing.maxRetries },
        'external call not eligible for retry',
      );
      return { call: existing, retried: false };
    }
    return { call: await dispatch(claimed), retried: true };
  };

  const retryFailedCalls = async (limit = 100): Promise<RetrySweepResult> => {
    const result: RetrySweepResult = { attempted: 0, succeeded: 0, failed: 0 };
    const candidates = await store.listRetryableExternalCalls(new Date(now() - STALE_PENDING_MS), limit);
    for (const candidate of candidates) {
      try {
        const { call, retried } = await retryCall(candidate.id);
        if (!retried) {
          continue;
        }
        result.attempted += 1;
        if (call.success) {
          result.succeeded += 1;
        } else {
          result.failed += 1;
        }
      } catch (error) {
        result.failed += 1;
        log.error({ err: error, callId: candidate.id }, 'external call retry failed');
      }
    }
    return result;
  };

  const listCalls = (filter: ExternalCallFilter) => store.listExternalCalls(filter);

  return {
    isEnabled: () => endpoint !== null,
    forwardMessage,
    retryCall,
    retryFailedCalls,
    listCalls,
  };
};

export type Forwarder = ReturnType<typeof createForwarder>;
