import { UpstreamHttpError } from '../shared/errors.js';
import { fetchWithTimeout, parseRetryAfterMs } from './http.js';
import type { FetchLike } from './http.js';
import type { ForwardingClient } from './ports.js';

const MAX_RESPONSE_BODY_CHARS = 4000;

export const createExternalApiClient = (options: { fetchImpl?: FetchLike } = {}): ForwardingClient => {
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    sendMailData: async (endpoint, payload, timeoutMs) => {
      const response = await fetchWithTimeout(
        fetchImpl,
        'sendMailData',
        endpoint,
        {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Accept: 'application/json',
          },
          body: JSON.stringify(payload),
        },
        timeoutMs,
      );
      const body = (await response.text().catch(() => '')).slice(0, MAX_RESPONSE_BODY_CHARS);
      if (!response.ok) {
        throw new UpstreamHttpError('sendMailData', response.status, {
          description: body || null,
          retryAfterMs: parseRetryAfterMs(response.headers.get('retry-after')),
        });
      }
      return { status: response.status, body };
    },
  };
};
