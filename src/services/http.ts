import { setTimeout as delay } from 'node:timers/promises';
import { UpstreamTimeoutError, UpstreamUnavailableError } from '../shared/errors.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

const isTimeoutError = (error: unknown) =>
  error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');

/**
 * One bounded HTTP call. A timeout becomes UpstreamTimeoutError, any other
 * transport failure UpstreamUnavailableError; both are retryable.
 */
export const fetchWithTimeout = async (
  fetchImpl: FetchLike,
  operation: string,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> => {
  try {
    return await fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    if (isTimeoutError(error)) {
      throw new UpstreamTimeoutError(operation, timeoutMs, error);
    }
    throw new UpstreamUnavailableError(operation, error);
  }
};

export const readBody = async (response: Response): Promise<unknown> => {
  const text = await response.text().catch(() => '');
  if (!text) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
};

export const parseRetryAfterMs = (value: string | null): number | null => {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) {
    return Math.round(seconds * 1000);
  }
  const at = Date.parse(value);
  if (Number.isFinite(at)) {
    return Math.max(0, at - Date.now());
  }
  return null;
};

export const nextBackoffMs = (attempt: number) => Math.min(500 * 2 ** attempt, 8000);
