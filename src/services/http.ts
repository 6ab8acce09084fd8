/**
 * JSON over HTTP with a hard timeout.
 *
 * Every failure surfaces as a TransientIOError; `retryable` is set for
 * network errors, timeouts, 5xx and 429.
 */

import { TransientIOError, describeError } from '../errors.js';

export async function requestJson(
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<unknown> {
  const method = init.method ?? 'GET';
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  let res: Response;
  try {
    res = await fetch(url, {
      ...init,
      signal: controller.signal,
      headers: { 'Content-Type': 'application/json' },
    });
  } catch (err) {
    const reason = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : describeError(err);
    throw new TransientIOError(`${method} ${url}: ${reason}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }

  if (!res.ok) {
    throw new TransientIOError(`${method} ${url}: HTTP ${res.status}`, {
      status: res.status,
      retryable: res.status >= 500 || res.status === 429,
    });
  }

  try {
    return await res.json();
  } catch (err) {
    throw new TransientIOError(`${method} ${url}: response is not JSON`, { retryable: false, cause: err });
  }
}
