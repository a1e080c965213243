// fetchWithTimeout.ts
// Races a client fetch against its timeout and abort signal.

import { FetchCancelledError, FetchTimeoutError } from '../errors/ContentErrors';
import type { ContentFetchClient } from '../types';

/**
 * Fetch `identifier`, rejecting with FetchTimeoutError after `timeoutMs` or
 * FetchCancelledError when `controller` aborts, whether or not the client
 * honours its signal.
 */
export function fetchWithTimeout(
  client: ContentFetchClient,
  identifier: string,
  controller: AbortController,
  timeoutMs: number
): Promise<string> {
  if (controller.signal.aborted) {
    return Promise.reject(new FetchCancelledError(identifier, 'aborted'));
  }

  return new Promise<string>((resolve, reject) => {
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    const onAbort = () => {
      clearTimeout(timer);
      reject(timedOut ? new FetchTimeoutError(identifier, timeoutMs) : new FetchCancelledError(identifier, 'aborted'));
    };
    controller.signal.addEventListener('abort', onAbort, { once: true });

    const finish = () => {
      clearTimeout(timer);
      controller.signal.removeEventListener('abort', onAbort);
    };

    let pending: Promise<string>;
    try {
      pending = client.fetchContent(identifier, { signal: controller.signal });
    } catch (err) {
      pending = Promise.reject(err);
    }

    void pending.then(
      (content) => {
        finish();
        resolve(content);
      },
      (err: unknown) => {
        finish();
        reject(err);
      }
    );
  });
}
