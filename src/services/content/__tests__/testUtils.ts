import { vi } from 'vitest';

export interface FakeClientOptions {
  // Delay before each fetch settles; 0 settles on the next microtask
  latencyMs?: number;
  // Identifiers that fail with an HTTP-style 404
  missing?: string[];
  // Content per identifier; defaults to "<p>Page {id}</p>"
  pages?: Record<string, string>;
}

function abortError(): Error {
  const err = new Error('The operation was aborted');
  err.name = 'AbortError';
  return err;
}

/**
 * In-process stand-in for the content repository client.
 */
export function createFakeClient(opts: FakeClientOptions = {}) {
  const latency = opts.latencyMs ?? 0;
  const missing = new Set(opts.missing ?? []);
  let active = 0;
  let maxActive = 0;
  const signals: AbortSignal[] = [];

  const fetchContent = vi.fn(
    (identifier: string, { signal }: { signal: AbortSignal }): Promise<string> =>
      new Promise<string>((resolve, reject) => {
        signals.push(signal);
        active++;
        maxActive = Math.max(maxActive, active);

        const complete = () => {
          active--;
          if (missing.has(identifier)) {
            reject(Object.assign(new Error(`Page ${identifier} not found`), { status: 404 }));
          } else {
            resolve(opts.pages?.[identifier] ?? `<p>Page ${identifier}</p>`);
          }
        };

        const timer = latency > 0 ? setTimeout(complete, latency) : undefined;
        if (!timer) {
          queueMicrotask(complete);
        }
        signal.addEventListener(
          'abort',
          () => {
            if (timer) clearTimeout(timer);
            active--;
            reject(abortError());
          },
          { once: true }
        );
      })
  );

  return {
    fetchContent,
    signals,
    get maxActive() {
      return maxActive;
    },
  };
}

/**
 * A client whose fetches never settle on their own and ignore abort signals.
 */
export function createHangingClient() {
  const signals: AbortSignal[] = [];
  const fetchContent = vi.fn((_identifier: string, { signal }: { signal: AbortSignal }): Promise<string> => {
    signals.push(signal);
    return new Promise<string>(() => undefined);
  });
  return { fetchContent, signals };
}
