import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { fetchWithTimeout } from '../fetchWithTimeout';
import { FetchCancelledError, FetchTimeoutError } from '../../errors/ContentErrors';
import { createFakeClient, createHangingClient } from '../../__tests__/testUtils';

describe('fetchWithTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the client content', async () => {
    const client = createFakeClient();

    await expect(fetchWithTimeout(client, '1', new AbortController(), 1000)).resolves.toBe('<p>Page 1</p>');
  });

  it('rejects on timeout when the client ignores its signal', async () => {
    const client = createHangingClient();
    const pending = fetchWithTimeout(client, '1', new AbortController(), 100);
    const assertion = expect(pending).rejects.toBeInstanceOf(FetchTimeoutError);

    await vi.advanceTimersByTimeAsync(100);

    await assertion;
    expect(client.signals[0].aborted).toBe(true);
  });

  it('rejects as cancelled when the caller aborts', async () => {
    const client = createHangingClient();
    const controller = new AbortController();
    const pending = fetchWithTimeout(client, '1', controller, 1000);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(FetchCancelledError);
  });

  it('does not call the client once already aborted', async () => {
    const client = createHangingClient();
    const controller = new AbortController();
    controller.abort();

    await expect(fetchWithTimeout(client, '1', controller, 1000)).rejects.toBeInstanceOf(FetchCancelledError);
    expect(client.fetchContent).not.toHaveBeenCalled();
  });

  it('turns a synchronous client throw into a rejection', async () => {
    const client = {
      fetchContent: vi.fn((): Promise<string> => {
        throw new Error('client misconfigured');
      }),
    };

    await expect(fetchWithTimeout(client, '1', new AbortController(), 1000)).rejects.toThrow('client misconfigured');
  });
});
