import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createFetchTransport } from '../../src/infrastructure/transport/fetch-transport.js';
import { TransportError } from '../../src/domain/index.js';
import { fakeLogger } from '../helpers/fakes.js';

describe('createFetchTransport', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts the body with the given headers', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    vi.stubGlobal('fetch', mockFetch);
    const body = Buffer.from('hello', 'utf-8');

    await createFetchTransport(log).post('https://ntfy.sh/a', body, { Title: 'T' });

    expect(mockFetch).toHaveBeenCalledOnce();
    expect(mockFetch).toHaveBeenCalledWith('https://ntfy.sh/a', {
      method: 'POST',
      headers: { Title: 'T' },
      body,
    });
    expect(log.debug).toHaveBeenCalledWith(
      { url: 'https://ntfy.sh/a', method: 'POST', status: 200 },
      'Notification request sent',
    );
  });

  it('uses PUT for put()', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, status: 200 });
    vi.stubGlobal('fetch', mockFetch);

    await createFetchTransport(log).put('https://ntfy.sh/a', new Uint8Array([1, 2]), { Filename: 'x.bin' });

    expect(mockFetch).toHaveBeenCalledWith('https://ntfy.sh/a', expect.objectContaining({ method: 'PUT' }));
  });

  it('rejects with the status on a non-2xx response', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue({ ok: false, status: 429 }));

    const error = await createFetchTransport(log)
      .post('https://ntfy.sh/a', new Uint8Array(), {})
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    expect((error as TransportError).status).toBe(429);
    expect((error as TransportError).message).toBe('POST https://ntfy.sh/a returned HTTP 429');
  });

  it('wraps network failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND')));

    await expect(
      createFetchTransport(log).post('https://nowhere.invalid/a', new Uint8Array(), {}),
    ).rejects.toThrow('POST https://nowhere.invalid/a failed: getaddrinfo ENOTFOUND');
  });
});
