import type { Logger } from 'pino';
import { TransportError } from '../../domain/index.js';
import type { HttpMethod, Transport } from '../../domain/index.js';

/**
 * Transport backed by the global `fetch`.
 *
 * Rejects with TransportError when the request cannot be sent or the
 * gateway answers with a non-2xx status.
 */
export function createFetchTransport(log: Logger): Transport {
  async function send(
    method: HttpMethod,
    url: string,
    body: Uint8Array,
    headers: Readonly<Record<string, string>>,
  ): Promise<void> {
    const response = await fetch(url, { method, headers: { ...headers }, body }).catch((err: unknown) => {
      throw new TransportError(
        `${method} ${url} failed: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        { url, method },
      );
    });

    if (!response.ok) {
      throw new TransportError(`${method} ${url} returned HTTP ${response.status}`, response.status, {
        url,
        method,
      });
    }

    log.debug({ url, method, status: response.status }, 'Notification request sent');
  }

  return {
    post: (url, body, headers) => send('POST', url, body, headers),
    put: (url, body, headers) => send('PUT', url, body, headers),
  };
}
