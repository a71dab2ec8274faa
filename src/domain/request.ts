/** Whether a request publishes to a topic or sends an email through the gateway. */
export type DestinationKind = 'topic' | 'email';

export type HttpMethod = 'POST' | 'PUT';

/**
 * Body of a notification request.
 *
 * `file` carries the local path only; bytes are read at dispatch time.
 */
export type RequestBody =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'file'; readonly path: string };

/**
 * One outbound HTTP request for a single destination at a single base URL.
 * Built fresh for every `notify` call and never persisted.
 */
export interface NotificationRequest {
  readonly destination: string;
  readonly kind: DestinationKind;
  readonly url: string;
  readonly method: HttpMethod;
  readonly headers: Record<string, string>;
  readonly body: RequestBody;
}

/**
 * HTTP primitives the dispatcher sends requests through.
 * Both reject when the gateway cannot be reached or refuses the request.
 */
export interface Transport {
  post(url: string, body: Uint8Array, headers: Readonly<Record<string, string>>): Promise<void>;
  put(url: string, body: Uint8Array, headers: Readonly<Record<string, string>>): Promise<void>;
}

/** Produces a human-memorable, hard-to-guess topic name. */
export type TopicGenerator = () => string;
