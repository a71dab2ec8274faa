import { readFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import {
  ConfigurationError,
  DEFAULT_BASE_URL,
  DispatchError,
  NotFoundError,
  cloneConfiguration,
  isHttpUrl,
  toList,
  toUrlList,
} from '../domain/index.js';
import type {
  Configuration,
  DispatchFailure,
  MessageDefaults,
  NotificationRequest,
  RequestBody,
  StringOrList,
  TopicGenerator,
  Transport,
} from '../domain/index.js';
import { fileConfigStore } from '../infrastructure/config/index.js';
import type { ConfigStore } from '../infrastructure/config/index.js';
import { createLogger } from '../infrastructure/logger.js';
import { generateTopic } from '../infrastructure/topics/index.js';
import { createFetchTransport } from '../infrastructure/transport/index.js';
import { describeConfiguration } from './describe.js';
import {
  parseMessageDefaultKeys,
  parseMessageDefaults,
  parseTargetItems,
} from './message-defaults-schema.js';
import { buildRequests, resolveFields } from './request-builder.js';
import type { FieldOverrides } from './request-builder.js';

export interface DispatcherOptions {
  topics?: StringOrList;
  emails?: StringOrList;
  baseUrl?: StringOrList;
  /** Validated against the message-default allow-list before anything is read. */
  messageDefaults?: Record<string, unknown>;
  /** File or directory; defaults to the current working directory. */
  confPath?: string;
  /** Write the configuration back after mutations. Defaults to true. */
  persist?: boolean;
  /** Log non-fatal warnings. Defaults to true. */
  warn?: boolean;
  /** Log a summary of the configuration once constructed. */
  describe?: boolean;
  logger?: Logger;
  transport?: Transport;
  configStore?: ConfigStore;
  generateTopic?: TopicGenerator;
}

export interface NotifyOptions extends FieldOverrides {
  topics?: StringOrList;
  /** An empty string or list suppresses the stored emails for this call. */
  emails?: StringOrList;
  baseUrl?: StringOrList;
  /** Log every resolved request before sending it. */
  debug?: boolean;
}

type TargetList = 'topics' | 'emails' | 'baseUrls';

const TARGET_LABELS: Record<TargetList, string> = {
  topics: 'Topic',
  emails: 'Email',
  baseUrls: 'Base URL',
};

/** Normalizes one target list; base URLs also lose their trailing slash. */
function parseTargets(value: StringOrList | undefined, list: TargetList): string[] | undefined {
  const items = list === 'baseUrls' ? toUrlList(value) : toList(value);
  return items === undefined ? undefined : parseTargetItems(items, list);
}

/**
 * Owns one merged configuration and sends notifications from it.
 *
 * Construction merges, in increasing precedence: the configuration file
 * (or built-in defaults), `messageDefaults`, then explicit
 * topics/emails/baseUrl. `notify` applies per-call overrides on top.
 */
export class Dispatcher {
  readonly confPath: string;

  private readonly config: Configuration;
  private readonly log: Logger;
  private readonly transport: Transport;
  private readonly store: ConfigStore;
  private readonly persistByDefault: boolean;
  private readonly warnings: boolean;

  constructor(options: DispatcherOptions = {}) {
    const topics = parseTargets(options.topics, 'topics');
    const emails = parseTargets(options.emails, 'emails');
    const baseUrls = parseTargets(options.baseUrl, 'baseUrls');
    const messageDefaults = parseMessageDefaults(options.messageDefaults ?? {});

    this.log = options.logger ?? createLogger();
    this.transport = options.transport ?? createFetchTransport(this.log);
    this.store = options.configStore ?? fileConfigStore;
    this.persistByDefault = options.persist ?? true;
    this.warnings = options.warn ?? true;

    this.confPath = this.store.resolvePath(options.confPath);
    const loaded = cloneConfiguration(this.store.load(this.confPath));

    this.config = {
      topics: topics ?? loaded.topics,
      emails: emails ?? loaded.emails,
      baseUrls: baseUrls ?? loaded.baseUrls,
      defaults: { ...loaded.defaults, ...messageDefaults },
    };

    if (this.config.topics.length === 0 && this.config.emails.length === 0) {
      const topic = (options.generateTopic ?? generateTopic)().trim();
      if (topic !== '') {
        this.warn({ topic }, 'No topic and no email set, created a random topic');
        this.config.topics = [topic];
        if (this.persistByDefault) this.save();
      }
    }

    if (this.config.topics.length === 0 && this.config.emails.length === 0) {
      throw new ConfigurationError('At least one topic or email is required', {
        confPath: this.confPath,
      });
    }

    if (options.describe) this.describe();
  }

  get topics(): string[] {
    return [...this.config.topics];
  }

  get emails(): string[] {
    return [...this.config.emails];
  }

  get baseUrls(): string[] {
    return [...this.config.baseUrls];
  }

  get messageDefaults(): MessageDefaults {
    return { ...this.config.defaults };
  }

  get configuration(): Configuration {
    return cloneConfiguration(this.config);
  }

  /** Logs the configuration summary and returns its lines. */
  describe(): string[] {
    const lines = describeConfiguration(this.config, this.confPath);
    for (const line of lines) this.log.info(line);
    return lines;
  }

  /** Writes the current configuration to `confPath`. */
  save(): void {
    this.warn(
      { confPath: this.confPath },
      'Configuration may contain secret topics, keep it out of version control',
    );
    this.store.write(this.confPath, cloneConfiguration(this.config));
    this.log.debug({ confPath: this.confPath }, 'Configuration written');
  }

  /**
   * Sends `message` to every destination at every base URL.
   *
   * All requests are attempted even when some fail; failures are then
   * raised together as a DispatchError.
   *
   * @returns destinations in dispatch order, one per (base URL, destination) pair
   * @throws ConflictError when both `message` and an attachment are set
   * @throws NotFoundError when a local attachment does not exist
   * @throws DispatchError when at least one request failed
   */
  async notify(message = '', options: NotifyOptions = {}): Promise<string[]> {
    const requests = buildRequests({
      message,
      baseUrls: this.resolveBaseUrls(options.baseUrl),
      topics: parseTargets(options.topics, 'topics') ?? this.config.topics,
      emails: parseTargets(options.emails, 'emails') ?? this.config.emails,
      fields: resolveFields(this.config.defaults, options),
    });

    const [first] = requests;
    if (first === undefined) {
      this.warn({}, 'No topic or email to notify');
      return [];
    }

    // Every request of one call shares the same body.
    const payload = await this.encodeBody(first.body);

    const dispatched: string[] = [];
    const failures: DispatchFailure[] = [];

    for (const request of requests) {
      if (options.debug) {
        this.log.info(
          {
            url: request.url,
            method: request.method,
            headers: request.headers,
            body: request.body.type === 'text' ? request.body.text : request.body.path,
          },
          'Resolved notification request',
        );
      }

      dispatched.push(request.destination);
      try {
        await this.send(request, payload);
      } catch (err: unknown) {
        this.log.error(
          { err, destination: request.destination, url: request.url },
          'Notification request failed',
        );
        failures.push({ destination: request.destination, url: request.url, error: err });
      }
    }

    if (failures.length > 0) {
      throw new DispatchError(dispatched, failures);
    }
    return dispatched;
  }

  addTopics(topics: StringOrList, persist?: boolean): void {
    this.addItems('topics', topics, persist);
  }

  addEmails(emails: StringOrList, persist?: boolean): void {
    this.addItems('emails', emails, persist);
  }

  addBaseUrls(baseUrls: StringOrList, persist?: boolean): void {
    this.addItems('baseUrls', baseUrls, persist);
  }

  removeTopics(topics: StringOrList, persist?: boolean): void {
    this.removeItems('topics', topics, persist);
  }

  removeEmails(emails: StringOrList, persist?: boolean): void {
    this.removeItems('emails', emails, persist);
  }

  removeBaseUrls(baseUrls: StringOrList, persist?: boolean): void {
    this.removeItems('baseUrls', baseUrls, persist);
  }

  removeAllTopics(persist?: boolean): void {
    this.config.topics = [];
    this.persistIf(persist);
  }

  removeAllEmails(persist?: boolean): void {
    this.config.emails = [];
    this.persistIf(persist);
  }

  removeAllBaseUrls(persist?: boolean): void {
    this.config.baseUrls = [];
    this.persistIf(persist);
  }

  /**
   * Merges new message defaults over the stored ones.
   * @throws ConfigurationError on a key outside the allow-list
   */
  updateMessageDefaults(defaults: Record<string, unknown>, persist?: boolean): void {
    const parsed = parseMessageDefaults(defaults);
    Object.assign(this.config.defaults, parsed);
    this.log.debug({ keys: Object.keys(parsed) }, 'Message defaults updated');
    this.persistIf(persist);
  }

  /** @throws ConfigurationError on a key outside the allow-list */
  removeMessageDefaults(keys: StringOrList, persist?: boolean): void {
    for (const key of parseMessageDefaultKeys(toList(keys) ?? [])) {
      if (this.config.defaults[key] === undefined) {
        this.warn({ key }, `Default ${key} is not set`);
      } else {
        delete this.config.defaults[key];
      }
    }
    this.persistIf(persist);
  }

  private addItems(list: TargetList, items: StringOrList, persist?: boolean): void {
    for (const item of parseTargets(items, list) ?? []) {
      if (this.config[list].includes(item)) {
        this.warn({ item }, `${TARGET_LABELS[list]} ${item} is already in the list`);
      } else {
        this.config[list].push(item);
      }
    }
    this.persistIf(persist);
  }

  private removeItems(list: TargetList, items: StringOrList, persist?: boolean): void {
    for (const item of parseTargets(items, list) ?? []) {
      const index = this.config[list].indexOf(item);
      if (index === -1) {
        this.warn({ item }, `${TARGET_LABELS[list]} ${item} is not in the list`);
      } else {
        this.config[list].splice(index, 1);
      }
    }
    this.persistIf(persist);
  }

  private persistIf(persist: boolean | undefined): void {
    if (persist ?? this.persistByDefault) this.save();
  }

  private warn(details: Record<string, unknown>, message: string): void {
    if (this.warnings) this.log.warn(details, message);
  }

  /** Explicit argument, else stored list, else the public ntfy server. */
  private resolveBaseUrls(explicit: StringOrList | undefined): string[] {
    const given = parseTargets(explicit, 'baseUrls') ?? [];
    const stored = toUrlList(this.config.baseUrls) ?? [];
    const urls = given.length > 0 ? given : stored.length > 0 ? stored : [DEFAULT_BASE_URL];

    for (const url of urls) {
      if (!isHttpUrl(url)) {
        this.warn({ url }, 'Base URL does not start with http:// or https://');
      }
    }
    return urls;
  }

  private async encodeBody(body: RequestBody): Promise<Uint8Array> {
    if (body.type === 'text') {
      return Buffer.from(body.text, 'utf-8');
    }
    try {
      return await readFile(body.path);
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new NotFoundError(`Attachment ${body.path}`, { path: body.path });
      }
      throw err;
    }
  }

  private send(request: NotificationRequest, payload: Uint8Array): Promise<void> {
    return request.method === 'PUT'
      ? this.transport.put(request.url, payload, request.headers)
      : this.transport.post(request.url, payload, request.headers);
  }
}
