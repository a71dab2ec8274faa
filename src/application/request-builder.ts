import { basename } from 'node:path';
import {
  ConflictError,
  isHttpUrl,
  toList,
  wireHeaderName,
} from '../domain/index.js';
import type {
  MessageDefaults,
  NotificationRequest,
  RequestBody,
  StringOrList,
} from '../domain/index.js';

/** Per-call overrides for the notification fields. */
export interface FieldOverrides {
  title?: string;
  priority?: string | number;
  tags?: StringOrList;
  click?: string;
  attach?: string;
  actions?: StringOrList;
  icon?: string;
}

/** Notification fields after applying call > stored > unset precedence. */
export interface NotificationFields {
  title?: string;
  priority?: string;
  tags: string[];
  click?: string;
  attach?: string;
  actions: string[];
  icon?: string;
}

export interface RequestPlan {
  message: string;
  baseUrls: readonly string[];
  topics: readonly string[];
  emails: readonly string[];
  fields: NotificationFields;
}

/** Blank strings count as "not given". */
function given(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function resolveFields(stored: MessageDefaults, overrides: FieldOverrides): NotificationFields {
  const priority = overrides.priority === undefined ? undefined : given(String(overrides.priority));

  return {
    title: given(overrides.title) ?? stored.title,
    priority: priority ?? stored.priority,
    tags: toList(overrides.tags) ?? toList(stored.tags) ?? [],
    click: given(overrides.click) ?? stored.click,
    attach: given(overrides.attach) ?? stored.attach,
    // An action definition contains commas itself, so string input is never split.
    actions: toList(overrides.actions, { split: false }) ?? toList(stored.actions, { split: false }) ?? [],
    icon: given(overrides.icon) ?? stored.icon,
  };
}

/** A local attachment is anything without an http(s) scheme. */
export function isLocalAttachment(attach: string | undefined): boolean {
  return attach !== undefined && !isHttpUrl(attach);
}

/**
 * Builds the header set shared by every request of one call.
 * Unset fields never produce a header.
 */
export function buildHeaders(fields: NotificationFields): Record<string, string> {
  const headers: Record<string, string> = {};

  const scalars = { title: fields.title, priority: fields.priority, click: fields.click, icon: fields.icon };
  for (const [key, value] of Object.entries(scalars)) {
    if (value !== undefined) headers[wireHeaderName(key)] = value;
  }

  if (fields.tags.length > 0) headers['Tags'] = fields.tags.join(',');
  if (fields.actions.length > 0) headers['Actions'] = fields.actions.join(',');

  if (fields.attach !== undefined) {
    if (isLocalAttachment(fields.attach)) {
      headers['Filename'] = basename(fields.attach);
    } else {
      headers['Attach'] = fields.attach;
    }
  }

  return headers;
}

/**
 * Expands a plan into one request per (base URL, destination) pair.
 *
 * Order: base URLs in list order; within each, all topics then all emails.
 * Each request gets its own copy of the headers.
 *
 * @throws ConflictError when both a message and an attachment are set
 */
export function buildRequests(plan: RequestPlan): NotificationRequest[] {
  const { message, fields } = plan;

  if (message !== '' && fields.attach !== undefined) {
    throw new ConflictError('Cannot send both a message and an attachment in one notification', {
      attach: fields.attach,
    });
  }

  const shared = buildHeaders(fields);
  const attachment = isLocalAttachment(fields.attach) ? fields.attach : undefined;
  const method = attachment === undefined ? 'POST' : 'PUT';
  const body: RequestBody = attachment === undefined
    ? { type: 'text', text: message }
    : { type: 'file', path: attachment };

  const requests: NotificationRequest[] = [];
  for (const base of plan.baseUrls) {
    for (const topic of plan.topics) {
      requests.push({
        destination: topic,
        kind: 'topic',
        url: `${base}/${topic}`,
        method,
        headers: { ...shared },
        body,
      });
    }
    for (const email of plan.emails) {
      requests.push({
        destination: email,
        kind: 'email',
        url: `${base}/alerts`,
        method,
        headers: { ...shared, Email: email },
        body,
      });
    }
  }
  return requests;
}
