export { Dispatcher } from './dispatcher.js';
export type { DispatcherOptions, NotifyOptions } from './dispatcher.js';
export { buildRequests, buildHeaders, resolveFields, isLocalAttachment } from './request-builder.js';
export type { FieldOverrides, NotificationFields, RequestPlan } from './request-builder.js';
export {
  messageDefaultsSchema,
  parseMessageDefaults,
  parseMessageDefaultKeys,
  parseTargetItems,
} from './message-defaults-schema.js';
export type { MessageDefaultsInput } from './message-defaults-schema.js';
export { describeConfiguration } from './describe.js';
