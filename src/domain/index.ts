export type {
  StringOrList,
  MessageDefaultKey,
  MessageDefaults,
  Configuration,
} from './configuration.js';
export {
  MESSAGE_DEFAULT_KEYS,
  DEFAULT_BASE_URL,
  CONFIG_FILENAME,
  DEFAULT_ICON_URL,
  BUILTIN_MESSAGE_DEFAULTS,
  isMessageDefaultKey,
  defaultConfiguration,
  cloneConfiguration,
} from './configuration.js';
export type {
  DestinationKind,
  HttpMethod,
  RequestBody,
  NotificationRequest,
  Transport,
  TopicGenerator,
} from './request.js';
export { toList, toUrlList, isHttpUrl, stripTrailingSlash, wireHeaderName } from './normalize.js';
export type { ToListOptions } from './normalize.js';
export type { ErrorContext, DispatchFailure } from './errors.js';
export {
  NotifierError,
  ConfigurationError,
  ConflictError,
  NotFoundError,
  TransportError,
  DispatchError,
} from './errors.js';
