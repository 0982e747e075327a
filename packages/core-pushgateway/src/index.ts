export { createPushClient, parseGatewayUrl } from './client.js';
export {
  DEFAULT_OPEN_TIMEOUT_MS,
  DEFAULT_READ_TIMEOUT_MS,
  parseGroupingKey,
  parsePushClientConfig,
  pushClientConfigFromEnv,
  pushClientConfigSchema
} from './config.js';
export {
  assertSuccessfulResponse,
  buildHttpError,
  classifyStatus,
  HttpClientError,
  HttpError,
  HttpRedirectError,
  HttpServerError,
  InvalidArgumentError,
  InvalidLabelSetError,
  LabelCollisionError,
  PushgatewayError,
  PushTimeoutError,
  type HttpErrorCode,
  type HttpErrorDetails,
  type PushgatewayErrorCode,
  type StatusClassification,
  type TimeoutPhase
} from './errors.js';
export {
  basicAuthHeader,
  buildPushPath,
  DEFAULT_GATEWAY,
  encodeBase64Url,
  encodePathComponent,
  redactUrl,
  stripCredentials,
  SUPPORTED_PROTOCOLS
} from './helpers.js';
export { Mutex } from './mutex.js';
export { assertNoLabelClashes, validateGroupingKey } from './validation.js';
export type { GroupingKey, PushClient, PushClientConfig, PushMethod, PushResponse, PushTransport } from './types.js';
