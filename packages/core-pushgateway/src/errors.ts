import type { ZodIssue } from 'zod';

export type PushgatewayErrorCode =
  | 'invalid_argument'
  | 'invalid_label_set'
  | 'label_collision'
  | 'http_redirect'
  | 'http_client_error'
  | 'http_server_error'
  | 'timeout';

export type HttpErrorCode = Extract<PushgatewayErrorCode, `http_${string}`>;

export type StatusClassification = 'success' | HttpErrorCode;

export class PushgatewayError extends Error {
  readonly code: PushgatewayErrorCode;

  constructor(code: PushgatewayErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PushgatewayError';
    this.code = code;
  }
}

export class InvalidArgumentError extends PushgatewayError {
  readonly issues: ZodIssue[];

  constructor(message: string, options: ErrorOptions & { issues?: ZodIssue[] } = {}) {
    super('invalid_argument', message, options);
    this.name = 'InvalidArgumentError';
    this.issues = options.issues ?? [];
  }
}

export class InvalidLabelSetError extends PushgatewayError {
  constructor(message: string, options?: ErrorOptions) {
    super('invalid_label_set', message, options);
    this.name = 'InvalidLabelSetError';
  }
}

export class LabelCollisionError extends PushgatewayError {
  readonly label: string;
  readonly metricName: string;

  constructor(label: string, metricName: string) {
    super(
      'label_collision',
      `label "${label}" from grouping key collides with label of the same name from metric "${metricName}" and would overwrite it`
    );
    this.name = 'LabelCollisionError';
    this.label = label;
    this.metricName = metricName;
  }
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  body: string;
}

export class HttpError extends PushgatewayError {
  readonly status: number;
  readonly statusText: string;
  readonly body: string;

  constructor(code: HttpErrorCode, details: HttpErrorDetails) {
    super(code, `status: ${details.status}, message: ${details.statusText}, body: ${details.body}`);
    this.name = 'HttpError';
    this.status = details.status;
    this.statusText = details.statusText;
    this.body = details.body;
  }
}

export class HttpRedirectError extends HttpError {
  constructor(details: HttpErrorDetails) {
    super('http_redirect', details);
    this.name = 'HttpRedirectError';
  }
}

export class HttpClientError extends HttpError {
  constructor(details: HttpErrorDetails) {
    super('http_client_error', details);
    this.name = 'HttpClientError';
  }
}

export class HttpServerError extends HttpError {
  constructor(details: HttpErrorDetails) {
    super('http_server_error', details);
    this.name = 'HttpServerError';
  }
}

export type TimeoutPhase = 'open' | 'read';

/**
 * Raised by the transport layer when the gateway does not answer in time.
 * Not an {@link HttpError}: no status was received.
 */
export class PushTimeoutError extends PushgatewayError {
  readonly phase: TimeoutPhase;
  readonly timeoutMs: number;

  constructor(phase: TimeoutPhase, timeoutMs: number) {
    super('timeout', `${phase} timeout of ${timeoutMs}ms exceeded`);
    this.name = 'PushTimeoutError';
    this.phase = phase;
    this.timeoutMs = timeoutMs;
  }
}

export function classifyStatus(status: number): StatusClassification {
  if (status < 300) return 'success';
  if (status <= 399) return 'http_redirect';
  if (status <= 499) return 'http_client_error';
  return 'http_server_error';
}

export function buildHttpError(status: number, statusText: string, body: string): HttpError | undefined {
  const details = { status, statusText, body };

  switch (classifyStatus(status)) {
    case 'http_redirect':
      return new HttpRedirectError(details);
    case 'http_client_error':
      return new HttpClientError(details);
    case 'http_server_error':
      return new HttpServerError(details);
    case 'success':
      return undefined;
  }
}

/**
 * Throw the matching {@link HttpError} unless the status is below 300.
 */
export function assertSuccessfulResponse<T extends HttpErrorDetails>(response: T): T {
  const error = buildHttpError(response.status, response.statusText, response.body);
  if (error) {
    throw error;
  }
  return response;
}
