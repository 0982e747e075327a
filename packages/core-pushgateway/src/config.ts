import { z } from 'zod';

import type { Logger } from '@pushgate/core-logging';
import type { Serializer } from '@pushgate/core-exposition';
import { safeParseOrThrow, type ValidationErrorFactory } from '@pushgate/core-validation';

import { InvalidArgumentError } from './errors.js';
import type { PushClientConfig, PushTransport } from './types.js';

export const DEFAULT_OPEN_TIMEOUT_MS = 60_000;
export const DEFAULT_READ_TIMEOUT_MS = 60_000;

const isFunction = (value: unknown): boolean => typeof value === 'function';

const isObjectWith = (keys: readonly string[]) => (value: unknown): boolean =>
  typeof value === 'object' && value !== null && keys.every((key) => isFunction(Reflect.get(value, key)));

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const isWellFormedString = (value: string): boolean => !LONE_SURROGATE.test(value);

const wellFormed = { message: 'must not contain lone surrogates' };

const timeoutSchema = z.number().positive().finite();

export const pushClientConfigSchema = z.object({
  job: z
    .string({ required_error: 'job cannot be missing', invalid_type_error: 'job must be a string' })
    .min(1, { message: 'job cannot be empty' })
    .refine(isWellFormedString, wellFormed),
  gateway: z.string().refine(isWellFormedString, wellFormed).optional(),
  groupingKey: z.record(z.string().refine(isWellFormedString, wellFormed)).optional(),
  openTimeoutMs: timeoutSchema.optional(),
  readTimeoutMs: timeoutSchema.optional(),
  serializer: z
    .custom<Serializer>(isObjectWith(['contentType', 'marshal']), { message: 'serializer must provide contentType and marshal' })
    .optional(),
  transport: z.custom<PushTransport>(isFunction, { message: 'transport must be a function' }).optional(),
  logger: z
    .custom<Logger>(isObjectWith(['debug', 'info', 'warn', 'error', 'child']), { message: 'logger is missing methods' })
    .optional()
});

const toInvalidArgument: ValidationErrorFactory = (message, issues) => new InvalidArgumentError(message, { issues });

export function parsePushClientConfig(config: PushClientConfig): PushClientConfig {
  return safeParseOrThrow(pushClientConfigSchema, config, 'push client config', toInvalidArgument);
}

const envSchema = z.object({
  PUSHGATEWAY_JOB: z.string({ required_error: 'PUSHGATEWAY_JOB is required' }).min(1),
  PUSHGATEWAY_URL: z.string().url().optional(),
  PUSHGATEWAY_GROUPING_KEY: z.string().optional(),
  PUSHGATEWAY_OPEN_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  PUSHGATEWAY_READ_TIMEOUT_MS: z.coerce.number().int().positive().optional()
});

/**
 * Parse `label=value,label=value`. Only the first `=` of a pair splits it, and empty values are kept.
 */
export function parseGroupingKey(raw: string): Record<string, string> {
  const groupingKey: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) continue;

    const separator = trimmed.indexOf('=');
    if (separator <= 0) {
      throw new InvalidArgumentError(`grouping key entry "${trimmed}" must look like label=value`);
    }
    groupingKey[trimmed.slice(0, separator)] = trimmed.slice(separator + 1);
  }
  return groupingKey;
}

/**
 * Build client options from `PUSHGATEWAY_*` variables. Nothing in the client reads the environment itself.
 */
export function pushClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PushClientConfig {
  const parsed = safeParseOrThrow(envSchema, env, 'pushgateway environment', toInvalidArgument);

  return {
    job: parsed.PUSHGATEWAY_JOB,
    gateway: parsed.PUSHGATEWAY_URL,
    groupingKey: parsed.PUSHGATEWAY_GROUPING_KEY ? parseGroupingKey(parsed.PUSHGATEWAY_GROUPING_KEY) : undefined,
    openTimeoutMs: parsed.PUSHGATEWAY_OPEN_TIMEOUT_MS,
    readTimeoutMs: parsed.PUSHGATEWAY_READ_TIMEOUT_MS
  };
}
