import { InvalidArgumentError } from './errors.js';
import type { GroupingKey } from './types.js';

export const DEFAULT_GATEWAY = 'http://localhost:9091';
export const SUPPORTED_PROTOCOLS: readonly string[] = ['http:', 'https:'];

const JOB_PATH_PREFIX = '/metrics/job';

// URL parsers resolve these as dot segments, whatever their percent-encoding
const DOT_SEGMENTS = new Set(['.', '..']);

/**
 * Percent-encode everything outside the RFC 3986 unreserved set.
 * `encodeURIComponent` leaves `!'()*` alone, so those are encoded here as well.
 */
export function encodePathComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Base64 with the URL-safe alphabet, keeping `=` padding.
 */
export function encodeBase64Url(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

function groupingKeySegment(label: string, value: string): string {
  if (value.includes('/') || DOT_SEGMENTS.has(value)) {
    return `/${label}@base64/${encodeBase64Url(value)}`;
  }

  // An empty segment (`//`) gets collapsed by proxies and HTTP libraries,
  // so the empty value is sent as a lone padding character.
  if (value === '') {
    return `/${label}@base64/=`;
  }

  return `/${label}/${encodePathComponent(value)}`;
}

/**
 * Build the push path for a job and grouping key.
 * Segments follow the grouping key's insertion order; the gateway reads them as an unordered label set.
 */
export function buildPushPath(job: string, groupingKey: GroupingKey = {}): string {
  let path = DOT_SEGMENTS.has(job)
    ? `${JOB_PATH_PREFIX}@base64/${encodeBase64Url(job)}`
    : `${JOB_PATH_PREFIX}/${encodePathComponent(job)}`;
  for (const [label, value] of Object.entries(groupingKey)) {
    path += groupingKeySegment(label, value);
  }
  return path;
}

/**
 * Replace the password of a URL with `***` so it can be logged.
 */
export function redactUrl(url: URL): string {
  if (!url.password) {
    return url.toString();
  }
  const copy = new URL(url.toString());
  copy.password = '***';
  return copy.toString();
}

/**
 * Basic auth header value for URLs that embed credentials.
 */
export function basicAuthHeader(url: URL): string | undefined {
  if (!url.username && !url.password) {
    return undefined;
  }
  let user: string;
  let password: string;
  try {
    user = decodeURIComponent(url.username);
    password = decodeURIComponent(url.password);
  } catch (error) {
    throw new InvalidArgumentError(`gateway credentials are not valid percent-encoding: ${redactUrl(url)}`, {
      cause: error
    });
  }
  return `Basic ${Buffer.from(`${user}:${password}`, 'utf8').toString('base64')}`;
}

/**
 * The request URL with credentials removed; fetch refuses URLs that carry them.
 */
export function stripCredentials(url: URL): string {
  const copy = new URL(url.toString());
  copy.username = '';
  copy.password = '';
  return copy.toString();
}
