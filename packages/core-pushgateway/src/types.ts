import type { Logger } from '@pushgate/core-logging';
import type { MetricsSource, Serializer } from '@pushgate/core-exposition';

export type GroupingKey = Readonly<Record<string, string>>;

export type PushMethod = 'POST' | 'PUT' | 'DELETE';

export type PushTransport = (input: string, init: RequestInit) => Promise<Response>;

export interface PushClientConfig {
  job: string;
  gateway?: string;
  groupingKey?: GroupingKey;
  /** Time allowed until response headers arrive. */
  openTimeoutMs?: number;
  /** Time allowed for reading the response body. */
  readTimeoutMs?: number;
  serializer?: Serializer;
  transport?: PushTransport;
  logger?: Logger;
}

export interface PushResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

export interface PushClient {
  readonly job: string;
  /** Base gateway URL as configured. */
  readonly gateway: string;
  readonly path: string;
  readonly groupingKey: GroupingKey;
  /** Merge the source's metrics into what the gateway holds for this job and grouping key. */
  add: (source: MetricsSource) => Promise<PushResponse>;
  /** Replace everything the gateway holds for this job and grouping key. */
  replace: (source: MetricsSource) => Promise<PushResponse>;
  delete: () => Promise<PushResponse>;
}
