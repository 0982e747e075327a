export type MetricType = 'counter' | 'gauge' | 'histogram' | 'summary' | 'untyped';

export interface Sample {
  /** Full sample name, e.g. `request_seconds_bucket`. Defaults to the family name. */
  name?: string;
  labels: Readonly<Record<string, string>>;
  value: number;
  timestampMs?: number;
}

export interface MetricFamily {
  name: string;
  help?: string;
  type: MetricType;
  /** Label names used by the family's samples. */
  labelNames: readonly string[];
  samples: readonly Sample[];
}

/**
 * Anything that can hand out a snapshot of metric families, such as a registry.
 */
export interface MetricsSource {
  metrics: () => Iterable<MetricFamily>;
}

/**
 * Turns a metrics source into a wire payload.
 */
export interface Serializer {
  contentType: () => string;
  marshal: (source: MetricsSource) => string;
}
