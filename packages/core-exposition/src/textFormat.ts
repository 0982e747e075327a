import { z } from 'zod';

import { safeParseOrThrow } from '@pushgate/core-validation';

import type { MetricFamily, MetricsSource, Sample, Serializer } from './types.js';

export const TEXT_CONTENT_TYPE = 'text/plain; version=0.0.4';

const METRIC_NAME_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

const labelsSchema = z.record(
  z.string().regex(LABEL_NAME_PATTERN, { message: 'invalid label name' }),
  z.string()
);

export const metricFamilySchema = z.object({
  name: z.string().regex(METRIC_NAME_PATTERN, { message: 'invalid metric name' }),
  help: z.string().optional(),
  type: z.enum(['counter', 'gauge', 'histogram', 'summary', 'untyped']),
  labelNames: z.array(z.string().regex(LABEL_NAME_PATTERN, { message: 'invalid label name' })),
  samples: z.array(
    z.object({
      name: z.string().regex(METRIC_NAME_PATTERN, { message: 'invalid metric name' }).optional(),
      labels: labelsSchema,
      value: z.number(),
      timestampMs: z.number().int().optional()
    })
  )
});

export function escapeHelp(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/\n/g, '\\n').replace(/"/g, '\\"');
}

export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Number.POSITIVE_INFINITY) return '+Inf';
  if (value === Number.NEGATIVE_INFINITY) return '-Inf';
  return String(value);
}

function formatSample(familyName: string, sample: Sample): string {
  const labels = Object.entries(sample.labels)
    .map(([name, value]) => `${name}="${escapeLabelValue(value)}"`)
    .join(',');
  const labelBlock = labels ? `{${labels}}` : '';
  const timestamp = sample.timestampMs === undefined ? '' : ` ${sample.timestampMs}`;
  return `${sample.name ?? familyName}${labelBlock} ${formatValue(sample.value)}${timestamp}`;
}

function formatFamily(family: MetricFamily): string[] {
  const lines: string[] = [];
  if (family.help !== undefined) {
    lines.push(`# HELP ${family.name} ${escapeHelp(family.help)}`);
  }
  lines.push(`# TYPE ${family.name} ${family.type}`);
  for (const sample of family.samples) {
    lines.push(formatSample(family.name, sample));
  }
  return lines;
}

/**
 * Render a metrics source in the Prometheus text exposition format (0.0.4).
 *
 * @example
 * ```typescript
 * const body = marshalText({
 *   metrics: () => [{ name: 'jobs_total', type: 'counter', labelNames: [], samples: [{ labels: {}, value: 3 }] }]
 * });
 * // "# TYPE jobs_total counter\njobs_total 3\n"
 * ```
 */
export function marshalText(source: MetricsSource): string {
  const lines: string[] = [];
  for (const family of source.metrics()) {
    safeParseOrThrow(metricFamilySchema, family, `metric ${family.name}`);
    lines.push(...formatFamily(family));
  }
  return lines.length ? `${lines.join('\n')}\n` : '';
}

export const textFormat: Serializer = {
  contentType: () => TEXT_CONTENT_TYPE,
  marshal: marshalText
};
