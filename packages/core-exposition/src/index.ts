export type { MetricFamily, MetricType, MetricsSource, Sample, Serializer } from './types.js';
export {
  escapeHelp,
  escapeLabelValue,
  formatValue,
  marshalText,
  metricFamilySchema,
  TEXT_CONTENT_TYPE,
  textFormat
} from './textFormat.js';
