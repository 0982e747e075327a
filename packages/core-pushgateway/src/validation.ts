import { LabelSetError, LabelSetValidator } from '@pushgate/core-labels';
import type { MetricsSource } from '@pushgate/core-exposition';

import { InvalidLabelSetError, LabelCollisionError } from './errors.js';
import type { GroupingKey } from './types.js';

export function validateGroupingKey(groupingKey: GroupingKey): void {
  const validator = new LabelSetValidator();
  try {
    validator.validateSymbols(groupingKey);
  } catch (error) {
    if (error instanceof LabelSetError) {
      throw new InvalidLabelSetError(`invalid grouping key: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * A grouping-key label would overwrite the metric label of the same name at the gateway.
 */
export function assertNoLabelClashes(groupingKey: GroupingKey, source: MetricsSource): void {
  const groupingKeyLabels = new Set(Object.keys(groupingKey));
  if (groupingKeyLabels.size === 0) return;

  for (const metric of source.metrics()) {
    for (const label of metric.labelNames) {
      if (groupingKeyLabels.has(label)) {
        throw new LabelCollisionError(label, metric.name);
      }
    }
  }
}
