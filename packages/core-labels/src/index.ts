import { z, type ZodIssue } from 'zod';

import { safeParseOrThrow, ValidationError } from '@pushgate/core-validation';

export type LabelSet = Readonly<Record<string, string>>;

/** Labels the client library claims for itself. */
export const BASE_RESERVED_LABELS: readonly string[] = ['pid'];

export const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export const labelNameSchema = z
  .string()
  .regex(LABEL_NAME_PATTERN, { message: `label name must match ${LABEL_NAME_PATTERN}` });

export class LabelSetError extends ValidationError {
  constructor(message: string, issues: ZodIssue[] = []) {
    super(message, issues, 'label set');
    this.name = 'LabelSetError';
  }
}

export class InvalidLabelNameError extends LabelSetError {
  constructor(message: string, issues: ZodIssue[] = []) {
    super(message, issues);
    this.name = 'InvalidLabelNameError';
  }
}

export class ReservedLabelError extends LabelSetError {
  constructor(message: string) {
    super(message);
    this.name = 'ReservedLabelError';
  }
}

export interface LabelSetValidatorOptions {
  reservedLabels?: Iterable<string>;
}

/**
 * Checks label names for syntax and reserved names.
 */
export class LabelSetValidator {
  readonly reservedLabels: ReadonlySet<string>;

  constructor(options: LabelSetValidatorOptions = {}) {
    this.reservedLabels = new Set([...BASE_RESERVED_LABELS, ...(options.reservedLabels ?? [])]);
  }

  /**
   * Validate every key of `labels`. Values are not inspected.
   */
  validateSymbols(labels: LabelSet): true {
    for (const key of Object.keys(labels)) {
      this.validateName(key);
      this.validateReservedKey(key);
    }
    return true;
  }

  private validateName(key: string): void {
    if (key.startsWith('__')) {
      throw new ReservedLabelError(`label ${key} must not start with __`);
    }

    safeParseOrThrow(labelNameSchema, key, `label ${key}`, (message, issues) => new InvalidLabelNameError(message, issues));
  }

  private validateReservedKey(key: string): void {
    if (this.reservedLabels.has(key)) {
      throw new ReservedLabelError(`${key} is reserved`);
    }
  }
}
