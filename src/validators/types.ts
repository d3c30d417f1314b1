// src/validators/types.ts

import type { OptionDescriptor, OptionDescriptorInput } from '../config/schema.js';

/**
 * Validation issue with field, message, and severity.
 * `field` is the descriptor position plus property, e.g. `options[2].longName`.
 */
export interface ValidationIssue {
  field: string;
  message: string;
  severity: 'error' | 'warning';
}

/**
 * Shared context passed to all validators while an option table is built.
 */
export interface ValidationContext {
  inputs: readonly OptionDescriptorInput[];
  /** Resolved descriptors by input position; undefined where the input failed shape checks */
  descriptors: (OptionDescriptor | undefined)[];
  issues: ValidationIssue[];
}

/**
 * Interface for all validators.
 * Validators are composed by the ValidationOrchestrator and executed in priority order.
 */
export interface Validator {
  /** Unique identifier for this validator */
  readonly name: string;

  /** Priority level: 0=shape, 1=cross-descriptor */
  readonly priority: 0 | 1;

  /**
   * Check if this validator should run given current context.
   */
  shouldRun(context: ValidationContext): boolean;

  /**
   * Perform validation, pushing onto context.issues.
   */
  validate(context: ValidationContext): void;
}

export function fieldOf(index: number, property?: string): string {
  return property ? `options[${index}].${property}` : `options[${index}]`;
}
