// src/validators/validation-orchestrator.ts

import type { OptionDescriptor, OptionDescriptorInput } from '../config/schema.js';
import { ValidationIssue, ValidationContext, Validator } from './types.js';

import { DescriptorShapeValidator } from './descriptor-shape-validator.js';
import { DuplicateIdValidator } from './duplicate-id-validator.js';
import { DuplicateLongNameValidator } from './duplicate-long-name-validator.js';

export interface ValidationOutcome {
  descriptors: OptionDescriptor[];
  issues: ValidationIssue[];
}

/**
 * Orchestrates validation by composing multiple validators.
 * Validators are executed in priority order (0 first, then 1).
 * Every violation is collected; callers decide whether to fail.
 */
export class ValidationOrchestrator {
  private validators: Validator[] = [];

  constructor() {
    // P0: resolves descriptors
    this.register(new DescriptorShapeValidator());
    // P1: cross-descriptor uniqueness
    this.register(new DuplicateIdValidator());
    this.register(new DuplicateLongNameValidator());
  }

  /**
   * Register a validator. Validators are automatically sorted by priority.
   */
  register(validator: Validator): void {
    this.validators.push(validator);
    this.validators.sort((a, b) => a.priority - b.priority);
  }

  validate(inputs: readonly OptionDescriptorInput[]): ValidationOutcome {
    const context: ValidationContext = {
      inputs,
      descriptors: new Array<OptionDescriptor | undefined>(inputs.length).fill(undefined),
      issues: [],
    };

    for (const validator of this.validators) {
      if (validator.shouldRun(context)) {
        validator.validate(context);
      }
    }

    const descriptors = context.descriptors.filter(
      (descriptor): descriptor is OptionDescriptor => descriptor !== undefined
    );

    return { descriptors, issues: context.issues };
  }
}

export function hasErrors(issues: readonly ValidationIssue[]): boolean {
  return issues.some((issue) => issue.severity === 'error');
}
