// src/validators/descriptor-shape-validator.ts

import { optionDescriptorSchema } from '../config/schema.js';
import { Validator, ValidationContext, fieldOf } from './types.js';

/**
 * Resolves each descriptor input through the zod schema, filling defaults.
 * Inputs that fail are left unresolved so later validators skip them.
 */
export class DescriptorShapeValidator implements Validator {
  readonly name = 'descriptor-shape';
  readonly priority = 0 as const;

  shouldRun(): boolean {
    return true; // Always runs
  }

  validate(context: ValidationContext): void {
    const { inputs, descriptors, issues } = context;

    inputs.forEach((input, index) => {
      const result = optionDescriptorSchema.safeParse(input);
      if (!result.success) {
        descriptors[index] = undefined;
        for (const issue of result.error.issues) {
          issues.push({
            field: fieldOf(index, issue.path.join('.')),
            message: issue.message,
            severity: 'error',
          });
        }
        return;
      }

      const descriptor = Object.freeze(result.data);
      descriptors[index] = descriptor;

      if (descriptor.description.trim() === '') {
        issues.push({
          field: fieldOf(index, 'description'),
          message: 'Option has no description; its help entry will be a bare label',
          severity: 'warning',
        });
      }
    });
  }
}
