// src/validators/duplicate-long-name-validator.ts

import { Validator, ValidationContext, fieldOf } from './types.js';

/**
 * Empty long names are exempt: any number of options may be short-only.
 */
export class DuplicateLongNameValidator implements Validator {
  readonly name = 'duplicate-long-name';
  readonly priority = 1 as const;

  shouldRun(context: ValidationContext): boolean {
    const named = context.descriptors.filter((descriptor) => descriptor && descriptor.longName !== '');
    return named.length > 1;
  }

  validate(context: ValidationContext): void {
    const firstSeen = new Map<string, number>();

    context.descriptors.forEach((descriptor, index) => {
      if (!descriptor || descriptor.longName === '') return;

      const previous = firstSeen.get(descriptor.longName);
      if (previous === undefined) {
        firstSeen.set(descriptor.longName, index);
        return;
      }

      context.issues.push({
        field: fieldOf(index, 'longName'),
        message: `Duplicate long name --${descriptor.longName}, already used by options[${previous}]`,
        severity: 'error',
      });
    });
  }
}
