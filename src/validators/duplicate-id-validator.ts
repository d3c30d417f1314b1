// src/validators/duplicate-id-validator.ts

import { isShortId } from '../config/schema.js';
import { Validator, ValidationContext, fieldOf } from './types.js';

export class DuplicateIdValidator implements Validator {
  readonly name = 'duplicate-id';
  readonly priority = 1 as const;

  shouldRun(context: ValidationContext): boolean {
    return context.descriptors.filter(Boolean).length > 1;
  }

  validate(context: ValidationContext): void {
    const firstSeen = new Map<number, number>();

    context.descriptors.forEach((descriptor, index) => {
      if (!descriptor) return;

      const previous = firstSeen.get(descriptor.id);
      if (previous === undefined) {
        firstSeen.set(descriptor.id, index);
        return;
      }

      const shown = isShortId(descriptor.id)
        ? `'${String.fromCharCode(descriptor.id)}' (${descriptor.id})`
        : String(descriptor.id);
      context.issues.push({
        field: fieldOf(index, 'id'),
        message: `Duplicate id ${shown}, already used by options[${previous}]`,
        severity: 'error',
      });
    });
  }
}
