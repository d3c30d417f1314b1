// src/core/option-table.ts

import {
  OptionDescriptor,
  OptionDescriptorInput,
  OptionKey,
  isShortId,
  toOptionId,
} from '../config/schema.js';
import { ValidationOrchestrator, hasErrors } from '../validators/validation-orchestrator.js';
import { ValidationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

/**
 * Validated, immutable set of option descriptors.
 * Construction fails with a ValidationError listing every violation.
 */
export class OptionTable implements Iterable<OptionDescriptor> {
  readonly descriptors: readonly OptionDescriptor[];
  private readonly byId: ReadonlyMap<number, OptionDescriptor>;
  private readonly byLongName: ReadonlyMap<string, OptionDescriptor>;

  constructor(inputs: readonly OptionDescriptorInput[]) {
    const { descriptors, issues } = new ValidationOrchestrator().validate(inputs);

    if (hasErrors(issues)) {
      throw new ValidationError(issues.filter((issue) => issue.severity === 'error'));
    }
    for (const warning of issues) {
      Logger.warn(`${warning.field}: ${warning.message}`);
    }

    this.descriptors = Object.freeze(descriptors);
    this.byId = new Map(descriptors.map((descriptor) => [descriptor.id, descriptor]));
    this.byLongName = new Map(
      descriptors
        .filter((descriptor) => descriptor.longName !== '')
        .map((descriptor) => [descriptor.longName, descriptor])
    );
    Object.freeze(this);
  }

  static of(...inputs: OptionDescriptorInput[]): OptionTable {
    return new OptionTable(inputs);
  }

  get size(): number {
    return this.descriptors.length;
  }

  findById(key: OptionKey): OptionDescriptor | undefined {
    return this.byId.get(toOptionId(key));
  }

  /**
   * Lookup for one character of a short-option token.
   * Long-only ids never match, whatever their numeric value.
   */
  findByShortChar(char: string): OptionDescriptor | undefined {
    const code = char.charCodeAt(0);
    if (char.length !== 1 || !isShortId(code)) return undefined;
    return this.byId.get(code);
  }

  findByLongName(name: string): OptionDescriptor | undefined {
    if (name === '') return undefined;
    return this.byLongName.get(name);
  }

  [Symbol.iterator](): Iterator<OptionDescriptor> {
    return this.descriptors[Symbol.iterator]();
  }
}

/**
 * Name used in messages: `--long` when the option has one, `-x` otherwise.
 */
export function displayName(descriptor: OptionDescriptor): string {
  if (descriptor.longName !== '') return `--${descriptor.longName}`;
  return `-${String.fromCharCode(descriptor.id)}`;
}
