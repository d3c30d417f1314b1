// src/core/parsed-option.ts

import type { OptionDescriptor } from '../config/schema.js';
import { MissingOptionArgumentError } from '../utils/errors.js';
import { displayName } from './option-table.js';

/**
 * One option occurrence found by a scan.
 */
export class ParsedOption {
  constructor(
    readonly descriptor: OptionDescriptor,
    private readonly argument: string | null = null
  ) {
    Object.freeze(this);
  }

  /** The shortopt character code, or the long-only identifier */
  get id(): number {
    return this.descriptor.id;
  }

  get name(): string {
    return displayName(this.descriptor);
  }

  hasArgument(): boolean {
    return this.argument !== null;
  }

  /**
   * @throws MissingOptionArgumentError when nothing was bound; check
   * hasArgument() first for options with an optional argument
   */
  getArgument(): string {
    if (this.argument === null) {
      throw new MissingOptionArgumentError(this.name);
    }
    return this.argument;
  }

  argumentOrNull(): string | null {
    return this.argument;
  }
}
