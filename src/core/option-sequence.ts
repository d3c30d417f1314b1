// src/core/option-sequence.ts

import { OptionKey, toOptionId } from '../config/schema.js';
import { ParsedOption } from './parsed-option.js';

/**
 * Options and non-option arguments in the order a scan met them.
 */
export class OptionSequence implements Iterable<ParsedOption> {
  private readonly options: ParsedOption[] = [];
  private readonly nonOptions: string[] = [];

  static concat(...sequences: OptionSequence[]): OptionSequence {
    const combined = new OptionSequence();
    for (const sequence of sequences) {
      combined.options.push(...sequence.options);
      combined.nonOptions.push(...sequence.nonOptions);
    }
    return combined;
  }

  addOption(option: ParsedOption): void {
    this.options.push(option);
  }

  addNonOptionArgument(argument: string): void {
    this.nonOptions.push(argument);
  }

  /** A new sequence holding this one's entries followed by other's. */
  merge(other: OptionSequence): OptionSequence {
    return OptionSequence.concat(this, other);
  }

  get size(): number {
    return this.options.length;
  }

  get isEmpty(): boolean {
    return this.options.length === 0;
  }

  get nonOptionArguments(): readonly string[] {
    return this.nonOptions;
  }

  at(index: number): ParsedOption {
    const option = this.options[index];
    if (!Number.isInteger(index) || option === undefined) {
      throw new RangeError(`Option index ${index} out of range (size ${this.options.length})`);
    }
    return option;
  }

  hasOption(key: OptionKey): boolean {
    const id = toOptionId(key);
    return this.options.some((option) => option.id === id);
  }

  find(key: OptionKey): ParsedOption | undefined {
    const id = toOptionId(key);
    return this.options.find((option) => option.id === id);
  }

  findAll(key: OptionKey): ParsedOption[] {
    const id = toOptionId(key);
    return this.options.filter((option) => option.id === id);
  }

  [Symbol.iterator](): Iterator<ParsedOption> {
    return this.options[Symbol.iterator]();
  }
}
