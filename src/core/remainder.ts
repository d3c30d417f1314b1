// src/core/remainder.ts

/**
 * Unconsumed tail of an argument vector. The source array is referenced,
 * never copied, until `tokens` is read.
 */
export class Remainder {
  constructor(
    readonly source: readonly string[],
    readonly offset: number
  ) {
    if (offset < 0 || offset > source.length) {
      throw new RangeError(`Remainder offset ${offset} outside argv of length ${source.length}`);
    }
    Object.freeze(this);
  }

  static empty(source: readonly string[]): Remainder {
    return new Remainder(source, source.length);
  }

  get count(): number {
    return this.source.length - this.offset;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  /**
   * The untouched tokens. Scanning these directly treats the first one as
   * the program name, as when handing off to a subcommand's parser.
   */
  get tokens(): string[] {
    return this.source.slice(this.offset);
  }

  /** Argv for a follow-up scan that must also look at the first remaining token. */
  withProgramName(programName: string): string[] {
    return [programName, ...this.tokens];
  }
}
