// src/core/option-parser.ts

import {
  HelpFormatConfig,
  OptionDescriptorInput,
  StopCondition,
} from '../config/schema.js';
import { HelpFormatter } from '../help/help-formatter.js';
import { ArgvScanner, ScanResult } from './argv-scanner.js';
import { OptionSequence } from './option-sequence.js';
import { OptionTable } from './option-table.js';
import { Remainder } from './remainder.js';

export interface OptionParserOptions {
  help?: Partial<HelpFormatConfig>;
}

/**
 * Entry point bundling an option table with its scanner and help text.
 *
 * @example
 * const parser = new OptionParser([
 *   { id: 'h', longName: 'help', description: 'Show this help' },
 *   { id: 'o', longName: 'output', description: 'Output file', argRequirement: ArgRequirement.Required, placeholder: 'file' },
 * ]);
 * const options = parser.parse(process.argv.slice(1));
 * if (options.hasOption('h')) process.stdout.write(parser.helpText());
 */
export class OptionParser {
  readonly table: OptionTable;
  private readonly scanner: ArgvScanner;
  private readonly formatter: HelpFormatter;
  private renderedHelp: string | null = null;

  constructor(descriptors: readonly OptionDescriptorInput[], options: OptionParserOptions = {}) {
    this.table = new OptionTable(descriptors);
    this.scanner = new ArgvScanner(this.table);
    this.formatter = new HelpFormatter(options.help);
  }

  /**
   * Scans every argument; options and positionals may interleave.
   * @throws UnknownOptionError, MissingRequiredArgumentError
   */
  parse(argv: readonly string[]): OptionSequence {
    return this.scanner.scan(argv, StopCondition.AllOptions).options;
  }

  parseUntil(argv: readonly string[], stopCondition: StopCondition): ScanResult {
    return this.scanner.scan(argv, stopCondition);
  }

  /**
   * Scans until `count` non-option arguments were collected, e.g. a command
   * taking exactly two operands before its own trailing arguments.
   * A `--` seen in one round keeps later tokens positional.
   */
  parseThroughNonOptions(argv: readonly string[], count: number): ScanResult {
    let options = new OptionSequence();
    let remainder = new Remainder(argv, Math.min(1, argv.length));
    let pastSeparator = false;

    for (let collected = 0; collected < count && !remainder.isEmpty; collected++) {
      const result = this.scanner.scan(
        argv,
        StopCondition.AfterFirstNonOptionArgument,
        remainder.offset,
        pastSeparator
      );
      options = options.merge(result.options);
      remainder = result.remainder;
      pastSeparator = result.pastSeparator;
    }

    return { options, remainder, pastSeparator };
  }

  helpText(): string {
    if (this.renderedHelp === null) {
      this.renderedHelp = this.formatter.format(this.table);
    }
    return this.renderedHelp;
  }
}
