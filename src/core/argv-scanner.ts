// src/core/argv-scanner.ts

import { ArgRequirement, StopCondition } from '../config/schema.js';
import {
  MissingRequiredArgumentError,
  ScanError,
  UnexpectedArgumentError,
  UnknownOptionError,
} from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { OptionTable } from './option-table.js';
import { OptionSequence } from './option-sequence.js';
import { ParsedOption } from './parsed-option.js';
import { Remainder } from './remainder.js';
import { ScanCursor } from './scan-cursor.js';

export const SEPARATOR = '--';

export interface ScanResult {
  options: OptionSequence;
  remainder: Remainder;
  /** A `--` was consumed; resume with this set to keep the remainder positional */
  pastSeparator: boolean;
}

/**
 * Outcome of classifying the token(s) at the cursor.
 * `options` may hold entries even for an error: the part of a clustered
 * token walked before the bad character.
 */
type Step =
  | { kind: 'options'; options: ParsedOption[] }
  | { kind: 'non-option'; value: string }
  | { kind: 'separator' }
  | { kind: 'error'; error: ScanError; options: ParsedOption[] };

/**
 * Classifies an argument vector against an option table.
 * Stateless between calls: every scan threads its own cursor.
 */
export class ArgvScanner {
  constructor(private readonly table: OptionTable) {}

  /**
   * Under BeforeFirstError the options matched in a failing cluster before
   * the bad character are kept, but the remainder still starts at that whole
   * token: `-vz` yields `v` and remainder `['-vz']`. Rescanning the remainder
   * records `v` a second time.
   *
   * @param argv program name followed by the arguments
   * @param startIndex first argv index to classify; earlier entries are skipped
   * @param pastSeparator treat every token as positional, as after a `--`
   * @throws ScanError under every stop condition but BeforeFirstError
   */
  scan(
    argv: readonly string[],
    stopCondition: StopCondition = StopCondition.AllOptions,
    startIndex: number = 1,
    pastSeparator: boolean = false
  ): ScanResult {
    const cursor = new ScanCursor(argv, startIndex, pastSeparator);
    const options = new OptionSequence();

    while (!cursor.done) {
      const start = cursor.index;

      if (
        stopCondition === StopCondition.BeforeFirstNonOptionArgument &&
        !cursor.pastSeparator &&
        cursor.current() === SEPARATOR &&
        cursor.peekNext() !== undefined
      ) {
        // Leave the separator in place so a nested scan still honours it
        return this.stop(options, cursor, start, stopCondition);
      }

      const step = this.step(cursor);

      switch (step.kind) {
        case 'separator':
          break;

        case 'options':
          step.options.forEach((option) => options.addOption(option));
          break;

        case 'non-option':
          if (stopCondition === StopCondition.BeforeFirstNonOptionArgument) {
            return this.stop(options, cursor, start, stopCondition);
          }
          options.addNonOptionArgument(step.value);
          if (stopCondition === StopCondition.AfterFirstNonOptionArgument) {
            return this.stop(options, cursor, cursor.index, stopCondition);
          }
          break;

        case 'error':
          if (stopCondition !== StopCondition.BeforeFirstError) {
            throw step.error;
          }
          step.options.forEach((option) => options.addOption(option));
          Logger.debug(`Suppressed: ${step.error.message}`);
          return this.stop(options, cursor, start, stopCondition);
      }
    }

    return { options, remainder: Remainder.empty(argv), pastSeparator: cursor.pastSeparator };
  }

  private stop(
    options: OptionSequence,
    cursor: ScanCursor,
    offset: number,
    stopCondition: StopCondition
  ): ScanResult {
    const remainder = new Remainder(cursor.argv, offset);
    Logger.debug(`Scan stopped (${stopCondition}) with ${remainder.count} token(s) remaining`);
    return { options, remainder, pastSeparator: cursor.pastSeparator };
  }

  /**
   * Classifies the token at the cursor and moves the cursor past everything consumed.
   */
  private step(cursor: ScanCursor): Step {
    const token = cursor.current();

    if (cursor.pastSeparator) {
      cursor.advance();
      return { kind: 'non-option', value: token };
    }

    if (token === SEPARATOR) {
      cursor.consumeSeparator();
      return { kind: 'separator' };
    }

    if (token.startsWith(SEPARATOR)) {
      const step = this.scanLong(cursor, token);
      cursor.advance();
      return step;
    }

    if (token.startsWith('-') && token.length > 1) {
      const step = this.scanCluster(cursor, token);
      cursor.advance();
      return step;
    }

    cursor.advance();
    return { kind: 'non-option', value: token };
  }

  private scanLong(cursor: ScanCursor, token: string): Step {
    const body = token.slice(SEPARATOR.length);
    const eq = body.indexOf('=');
    const name = eq === -1 ? body : body.slice(0, eq);
    const inline = eq === -1 ? null : body.slice(eq + 1);

    const descriptor = this.table.findByLongName(name);
    if (!descriptor) {
      return this.fail(new UnknownOptionError(token));
    }

    switch (descriptor.argRequirement) {
      case ArgRequirement.None:
        if (inline !== null) {
          return this.fail(new UnexpectedArgumentError(token, `--${name}`));
        }
        return this.matched(new ParsedOption(descriptor));

      case ArgRequirement.Optional:
        // Long options bind an optional argument only through `=`
        return this.matched(new ParsedOption(descriptor, inline));

      case ArgRequirement.Required: {
        const argument = inline ?? cursor.takeNext();
        if (argument === undefined) {
          return this.fail(new MissingRequiredArgumentError(token, `--${name}`));
        }
        return this.matched(new ParsedOption(descriptor, argument));
      }
    }
  }

  /**
   * Walks `-abc` one character at a time. An option that binds an argument
   * ends the walk.
   */
  private scanCluster(cursor: ScanCursor, token: string): Step {
    const found: ParsedOption[] = [];

    for (let offset = 1; offset < token.length; offset++) {
      const char = token.charAt(offset);
      const descriptor = this.table.findByShortChar(char);
      if (!descriptor) {
        return this.fail(new UnknownOptionError(token, char), found);
      }

      const rest = token.slice(offset + 1);

      switch (descriptor.argRequirement) {
        case ArgRequirement.None:
          found.push(new ParsedOption(descriptor));
          continue;

        case ArgRequirement.Required: {
          const argument = rest !== '' ? rest : cursor.takeNext();
          if (argument === undefined) {
            return this.fail(new MissingRequiredArgumentError(token, `-${char}`), found);
          }
          found.push(new ParsedOption(descriptor, argument));
          return { kind: 'options', options: found };
        }

        case ArgRequirement.Optional: {
          const argument = rest !== '' ? rest : this.takeOptionalShortArgument(cursor);
          found.push(new ParsedOption(descriptor, argument));
          if (argument !== null) {
            return { kind: 'options', options: found };
          }
          continue;
        }
      }
    }

    return { kind: 'options', options: found };
  }

  /**
   * Short options with an optional argument may take the next token when it
   * does not look like an option. Long options never do this.
   */
  private takeOptionalShortArgument(cursor: ScanCursor): string | null {
    const next = cursor.peekNext();
    if (next === undefined || next.startsWith('-')) return null;
    cursor.takeNext();
    return next;
  }

  private matched(option: ParsedOption): Step {
    return { kind: 'options', options: [option] };
  }

  private fail(error: ScanError, options: ParsedOption[] = []): Step {
    return { kind: 'error', error, options };
  }
}

