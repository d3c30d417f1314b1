// src/__tests__/core/option-parser.test.ts

import { describe, it, expect } from 'vitest';
import { OptionParser } from '../../core/option-parser.js';
import { StopCondition } from '../../config/schema.js';
import { ValidationError } from '../../utils/errors.js';
import { argv } from '../setup.js';
import { mainOptions, subcommandOptions } from '../fixtures/option-tables.js';

describe('OptionParser', () => {
  const parser = new OptionParser(mainOptions);

  it('should fail construction on an invalid table', () => {
    expect(
      () => new OptionParser([{ id: 'a', description: 'A' }, { id: 'a', description: 'B' }])
    ).toThrow(ValidationError);
  });

  it('should parse every argument', () => {
    const options = parser.parse(argv('-v', 'file', '--output=o.txt'));
    expect(options.hasOption('v')).toBe(true);
    expect(options.find('o')?.getArgument()).toBe('o.txt');
    expect(options.nonOptionArguments).toEqual(['file']);
  });

  it('should dispatch a subcommand through the remainder', () => {
    const sub = new OptionParser(subcommandOptions);

    const global = parser.parseUntil(argv('-v', 'build', '-a', '-b', 'x', 'target'), StopCondition.BeforeFirstNonOptionArgument);
    const command = global.remainder.tokens;
    const subOptions = sub.parse(command);

    expect(command[0]).toBe('build');
    expect(subOptions.hasOption('a')).toBe(true);
    expect(subOptions.find('b')?.getArgument()).toBe('x');
    expect(subOptions.nonOptionArguments).toEqual(['target']);
  });

  it('should chain scans with withProgramName', () => {
    const first = parser.parseUntil(argv('-v', 'cmd', '--output', 'x'), StopCondition.AfterFirstNonOptionArgument);
    const rest = parser.parse(first.remainder.withProgramName('cmd'));
    expect(rest.find('o')?.getArgument()).toBe('x');
  });

  describe('parseThroughNonOptions', () => {
    it('should stop after the requested number of positionals', () => {
      const { options, remainder } = parser.parseThroughNonOptions(
        argv('-v', 'file1', '--output', 'out.txt', 'file2', '-h'),
        2
      );

      expect(options.hasOption('v')).toBe(true);
      expect(options.hasOption('h')).toBe(false);
      expect(options.find('o')?.getArgument()).toBe('out.txt');
      expect(options.nonOptionArguments).toEqual(['file1', 'file2']);
      expect(remainder.offset).toBe(6);
      expect(remainder.tokens).toEqual(['-h']);
    });

    it('should end with an empty remainder when positionals run out', () => {
      const { options, remainder } = parser.parseThroughNonOptions(argv('a', '-v'), 3);
      expect(options.nonOptionArguments).toEqual(['a']);
      expect(options.hasOption('v')).toBe(true);
      expect(remainder.isEmpty).toBe(true);
    });

    it('should keep tokens after "--" positional across rounds', () => {
      const { options, remainder, pastSeparator } = parser.parseThroughNonOptions(
        argv('--', 'a', '-h'),
        2
      );

      expect(options.nonOptionArguments).toEqual(['a', '-h']);
      expect(options.hasOption('h')).toBe(false);
      expect(remainder.isEmpty).toBe(true);
      expect(pastSeparator).toBe(true);
    });

    it('should not reject unknown dash tokens after "--"', () => {
      const { options } = parser.parseThroughNonOptions(argv('--', 'a', '-zz'), 2);
      expect(options.nonOptionArguments).toEqual(['a', '-zz']);
    });

    it('should honour a "--" met after the first positional', () => {
      const { options, remainder, pastSeparator } = parser.parseThroughNonOptions(
        argv('a', '--', '-h', '-v'),
        2
      );

      expect(options.nonOptionArguments).toEqual(['a', '-h']);
      expect(options.hasOption('h')).toBe(false);
      expect(options.hasOption('v')).toBe(false);
      expect(remainder.tokens).toEqual(['-v']);
      expect(pastSeparator).toBe(true);
    });

    it('should scan nothing for a count of zero', () => {
      const { options, remainder } = parser.parseThroughNonOptions(argv('-v'), 0);
      expect(options.isEmpty).toBe(true);
      expect(remainder.tokens).toEqual(['-v']);
    });
  });

  describe('helpText', () => {
    it('should render once and reuse the text', () => {
      const text = parser.helpText();
      expect(parser.helpText()).toBe(text);
      expect(text.startsWith('  -h, --help ')).toBe(true);
    });

    it('should apply help configuration', () => {
      const narrow = new OptionParser([{ id: 'h', longName: 'help', description: 'Help' }], {
        help: { indent: 4, gutter: 2 },
      });
      expect(narrow.helpText()).toBe('    -h, --help  Help\n');
    });
  });
});
