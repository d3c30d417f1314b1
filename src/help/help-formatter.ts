// src/help/help-formatter.ts

import chalk from 'chalk';
import type { HelpFormatConfig, OptionDescriptor } from '../config/schema.js';
import { buildHelpConfig } from '../config/help-config.js';
import type { OptionTable } from '../core/option-table.js';
import { formatLabel, maxLabelLength } from './label.js';
import { splitWords, wrapWords } from './word-wrap.js';

const c = {
  flag: chalk.yellow,
};

/**
 * Renders the option list of a table: one entry per option, in table order,
 * with every description starting at the same column.
 *
 *   -o, --output <file>  Write the result to file
 *       --level[=n]      Set the level; continuation lines of long
 *                        descriptions are indented to this column
 */
export class HelpFormatter {
  readonly config: HelpFormatConfig;

  constructor(config: Partial<HelpFormatConfig> = {}) {
    this.config = buildHelpConfig(config);
  }

  /** Column (0-based) where every description starts */
  descriptionColumn(table: OptionTable): number {
    return this.config.indent + maxLabelLength(table) + this.config.gutter;
  }

  format(table: OptionTable): string {
    const column = this.descriptionColumn(table);
    return table.descriptors.map((descriptor) => this.formatEntry(descriptor, column)).join('');
  }

  /**
   * One entry, terminated by a newline. Lengths are measured on the plain
   * label; colour codes are added afterwards.
   */
  formatEntry(descriptor: OptionDescriptor, column: number): string {
    const { indent, gutter, lineWidth, color } = this.config;
    const label = formatLabel(descriptor);
    const lead = ' '.repeat(indent) + (color ? c.flag(label) : label);
    const lines = wrapWords(splitWords(descriptor.description), column, lineWidth);
    if (lines.length === 0) {
      return `${lead}\n`;
    }

    const padding = ' '.repeat(Math.max(column - indent - label.length - gutter, 0) + gutter);
    const continuation = ' '.repeat(column);
    const [first, ...rest] = lines;

    return [
      lead + padding + first,
      ...rest.map((line) => continuation + line),
    ].join('\n') + '\n';
  }
}
