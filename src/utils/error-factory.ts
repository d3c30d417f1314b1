// src/utils/error-factory.ts

import type { OptionTable } from '../core/option-table.js';
import { formatArgAnnotation } from '../help/label.js';
import {
  MissingRequiredArgumentError,
  ScanErrorKind,
  UnexpectedArgumentError,
  UnknownOptionError,
} from './errors.js';

export interface ScanErrorDetails {
  kind: ScanErrorKind | 'other';
  message: string;
  token?: string;
  suggestion?: string;
}

// Typos further than this from every long name get no "did you mean"
const MAX_SUGGESTION_DISTANCE = 2;

export class ScanErrorFactory {
  /**
   * Turns whatever a scan threw into a report for the command line user.
   * Passing the table enables suggestions that name real options.
   */
  static describe(error: unknown, table?: OptionTable): ScanErrorDetails {
    if (error instanceof UnknownOptionError || error instanceof MissingRequiredArgumentError) {
      const details: ScanErrorDetails = {
        kind: error.kind,
        message: error.message,
        token: error.token,
      };
      const suggestion = this.getSuggestion(error, table);
      if (suggestion) {
        details.suggestion = suggestion;
      }
      return details;
    }

    return {
      kind: 'other',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  private static getSuggestion(
    error: UnknownOptionError | MissingRequiredArgumentError,
    table?: OptionTable
  ): string | undefined {
    if (error instanceof UnexpectedArgumentError) {
      return `${error.optionName} takes no argument; pass it without "=..."`;
    }

    if (error instanceof MissingRequiredArgumentError) {
      const annotation = this.placeholderFor(error.optionName, table);
      return error.optionName.startsWith('--')
        ? `Pass a value: ${error.optionName}=${annotation} or ${error.optionName} ${annotation}`
        : `Pass a value: ${error.optionName}${annotation} or ${error.optionName} ${annotation}`;
    }

    if (error.character !== undefined) {
      return `Unknown option character '${error.character}' in ${error.token}; use -- before arguments that start with "-"`;
    }

    if (error.token.startsWith('--') && table) {
      const name = error.token.slice(2).split('=')[0] ?? '';
      const closest = this.closestLongName(name, table);
      if (closest) {
        return `Did you mean --${closest}?`;
      }
    }

    return undefined;
  }

  private static placeholderFor(optionName: string, table?: OptionTable): string {
    const descriptor = optionName.startsWith('--')
      ? table?.findByLongName(optionName.slice(2))
      : table?.findByShortChar(optionName.slice(1));
    // ' <file>' -> '<file>'
    return descriptor ? formatArgAnnotation(descriptor).trim() : '<arg>';
  }

  private static closestLongName(name: string, table: OptionTable): string | undefined {
    let best: string | undefined;
    let bestDistance = MAX_SUGGESTION_DISTANCE + 1;

    for (const descriptor of table) {
      if (descriptor.longName === '') continue;
      const distance = editDistance(name, descriptor.longName);
      if (distance < bestDistance) {
        best = descriptor.longName;
        bestDistance = distance;
      }
    }

    return best;
  }
}

export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      current[j] = Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, substitution);
    }
    previous = current;
  }

  return previous[b.length] ?? 0;
}
