// src/__tests__/help/label.test.ts

import { describe, it, expect } from 'vitest';
import { formatLabel, labelLength, maxLabelLength } from '../../help/label.js';
import { OptionTable } from '../../core/option-table.js';
import { ArgRequirement } from '../../config/schema.js';
import { LONG_ONLY, mainOptions } from '../fixtures/option-tables.js';

describe('formatLabel', () => {
  const table = new OptionTable(mainOptions);
  const label = (key: string | number) => {
    const descriptor = table.findById(key);
    if (!descriptor) throw new Error(`fixture has no option ${key}`);
    return formatLabel(descriptor);
  };

  it('should combine short and long forms', () => {
    expect(label('h')).toBe('-h, --help');
  });

  it('should show a short-only option alone', () => {
    expect(label('s')).toBe('-s');
  });

  it('should indent a long-only option past the short column', () => {
    expect(label(LONG_ONLY)).toBe('    --long-only');
  });

  it('should annotate a required argument with its placeholder', () => {
    expect(label('o')).toBe('-o, --output <file>');
  });

  it('should annotate an optional long argument with "[=placeholder]"', () => {
    expect(label('p')).toBe('-p, --param[=arg]');
  });

  it('should annotate an optional short-only argument with "[placeholder]"', () => {
    const shortOnly = OptionTable.of({
      id: 'x',
      description: 'Level',
      argRequirement: ArgRequirement.Optional,
      placeholder: 'n',
    });
    expect(formatLabel(shortOnly.descriptors[0])).toBe('-x[n]');
  });

  it('should measure the widest label', () => {
    expect(labelLength(table.descriptors[2])).toBe(19);
    expect(maxLabelLength(table)).toBe('    --long-description <arg>'.length);
    expect(maxLabelLength([])).toBe(0);
  });
});
