// src/help/label.ts

import { ArgRequirement, OptionDescriptor, isShortId } from '../config/schema.js';

// Width of "-x, " kept blank for long-only options so long names line up
const SHORT_COLUMN = '    ';

/**
 * Help label for one option, e.g. `-o, --output <file>` or `    --level[=n]`.
 */
export function formatLabel(descriptor: OptionDescriptor): string {
  const hasLong = descriptor.longName !== '';
  let label = '';

  if (isShortId(descriptor.id)) {
    label += `-${String.fromCharCode(descriptor.id)}`;
    if (hasLong) label += ', ';
  } else {
    label += SHORT_COLUMN;
  }

  if (hasLong) {
    label += `--${descriptor.longName}`;
  }

  return label + formatArgAnnotation(descriptor);
}

export function formatArgAnnotation(descriptor: OptionDescriptor): string {
  switch (descriptor.argRequirement) {
    case ArgRequirement.Required:
      return ` <${descriptor.placeholder}>`;
    case ArgRequirement.Optional:
      return descriptor.longName === ''
        ? `[${descriptor.placeholder}]`
        : `[=${descriptor.placeholder}]`;
    case ArgRequirement.None:
      return '';
  }
}

export function labelLength(descriptor: OptionDescriptor): number {
  return formatLabel(descriptor).length;
}

export function maxLabelLength(descriptors: Iterable<OptionDescriptor>): number {
  let max = 0;
  for (const descriptor of descriptors) {
    max = Math.max(max, labelLength(descriptor));
  }
  return max;
}
