// src/config/help-config.ts

import { HelpFormatConfig, helpFormatConfigSchema } from './schema.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_HELP_CONFIG: Readonly<HelpFormatConfig> = Object.freeze({
  lineWidth: 80,
  indent: 2,
  gutter: 1,
  color: false,
});

/**
 * Merges overrides onto the defaults and validates the result.
 */
export function buildHelpConfig(overrides: Partial<HelpFormatConfig> = {}): HelpFormatConfig {
  const merged = {
    lineWidth: overrides.lineWidth ?? DEFAULT_HELP_CONFIG.lineWidth,
    indent: overrides.indent ?? DEFAULT_HELP_CONFIG.indent,
    gutter: overrides.gutter ?? DEFAULT_HELP_CONFIG.gutter,
    color: overrides.color ?? DEFAULT_HELP_CONFIG.color,
  };

  const result = helpFormatConfigSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid help format configuration: ${details}`);
  }

  return result.data;
}
