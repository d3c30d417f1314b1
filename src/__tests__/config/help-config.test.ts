// src/__tests__/config/help-config.test.ts

import { describe, it, expect } from 'vitest';
import { DEFAULT_HELP_CONFIG, buildHelpConfig } from '../../config/help-config.js';
import { ConfigurationError } from '../../utils/errors.js';

describe('buildHelpConfig', () => {
  it('should return the defaults with no overrides', () => {
    expect(buildHelpConfig()).toEqual({ lineWidth: 80, indent: 2, gutter: 1, color: false });
    expect(DEFAULT_HELP_CONFIG.lineWidth).toBe(80);
  });

  it('should merge partial overrides', () => {
    expect(buildHelpConfig({ lineWidth: 100, color: true })).toEqual({
      lineWidth: 100,
      indent: 2,
      gutter: 1,
      color: true,
    });
  });

  it('should allow a zero indent', () => {
    expect(buildHelpConfig({ indent: 0 }).indent).toBe(0);
  });

  it('should name every invalid field', () => {
    expect(() => buildHelpConfig({ lineWidth: 12.5, indent: -1 })).toThrow(ConfigurationError);
    expect(() => buildHelpConfig({ lineWidth: 12.5, indent: -1 })).toThrow(
      /^Invalid help format configuration: lineWidth: .+; indent: .+$/
    );
  });
});
