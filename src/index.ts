// src/index.ts - Public library surface

export {
  ArgRequirement,
  StopCondition,
  SHORT_ID_MIN,
  SHORT_ID_MAX,
  LONG_ONLY_ID_MIN,
  DEFAULT_PLACEHOLDER,
  isShortId,
  toOptionId,
  optionDescriptorSchema,
} from './config/schema.js';
export type {
  OptionDescriptor,
  OptionDescriptorInput,
  OptionKey,
  HelpFormatConfig,
} from './config/schema.js';
export { DEFAULT_HELP_CONFIG, buildHelpConfig } from './config/help-config.js';

export { OptionTable, displayName } from './core/option-table.js';
export { ParsedOption } from './core/parsed-option.js';
export { OptionSequence } from './core/option-sequence.js';
export { Remainder } from './core/remainder.js';
export { ScanCursor } from './core/scan-cursor.js';
export { ArgvScanner, SEPARATOR } from './core/argv-scanner.js';
export type { ScanResult } from './core/argv-scanner.js';
export { OptionParser } from './core/option-parser.js';
export type { OptionParserOptions } from './core/option-parser.js';

export { HelpFormatter } from './help/help-formatter.js';
export { formatLabel, formatArgAnnotation, labelLength, maxLabelLength } from './help/label.js';
export { splitWords, wrapWords } from './help/word-wrap.js';

export { ValidationOrchestrator, hasErrors } from './validators/validation-orchestrator.js';
export type { ValidationOutcome } from './validators/validation-orchestrator.js';
export type { ValidationIssue, ValidationContext, Validator } from './validators/types.js';

export {
  ValidationError,
  ConfigurationError,
  ScanError,
  UnknownOptionError,
  UnexpectedArgumentError,
  MissingRequiredArgumentError,
  MissingOptionArgumentError,
} from './utils/errors.js';
export type { ScanErrorKind } from './utils/errors.js';
export { ScanErrorFactory } from './utils/error-factory.js';
export type { ScanErrorDetails } from './utils/error-factory.js';
export { Logger, LogLevel } from './utils/logger.js';
