// src/utils/errors.ts

import type { ValidationIssue } from '../validators/types.js';

export class ValidationError extends Error {
  constructor(public readonly issues: readonly ValidationIssue[]) {
    super(
      `Invalid option table:\n${issues
        .map((issue) => `  - ${issue.field}: ${issue.message}`)
        .join('\n')}`
    );
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type ScanErrorKind = 'unknown-option' | 'missing-required-argument';

/**
 * Raised by a scan that hit a token it cannot classify.
 * `token` is the argv entry at fault, as given.
 */
export abstract class ScanError extends Error {
  abstract readonly kind: ScanErrorKind;

  constructor(
    public readonly token: string,
    message: string
  ) {
    super(message);
    this.name = 'ScanError';
  }
}

export class UnknownOptionError extends ScanError {
  readonly kind = 'unknown-option' as const;

  constructor(
    token: string,
    public readonly character?: string,
    message: string = `Unknown option: ${token}`
  ) {
    super(token, message);
    this.name = 'UnknownOptionError';
  }
}

export class UnexpectedArgumentError extends UnknownOptionError {
  constructor(
    token: string,
    public readonly optionName: string
  ) {
    super(token, undefined, `Option does not take an argument: ${token}`);
    this.name = 'UnexpectedArgumentError';
  }
}

export class MissingRequiredArgumentError extends ScanError {
  readonly kind = 'missing-required-argument' as const;

  constructor(
    token: string,
    public readonly optionName: string
  ) {
    super(token, `Missing required argument for option: ${optionName}`);
    this.name = 'MissingRequiredArgumentError';
  }
}

export class MissingOptionArgumentError extends Error {
  constructor(public readonly optionName: string) {
    super(`No argument present for option: ${optionName}`);
    this.name = 'MissingOptionArgumentError';
  }
}
