// src/config/schema.ts

import { z } from 'zod';

/**
 * Whether an option binds an argument.
 * - none: the option is a flag
 * - required: an argument must be bound (`--out=x`, `--out x`, `-ox`, `-o x`)
 * - optional: an argument may be bound (`--param=x`, `-px`, `-p x`)
 */
export enum ArgRequirement {
  None = 'none',
  Required = 'required',
  Optional = 'optional',
}

/**
 * When a scan hands the rest of the argument vector back to the caller.
 */
export enum StopCondition {
  AllOptions = 'all-options',
  BeforeFirstNonOptionArgument = 'before-first-non-option-argument',
  AfterFirstNonOptionArgument = 'after-first-non-option-argument',
  BeforeFirstError = 'before-first-error',
}

export const SHORT_ID_MIN = 33;
export const SHORT_ID_MAX = 126;
export const LONG_ONLY_ID_MIN = 1000;
export const DEFAULT_PLACEHOLDER = 'arg';

export function isShortId(id: number): boolean {
  return Number.isInteger(id) && id >= SHORT_ID_MIN && id <= SHORT_ID_MAX;
}

/** An option id, or the single character it stands for. */
export type OptionKey = number | string;

export function toOptionId(key: OptionKey): number {
  if (typeof key === 'number') return key;
  if (key.length !== 1) {
    throw new RangeError(`Option key must be a single character, got "${key}"`);
  }
  return key.charCodeAt(0);
}

export const optionDescriptorSchema = z
  .object({
    id: z.union([
      z.number().int(),
      z
        .string()
        .length(1, 'Character ids must be exactly one character')
        .transform((char) => char.charCodeAt(0)),
    ]),
    longName: z
      .string()
      .refine((name) => !name.startsWith('-'), 'Long name must not start with "-"')
      .refine((name) => !name.includes('='), 'Long name must not contain "="')
      .refine((name) => !/\s/.test(name), 'Long name must not contain whitespace')
      .default(''),
    description: z.string().default(''),
    argRequirement: z.nativeEnum(ArgRequirement).default(ArgRequirement.None),
    placeholder: z.string().min(1, 'Placeholder must not be empty').default(DEFAULT_PLACEHOLDER),
  })
  .superRefine((descriptor, ctx) => {
    const { id } = descriptor;
    // Ids that are not integers were already reported by the id schema
    if (isShortId(id) || !Number.isInteger(id)) return;

    if (id < LONG_ONLY_ID_MIN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['id'],
        message: `Id ${id} is neither a printable character (${SHORT_ID_MIN}-${SHORT_ID_MAX}) nor a long-only id (>= ${LONG_ONLY_ID_MIN})`,
      });
    } else if (descriptor.longName === '') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['longName'],
        message: `Long-only id ${id} needs a long name`,
      });
    }
  });

/** Descriptor as written by callers; every field but `id` has a default. */
export type OptionDescriptorInput = z.input<typeof optionDescriptorSchema>;

export interface OptionDescriptor {
  readonly id: number;
  readonly longName: string;
  readonly description: string;
  readonly argRequirement: ArgRequirement;
  readonly placeholder: string;
}

export interface HelpFormatConfig {
  lineWidth: number;   // Default: 80
  indent: number;      // Spaces before each label. Default: 2
  gutter: number;      // Spaces between the padded label and the description. Default: 1
  color: boolean;      // Paint labels with chalk. Default: false
}

export const helpFormatConfigSchema = z.object({
  lineWidth: z.number().int().positive(),
  indent: z.number().int().nonnegative(),
  gutter: z.number().int().positive(),
  color: z.boolean(),
});
