/**
 * Validator routines injected into extraction models.
 * Each routine is emitted as a Zod transform over a text value.
 */

import { ValidatorError, type SchemaLocation } from '@polyschema/shared';
import { pascalCase, quote } from './naming.js';

export const VALIDATOR_NAMES = ['non_empty', 'e164_phone', 'url_http', 'postcode_uk'] as const;
export type ValidatorName = (typeof VALIDATOR_NAMES)[number];

interface ValidatorTemplate {
  summary: (field: string) => string;
  /** Statements run against a present `value`, ending in a return */
  body: (field: string) => string[];
}

function fail(message: string): string[] {
  return [
    `  ctx.addIssue({ code: z.ZodIssueCode.custom, message: ${quote(message)} });`,
    '  return z.NEVER;',
  ];
}

const TEMPLATES: Record<ValidatorName, ValidatorTemplate> = {
  non_empty: {
    summary: (field) => `Ensure ${field} is not empty or whitespace`,
    body: (field) => [
      'const trimmed = value.trim();',
      'if (trimmed.length === 0) {',
      ...fail(`${field} cannot be empty`),
      '}',
      'return trimmed;',
    ],
  },
  e164_phone: {
    summary: (field) => `Ensure ${field} is an international number in E.164 format`,
    body: (field) => [
      `if (!value.startsWith('+')) {`,
      ...fail(`${field} must be in E.164 format (starting with +)`),
      '}',
      'if (/[\\s-]/.test(value)) {',
      ...fail(`${field} must not contain spaces or dashes in E.164 format`),
      '}',
      'return value;',
    ],
  },
  url_http: {
    summary: (field) => `Ensure ${field} is a URL with an explicit http(s) scheme`,
    body: (field) => [
      'if (!/^https?:\\/\\//.test(value)) {',
      ...fail(`${field} must be a valid URL starting with http:// or https://`),
      '}',
      'return value;',
    ],
  },
  postcode_uk: {
    summary: (field) => `Ensure ${field} is a postcode in canonical form`,
    body: (field) => [
      `if (!value.includes(' ')) {`,
      ...fail(`${field} should contain a space between outward and inward codes (e.g. 'AB1 2CD')`),
      '}',
      'if (value !== value.toUpperCase()) {',
      ...fail(`${field} should be uppercase`),
      '}',
      'return value;',
    ],
  },
};

export function isValidatorName(value: string): value is ValidatorName {
  return (VALIDATOR_NAMES as readonly string[]).includes(value);
}

/**
 * A validator routine ready to be rendered for one field
 */
export interface ValidatorRoutine {
  functionName: string;
  validator: ValidatorName;
  field: string;
}

/**
 * Look up a validator by name for a field.
 *
 * `takenNames` holds the function names already used in the module. A name
 * two fields would share (`phone_no` and `phoneNo`) gets a numeric suffix.
 *
 * @throws ValidatorError for an unrecognized validator name
 */
export function createValidatorRoutine(
  validator: string,
  field: string,
  location: SchemaLocation,
  takenNames: Set<string> = new Set()
): ValidatorRoutine {
  if (!isValidatorName(validator)) {
    throw new ValidatorError(validator, VALIDATOR_NAMES, location);
  }

  const base = `validate${pascalCase(field)}${pascalCase(validator)}`;
  let functionName = base;
  for (let suffix = 2; takenNames.has(functionName); suffix++) {
    functionName = `${base}${suffix}`;
  }
  takenNames.add(functionName);

  return { functionName, validator, field };
}

/**
 * Render a routine as a function usable in `.transform()`.
 * `absentValues` lists which of `null` and `undefined` may reach it.
 */
export function renderValidatorRoutine(
  routine: ValidatorRoutine,
  absentValues: ReadonlyArray<'null' | 'undefined'>
): string {
  const template = TEMPLATES[routine.validator];
  const valueType = ['string', ...absentValues].join(' | ');

  const guard =
    absentValues.length > 0
      ? [
          `  if (${absentValues.map((absent) => `value === ${absent}`).join(' || ')}) {`,
          '    return value;',
          '  }',
        ]
      : [];

  return [
    '/**',
    ` * ${template.summary(routine.field)}`,
    ' */',
    `function ${routine.functionName}(value: ${valueType}, ctx: z.RefinementCtx): ${valueType} {`,
    ...guard,
    ...template.body(routine.field).map((line) => `  ${line}`),
    '}',
  ].join('\n');
}
