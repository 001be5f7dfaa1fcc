import createError from '@fastify/error';

import type { ValidationIssue } from './types.js';

// Schema errors (SCHEMA_*, CONFIG_VALIDATION_*)

/** A schema declaration is inconsistent (duplicate keys, empty enum) */
export const SchemaDefinitionError = createError<[string, string]>(
  'SCHEMA_DEFINITION_INVALID',
  'Invalid %s schema definition: %s',
  500
);

/** A config object that did not come out of schema validation (500 -- a programming error) */
export const ConfigNotValidatedError = createError<[string]>(
  'CONFIG_NOT_VALIDATED',
  'Configuration for %s was not produced by schema validation',
  500
);

const ConfigValidationFailed = createError<[string, string]>(
  'CONFIG_VALIDATION_FAILED',
  'Invalid %s configuration: %s',
  422
);

/**
 * Every field-level problem found in one validation pass.
 * The message lists each issue, so field names can be matched in the text.
 */
export class ConfigValidationError extends ConfigValidationFailed {
  readonly schemaName: string;
  readonly issues: readonly ValidationIssue[];

  constructor(schemaName: string, issues: readonly ValidationIssue[]) {
    super(schemaName, issues.map((issue) => issue.message).join('; '));
    this.name = 'ConfigValidationError';
    this.schemaName = schemaName;
    this.issues = issues;
  }
}
