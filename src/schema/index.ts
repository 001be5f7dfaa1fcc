// Config schema module barrel export.

export { ConfigSchema, defineConfigSchema, REDACTED } from './config-schema.js';
export type { ValidationResult } from './config-schema.js';
export { ConfigNotValidatedError, ConfigValidationError, SchemaDefinitionError } from './errors.js';
export { field, isSecretField, markSecret, secretKeyOf, secretMarker, toExternalKey } from './fields.js';
export type {
  BooleanFieldSpec,
  EnumFieldSpec,
  FieldKind,
  FieldMarker,
  FieldShape,
  FieldSpec,
  SecretMarker,
  StringFieldSpec,
  StringFormat,
} from './fields.js';
export { HostSchema, isIpOrFqdn } from './host.js';
export type {
  ConfigField,
  ConfigValue,
  RawConfig,
  ValidationIssue,
  ValidationIssueCode,
} from './types.js';
export { isValidatedConfig } from './validated-config.js';
export type { ValidatedConfig } from './validated-config.js';
