import type { FieldKind, StringFormat } from './fields.js';

/** Value held by a validated field; null when an optional field was not supplied */
export type ConfigValue = string | boolean | null;

/** Raw configuration as handed over by the config-loading layer */
export type RawConfig = Readonly<Record<string, unknown>>;

/**
 * Resolved, read-only view of a single field, as exposed by `ConfigSchema.fields()`.
 */
export interface ConfigField {
  readonly name: string;
  readonly valueType: FieldKind;
  readonly required: boolean;
  readonly isSecret: boolean;
  /** Authoritative wire key (e.g. `san-ip` for `san_ip`) */
  readonly externalKeyName: string;
  /** Key inside the backend secret; null for plain fields */
  readonly secretKey: string | null;
  /** Enum members; null for non-enum fields */
  readonly allowedValues: readonly string[] | null;
  readonly defaultValue: null;
  readonly format: StringFormat | null;
  readonly description: string;
}

export type ValidationIssueCode = 'MISSING_REQUIRED_FIELD' | 'INVALID_FIELD_VALUE';

export interface ValidationIssue {
  code: ValidationIssueCode;
  /** Internal field name */
  field: string;
  /** Wire key the value was expected under */
  key: string;
  message: string;
}
