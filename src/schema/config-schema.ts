// Generic configuration schema shared by every backend.
//
// Validation walks every declared field once and collects all problems, so a
// caller can report missing and invalid options together.

import { z } from 'zod';

import { ConfigValidationError, SchemaDefinitionError } from './errors.js';
import type { FieldShape, FieldSpec } from './fields.js';
import { isSecretField, secretKeyOf, toExternalKey } from './fields.js';
import { HostSchema } from './host.js';
import type { ConfigField, ConfigValue, RawConfig, ValidationIssue } from './types.js';
import { issueValidatedConfig } from './validated-config.js';
import type { ValidatedConfig } from './validated-config.js';

export const REDACTED = '[redacted]';

export type ValidationResult =
  | { success: true; data: ValidatedConfig }
  | { success: false; error: ConfigValidationError };

function resolveField(name: string, spec: FieldSpec): ConfigField {
  return {
    name,
    valueType: spec.kind,
    required: spec.required,
    isSecret: isSecretField(spec),
    externalKeyName: spec.key ?? toExternalKey(name),
    secretKey: secretKeyOf(spec),
    allowedValues: spec.kind === 'enum' ? spec.values : null,
    defaultValue: null,
    format: spec.kind === 'string' ? spec.format : null,
    description: spec.description,
  };
}

function validatorFor(spec: FieldSpec): z.ZodType<string | boolean> {
  switch (spec.kind) {
    case 'boolean':
      return z.boolean();
    case 'enum':
      return z.enum(spec.values);
    case 'string':
      return spec.format === 'host' ? HostSchema : z.string();
  }
}

function expectation(field: ConfigField): string {
  if (field.allowedValues) {
    return `expected one of ${field.allowedValues.join(', ')}`;
  }
  if (field.format === 'host') {
    return 'expected an IP address or FQDN';
  }
  return `expected a ${field.valueType}`;
}

function describeValue(field: ConfigField, value: unknown): string {
  if (field.isSecret) return REDACTED;
  return typeof value === 'string' ? `"${value}"` : String(value);
}

interface SchemaEntry {
  field: ConfigField;
  validator: z.ZodType<string | boolean>;
}

export class ConfigSchema {
  readonly name: string;
  private readonly entries: ReadonlyMap<string, SchemaEntry>;

  constructor(name: string, shape: FieldShape) {
    this.name = name;

    const entries = new Map<string, SchemaEntry>();
    const externalKeys = new Set<string>();
    const secretKeys = new Set<string>();

    for (const [fieldName, spec] of Object.entries(shape)) {
      const resolved = resolveField(fieldName, spec);

      if (spec.kind === 'enum' && spec.values.length === 0) {
        throw new SchemaDefinitionError(name, `enum field ${fieldName} has no values`);
      }
      if (resolved.secretKey === '') {
        throw new SchemaDefinitionError(name, `secret field ${fieldName} has an empty key`);
      }
      if (externalKeys.has(resolved.externalKeyName)) {
        throw new SchemaDefinitionError(name, `duplicate key ${resolved.externalKeyName}`);
      }
      externalKeys.add(resolved.externalKeyName);

      if (resolved.secretKey !== null) {
        if (secretKeys.has(resolved.secretKey)) {
          throw new SchemaDefinitionError(name, `duplicate secret key ${resolved.secretKey}`);
        }
        secretKeys.add(resolved.secretKey);
      }

      entries.set(fieldName, { field: resolved, validator: validatorFor(spec) });
    }

    this.entries = entries;
  }

  fields(): readonly ConfigField[] {
    return [...this.entries.values()].map((entry) => entry.field);
  }

  field(name: string): ConfigField | undefined {
    return this.entries.get(name)?.field;
  }

  secretFields(): readonly ConfigField[] {
    return this.fields().filter((f) => f.isSecret);
  }

  requiredFields(): readonly ConfigField[] {
    return this.fields().filter((f) => f.required);
  }

  /**
   * Validate a raw mapping without throwing.
   *
   * Each field is read from its external key, falling back to the internal
   * name. `undefined` and `null` count as absent. Keys the schema does not
   * declare are ignored.
   */
  safeValidate(raw: RawConfig): ValidationResult {
    const values = new Map<string, ConfigValue>();
    const issues: ValidationIssue[] = [];

    for (const { field, validator } of this.entries.values()) {
      const value = lookup(raw, field);

      if (value === undefined || value === null) {
        if (field.required) {
          issues.push({
            code: 'MISSING_REQUIRED_FIELD',
            field: field.name,
            key: field.externalKeyName,
            message: `Missing required field ${field.name} (${field.externalKeyName})`,
          });
        } else {
          values.set(field.name, null);
        }
        continue;
      }

      const parsed = validator.safeParse(value);
      if (!parsed.success) {
        issues.push({
          code: 'INVALID_FIELD_VALUE',
          field: field.name,
          key: field.externalKeyName,
          message: `Invalid value ${describeValue(field, value)} for field ${field.name} (${field.externalKeyName}): ${expectation(field)}`,
        });
        continue;
      }
      values.set(field.name, parsed.data);
    }

    if (issues.length > 0) {
      return { success: false, error: new ConfigValidationError(this.name, issues) };
    }
    return { success: true, data: issueValidatedConfig(this.name, values) };
  }

  /** Validate a raw mapping, throwing `ConfigValidationError` with every issue found. */
  validate(raw: RawConfig): ValidatedConfig {
    const result = this.safeValidate(raw);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  }

  /**
   * Record keyed by external key with secret values masked.
   * Unset optional fields are left out.
   */
  redact(config: ValidatedConfig): Record<string, string | boolean> {
    const out: Record<string, string | boolean> = {};
    for (const { field } of this.entries.values()) {
      const value = config.get(field.name);
      if (value === null || value === undefined) continue;
      out[field.externalKeyName] = field.isSecret ? REDACTED : value;
    }
    return out;
  }
}

/** Wire key first; a null or undefined wire value falls through to the internal name */
function lookup(raw: RawConfig, field: ConfigField): unknown {
  const wire = Object.hasOwn(raw, field.externalKeyName) ? raw[field.externalKeyName] : undefined;
  if (wire !== undefined && wire !== null) {
    return wire;
  }
  return Object.hasOwn(raw, field.name) ? raw[field.name] : wire;
}

export function defineConfigSchema(name: string, shape: FieldShape): ConfigSchema {
  return new ConfigSchema(name, shape);
}
