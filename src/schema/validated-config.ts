import { ConfigNotValidatedError } from './errors.js';
import type { ConfigValue } from './types.js';

const ISSUE_TOKEN = Symbol('validated-config');
const issued = new WeakSet<object>();

/**
 * Immutable result of a successful schema validation.
 *
 * Instances only come from `ConfigSchema` (through `issueValidatedConfig`).
 * Calling the constructor directly throws, and `isValidatedConfig` rejects
 * anything that was not issued that way.
 */
export class ValidatedConfig {
  private readonly values: ReadonlyMap<string, ConfigValue>;

  /** Name of the schema (backend type) that produced this config */
  readonly schemaName: string;

  constructor(token: symbol, schemaName: string, values: ReadonlyMap<string, ConfigValue>) {
    if (token !== ISSUE_TOKEN) {
      throw new ConfigNotValidatedError(schemaName);
    }
    this.schemaName = schemaName;
    this.values = new Map(values);
    issued.add(this);
    Object.freeze(this);
  }

  /** Value of a declared field, or undefined when the schema has no such field */
  get(name: string): ConfigValue | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  names(): string[] {
    return [...this.values.keys()];
  }

  /** Plain record keyed by internal field name, in schema order */
  toRecord(): Record<string, ConfigValue> {
    return Object.fromEntries(this.values);
  }
}

/** Create a validated config. Only `ConfigSchema.safeValidate` calls this. */
export function issueValidatedConfig(
  schemaName: string,
  values: ReadonlyMap<string, ConfigValue>
): ValidatedConfig {
  return new ValidatedConfig(ISSUE_TOKEN, schemaName, values);
}

export function isValidatedConfig(value: unknown): value is ValidatedConfig {
  return typeof value === 'object' && value !== null && issued.has(value);
}
