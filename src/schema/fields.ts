// Configuration field descriptors and secret classification.
//
// A field spec is plain data: its kind, whether it is required, the wire key it
// is read from, and a list of markers. Markers never influence validation; the
// only marker today flags a field as secret and records the key its value is
// stored under in the backend secret.

export type FieldKind = 'string' | 'boolean' | 'enum';

/** Extra checks applied to string fields */
export type StringFormat = 'host';

export interface SecretMarker {
  readonly kind: 'secret';
  /** Key of the value inside the backend secret (e.g. `san-ip`) */
  readonly key: string;
}

export type FieldMarker = SecretMarker;

interface FieldSpecBase {
  readonly description: string;
  readonly required: boolean;
  /** Wire key override; defaults to the field name with `_` replaced by `-` */
  readonly key: string | null;
  readonly markers: readonly FieldMarker[];
}

export interface StringFieldSpec extends FieldSpecBase {
  readonly kind: 'string';
  readonly format: StringFormat | null;
}

export interface BooleanFieldSpec extends FieldSpecBase {
  readonly kind: 'boolean';
}

export interface EnumFieldSpec extends FieldSpecBase {
  readonly kind: 'enum';
  readonly values: readonly [string, ...string[]];
}

export type FieldSpec = StringFieldSpec | BooleanFieldSpec | EnumFieldSpec;

/** Field specs keyed by internal field name */
export type FieldShape = Readonly<Record<string, FieldSpec>>;

export interface FieldOptions {
  required?: boolean;
  key?: string;
}

export interface StringFieldOptions extends FieldOptions {
  format?: StringFormat;
}

function stringField(description: string, options: StringFieldOptions = {}): StringFieldSpec {
  return {
    kind: 'string',
    description,
    required: options.required ?? false,
    key: options.key ?? null,
    format: options.format ?? null,
    markers: [],
  };
}

function booleanField(description: string, options: FieldOptions = {}): BooleanFieldSpec {
  return {
    kind: 'boolean',
    description,
    required: options.required ?? false,
    key: options.key ?? null,
    markers: [],
  };
}

function enumField(
  values: readonly [string, ...string[]],
  description: string,
  options: FieldOptions = {}
): EnumFieldSpec {
  return {
    kind: 'enum',
    values,
    description,
    required: options.required ?? false,
    key: options.key ?? null,
    markers: [],
  };
}

/**
 * Field spec builders.
 *
 * @example
 * ```ts
 * const shape = {
 *   san_ip: markSecret(field.string('Management IP', { required: true, format: 'host' }), 'san-ip'),
 *   protocol: field.enum(['fc', 'iscsi'], 'Storage protocol'),
 * };
 * ```
 */
export const field = {
  string: stringField,
  boolean: booleanField,
  enum: enumField,
};

export function secretMarker(key: string): SecretMarker {
  return { kind: 'secret', key };
}

/** Return a copy of the spec carrying a secret marker for `key`. */
export function markSecret<F extends FieldSpec>(spec: F, key: string): F {
  return { ...spec, markers: [...spec.markers, secretMarker(key)] };
}

export function isSecretField(spec: Pick<FieldSpec, 'markers'>): boolean {
  return spec.markers.some((marker) => marker.kind === 'secret');
}

/** Key of the first secret marker, or null for plain fields */
export function secretKeyOf(spec: Pick<FieldSpec, 'markers'>): string | null {
  const marker = spec.markers.find((m) => m.kind === 'secret');
  return marker ? marker.key : null;
}

export function toExternalKey(name: string): string {
  return name.replace(/_/g, '-');
}
