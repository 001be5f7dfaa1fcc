// Zod schemas for the backend management API.

import { z } from 'zod';

import { DeploymentVariablesSchema } from '../deploy/variables-schema.js';

export { DeploymentVariablesSchema };

export const BackendParamsSchema = z.object({
  backendType: z.string().min(1),
});

export const InstanceParamsSchema = BackendParamsSchema.extend({
  instanceName: z.string().min(1),
});

/** Raw backend configuration, keyed by wire key */
export const RawConfigBodySchema = z.record(z.string(), z.unknown());

export const DeployableUnitSchema = z.object({
  name: z.string(),
  channel: z.string(),
  revision: z.string().nullable(),
  base: z.string(),
});

export const BackendSummarySchema = z.object({
  backendType: z.string(),
  displayName: z.string(),
  deployableUnit: DeployableUnitSchema,
});

export const ConfigFieldSchema = z.object({
  name: z.string(),
  valueType: z.enum(['string', 'boolean', 'enum']),
  required: z.boolean(),
  isSecret: z.boolean(),
  externalKeyName: z.string(),
  secretKey: z.string().nullable(),
  allowedValues: z.array(z.string()).nullable(),
  defaultValue: z.null(),
  format: z.enum(['host']).nullable(),
  description: z.string(),
});

export const BackendDetailSchema = BackendSummarySchema.extend({
  fields: z.array(ConfigFieldSchema),
});

export const ValidationIssueSchema = z.object({
  code: z.enum(['MISSING_REQUIRED_FIELD', 'INVALID_FIELD_VALUE']),
  field: z.string(),
  key: z.string(),
  message: z.string(),
});

export const ValidateResponseSchema = z.union([
  z.object({
    valid: z.literal(true),
    config: z.record(z.string(), z.union([z.string(), z.boolean()])),
  }),
  z.object({
    valid: z.literal(false),
    issues: z.array(ValidationIssueSchema),
  }),
]);

export const InstanceResponseSchema = z.object({
  backendType: z.string(),
  instanceName: z.string(),
  variables: DeploymentVariablesSchema,
});

export type BackendSummary = z.infer<typeof BackendSummarySchema>;
