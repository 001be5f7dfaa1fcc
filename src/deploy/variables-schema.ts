import { z } from 'zod';

/** Shape of a variables file written by a deployment engine */
export const DeploymentVariablesSchema = z.object({
  charm_name: z.string(),
  charm_channel: z.string(),
  charm_revision: z.string().nullable(),
  charm_base: z.string(),
  endpoint_bindings: z.record(z.string(), z.string()),
  charm_config: z.record(z.string(), z.union([z.string(), z.boolean()])),
  secret_ref: z.string().nullable(),
});
