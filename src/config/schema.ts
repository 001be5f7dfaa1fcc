import { z } from 'zod';

export const AppConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
    })
    .default(() => ({ host: '0.0.0.0', port: 3000 })),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default(() => ({ global: 100, windowMs: 60000 })),

  // Deployment engine the backend lifecycle hooks delegate to
  deployment: z
    .object({
      /** `fs` writes plan/variable files for Terraform; `memory` records calls only */
      engine: z.enum(['fs', 'memory']).default('fs'),
      /** Directory plan and variable files are written to (fs engine) */
      outputDir: z.string().default('./data/plans'),
    })
    .default(() => ({ engine: 'fs' as const, outputDir: './data/plans' })),

  // Network spaces used for endpoint bindings
  network: z
    .object({
      managementSpace: z.string().min(1).default('management'),
      storageSpace: z.string().min(1).default('storage'),
    })
    .default(() => ({ managementSpace: 'management', storageSpace: 'storage' })),
});

export type Config = z.infer<typeof AppConfigSchema>;
