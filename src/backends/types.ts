// Storage backend contract and the collaborators it delegates to.
//
// A backend is identity + a deployable unit + a config schema. Everything that
// touches the outside world (plan application, secret storage) goes through the
// DeploymentEngine and SecretStore interfaces so tests and alternative engines
// can be plugged in.

import type { FastifyBaseLogger } from 'fastify';

import type { ConfigSchema, ValidatedConfig } from '../schema/index.js';

/** Identity of the charm that realises a backend */
export interface DeployableUnit {
  name: string;
  channel: string;
  revision: string | null;
  base: string;
}

export interface BackendDescriptor {
  backendType: string;
  displayName: string;
  deployableUnit: DeployableUnit;
}

/** Network spaces endpoints are bound to */
export interface NetworkSpaces {
  management: string;
  storage: string;
}

/** Endpoint name to space; the empty key is the default binding */
export type EndpointBindings = Record<string, string>;

/**
 * Flat variable set consumed by the deployment engine.
 * Secret values are never inlined; `secret_ref` points at the stored secret.
 */
export interface DeploymentVariables {
  charm_name: string;
  charm_channel: string;
  charm_revision: string | null;
  charm_base: string;
  endpoint_bindings: EndpointBindings;
  charm_config: Record<string, string | boolean>;
  secret_ref: string | null;
}

export interface DeploymentPlan {
  name: string;
  backendType: string;
  deployableUnit: DeployableUnit;
}

export interface BuildVariablesOptions {
  instanceName: string;
  secretRef: string | null;
  spaces?: NetworkSpaces;
}

/** External orchestration collaborator */
export interface DeploymentEngine {
  registerPlan(plan: DeploymentPlan): Promise<void>;

  /** Install or update one backend instance from its variables */
  apply(planName: string, instanceName: string, variables: DeploymentVariables): Promise<void>;

  destroy(planName: string, instanceName: string): Promise<void>;

  /** Health check -- returns true if the engine is operational */
  healthy(): Promise<boolean>;
}

/** External secret storage collaborator */
export interface SecretStore {
  /** Store (or replace) secret content and return a reference to it */
  put(name: string, content: Readonly<Record<string, string>>): Promise<string>;

  remove(name: string): Promise<void>;
}

export interface LifecycleContext {
  engine: DeploymentEngine;
  secrets: SecretStore;
  log: FastifyBaseLogger;
  spaces?: NetworkSpaces;
}

export interface StorageBackend extends BackendDescriptor {
  configSchema(): ConfigSchema;

  /** Endpoint-binding hints derived from the validated config. Pure. */
  endpointBindings(config: ValidatedConfig, spaces?: NetworkSpaces): EndpointBindings;

  /** Secret key to value for every secret field that is set */
  secretContent(config: ValidatedConfig): Record<string, string>;

  buildDeploymentVariables(
    config: ValidatedConfig,
    options: BuildVariablesOptions
  ): DeploymentVariables;

  registerDeploymentPlan(ctx: LifecycleContext): Promise<void>;

  addBackendInstance(
    ctx: LifecycleContext,
    instanceName: string,
    config: ValidatedConfig
  ): Promise<DeploymentVariables>;

  removeBackend(ctx: LifecycleContext, instanceName: string): Promise<void>;
}
