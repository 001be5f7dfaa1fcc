// Shared implementation of the storage backend contract.
//
// Vendors differ only in data: type, display name, charm pinning and field
// shape. Validation lives in ConfigSchema; this class turns a validated config
// into deployment variables and drives the collaborators.

import { ConfigNotValidatedError, defineConfigSchema, isValidatedConfig } from '../schema/index.js';
import type { ConfigSchema, FieldShape, ValidatedConfig } from '../schema/index.js';

import { ConfigMismatchError, InstanceNameInvalidError, SecretReferenceMissingError } from './errors.js';
import type {
  BuildVariablesOptions,
  DeployableUnit,
  DeploymentVariables,
  EndpointBindings,
  LifecycleContext,
  NetworkSpaces,
  StorageBackend,
} from './types.js';

/** Every backend charm is named `cinder-volume-<backendType>` */
export const CHARM_NAME_PREFIX = 'cinder-volume-';

export const DEFAULT_CHARM_CHANNEL = '2025.1/edge';
export const DEFAULT_CHARM_BASE = 'ubuntu@24.04';

export const DEFAULT_SPACES: NetworkSpaces = {
  management: 'management',
  storage: 'storage',
};

const INSTANCE_NAME_PATTERN = /^[a-z][a-z0-9-]{0,62}$/;

export interface CinderVolumeBackendOptions {
  backendType: string;
  displayName: string;
  fields: FieldShape;
  charm?: {
    /** Defaults to `cinder-volume-<backendType>` */
    name?: string;
    channel?: string;
    revision?: string | null;
    base?: string;
  };
}

export function assertInstanceName(instanceName: string): void {
  if (!INSTANCE_NAME_PATTERN.test(instanceName) || instanceName.endsWith('-')) {
    throw new InstanceNameInvalidError(instanceName);
  }
}

export class CinderVolumeBackend implements StorageBackend {
  readonly backendType: string;
  readonly displayName: string;
  readonly deployableUnit: DeployableUnit;
  private readonly schema: ConfigSchema;

  constructor(options: CinderVolumeBackendOptions) {
    this.backendType = options.backendType;
    this.displayName = options.displayName;
    this.deployableUnit = Object.freeze({
      name: options.charm?.name ?? `${CHARM_NAME_PREFIX}${options.backendType}`,
      channel: options.charm?.channel ?? DEFAULT_CHARM_CHANNEL,
      revision: options.charm?.revision ?? null,
      base: options.charm?.base ?? DEFAULT_CHARM_BASE,
    });
    this.schema = defineConfigSchema(options.backendType, options.fields);
  }

  /** Name of the deployment plan every instance of this backend is applied through */
  get planName(): string {
    return `storage-backend-${this.backendType}`;
  }

  configSchema(): ConfigSchema {
    return this.schema;
  }

  secretName(instanceName: string): string {
    return `${this.backendType}-${instanceName}`;
  }

  endpointBindings(config: ValidatedConfig, spaces: NetworkSpaces = DEFAULT_SPACES): EndpointBindings {
    this.assertOwnConfig(config);
    const bindings: EndpointBindings = { '': spaces.management };
    // FC traffic never touches an IP network; iSCSI and NVMe need the storage space
    if (config.get('protocol') !== 'fc') {
      bindings.storage = spaces.storage;
    }
    return bindings;
  }

  secretContent(config: ValidatedConfig): Record<string, string> {
    this.assertOwnConfig(config);
    const content: Record<string, string> = {};
    for (const field of this.schema.secretFields()) {
      const value = config.get(field.name);
      if (value === null || value === undefined || field.secretKey === null) continue;
      content[field.secretKey] = String(value);
    }
    return content;
  }

  /**
   * Translate a validated config into the variable set the deployment engine
   * consumes. Plain options land in `charm_config` under their wire keys;
   * secret options are only reachable through `secret_ref`.
   */
  buildDeploymentVariables(
    config: ValidatedConfig,
    options: BuildVariablesOptions
  ): DeploymentVariables {
    this.assertOwnConfig(config);

    const hasSecrets = Object.keys(this.secretContent(config)).length > 0;
    if (hasSecrets && options.secretRef === null) {
      throw new SecretReferenceMissingError(this.backendType);
    }

    const charmConfig: Record<string, string | boolean> = {
      'volume-backend-name': options.instanceName,
    };
    for (const field of this.schema.fields()) {
      if (field.isSecret) continue;
      const value = config.get(field.name);
      if (value === null || value === undefined) continue;
      charmConfig[field.externalKeyName] = value;
    }

    return {
      charm_name: this.deployableUnit.name,
      charm_channel: this.deployableUnit.channel,
      charm_revision: this.deployableUnit.revision,
      charm_base: this.deployableUnit.base,
      endpoint_bindings: this.endpointBindings(config, options.spaces),
      charm_config: charmConfig,
      secret_ref: hasSecrets ? options.secretRef : null,
    };
  }

  async registerDeploymentPlan(ctx: LifecycleContext): Promise<void> {
    await ctx.engine.registerPlan({
      name: this.planName,
      backendType: this.backendType,
      deployableUnit: this.deployableUnit,
    });
    ctx.log.debug({ backendType: this.backendType, plan: this.planName }, 'Deployment plan registered');
  }

  async addBackendInstance(
    ctx: LifecycleContext,
    instanceName: string,
    config: ValidatedConfig
  ): Promise<DeploymentVariables> {
    assertInstanceName(instanceName);
    this.assertOwnConfig(config);

    const content = this.secretContent(config);
    const secretKeys = Object.keys(content);
    const secretRef =
      secretKeys.length > 0 ? await ctx.secrets.put(this.secretName(instanceName), content) : null;

    const variables = this.buildDeploymentVariables(config, {
      instanceName,
      secretRef,
      spaces: ctx.spaces,
    });
    await ctx.engine.apply(this.planName, instanceName, variables);

    ctx.log.info(
      {
        backendType: this.backendType,
        instanceName,
        charm: this.deployableUnit.name,
        secretKeys,
      },
      'Backend instance applied'
    );
    return variables;
  }

  async removeBackend(ctx: LifecycleContext, instanceName: string): Promise<void> {
    assertInstanceName(instanceName);
    await ctx.engine.destroy(this.planName, instanceName);
    await ctx.secrets.remove(this.secretName(instanceName));
    ctx.log.info({ backendType: this.backendType, instanceName }, 'Backend instance removed');
  }

  private assertOwnConfig(config: ValidatedConfig): void {
    if (!isValidatedConfig(config)) {
      throw new ConfigNotValidatedError(this.backendType);
    }
    if (config.schemaName !== this.schema.name) {
      throw new ConfigMismatchError(config.schemaName, this.backendType);
    }
  }
}
