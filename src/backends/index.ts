// Backends module barrel export and registry factory.

import type { FastifyBaseLogger } from 'fastify';

import type { CinderVolumeBackend } from './base.js';
import { createDellPowerStoreBackend } from './dellpowerstore.js';
import { createDellScBackend } from './dellsc.js';
import { createHitachiBackend } from './hitachi.js';
import { createPureStorageBackend } from './purestorage.js';
import { BackendRegistry } from './registry.js';

export type {
  BackendDescriptor,
  BuildVariablesOptions,
  DeployableUnit,
  DeploymentEngine,
  DeploymentPlan,
  DeploymentVariables,
  EndpointBindings,
  LifecycleContext,
  NetworkSpaces,
  SecretStore,
  StorageBackend,
} from './types.js';
export {
  CHARM_NAME_PREFIX,
  CinderVolumeBackend,
  DEFAULT_CHARM_BASE,
  DEFAULT_CHARM_CHANNEL,
  DEFAULT_SPACES,
  assertInstanceName,
} from './base.js';
export type { CinderVolumeBackendOptions } from './base.js';
export * from './errors.js';
export { BackendRegistry } from './registry.js';
export { createDellPowerStoreBackend } from './dellpowerstore.js';
export { createDellScBackend } from './dellsc.js';
export { createHitachiBackend } from './hitachi.js';
export { createPureStorageBackend } from './purestorage.js';

/** Factories for every backend shipped with the service, in registration order */
export const BUILTIN_BACKENDS: ReadonlyArray<() => CinderVolumeBackend> = [
  createHitachiBackend,
  createPureStorageBackend,
  createDellScBackend,
  createDellPowerStoreBackend,
];

/**
 * Create a registry holding every built-in backend.
 * Throws if the built-in set violates a registry invariant.
 */
export function createBackendRegistry(log?: FastifyBaseLogger): BackendRegistry {
  const registry = new BackendRegistry(log);
  for (const create of BUILTIN_BACKENDS) {
    registry.register(create());
  }
  return registry;
}
