import type { FastifyBaseLogger } from 'fastify';

import { CHARM_NAME_PREFIX } from './base.js';
import {
  BackendDescriptorInvalidError,
  BackendNotFoundError,
  DuplicateBackendTypeError,
  DuplicateDeployableUnitError,
} from './errors.js';
import type { StorageBackend } from './types.js';

const BACKEND_TYPE_PATTERN = /^[a-z][a-z0-9]*$/;

function descriptorProblem(backend: StorageBackend): string | null {
  const { backendType, displayName, deployableUnit } = backend;
  if (!BACKEND_TYPE_PATTERN.test(backendType)) {
    return 'backend type must be lowercase alphanumeric';
  }
  if (displayName.trim().length === 0) {
    return 'display name is empty';
  }
  if (!deployableUnit.name.startsWith(CHARM_NAME_PREFIX)) {
    return `deployable unit name must start with ${CHARM_NAME_PREFIX}`;
  }
  if (deployableUnit.name.length === CHARM_NAME_PREFIX.length) {
    return 'deployable unit name has no suffix';
  }
  if (deployableUnit.channel.length === 0 || deployableUnit.base.length === 0) {
    return 'deployable unit channel and base are required';
  }
  const unkeyedSecret = backend
    .configSchema()
    .secretFields()
    .find((f) => f.secretKey === null || f.externalKeyName.length === 0);
  if (unkeyedSecret) {
    return `secret field ${unkeyedSecret.name} has no key`;
  }
  return null;
}

/**
 * Known storage backends, in registration order.
 *
 * Registration fails immediately on a malformed descriptor or on a backend
 * type / deployable unit name that is already taken, so the set held here
 * never contains duplicates.
 */
export class BackendRegistry {
  private readonly backends = new Map<string, StorageBackend>();
  private readonly unitOwners = new Map<string, string>();
  private readonly log: FastifyBaseLogger | undefined;

  constructor(log?: FastifyBaseLogger) {
    this.log = log;
  }

  register(backend: StorageBackend): this {
    const problem = descriptorProblem(backend);
    if (problem !== null) {
      throw new BackendDescriptorInvalidError(backend.backendType, problem);
    }
    if (this.backends.has(backend.backendType)) {
      throw new DuplicateBackendTypeError(backend.backendType);
    }
    const owner = this.unitOwners.get(backend.deployableUnit.name);
    if (owner !== undefined) {
      throw new DuplicateDeployableUnitError(backend.deployableUnit.name, owner);
    }

    this.backends.set(backend.backendType, backend);
    this.unitOwners.set(backend.deployableUnit.name, backend.backendType);
    this.log?.debug(
      { backendType: backend.backendType, charm: backend.deployableUnit.name },
      'Storage backend registered'
    );
    return this;
  }

  /** Look up a backend, throwing BackendNotFoundError for unknown types */
  get(backendType: string): StorageBackend {
    const backend = this.backends.get(backendType);
    if (!backend) {
      throw new BackendNotFoundError(backendType);
    }
    return backend;
  }

  find(backendType: string): StorageBackend | null {
    return this.backends.get(backendType) ?? null;
  }

  has(backendType: string): boolean {
    return this.backends.has(backendType);
  }

  all(): readonly StorageBackend[] {
    return [...this.backends.values()];
  }

  get size(): number {
    return this.backends.size;
  }
}
