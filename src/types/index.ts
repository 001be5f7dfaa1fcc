// Storage backend manager type definitions

import type { BackendRegistry } from '../backends/registry.js';
import type { DeploymentEngine, NetworkSpaces, SecretStore } from '../backends/types.js';
import type { Config } from '../config/index.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    backends: BackendRegistry;
    deploymentEngine: DeploymentEngine;
    secretStore: SecretStore;
    networkSpaces: NetworkSpaces;
  }
}
