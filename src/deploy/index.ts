// Deployment collaborators barrel export and factory function.

import type { DeploymentEngine } from '../backends/types.js';

import { FsDeploymentEngine } from './fs-engine.js';
import { MemoryDeploymentEngine } from './memory-engine.js';

export { DeployPlanNotRegisteredError, DeployUnsafeNameError } from './errors.js';
export { FsDeploymentEngine } from './fs-engine.js';
export { MemoryDeploymentEngine } from './memory-engine.js';
export { MemorySecretStore } from './memory-secret-store.js';

export interface DeploymentConfig {
  engine: 'fs' | 'memory';
  outputDir: string;
}

/**
 * Create a deployment engine based on configuration.
 * `fs` writes plan and variable files; `memory` only records calls.
 */
export function createDeploymentEngine(config: DeploymentConfig): DeploymentEngine {
  switch (config.engine) {
    case 'memory':
      return new MemoryDeploymentEngine();
    case 'fs':
    default:
      return new FsDeploymentEngine(config.outputDir);
  }
}
