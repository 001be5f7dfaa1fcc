import type { DeploymentEngine, DeploymentPlan, DeploymentVariables } from '../backends/types.js';

import { DeployPlanNotRegisteredError } from './errors.js';

/**
 * In-process deployment engine that only records what it was asked to do.
 * Used for dry runs and tests.
 */
export class MemoryDeploymentEngine implements DeploymentEngine {
  private readonly plans = new Map<string, DeploymentPlan>();
  private readonly applied = new Map<string, DeploymentVariables>();

  async registerPlan(plan: DeploymentPlan): Promise<void> {
    this.plans.set(plan.name, plan);
  }

  async apply(planName: string, instanceName: string, variables: DeploymentVariables): Promise<void> {
    if (!this.plans.has(planName)) {
      throw new DeployPlanNotRegisteredError(planName);
    }
    this.applied.set(key(planName, instanceName), variables);
  }

  async destroy(planName: string, instanceName: string): Promise<void> {
    this.applied.delete(key(planName, instanceName));
  }

  async healthy(): Promise<boolean> {
    return true;
  }

  plan(name: string): DeploymentPlan | null {
    return this.plans.get(name) ?? null;
  }

  variables(planName: string, instanceName: string): DeploymentVariables | null {
    return this.applied.get(key(planName, instanceName)) ?? null;
  }
}

function key(planName: string, instanceName: string): string {
  return `${planName}/${instanceName}`;
}
