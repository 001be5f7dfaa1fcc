// Filesystem deployment engine.
//
// Writes each registered plan and each instance's variables as JSON under
// `<outputDir>/<plan>/`, ready for an external Terraform run to pick up.
// Variables never carry secret values, so the files are safe to keep on disk.

import { access, mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { DeploymentEngine, DeploymentPlan, DeploymentVariables } from '../backends/types.js';

import { DeployPlanNotRegisteredError, DeployUnsafeNameError } from './errors.js';
import { DeploymentVariablesSchema } from './variables-schema.js';

const SAFE_SEGMENT = /^[a-z0-9][a-z0-9-]*$/;
const PLAN_FILE = 'plan.json';
const VARS_SUFFIX = '.tfvars.json';

export class FsDeploymentEngine implements DeploymentEngine {
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  async registerPlan(plan: DeploymentPlan): Promise<void> {
    const dir = await this.planDir(plan.name);
    await writeFile(join(dir, PLAN_FILE), `${JSON.stringify(plan, null, 2)}\n`);
  }

  /** Throws DeployPlanNotRegisteredError unless `registerPlan` wrote the plan first */
  async apply(planName: string, instanceName: string, variables: DeploymentVariables): Promise<void> {
    assertSafe('plan', planName);
    assertSafe('instance', instanceName);
    try {
      await access(join(this.outputDir, planName, PLAN_FILE));
    } catch {
      throw new DeployPlanNotRegisteredError(planName);
    }
    const file = await this.varsFile(planName, instanceName);
    await writeFile(file, `${JSON.stringify(variables, null, 2)}\n`);
  }

  async destroy(planName: string, instanceName: string): Promise<void> {
    const file = await this.varsFile(planName, instanceName);
    await rm(file, { force: true });
  }

  /** Variables last applied for an instance, or null if none were applied */
  async read(planName: string, instanceName: string): Promise<DeploymentVariables | null> {
    const file = await this.varsFile(planName, instanceName);
    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch {
      return null;
    }
    return DeploymentVariablesSchema.parse(JSON.parse(raw));
  }

  async instances(planName: string): Promise<string[]> {
    const dir = await this.planDir(planName);
    const entries = await readdir(dir);
    return entries
      .filter((entry) => entry.endsWith(VARS_SUFFIX))
      .map((entry) => entry.slice(0, -VARS_SUFFIX.length))
      .sort();
  }

  async healthy(): Promise<boolean> {
    try {
      await mkdir(this.outputDir, { recursive: true });
      await access(this.outputDir);
      return true;
    } catch {
      return false;
    }
  }

  private async planDir(planName: string): Promise<string> {
    assertSafe('plan', planName);
    const dir = join(this.outputDir, planName);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  private async varsFile(planName: string, instanceName: string): Promise<string> {
    assertSafe('instance', instanceName);
    return join(await this.planDir(planName), `${instanceName}${VARS_SUFFIX}`);
  }
}

// Names become path segments; reject anything that could escape outputDir
function assertSafe(kind: 'plan' | 'instance', name: string): void {
  if (!SAFE_SEGMENT.test(name)) {
    throw new DeployUnsafeNameError(kind, name);
  }
}
