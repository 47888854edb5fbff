import { readFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { DeploymentPlan, parseDeploymentPlan } from '../schemas/validators';
import { Result, ok, err } from '../types/result';

export const DEFAULT_DEPLOYMENT_FILE = 'phaseguard.json';

export interface LoadedDeploymentPlan {
  plan: DeploymentPlan;
  /** Absolute path of the deployment file */
  path: string;
  /** Directory relative paths in the plan resolve against */
  baseDir: string;
}

/**
 * Load and validate a deployment file
 * @param path - Deployment file path, relative to `cwd`
 */
export function loadDeploymentPlan(path: string, cwd: string): Result<LoadedDeploymentPlan, string> {
  const planPath = resolve(cwd, path);

  if (!existsSync(planPath)) {
    return err(`Deployment file not found: ${planPath}`);
  }

  let content: string;
  try {
    content = readFileSync(planPath, 'utf-8');
  } catch (error) {
    return err(`Cannot read ${planPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = parseDeploymentPlan(content);
  if (!parsed.success) {
    return err(`Invalid deployment file ${planPath}:\n  - ${parsed.errors.join('\n  - ')}`);
  }

  return ok({ plan: parsed.data, path: planPath, baseDir: dirname(planPath) });
}
