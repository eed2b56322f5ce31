/**
 * Shared command plumbing: config and rule loading, exit codes.
 */
import { loadConfig } from '../../core/config/loader.js';
import type { Config, ExitCodes } from '../../core/config/schema.js';
import { loadRules } from '../../core/rules/loader.js';
import type { RuleModel } from '../../core/rules/model.js';
import type { ValidationReport } from '../../core/validation/types.js';

export interface ProjectOptions {
  config?: string;
  rules?: string;
}

export interface Project {
  projectRoot: string;
  config: Config;
  model: RuleModel;
}

export async function loadProject(projectRoot: string, options: ProjectOptions = {}): Promise<Project> {
  const config = await loadConfig(projectRoot, options.config);
  const model = await loadRules(projectRoot, {
    rulesPath: options.rules ?? config.rules,
    preset: config.preset,
  });
  return { projectRoot, config, model };
}

/**
 * Exit code for a validation report.
 */
export function getExitCode(report: ValidationReport, exitCodes: ExitCodes): number {
  if (report.summary.errors > 0 || !report.passed) {
    return exitCodes.error;
  }
  if (report.summary.warnings > 0) {
    return exitCodes.warning_only;
  }
  return exitCodes.success;
}
