import { Command } from 'commander';
import * as path from 'node:path';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { loadFeatureDescriptor } from '../../core/features/parser.js';
import { planLayout } from '../../core/planner/planner.js';
import { reconcilePlan } from '../../core/planner/reconcile.js';
import { writeSkeletons } from '../../core/planner/skeleton.js';
import { treeFromPlan } from '../../core/tree/from-plan.js';
import { listSourceFiles } from '../../core/tree/scanner.js';
import { readGoModule } from '../../core/tree/go-module.js';
import { validateTree } from '../../core/validation/engine.js';
import { formatPlanHuman, formatPlanJson } from '../formatters/plan.js';
import { loadProject } from './project.js';

interface PlanOptions {
  json?: boolean;
  write?: boolean;
  rules?: string;
  config?: string;
}

/**
 * Create the plan command.
 */
export function createPlanCommand(): Command {
  return new Command('plan')
    .description('Plan the file layout for a feature descriptor')
    .argument('<descriptor>', 'Feature descriptor (Markdown, YAML or JSON)')
    .option('--json', 'Output in JSON format')
    .option('--write', 'Write skeletons for planned files that do not exist')
    .option('--rules <path>', 'Path to the rule file')
    .option('--config <path>', 'Path to config file')
    .action(async (descriptor: string, options: PlanOptions) => {
      let exitCode = 0;
      try {
        exitCode = await runPlan(descriptor, options);
      } catch (error) {
        log.error(getErrorMessage(error), error instanceof Error ? error : undefined);
        exitCode = 1;
      }
      if (exitCode !== 0) {
        process.exit(exitCode);
      }
    });
}

async function runPlan(descriptor: string, options: PlanOptions): Promise<number> {
  const projectRoot = process.cwd();
  const { config, model } = await loadProject(projectRoot, options);

  const features = await loadFeatureDescriptor(path.resolve(projectRoot, descriptor), {
    defaultOperations: config.features.default_operations,
  });
  const plan = planLayout(model, features);
  const validation = validateTree(model, treeFromPlan(plan), {
    failOnWarning: config.validation.fail_on_warning,
  });
  const existing = await listSourceFiles(projectRoot, model, { exclude: config.files.exclude });
  const reconciliation = reconcilePlan(plan, model, existing);

  const view = { plan, validation, reconciliation };
  console.log(options.json ? formatPlanJson(view) : formatPlanHuman(view, { colors: config.output.colors }));

  if (!validation.passed) {
    return 1;
  }

  if (options.write) {
    const goModule = model.language === 'go' ? await readGoModule(projectRoot) : null;
    const result = await writeSkeletons(projectRoot, plan, { goModule: goModule ?? undefined });
    log.success(`Created ${result.created.length} file(s); ${result.skipped.length} already existed`);
  }
  return 0;
}
