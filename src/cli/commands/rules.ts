import { Command } from 'commander';
import chalk from 'chalk';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { describeCase } from '../../core/naming/case.js';
import type { RuleModel } from '../../core/rules/model.js';
import { loadProject } from './project.js';

interface RulesOptions {
  json?: boolean;
  rules?: string;
  config?: string;
}

/**
 * Create the rules command.
 */
export function createRulesCommand(): Command {
  return new Command('rules')
    .description('Show the resolved rule model: layers in dependency order')
    .option('--json', 'Output in JSON format')
    .option('--rules <path>', 'Path to the rule file')
    .option('--config <path>', 'Path to config file')
    .action(async (options: RulesOptions) => {
      try {
        const { model } = await loadProject(process.cwd(), options);
        console.log(options.json ? JSON.stringify(model.toJSON(), null, 2) : formatRuleModel(model));
      } catch (error) {
        log.error(getErrorMessage(error), error instanceof Error ? error : undefined);
        process.exit(1);
      }
    });
}

export function formatRuleModel(model: RuleModel): string {
  const lines = [
    chalk.bold(`Rules ${model.version} (${model.language}, root ${model.root || '.'})`),
    `Naming: ${describeCase(model.naming.files)}; chain mode: ${model.chainMode}; unlayered files: ${model.unlayered}`,
    '',
    chalk.bold('Layers (dependency order):'),
  ];

  for (const layer of model.layers) {
    const scope = layer.scope === 'shared' ? chalk.dim(' (shared)') : '';
    lines.push(`  [${layer.rank}] ${chalk.cyan(layer.name)}  ${layer.directory}/${scope}`);
    const imports = [...layer.canImport].sort();
    lines.push(`      imports: ${imports.length > 0 ? imports.join(', ') : chalk.dim('nothing')}`);
  }

  if (model.forbidden.length > 0) {
    lines.push('', chalk.bold('Forbidden:'));
    for (const rule of model.forbidden) {
      const scope = rule.layers ? [...rule.layers].sort().join(', ') : 'all layers';
      lines.push(`  ${rule.id} (${rule.severity}, ${scope}): /${rule.pattern}/`);
    }
  }

  return lines.join('\n');
}
