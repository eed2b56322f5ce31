import { Command } from 'commander';
import * as path from 'node:path';
import chalk from 'chalk';
import { fileExists, writeFile } from '../../utils/file-system.js';
import { IGNORE_FILENAME } from '../../utils/ignore-file.js';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { DEFAULT_PRESET, listPresets, readPresetSource } from '../../core/rules/presets.js';
import { parseRulesYaml } from '../../core/rules/loader.js';
import { CONFIG_TEMPLATE, FEATURES_TEMPLATE, IGNORE_TEMPLATE } from './init-templates.js';

interface InitOptions {
  preset: string;
  force?: boolean;
  listPresets?: boolean;
}

/**
 * Create the init command.
 */
export function createInitCommand(): Command {
  return new Command('init')
    .description('Initialize layerkit in the current project')
    .option('--preset <name>', 'Rule preset to start from', DEFAULT_PRESET)
    .option('--force', 'Overwrite existing configuration')
    .option('--list-presets', 'List built-in presets and exit')
    .action(async (options: InitOptions) => {
      try {
        await runInit(options);
      } catch (error) {
        log.error(getErrorMessage(error));
        process.exit(1);
      }
    });
}

async function runInit(options: InitOptions): Promise<void> {
  if (options.listPresets) {
    for (const name of await listPresets()) {
      console.log(name === DEFAULT_PRESET ? `${name} ${chalk.dim('(default)')}` : name);
    }
    return;
  }

  const projectRoot = process.cwd();
  const configPath = path.join(projectRoot, '.layerkit', 'config.yaml');

  if (!options.force && (await fileExists(configPath))) {
    log.warn('.layerkit/ already exists. Use --force to reinitialize.');
    return;
  }

  // Fails with R006 for an unknown preset before anything is written
  const rules = await readPresetSource(options.preset);
  parseRulesYaml(rules, `preset ${options.preset}`);

  console.log();
  console.log(chalk.bold(`Initializing layerkit (preset: ${options.preset})...`));
  console.log();

  await writeFile(configPath, CONFIG_TEMPLATE);
  log.success('Created .layerkit/config.yaml');

  await writeFile(path.join(projectRoot, '.layerkit', 'rules.yaml'), rules);
  log.success('Created .layerkit/rules.yaml');

  const ignorePath = path.join(projectRoot, IGNORE_FILENAME);
  if (options.force || !(await fileExists(ignorePath))) {
    await writeFile(ignorePath, IGNORE_TEMPLATE);
    log.success(`Created ${IGNORE_FILENAME}`);
  }

  // A sample descriptor is never overwritten
  const featuresPath = path.join(projectRoot, 'features.md');
  if (!(await fileExists(featuresPath))) {
    await writeFile(featuresPath, FEATURES_TEMPLATE);
    log.success('Created features.md');
  }

  console.log();
  console.log(chalk.bold.green('layerkit initialized.'));
  console.log();
  console.log('Next steps:');
  console.log(chalk.dim('  1. Adjust layers and chains in .layerkit/rules.yaml'));
  console.log(chalk.dim('  2. Preview a layout:    layerkit plan features.md'));
  console.log(chalk.dim('  3. Write skeletons:     layerkit plan features.md --write'));
  console.log(chalk.dim('  4. Validate the tree:   layerkit check'));
  console.log();
}
