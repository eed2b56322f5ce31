import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { isLogLevel, logger, LOG_LEVELS } from '../utils/logger.js';
import { createInitCommand } from './commands/init.js';
import { createRulesCommand } from './commands/rules.js';
import { createPlanCommand } from './commands/plan.js';
import { createCheckCommand } from './commands/check.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

const VERSION = readVersion();

interface GlobalOptions {
  logLevel?: string;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Apply the global logging flags. `--log-level` wins over the shortcuts.
 */
export function applyLogOptions(options: GlobalOptions): void {
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new Error(`Unknown log level '${options.logLevel}' (expected one of ${LOG_LEVELS.join(', ')})`);
    }
    logger.setLevel(options.logLevel);
  } else if (options.verbose) {
    logger.setLevel('debug');
  } else if (options.quiet) {
    logger.setLevel('error');
  }
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('layerkit')
    .description('Plan and validate layered project layouts from feature descriptors')
    .version(VERSION)
    .enablePositionalOptions()
    .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(', ')}`)
    .option('--verbose', 'Enable debug logging')
    .option('--quiet', 'Only log errors')
    .hook('preAction', () => {
      applyLogOptions(program.opts<GlobalOptions>());
    });

  [createInitCommand, createRulesCommand, createPlanCommand, createCheckCommand].forEach((cmd) =>
    program.addCommand(cmd())
  );
  return program;
}
