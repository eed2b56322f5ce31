import { Command } from 'commander';
import { logger as log } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { OutputFormatSchema } from '../../core/config/schema.js';
import { scanTree } from '../../core/tree/scanner.js';
import { validateTree } from '../../core/validation/engine.js';
import { createFormatter } from '../formatters/index.js';
import { getExitCode, loadProject } from './project.js';

interface CheckOptions {
  format?: string;
  strict?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  errorsOnly?: boolean;
  rules?: string;
  config?: string;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate the source tree against the layer rules')
    .argument('[paths...]', 'Files, directories or glob patterns to report on')
    .option('--format <format>', 'Output format: human, json, or compact')
    .option('--strict', 'Treat warnings as errors')
    .option('--quiet', 'Only print output when the check fails')
    .option('--verbose', 'Show fix hints')
    .option('--errors-only', 'Only show errors in output (still runs all checks)')
    .option('--rules <path>', 'Path to the rule file')
    .option('--config <path>', 'Path to config file')
    .action(async (paths: string[], options: CheckOptions) => {
      let exitCode: number;
      try {
        exitCode = await runCheck(paths, options);
      } catch (error) {
        log.error(getErrorMessage(error), error instanceof Error ? error : undefined);
        exitCode = 1;
      }
      process.exit(exitCode);
    });
}

async function runCheck(paths: string[], options: CheckOptions): Promise<number> {
  const projectRoot = process.cwd();
  const { config, model } = await loadProject(projectRoot, options);

  const format = OutputFormatSchema.safeParse(options.format ?? config.output.format);
  if (!format.success) {
    log.error(`Unknown output format '${options.format}'. Use human, json, or compact.`);
    return 1;
  }

  const tree = await scanTree(projectRoot, model, { exclude: config.files.exclude });
  const report = validateTree(model, tree, {
    failOnWarning: options.strict || config.validation.fail_on_warning,
    only: paths,
  });

  if (!(options.quiet && report.passed)) {
    const formatter = createFormatter(format.data, {
      colors: config.output.colors,
      verbose: options.verbose,
      errorsOnly: options.errorsOnly,
    });
    console.log(formatter.formatReport(report));
  }

  return getExitCode(report, config.validation.exit_codes);
}
