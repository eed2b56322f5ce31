import type { FormatOptions, IFormatter, OutputFormat } from './types.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import { CompactFormatter } from './compact.js';

export function createFormatter(format: OutputFormat, options: Partial<FormatOptions> = {}): IFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter(options);
    case 'compact':
      return new CompactFormatter(options);
    case 'human':
      return new HumanFormatter(options);
  }
}

export { HumanFormatter, JsonFormatter, CompactFormatter };
export { formatPlanHuman, formatPlanJson, type PlanView } from './plan.js';
export type { FormatOptions, IFormatter, OutputFormat } from './types.js';
