/**
 * Forbidden constructs - regex matches against file content.
 * Only scanned source files carry content; tests are not checked.
 *
 * Error code: E006
 */
import { ErrorCodes } from '../../../utils/errors.js';
import type { CheckContext, Violation } from '../types.js';
import { BaseCheck } from './base.js';

function lineAt(content: string, index: number): number {
  return content.slice(0, index).split('\n').length;
}

export class ForbiddenConstructCheck extends BaseCheck {
  readonly rule = 'forbidden_construct' as const;
  readonly errorCode = ErrorCodes.FORBIDDEN_CONSTRUCT;

  run(context: CheckContext): Violation[] {
    const { model, tree } = context;
    const violations: Violation[] = [];

    for (const file of tree.files) {
      if (file.content === undefined || model.isTestPath(file.path)) continue;
      const content = file.content;

      for (const rule of model.forbiddenFor(model.layerOf(file.path))) {
        for (const match of content.matchAll(rule.regex)) {
          const snippet = match[0].trim().slice(0, 80);
          violations.push(
            this.createViolation(file.path, `Forbidden construct '${rule.id}': ${snippet}`, {
              line: lineAt(content, match.index ?? 0),
              severity: rule.severity,
              why: rule.why,
              actual: rule.id,
            })
          );
        }
      }
    }

    return violations;
  }

  protected getFixHint(actual?: string): string {
    return `Remove the construct matched by '${actual ?? 'the rule'}'`;
  }
}
