/**
 * Files in a shared layer must be one of its declared files (or their tests).
 *
 * Error code: E009
 */
import { ErrorCodes } from '../../../utils/errors.js';
import { splitWords, toCase } from '../../naming/case.js';
import type { CheckContext, Violation } from '../types.js';
import { BaseCheck } from './base.js';

export class SharedFileCheck extends BaseCheck {
  readonly rule = 'unexpected_shared_file' as const;
  readonly errorCode = ErrorCodes.UNEXPECTED_SHARED_FILE;
  readonly severity = 'warning' as const;

  run(context: CheckContext): Violation[] {
    const { model, tree } = context;
    const style = model.naming.files;
    const violations: Violation[] = [];

    for (const file of tree.files) {
      const layer = model.layerOf(file.path);
      if (!layer || layer.scope !== 'shared') continue;

      const stem = model.namingStem(file.path);
      if (model.naming.exempt.includes(stem)) continue;

      const declared = layer.files.map((words) => [...layer.prefix, ...words, ...layer.suffix].join(' '));
      if (declared.includes(splitWords(stem).join(' '))) continue;

      const expected = layer.files.map((words) => toCase([...layer.prefix, ...words, ...layer.suffix], style));
      violations.push(
        this.createViolation(
          file.path,
          `File '${stem}' is not declared by shared layer '${layer.name}' (expected one of: ${expected.join(', ')})`,
          { actual: layer.name }
        )
      );
    }

    return violations;
  }

  protected getFixHint(actual?: string): string {
    return `Add the file to 'files' of layer '${actual ?? 'the layer'}', or move it to an entity layer`;
  }
}
