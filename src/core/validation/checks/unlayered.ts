/**
 * Files under the root that no layer owns.
 * Severity follows the `unlayered` policy; `allow` disables the check.
 *
 * Error code: E007
 */
import { ErrorCodes } from '../../../utils/errors.js';
import type { CheckContext, Violation } from '../types.js';
import { BaseCheck } from './base.js';

export class UnlayeredFileCheck extends BaseCheck {
  readonly rule = 'unlayered_file' as const;
  readonly errorCode = ErrorCodes.UNLAYERED_FILE;

  run(context: CheckContext): Violation[] {
    const { model, tree } = context;
    if (model.unlayered === 'allow') return [];
    const severity = model.unlayered === 'deny' ? 'error' : 'warning';

    return tree.files
      .filter((file) => model.layerOf(file.path) === null)
      .map((file) =>
        this.createViolation(file.path, 'File is outside every layer directory', { severity })
      );
  }

  protected getFixHint(): string {
    return 'Move the file into a layer directory, or declare a layer for its directory';
  }
}
