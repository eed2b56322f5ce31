/**
 * File names checked against the case style and the layer's affixes.
 *
 * Error code: E003
 */
import { ErrorCodes } from '../../../utils/errors.js';
import { describeCase, matchesCase, splitWords, toCase } from '../../naming/case.js';
import type { CheckContext, Violation } from '../types.js';
import { BaseCheck } from './base.js';

function startsWithWords(words: string[], prefix: string[]): boolean {
  return prefix.every((word, i) => words[i] === word);
}

function endsWithWords(words: string[], suffix: string[]): boolean {
  const offset = words.length - suffix.length;
  return offset >= 0 && suffix.every((word, i) => words[offset + i] === word);
}

export class NamingCheck extends BaseCheck {
  readonly rule = 'naming_convention' as const;
  readonly errorCode = ErrorCodes.NAMING_CONVENTION;

  run(context: CheckContext): Violation[] {
    const { model, tree } = context;
    const style = model.naming.files;
    const violations: Violation[] = [];

    for (const file of tree.files) {
      const stem = model.namingStem(file.path);
      if (model.naming.exempt.includes(stem)) continue;

      if (!matchesCase(stem, style)) {
        violations.push(
          this.createViolation(file.path, `File name '${stem}' is not ${describeCase(style)}`, {
            actual: toCase(splitWords(stem), style),
          })
        );
        continue;
      }

      const layer = model.layerOf(file.path);
      if (!layer) continue;
      const words = splitWords(stem);
      if (layer.prefix.length > 0 && !startsWithWords(words, layer.prefix)) {
        violations.push(
          this.createViolation(
            file.path,
            `File name '${stem}' in layer '${layer.name}' must start with '${toCase(layer.prefix, style)}'`,
            { actual: toCase([...layer.prefix, ...words], style) }
          )
        );
      }
      if (layer.suffix.length > 0 && !endsWithWords(words, layer.suffix)) {
        violations.push(
          this.createViolation(
            file.path,
            `File name '${stem}' in layer '${layer.name}' must end with '${toCase(layer.suffix, style)}'`,
            { actual: toCase([...words, ...layer.suffix], style) }
          )
        );
      }
    }

    return violations;
  }

  protected getFixHint(actual?: string): string {
    return actual ? `Rename the file to '${actual}'` : 'Rename the file';
  }
}
