/**
 * Check registry - every check the validator runs, in report order.
 */
import type { Check, CheckRule } from '../types.js';
import { LayerDirectionCheck, LayerUndeclaredCheck } from './layer-direction.js';
import { NamingCheck } from './naming.js';
import { MissingTestCheck, OrphanTestCheck } from './tests.js';
import { ForbiddenConstructCheck } from './forbidden.js';
import { UnlayeredFileCheck } from './unlayered.js';
import { ImportCycleCheck } from './cycles.js';
import { SharedFileCheck } from './shared-files.js';

const checkRegistry = new Map<CheckRule, Check>();

checkRegistry.set('layer_direction', new LayerDirectionCheck());
checkRegistry.set('layer_undeclared', new LayerUndeclaredCheck());
checkRegistry.set('naming_convention', new NamingCheck());
checkRegistry.set('missing_test', new MissingTestCheck());
checkRegistry.set('orphan_test', new OrphanTestCheck());
checkRegistry.set('forbidden_construct', new ForbiddenConstructCheck());
checkRegistry.set('unlayered_file', new UnlayeredFileCheck());
checkRegistry.set('import_cycle', new ImportCycleCheck());
checkRegistry.set('unexpected_shared_file', new SharedFileCheck());

export function getCheck(rule: CheckRule): Check | undefined {
  return checkRegistry.get(rule);
}

export function getAllChecks(): Check[] {
  return [...checkRegistry.values()];
}

export { BaseCheck } from './base.js';
export type { ViolationOptions } from './base.js';
export { detectCycles } from './cycles.js';
export {
  LayerDirectionCheck,
  LayerUndeclaredCheck,
  NamingCheck,
  MissingTestCheck,
  OrphanTestCheck,
  ForbiddenConstructCheck,
  UnlayeredFileCheck,
  ImportCycleCheck,
  SharedFileCheck,
};
