/**
 * Import edges checked against the layer dependency graph.
 */
import { ErrorCodes } from '../../../utils/errors.js';
import type { EdgeKind } from '../../rules/types.js';
import type { CheckContext, Violation } from '../types.js';
import { BaseCheck } from './base.js';

interface LayerEdge {
  file: string;
  target: string;
  fromLayer: string;
  toLayer: string;
  line: number | null;
}

/**
 * Every import between two layered files with the given classification.
 */
function edgesOfKind(context: CheckContext, kind: EdgeKind): LayerEdge[] {
  const { model, tree } = context;
  const edges: LayerEdge[] = [];
  for (const file of tree.files) {
    const from = model.layerOf(file.path);
    if (!from) continue;
    for (const target of file.imports) {
      const to = model.layerOf(target);
      if (!to || model.classifyEdge(from.name, to.name) !== kind) continue;
      edges.push({
        file: file.path,
        target,
        fromLayer: from.name,
        toLayer: to.name,
        line: file.importLines?.get(target) ?? null,
      });
    }
  }
  return edges;
}

/**
 * Error code: E001
 */
export class LayerDirectionCheck extends BaseCheck {
  readonly rule = 'layer_direction' as const;
  readonly errorCode = ErrorCodes.LAYER_DIRECTION;

  run(context: CheckContext): Violation[] {
    return edgesOfKind(context, 'reverse').map((edge) =>
      this.createViolation(
        edge.file,
        `Layer '${edge.fromLayer}' imports '${edge.target}' from layer '${edge.toLayer}', which depends on '${edge.fromLayer}'`,
        { line: edge.line, actual: edge.toLayer }
      )
    );
  }

  protected getFixHint(actual?: string): string {
    return `Invert the dependency: move the code '${actual ?? 'the upper layer'}' needs into a lower layer`;
  }
}

/**
 * Error code: E002
 */
export class LayerUndeclaredCheck extends BaseCheck {
  readonly rule = 'layer_undeclared' as const;
  readonly errorCode = ErrorCodes.LAYER_UNDECLARED;

  run(context: CheckContext): Violation[] {
    return edgesOfKind(context, 'undeclared').map((edge) =>
      this.createViolation(
        edge.file,
        `Layer '${edge.fromLayer}' imports '${edge.target}' from layer '${edge.toLayer}' without an allowed dependency`,
        { line: edge.line, actual: `${edge.fromLayer}:${edge.toLayer}` }
      )
    );
  }

  protected getFixHint(actual?: string): string {
    const [from, to] = (actual ?? ':').split(':');
    return `Route the import through the chain, or add '${to}' to can_import of '${from}'`;
  }
}
