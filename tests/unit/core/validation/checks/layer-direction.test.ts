/**
 * Tests for layer direction checks (E001, E002).
 */
import { describe, it, expect } from 'vitest';
import { LayerDirectionCheck, LayerUndeclaredCheck } from '../../../../../src/core/validation/checks/layer-direction.js';
import type { CheckContext } from '../../../../../src/core/validation/types.js';
import type { SourceFile } from '../../../../../src/core/tree/types.js';
import { resolveRules } from '../../../../../src/core/rules/loader.js';

const model = resolveRules({
  root: 'src',
  chain: 'repository -> service -> handler',
  layers: [
    { name: 'domain', directory: 'domain', tests: false },
    { name: 'repository', directory: 'repositories', suffix: 'repository', can_import: ['domain'] },
    { name: 'service', directory: 'services', suffix: 'service', can_import: ['domain'] },
    { name: 'handler', directory: 'handlers', suffix: 'handler', can_import: ['domain'] },
  ],
});

function contextFor(files: SourceFile[]): CheckContext {
  return { model, tree: { files }, files: new Map(files.map((f) => [f.path, f])) };
}

const files: SourceFile[] = [
  {
    path: 'src/repositories/order-repository.ts',
    imports: ['src/domain/order.ts', 'src/services/order-service.ts'],
    importLines: new Map([
      ['src/domain/order.ts', 1],
      ['src/services/order-service.ts', 3],
    ]),
  },
  { path: 'src/services/order-service.ts', imports: ['src/domain/order.ts', 'src/repositories/order-repository.ts'] },
  { path: 'src/handlers/order-handler.ts', imports: ['src/repositories/order-repository.ts'] },
  { path: 'src/domain/order.ts', imports: [] },
  { path: 'src/main.ts', imports: ['src/handlers/order-handler.ts'] },
];

describe('LayerDirectionCheck', () => {
  it('should report imports against the dependency direction', () => {
    const violations = new LayerDirectionCheck().run(contextFor(files));

    expect(violations).toEqual([
      {
        code: 'E001',
        rule: 'layer_direction',
        severity: 'error',
        file: 'src/repositories/order-repository.ts',
        line: 3,
        message:
          "Layer 'repository' imports 'src/services/order-service.ts' from layer 'service', which depends on 'repository'",
        fixHint: "Invert the dependency: move the code 'service' needs into a lower layer",
      },
    ]);
  });

  it('should catch leaf layers importing upward', () => {
    const violations = new LayerDirectionCheck().run(
      contextFor([{ path: 'src/domain/order.ts', imports: ['src/handlers/order-handler.ts'] }])
    );

    expect(violations).toHaveLength(1);
    expect(violations[0].line).toBeNull();
  });
});

describe('LayerUndeclaredCheck', () => {
  it('should report imports that skip a layer', () => {
    const violations = new LayerUndeclaredCheck().run(contextFor(files));

    expect(violations).toHaveLength(1);
    expect(violations[0]).toMatchObject({
      code: 'E002',
      file: 'src/handlers/order-handler.ts',
      message:
        "Layer 'handler' imports 'src/repositories/order-repository.ts' from layer 'repository' without an allowed dependency",
      fixHint: "Route the import through the chain, or add 'repository' to can_import of 'handler'",
    });
  });

  it('should ignore imports from unlayered files', () => {
    const violations = new LayerUndeclaredCheck().run(
      contextFor([{ path: 'src/main.ts', imports: ['src/repositories/order-repository.ts'] }])
    );
    expect(violations).toEqual([]);
  });
});
