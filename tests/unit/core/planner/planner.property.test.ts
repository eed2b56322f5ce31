/**
 * Property tests for layout planning against the bundled presets.
 */
import { describe, it, expect, beforeAll } from 'vitest';
import * as fc from 'fast-check';
import { planLayout } from '../../../../src/core/planner/planner.js';
import { reconcilePlan } from '../../../../src/core/planner/reconcile.js';
import { loadPreset } from '../../../../src/core/rules/loader.js';
import type { RuleModel } from '../../../../src/core/rules/model.js';
import { normalizeFeatures } from '../../../../src/core/features/normalize.js';
import type { RawFeature } from '../../../../src/core/features/types.js';
import { matchesCase, splitWords, toCase } from '../../../../src/core/naming/case.js';
import { treeFromPlan } from '../../../../src/core/tree/from-plan.js';
import { validateTree } from '../../../../src/core/validation/engine.js';
import { PlanError } from '../../../../src/utils/errors.js';

/** Entity names whose last word is "test" become `<stem>_test.go` in Go */
function endsInTestWord(name: string): boolean {
  const words = splitWords(name);
  return words.length >= 2 && words[words.length - 1] === 'test';
}

const entityNameArb = fc.stringMatching(/^[A-Za-z][A-Za-z0-9 _-]{0,10}$/);

// Entity names distinct after normalization, each entity referencing a subset of the others
function rawFeaturesArb(nameArb: fc.Arbitrary<string>): fc.Arbitrary<RawFeature[]> {
  return fc
    .uniqueArray(nameArb, { minLength: 1, maxLength: 5, selector: (name) => toCase(splitWords(name), 'PascalCase') })
    .chain((names) =>
      fc
        .array(fc.array(fc.nat({ max: names.length - 1 }), { maxLength: 3 }), {
          minLength: names.length,
          maxLength: names.length,
        })
        .map((refs): RawFeature[] =>
          names.map((name, i) => ({
            entity: name,
            operations: [],
            fields: [...new Set(refs[i])].map((target) => ({ name: `ref${target}`, type: names[target] })),
          }))
        )
    );
}

const plannableArb = rawFeaturesArb(entityNameArb.filter((name) => !endsInTestWord(name)));

describe.each(['web-typescript', 'web-go'])('planLayout properties (%s)', (preset) => {
  let model: RuleModel;

  beforeAll(async () => {
    model = await loadPreset(preset);
  });

  it('every planned file follows the naming style', () => {
    fc.assert(
      fc.property(plannableArb, (raw) => {
        const plan = planLayout(model, normalizeFeatures(raw));
        for (const file of plan.files) {
          expect(matchesCase(model.namingStem(file.path), model.naming.files)).toBe(true);
          expect(model.isTestPath(file.path)).toBe(file.kind === 'test');
        }
      })
    );
  });

  it('a planned tree passes validation without direction or cycle violations', () => {
    fc.assert(
      fc.property(plannableArb, (raw) => {
        const plan = planLayout(model, normalizeFeatures(raw));
        const report = validateTree(model, treeFromPlan(plan));

        expect(report.violations.filter((v) => ['E001', 'E002', 'E008'].includes(v.code))).toEqual([]);
        expect(report.passed).toBe(true);
      })
    );
  });

  it('planning is deterministic and a written plan reconciles to nothing', () => {
    fc.assert(
      fc.property(plannableArb, (raw) => {
        const first = planLayout(model, normalizeFeatures(raw));
        const second = planLayout(model, normalizeFeatures([...raw].reverse()));

        expect(second.digest).toBe(first.digest);
        expect(second.files).toEqual(first.files);

        const reconciled = reconcilePlan(first, model, first.files.map((f) => f.path));
        expect(reconciled.create).toEqual([]);
        expect(reconciled.extra).toEqual([]);
      })
    );
  });
});

describe('planLayout on web-go with test-like entity names', () => {
  let model: RuleModel;

  beforeAll(async () => {
    model = await loadPreset('web-go');
  });

  it('rejects the plan with P002', () => {
    const testLikeArb = entityNameArb.map((name) => `${name} test`);
    fc.assert(
      fc.property(testLikeArb, (name) => {
        let code: string | null = null;
        try {
          planLayout(model, normalizeFeatures([{ entity: name, operations: [], fields: [] }]));
        } catch (error) {
          if (!(error instanceof PlanError)) throw error;
          code = error.code;
        }
        expect(code).toBe('P002');
      })
    );
  });
});
