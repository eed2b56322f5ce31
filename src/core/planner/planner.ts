/**
 * Layout planner - maps a feature set onto the layers of a rule model.
 *
 * Planning is a pure function of its inputs: files and edges are sorted and
 * fingerprinted, so planning the same descriptor twice yields the same plan.
 */
import * as path from 'node:path';
import { toCase } from '../naming/case.js';
import { computeChecksum } from '../../utils/checksum.js';
import { ErrorCodes, PlanError } from '../../utils/errors.js';
import { joinPosix } from '../../utils/file-system.js';
import type { RuleModel } from '../rules/model.js';
import type { ResolvedLayer } from '../rules/types.js';
import type { Entity, FeatureSet } from '../features/types.js';
import type { LayoutPlan, PlanEdge, PlannedFile } from './types.js';

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * File name (stem + extension) of a planned source file in a layer.
 */
export function plannedFileName(model: RuleModel, layer: ResolvedLayer, words: string[]): string {
  const stem = toCase([...layer.prefix, ...words, ...layer.suffix], model.naming.files);
  return `${stem}${layer.extension}`;
}

/**
 * Path of an entity's file in an entity-scoped layer.
 */
export function entityFilePath(model: RuleModel, layer: ResolvedLayer, entity: Entity): string {
  return joinPosix(layer.directory, plannedFileName(model, layer, entity.words));
}

export function planLayout(model: RuleModel, features: FeatureSet): LayoutPlan {
  const files: PlannedFile[] = [];
  const edges: PlanEdge[] = [];
  const byPath = new Map<string, PlannedFile>();

  const add = (file: PlannedFile): void => {
    const existing = byPath.get(file.path);
    if (existing) {
      throw new PlanError(
        ErrorCodes.PATH_COLLISION,
        `Planned path ${file.path} is claimed twice (${describe(existing)} and ${describe(file)})`,
        { path: file.path }
      );
    }
    if (file.kind === 'source' && model.isTestPath(file.path)) {
      throw new PlanError(
        ErrorCodes.SOURCE_NAMED_AS_TEST,
        `Planned source ${file.path} (${describe(file)}) is named like a test file (${model.tests.pattern}); rename it`,
        { path: file.path, entity: file.entity ?? null }
      );
    }
    byPath.set(file.path, file);
    files.push(file);
  };

  for (const layer of model.layers) {
    const sources: PlannedFile[] = [];

    if (layer.scope === 'entity') {
      for (const entity of features.entities) {
        sources.push({
          path: entityFilePath(model, layer, entity),
          layer: layer.name,
          kind: 'source',
          entity: entity.name,
          operations: entity.operations.map((op) => op.name),
        });
      }
    } else {
      for (const words of layer.files) {
        sources.push({
          path: joinPosix(layer.directory, plannedFileName(model, layer, words)),
          layer: layer.name,
          kind: 'source',
          operations: [],
        });
      }
    }

    for (const source of sources) {
      add(source);
      if (layer.tests && model.tests.colocated) {
        const testPath = model.testPathFor(source.path);
        add({
          path: testPath,
          layer: layer.name,
          kind: 'test',
          entity: source.entity,
          subject: source.path,
          operations: source.operations,
        });
        edges.push({ from: testPath, to: source.path, reason: 'test' });
      }
    }
  }

  const references = new Map<string, Set<string>>();
  for (const layer of model.layers) {
    if (layer.scope !== 'entity') continue;
    for (const entity of features.entities) {
      const from = entityFilePath(model, layer, entity);

      for (const usedName of layer.uses) {
        const used = model.getLayer(usedName);
        if (!used || used.scope !== 'entity') continue;
        edges.push({ from, to: entityFilePath(model, used, entity), reason: 'layer' });
      }

      if (layer.models) {
        for (const field of entity.fields) {
          if (!field.reference || field.reference === entity.name) continue;
          const target = features.entities.find((e) => e.name === field.reference);
          if (!target) continue;
          const to = entityFilePath(model, layer, target);
          // Mutual references keep only the first edge so model files stay acyclic
          if (reaches(references, to, from)) continue;
          addReference(references, from, to);
          edges.push({ from, to, reason: 'reference' });
        }
      }
    }
  }

  const uniqueEdges = new Map<string, PlanEdge>();
  for (const edge of edges) {
    uniqueEdges.set(`${edge.from}\0${edge.to}\0${edge.reason}`, edge);
  }
  const sortedEdges = [...uniqueEdges.values()].sort(
    (a, b) => compareStrings(a.from, b.from) || compareStrings(a.to, b.to) || compareStrings(a.reason, b.reason)
  );
  const sortedFiles = files.sort((a, b) => compareStrings(a.path, b.path));

  const directories = new Set<string>(model.layers.map((l) => l.directory));
  for (const file of sortedFiles) {
    directories.add(path.posix.dirname(file.path));
  }

  return {
    root: model.root,
    language: model.language,
    files: sortedFiles,
    directories: [...directories].sort(compareStrings),
    edges: sortedEdges,
    digest: computeChecksum(JSON.stringify({ files: sortedFiles, edges: sortedEdges })),
  };
}

function addReference(graph: Map<string, Set<string>>, from: string, to: string): void {
  const targets = graph.get(from) ?? new Set<string>();
  targets.add(to);
  graph.set(from, targets);
}

function reaches(graph: Map<string, Set<string>>, start: string, goal: string): boolean {
  const seen = new Set<string>();
  const stack = [start];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || seen.has(current)) continue;
    if (current === goal) return true;
    seen.add(current);
    stack.push(...(graph.get(current) ?? []));
  }
  return false;
}

function describe(file: PlannedFile): string {
  const owner = file.entity ? `${file.layer}/${file.entity}` : file.layer;
  return file.kind === 'test' ? `test of ${owner}` : owner;
}
