/**
 * Layout plan output: an indented tree for people, JSON for tools.
 */
import chalk from 'chalk';
import type { LayoutPlan, PlannedFile } from '../../core/planner/types.js';
import type { PlanReconciliation } from '../../core/planner/reconcile.js';
import type { ValidationReport } from '../../core/validation/types.js';

export interface PlanView {
  plan: LayoutPlan;
  validation: ValidationReport;
  reconciliation?: PlanReconciliation;
}

export function formatPlanJson(view: PlanView): string {
  return JSON.stringify(
    {
      plan: view.plan,
      validation: {
        passed: view.validation.passed,
        summary: view.validation.summary,
        violations: view.validation.violations,
      },
      ...(view.reconciliation && {
        reconciliation: {
          create: view.reconciliation.create.map((f) => f.path),
          existing: view.reconciliation.existing.map((f) => f.path),
          extra: view.reconciliation.extra,
        },
      }),
    },
    null,
    2
  );
}

export function formatPlanHuman(view: PlanView, options: { colors?: boolean } = {}): string {
  const colors = options.colors ?? true;
  const dim = (s: string): string => (colors ? chalk.dim(s) : s);
  const green = (s: string): string => (colors ? chalk.green(s) : s);
  const red = (s: string): string => (colors ? chalk.red(s) : s);

  const { plan, validation, reconciliation } = view;
  const existing = new Set(reconciliation?.existing.map((f) => f.path) ?? []);
  const imports = new Map<string, number>();
  for (const edge of plan.edges) {
    imports.set(edge.from, (imports.get(edge.from) ?? 0) + 1);
  }

  const byDir = new Map<string, PlannedFile[]>();
  for (const file of plan.files) {
    const dir = file.path.includes('/') ? file.path.slice(0, file.path.lastIndexOf('/')) : '.';
    const list = byDir.get(dir) ?? [];
    list.push(file);
    byDir.set(dir, list);
  }

  const lines: string[] = [`Plan ${plan.digest} (${plan.language}, root ${plan.root || '.'})`, ''];
  for (const [dir, files] of byDir) {
    lines.push(`${dir}/ ${dim(`[${files[0].layer}]`)}`);
    for (const file of files) {
      const name = file.path.slice(dir === '.' ? 0 : dir.length + 1);
      const count = imports.get(file.path) ?? 0;
      const notes = [
        count > 0 ? `${count} import${count === 1 ? '' : 's'}` : '',
        existing.has(file.path) ? 'exists' : '',
      ].filter((n) => n.length > 0);
      lines.push(`  ${name}${notes.length > 0 ? ` ${dim(`(${notes.join(', ')})`)}` : ''}`);
    }
  }

  lines.push('');
  lines.push(`${plan.files.length} files, ${plan.edges.length} imports`);
  if (reconciliation) {
    lines.push(`${reconciliation.create.length} to create, ${reconciliation.existing.length} existing`);
    if (reconciliation.extra.length > 0) {
      lines.push(`Not in plan: ${reconciliation.extra.join(', ')}`);
    }
  }
  if (validation.passed) {
    lines.push(green('Plan satisfies the rules'));
  } else {
    lines.push(red(`Plan violates the rules (${validation.summary.errors} errors, ${validation.summary.warnings} warnings)`));
    for (const v of validation.violations) {
      lines.push(`  ${v.file}: ${v.code} ${v.message}`);
    }
  }
  return lines.join('\n');
}
