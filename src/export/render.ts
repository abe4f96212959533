/**
 * Plan export - renders build plans and resolved targets for people and tools.
 */

import { stringify } from 'yaml';
import type {
  Expression,
  PlanEntry,
  Requirements,
  ResolvedPreset,
  ResolvedTarget,
} from '../core/types.js';
import { formatCondition } from '../expr/parse.js';

export type PlanFormat = 'text' | 'json' | 'yaml';

export const PLAN_FORMATS: readonly PlanFormat[] = ['text', 'json', 'yaml'];

export function isPlanFormat(value: string): value is PlanFormat {
  return PLAN_FORMATS.some((entry) => entry === value);
}

const LABEL_WIDTH = 10;

function field(label: string, values: readonly string[]): string | null {
  if (values.length === 0) return null;
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${values.join(' ')}`;
}

function renderEntryText(entry: PlanEntry): string {
  const lines = [
    `${entry.name} (${entry.kind})`,
    field('sources', entry.sources),
    field('includes', entry.includeDirs),
    field('defines', entry.definitions),
    field('options', entry.options),
    field('links', entry.linkDependencies),
  ];
  return lines.filter((line): line is string => line !== null).join('\n');
}

export function renderPlan(plan: readonly PlanEntry[], format: PlanFormat = 'text'): string {
  switch (format) {
    case 'json':
      return JSON.stringify(plan, null, 2);
    case 'yaml':
      return stringify({ plan }, { lineWidth: 0 });
    case 'text':
      return plan.map(renderEntryText).join('\n\n');
  }
}

/**
 * One entry as written in a manifest, its condition (if any) in brackets.
 */
export function formatExpression(expression: Expression): string {
  if (expression.kind === 'literal') return expression.value;
  return `${expression.value} [if ${formatCondition(expression.when)}]`;
}

function renderRequirements(title: string, requirements: Requirements): string[] {
  const lines = [`  ${title}:`];
  const groups: [string, readonly Expression[]][] = [
    ['includes', requirements.includeDirs],
    ['defines', requirements.definitions],
    ['options', requirements.options],
  ];

  let empty = true;
  for (const [label, entries] of groups) {
    for (const entry of entries) {
      lines.push(`    ${`${label}:`.padEnd(LABEL_WIDTH)}${formatExpression(entry)}`);
      empty = false;
    }
  }
  if (empty) lines.push('    (none)');
  return lines;
}

export function renderResolvedTarget(target: ResolvedTarget): string {
  const lines = [`${target.name} (${target.kind})`];

  if (target.sources.length > 0) {
    lines.push(`  sources: ${target.sources.join(' ')}`);
  }
  for (const edge of target.edges) {
    lines.push(`  depends: ${edge.to} (${edge.visibility})`);
  }
  lines.push(...renderRequirements('effective', target.effective));
  lines.push(...renderRequirements('exported', target.exported));
  if (target.linkDependencies.length > 0) {
    lines.push(`  links: ${target.linkDependencies.join(' ')}`);
  }

  return lines.join('\n');
}

export function renderPreset(preset: ResolvedPreset): string {
  const lines = [`${preset.name} (${preset.chain.join(' → ')})`];
  for (const [key, value] of Object.entries(preset.context)) {
    lines.push(`  ${key}: ${value ?? '(unset)'}`);
  }
  const variables = Object.entries(preset.variables);
  if (variables.length > 0) {
    lines.push('  variables:');
    for (const [key, value] of variables) {
      lines.push(`    ${key}=${value}`);
    }
  }
  return lines.join('\n');
}
