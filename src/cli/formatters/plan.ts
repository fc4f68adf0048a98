/**
 * Output formatters for build plans.
 */
import chalk from 'chalk';
import type { BuildPlan } from '../../core/app/types.js';

export type OutputFormat = 'human' | 'json';

export interface PlanFormatOptions {
  colors: boolean;
}

export function formatPlanJson(plan: BuildPlan): string {
  return JSON.stringify(plan, null, 2);
}

/**
 * One numbered line per package in build order, with its dependencies.
 */
export function formatPlanHuman(plan: BuildPlan, options: PlanFormatOptions = { colors: true }): string {
  const paint = (text: string, style: 'bold' | 'dim' | 'cyan'): string =>
    options.colors ? chalk[style](text) : text;

  const lines: string[] = [paint('Build order', 'bold')];
  const width = String(plan.packages.length).length;

  plan.packages.forEach((pkg, i) => {
    const marks: string[] = [];
    if (pkg.hasInit) marks.push('init');
    if (pkg.isShadow) marks.push('shadow');
    if (pkg.baseDir !== undefined) marks.push(`workspace: ${pkg.baseDir}`);

    const suffix = marks.length > 0 ? ` ${paint(`[${marks.join(', ')}]`, 'dim')}` : '';
    lines.push(`${String(i + 1).padStart(width)}. ${paint(pkg.importPath, 'cyan')}${suffix}`);
    if (pkg.dependencies.length > 0) {
      lines.push(`${' '.repeat(width + 2)}${paint(`depends on: ${pkg.dependencies.join(', ')}`, 'dim')}`);
    }
  });

  lines.push('');
  lines.push(`Root packages: ${plan.rootPackages.length > 0 ? plan.rootPackages.join(', ') : '(none)'}`);
  return lines.join('\n');
}

export function formatPlan(plan: BuildPlan, format: OutputFormat, options?: PlanFormatOptions): string {
  return format === 'json' ? formatPlanJson(plan) : formatPlanHuman(plan, options);
}
