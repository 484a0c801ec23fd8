/**
 * Text formatting for analysis reports.
 */

import chalk from 'chalk';
import type { AnalysisReport } from '../analysis/DependencyAnalyzer.js';
import type { ClosureGraph } from '../graph/types.js';

export function formatClosure(closure: ClosureGraph): string[] {
  return Array.from(closure, ([pkg, refs]) => `  ${pkg}: [${refs.join(', ')}]`);
}

export function formatParameters(params: Array<[string, string]>): string[] {
  return [
    chalk.cyan('=== Configuration Parameters ==='),
    ...params.map(([key, value]) => `${chalk.dim(`${key}:`)} ${value}`),
    chalk.cyan('================================')
  ];
}

export function formatReport(report: AnalysisReport): string[] {
  const pkg = report.request.packageName;
  const reverse = report.direction === 'reverse';
  const lines: string[] = [];

  lines.push(chalk.cyan(`Analyzing package: ${pkg}`));
  lines.push(`${chalk.dim('Source:')} ${report.sourceName}`);
  lines.push(`${chalk.dim('Direction:')} ${report.direction}`);
  lines.push('');

  lines.push(chalk.cyan(reverse ? 'Reverse dependency graph:' : 'Dependency graph:'));
  lines.push(...formatClosure(report.closure));
  lines.push('');

  const label = reverse ? 'Transitive dependents' : 'Transitive dependencies';
  lines.push(`${chalk.dim(`${label}:`)} ${report.transitive.length}`);
  if (report.transitive.length > 0) {
    lines.push(`  ${report.transitive.join(', ')}`);
  }

  if (report.directReverse) {
    lines.push(`${chalk.dim('Direct dependents:')} ${report.directReverse.length > 0 ? report.directReverse.join(', ') : '(none)'}`);
  }

  if (report.tree !== undefined) {
    lines.push('');
    lines.push(chalk.cyan('ASCII tree:'));
    lines.push(report.tree);
  }

  if (report.graphDescription !== undefined) {
    lines.push('');
    lines.push(chalk.cyan('Graph description:'));
    lines.push(report.graphDescription.trimEnd());
    if (report.exportPath) {
      lines.push(`${chalk.dim('Saved to:')} ${report.exportPath}`);
    }
  }

  if (report.cycleCheck) {
    lines.push('');
    lines.push(chalk.cyan(`Cycle detection check (root ${report.cycleCheck.root}):`));
    lines.push(report.cycleCheck.detected ? chalk.yellow(report.cycleCheck.message) : report.cycleCheck.message);
  }

  return lines;
}

/**
 * Plain-object form of a report for --json
 */
export function reportToJson(report: AnalysisReport): Record<string, unknown> {
  return {
    ...report,
    closure: Object.fromEntries(report.closure)
  };
}
