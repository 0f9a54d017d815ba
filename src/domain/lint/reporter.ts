import type { RulegateConfig } from '../config/types.js';
import type { DetectionIssue } from '../detection/types.js';
import { SEVERITIES } from '../rule/types.js';
import type { Severity } from '../rule/types.js';
import type { LintReport } from './types.js';

export const SEVERITY_ICONS: Readonly<Record<Severity, string>> = {
  critical: '🚫',
  error: '❌',
  warning: '⚠️',
  info: 'ℹ️',
};

const STRONGEST_FIRST: readonly Severity[] = [...SEVERITIES].reverse();

export function hasBlockingIssues(report: LintReport): boolean {
  return report.issues.some((i) => i.severity === 'error' || i.severity === 'critical');
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

export function formatIssue(issue: DetectionIssue, showRuleNames: boolean): string {
  const location = issue.line === undefined ? issue.filePath : `${issue.filePath}:${issue.line}:${issue.column ?? 1}`;
  const rule = showRuleNames ? ` [${issue.ruleName}]` : '';
  return `${SEVERITY_ICONS[issue.severity]} ${location} ${issue.severity}: ${issue.message}${rule}`;
}

/** Keeps the first `max` issues of each rule; `max` 0 keeps all. */
function capPerRule(issues: readonly DetectionIssue[], max: number): { shown: DetectionIssue[]; hidden: Map<string, number> } {
  const hidden = new Map<string, number>();
  if (max <= 0) return { shown: [...issues], hidden };
  const seen = new Map<string, number>();
  const shown: DetectionIssue[] = [];
  for (const issue of issues) {
    const count = (seen.get(issue.ruleName) ?? 0) + 1;
    seen.set(issue.ruleName, count);
    if (count <= max) shown.push(issue);
    else hidden.set(issue.ruleName, (hidden.get(issue.ruleName) ?? 0) + 1);
  }
  return { shown, hidden };
}

export function summarize(report: LintReport): string {
  const files = plural(report.filesScanned, 'file');
  if (report.issues.length === 0) return `No issues found in ${files}`;
  const counts = STRONGEST_FIRST
    .map((s) => [s, report.issues.filter((i) => i.severity === s).length] as const)
    .filter(([, n]) => n > 0)
    .map(([s, n]) => `${n} ${s}`);
  return `${plural(report.issues.length, 'issue')} (${counts.join(', ')}) in ${files}`;
}

export function formatReport(report: LintReport, output: RulegateConfig['output']): string {
  const lines: string[] = [];
  const { shown, hidden } = capPerRule(report.issues, output.maxIssuesPerRule);

  if (output.groupBySeverity) {
    for (const severity of STRONGEST_FIRST) {
      const group = shown.filter((i) => i.severity === severity);
      if (group.length === 0) continue;
      lines.push(`${severity.toUpperCase()} (${group.length})`);
      lines.push(...group.map((i) => `  ${formatIssue(i, output.showRuleNames)}`));
    }
  } else {
    lines.push(...shown.map((i) => formatIssue(i, output.showRuleNames)));
  }

  for (const [rule, count] of hidden) {
    lines.push(`... ${plural(count, 'more issue')} from ${rule} not shown`);
  }

  if (report.errors.length > 0) {
    lines.push('', 'Errors:');
    lines.push(...report.errors.map((e) => `  ${e.filePath}: ${e.message}`));
  }

  if (report.fixes.length > 0) {
    const applied = report.fixes.reduce((n, f) => n + f.applied, 0);
    const verb = report.fixMode === 'dry-run' ? 'Would fix' : 'Fixed';
    lines.push('', `${verb} ${plural(applied, 'issue')} in ${plural(report.fixes.length, 'file')}`);
  }

  if (lines.length > 0) lines.push('');
  lines.push(summarize(report));
  return lines.join('\n');
}
