import type { CompiledRule } from './compiler.js';
import { FUNCTION_GROUP } from './compiler.js';
import { renderTemplate } from './template.js';
import type { DetectionIssue, IssueFix } from './types.js';

const NO_ISSUE_FIX: IssueFix = Object.freeze({ kind: 'none' });

/** Offsets at which each line starts. */
function lineStarts(text: string): number[] {
  const starts = [0];
  for (let i = text.indexOf('\n'); i !== -1; i = text.indexOf('\n', i + 1)) {
    starts.push(i + 1);
  }
  return starts;
}

/** 1-based line and column of `offset`. */
export function positionAt(starts: readonly number[], offset: number): { line: number; column: number } {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (starts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: offset - starts[lo] + 1 };
}

/**
 * Runs one compiled rule over `text`. Matches never overlap; empty matches
 * are stepped over without producing an issue. AST rules find nothing here.
 */
export function detect(compiled: CompiledRule, text: string, filePath: string): DetectionIssue[] {
  const { rule, matcher } = compiled;
  if (!matcher) return [];

  const starts = lineStarts(text);
  const issues: DetectionIssue[] = [];
  // matchAll works on a copy of the regex, so the shared lastIndex is never touched
  for (const match of text.matchAll(matcher)) {
    const matched = match[0];
    if (matched.length === 0) continue;
    const start = match.index ?? 0;
    const { line, column } = positionAt(starts, start);

    const vars: Record<string, string> = {};
    for (const [group, value] of Object.entries(match.groups ?? {})) {
      if (value !== undefined) vars[group] = value;
    }
    Object.assign(vars, {
      matched,
      file: filePath,
      line: String(line),
      column: String(column),
      rule: rule.name,
    });

    let fix = NO_ISSUE_FIX;
    if (rule.fix.kind === 'template') {
      const calledName = rule.detector.kind === 'call' ? vars[FUNCTION_GROUP] : undefined;
      fix = {
        kind: 'replace',
        start,
        end: start + (calledName ?? matched).length,
        replacement: renderTemplate(rule.fix.template, vars),
      };
    }

    const issue: DetectionIssue = {
      ruleName: rule.name,
      severity: rule.severity,
      filePath,
      line,
      column,
      message: renderTemplate(rule.messageTemplate, vars),
      matchedText: matched,
      fix,
    };
    issues.push(Object.freeze(issue));
  }
  return issues;
}
