import type { DetectionIssue, FixOutcome, IssueFix } from './types.js';

type Replacement = DetectionIssue & { readonly fix: Extract<IssueFix, { kind: 'replace' }> };

function isReplacement(issue: DetectionIssue): issue is Replacement {
  return issue.fix.kind === 'replace';
}

/**
 * Applies every replace-fix to `text` and returns the new content. Spans are
 * applied from the end of the text backwards, so earlier offsets stay valid.
 * A span overlapping one already applied, or lying outside the text, is
 * skipped. Bytes outside the applied spans come through unchanged.
 */
export function applyFixes(text: string, issues: readonly DetectionIssue[]): FixOutcome {
  const candidates = issues
    .filter(isReplacement)
    .map((issue, order) => ({ issue, order }))
    .sort((a, b) => b.issue.fix.start - a.issue.fix.start || b.issue.fix.end - a.issue.fix.end || a.order - b.order);

  const applied: DetectionIssue[] = [];
  const skipped: DetectionIssue[] = [];
  let content = text;
  let floor = text.length;

  for (const { issue } of candidates) {
    const { start, end, replacement } = issue.fix;
    if (end > floor || start < 0 || end < start) {
      skipped.push(issue);
      continue;
    }
    content = content.slice(0, start) + replacement + content.slice(end);
    floor = start;
    applied.push(issue);
  }

  applied.reverse();
  return { content, applied, skipped };
}
