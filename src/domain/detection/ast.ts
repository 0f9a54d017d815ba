import type { EffectivePolicy } from '../policy/types.js';
import { renderTemplate } from './template.js';
import type { DetectionIssue } from './types.js';

/** One result from an external AST query run for an `ast` rule. */
export interface AstFinding {
  ruleId: string;
  file: string;
  line: number;
  column: number;
  matchedText: string;
}

/**
 * Turns findings into issues using the severity and message of the `ast`
 * rule they name. Findings for rules the policy does not run are dropped.
 */
export async function astFindingsToIssues(
  findings: AsyncIterable<AstFinding> | Iterable<AstFinding>,
  policy: EffectivePolicy,
): Promise<DetectionIssue[]> {
  const astRules = new Map(
    policy.rules
      .filter((c) => c.rule.detector.kind === 'ast')
      .map((c) => [c.rule.name, c.rule] as const),
  );

  const issues: DetectionIssue[] = [];
  for await (const finding of findings) {
    const rule = astRules.get(finding.ruleId);
    if (!rule) continue;
    const vars = {
      matched: finding.matchedText,
      file: finding.file,
      line: String(finding.line),
      column: String(finding.column),
      rule: rule.name,
    };
    const issue: DetectionIssue = {
      ruleName: rule.name,
      severity: rule.severity,
      filePath: finding.file,
      line: finding.line,
      column: finding.column,
      message: renderTemplate(rule.messageTemplate, vars),
      matchedText: finding.matchedText,
      fix: { kind: 'none' },
    };
    issues.push(Object.freeze(issue));
  }
  return issues;
}
