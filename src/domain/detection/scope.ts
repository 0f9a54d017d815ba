import { minimatch } from 'minimatch';
import type { RuleDefinition } from '../rule/types.js';

/**
 * Whether `filePath` is in scope for the rule. Rules without a `fileGlob`
 * apply everywhere; a glob without a slash matches against the basename.
 */
export function matchesFileGlob(rule: Pick<RuleDefinition, 'fileGlob'>, filePath: string): boolean {
  if (rule.fileGlob === undefined) return true;
  const posixPath = filePath.replace(/\\/g, '/').replace(/^\.\//, '');
  return minimatch(posixPath, rule.fileGlob, { dot: true, matchBase: true });
}
