import { promises as fs } from 'node:fs';
import { FixApplicationError, errorMessage } from '../../infra/errors.js';
import { decodeUtf8, writeFileAtomic } from '../../infra/fs-utils.js';
import { err, ok } from '../../infra/types.js';
import type { Result } from '../../infra/types.js';
import { Logger } from '../../logging/logger.js';
import { KeyedLock } from '../../orchestration/pool.js';
import { applyFixes } from './fixer.js';
import type { DetectionIssue, FixOutcome } from './types.js';

export interface FixWriteOptions {
  dryRun?: boolean;
  /** Text the issues were detected in; the write is refused if the file no longer holds it. */
  expectedText?: string;
}

export interface FixWriteResult extends FixOutcome {
  path: string;
  written: boolean;
}

/**
 * Applies fixes to files on disk. Writers to one path queue behind each other;
 * different paths proceed concurrently. Each write goes through a temp file.
 * Files that are not valid UTF-8 are never rewritten.
 */
export class FixWriter {
  private locks = new KeyedLock();

  constructor(private logger: Logger = Logger.silent()) {}

  apply(
    path: string,
    issues: readonly DetectionIssue[],
    opts: FixWriteOptions = {},
  ): Promise<Result<FixWriteResult, FixApplicationError>> {
    return this.locks.run(path, async () => {
      let bytes: Buffer;
      try {
        bytes = await fs.readFile(path);
      } catch (e) {
        return err(new FixApplicationError(path, errorMessage(e), { cause: e }));
      }
      const original = decodeUtf8(bytes);
      if (original === null) return err(new FixApplicationError(path, 'not valid UTF-8'));
      if (opts.expectedText !== undefined && opts.expectedText !== original) {
        return err(new FixApplicationError(path, 'file changed since it was scanned'));
      }

      const outcome = applyFixes(original, issues);
      const changed = outcome.content !== original;
      if (opts.dryRun || !changed) {
        return ok({ ...outcome, path, written: false });
      }

      try {
        await writeFileAtomic(path, outcome.content);
      } catch (e) {
        return err(new FixApplicationError(path, errorMessage(e), { cause: e }));
      }
      this.logger.info('Fixes written', { path, applied: outcome.applied.length, skipped: outcome.skipped.length });
      return ok({ ...outcome, path, written: true });
    });
  }
}
