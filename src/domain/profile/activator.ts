import { Minimatch } from 'minimatch';
import { errorMessage } from '../../infra/errors.js';
import { Logger } from '../../logging/logger.js';
import type { ContentActivation, ProfileDocument } from '../rule/types.js';
import { HEADER_BYTES } from './types.js';
import type { ProjectEvidence } from './types.js';

const ALL_FILES = ['**/*'];

export class ProfileActivator {
  constructor(private logger: Logger = Logger.silent()) {}

  /**
   * Names of the profiles whose activation predicate holds. Profiles are
   * checked concurrently and never look at each other; the result keeps the
   * order of `profiles`.
   */
  async activate(profiles: readonly ProfileDocument[], evidence: ProjectEvidence): Promise<Set<string>> {
    const verdicts = await Promise.all(profiles.map((profile) => this.isActive(profile, evidence)));
    return new Set(profiles.filter((_, i) => verdicts[i]).map((p) => p.metadata.name));
  }

  async isActive(profile: ProfileDocument, evidence: ProjectEvidence): Promise<boolean> {
    const name = profile.metadata.name;
    const { activation } = profile;

    for (const indicator of activation.indicators) {
      if (await evidence.pathExists(indicator)) {
        this.logger.debug('Profile activated by indicator', { profile: name, indicator });
        return true;
      }
    }

    for (const path of activation.paths) {
      if (await evidence.pathExists(path)) {
        this.logger.debug('Profile activated by path', { profile: name, path });
        return true;
      }
    }

    for (const pattern of activation.globs) {
      const matcher = this.compileGlob(pattern, name);
      if (matcher && evidence.files.some((f) => matcher.match(f))) {
        this.logger.debug('Profile activated by glob', { profile: name, glob: pattern });
        return true;
      }
    }

    for (const trigger of activation.content) {
      const file = await this.findContentMatch(trigger, evidence, name);
      if (file !== undefined) {
        this.logger.debug('Profile activated by content', { profile: name, file });
        return true;
      }
    }

    return false;
  }

  private async findContentMatch(
    trigger: ContentActivation,
    evidence: ProjectEvidence,
    profile: string,
  ): Promise<string | undefined> {
    const matchers = (trigger.globs.length > 0 ? trigger.globs : ALL_FILES)
      .map((g) => this.compileGlob(g, profile))
      .filter((m): m is Minimatch => m !== null);
    const limit = trigger.position === 'header' ? HEADER_BYTES : undefined;

    for (const file of evidence.files) {
      if (!matchers.some((m) => m.match(file))) continue;
      let text: string;
      try {
        text = await evidence.readText(file, limit);
      } catch (e) {
        this.logger.debug('Unreadable file skipped during activation', { profile, file, error: errorMessage(e) });
        continue;
      }
      if (trigger.matches.some((needle) => text.includes(needle))) return file;
    }
    return undefined;
  }

  private compileGlob(pattern: string, profile: string): Minimatch | null {
    try {
      return new Minimatch(pattern, { dot: true });
    } catch (e) {
      this.logger.warn('Invalid activation glob', { profile, glob: pattern, error: errorMessage(e) });
      return null;
    }
  }
}
