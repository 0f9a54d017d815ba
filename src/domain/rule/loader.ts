import { join } from 'node:path';
import { readdirOrEmpty, readFileOrNull } from '../../infra/fs-utils.js';
import { DocumentError, DocumentLoadError, errorMessage } from '../../infra/errors.js';
import type { Logger } from '../../logging/logger.js';
import {
  parseActiveRuleDocument, parseBaseDocument, parseOverrideDocument,
  parseProfileDocument, parseSliceDocument,
} from './documents.js';
import { RuleStore } from './store.js';
import type { ActiveRuleDocument, ProfileDocument, SliceDocument } from './types.js';

export const BASE_FILE = 'base.toml';
export const OVERRIDE_FILE = 'override.toml';
export const SLICES_DIR = 'slices';
export const PROFILES_DIR = 'profiles';
export const ACTIVE_DIR = 'active';

/**
 * Reads a config directory into a `RuleStore`.
 *
 * Every document is parsed before anything is returned; if any of them is
 * malformed the whole load fails with one `DocumentLoadError` listing each file.
 */
export class RuleStoreLoader {
  constructor(private logger?: Logger) {}

  async load(configDir: string): Promise<RuleStore> {
    const errors: DocumentError[] = [];

    const read = async <T>(path: string, parse: (raw: string, source: string) => T): Promise<T | undefined> => {
      let raw: string | null;
      try {
        raw = await readFileOrNull(path);
      } catch (e) {
        errors.push(new DocumentError(path, [`unreadable: ${errorMessage(e)}`], { cause: e }));
        return undefined;
      }
      if (raw === null) return undefined;
      try {
        return parse(raw, path);
      } catch (e) {
        if (e instanceof DocumentError) {
          errors.push(e);
          return undefined;
        }
        throw e;
      }
    };

    const readDir = async <T>(dir: string, parse: (raw: string, source: string) => T): Promise<T[]> => {
      const docs: T[] = [];
      for (const file of await readdirOrEmpty(join(configDir, dir))) {
        if (!file.endsWith('.toml')) continue;
        const doc = await read(join(configDir, dir, file), parse);
        if (doc !== undefined) docs.push(doc);
      }
      return docs;
    };

    const base = await read(join(configDir, BASE_FILE), parseBaseDocument);
    const override = await read(join(configDir, OVERRIDE_FILE), parseOverrideDocument);
    const slices: SliceDocument[] = await readDir(SLICES_DIR, parseSliceDocument);
    const profiles: ProfileDocument[] = await readDir(PROFILES_DIR, parseProfileDocument);
    const active: ActiveRuleDocument[] = await readDir(ACTIVE_DIR, parseActiveRuleDocument);

    if (errors.length > 0) throw new DocumentLoadError(errors);

    for (const doc of active) {
      if (!doc.enabled) this.logger?.debug('Skipping disabled active rule document', { source: doc.source });
    }

    const store = RuleStore.from({ base, override, slices, profiles, activeRules: active });
    for (const warning of store.warnings) this.logger?.warn(warning);
    this.logger?.debug('Rule store loaded', {
      configDir,
      slices: store.slices.length,
      profiles: store.profiles.length,
      activeRules: store.activeRules.length,
    });
    return store;
  }
}
