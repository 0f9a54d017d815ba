import { EMPTY_OVERRIDE } from './types.js';
import type {
  ActiveRuleDocument, BaseDocument, OverrideDocument, ProfileDocument,
  RuleDefinition, SliceDocument,
} from './types.js';

export interface RuleStoreInit {
  base?: BaseDocument;
  override?: OverrideDocument;
  slices?: readonly SliceDocument[];
  profiles?: readonly ProfileDocument[];
  activeRules?: readonly ActiveRuleDocument[];
}

/**
 * Every rule document one invocation works with. Built once, never mutated;
 * tests build stores directly with `RuleStore.from` instead of reading disk.
 */
export class RuleStore {
  readonly base?: BaseDocument;
  readonly override: OverrideDocument;
  readonly slices: readonly SliceDocument[];
  readonly profiles: readonly ProfileDocument[];
  readonly activeRules: readonly ActiveRuleDocument[];
  /** Duplicate slice or profile names seen while building; the first declaration is kept. */
  readonly warnings: readonly string[];

  private readonly sliceIndex: ReadonlyMap<string, SliceDocument>;
  private readonly profileIndex: ReadonlyMap<string, ProfileDocument>;

  private constructor(init: RuleStoreInit) {
    const warnings: string[] = [];
    this.base = init.base;
    this.override = init.override ?? EMPTY_OVERRIDE;
    this.sliceIndex = indexByName(init.slices ?? [], 'slice', warnings);
    this.profileIndex = indexByName(init.profiles ?? [], 'profile', warnings);
    this.slices = Object.freeze([...this.sliceIndex.values()]);
    this.profiles = Object.freeze([...this.profileIndex.values()]);
    this.activeRules = Object.freeze((init.activeRules ?? []).filter((doc) => doc.enabled));
    this.warnings = Object.freeze(warnings);
    Object.freeze(this);
  }

  static from(init: RuleStoreInit): RuleStore {
    return new RuleStore(init);
  }

  static empty(): RuleStore {
    return new RuleStore({});
  }

  slice(name: string): SliceDocument | undefined {
    return this.sliceIndex.get(name);
  }

  profile(name: string): ProfileDocument | undefined {
    return this.profileIndex.get(name);
  }

  /** Every rule name declared in any document, used to flag dangling enable/disable references. */
  allRuleNames(): Set<string> {
    const names = new Set<string>();
    const add = (rules: readonly RuleDefinition[]) => rules.forEach((r) => names.add(r.name));
    if (this.base) add(this.base.rules);
    add(this.override.rules);
    for (const slice of this.slices) add(sliceRules(slice));
    for (const doc of this.activeRules) add(doc.rules);
    return names;
  }
}

export function sliceRules(slice: SliceDocument): RuleDefinition[] {
  const rules: RuleDefinition[] = [];
  for (const list of slice.categories.values()) rules.push(...list);
  return rules;
}

function indexByName<T extends { metadata: { name: string }; source: string }>(
  docs: readonly T[],
  kind: string,
  warnings: string[],
): Map<string, T> {
  const index = new Map<string, T>();
  for (const doc of docs) {
    const existing = index.get(doc.metadata.name);
    if (existing) {
      warnings.push(`Duplicate ${kind} "${doc.metadata.name}" in ${doc.source} ignored (already declared in ${existing.source})`);
      continue;
    }
    index.set(doc.metadata.name, doc);
  }
  return index;
}
