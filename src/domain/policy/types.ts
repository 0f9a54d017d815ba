import type { CompiledRule } from '../detection/compiler.js';
import type { OverrideDocument, PolicyMode } from '../rule/types.js';
import type { RuleStore } from '../rule/store.js';

/** The rules one invocation runs. Rebuilt every time, never stored. */
export interface EffectivePolicy {
  readonly mode: PolicyMode;
  readonly enabled: ReadonlySet<string>;
  readonly disabled: ReadonlySet<string>;
  /** Rules that run, in candidate order. */
  readonly rules: readonly CompiledRule[];
  readonly activatedProfiles: readonly string[];
  readonly warnings: readonly string[];
}

export interface ComposeInput {
  mode: PolicyMode;
  override: OverrideDocument;
  /** Profiles to expand; order follows the store's profile order regardless of iteration order here. */
  activatedProfiles: Iterable<string>;
  store: RuleStore;
}
