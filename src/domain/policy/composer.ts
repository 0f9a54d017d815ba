import { Logger } from '../../logging/logger.js';
import { compileRule } from '../detection/compiler.js';
import type { CompiledRule } from '../detection/compiler.js';
import { sliceRules } from '../rule/store.js';
import type { ProfileDocument, RuleDefinition } from '../rule/types.js';
import type { ComposeInput, EffectivePolicy } from './types.js';

/**
 * Merges the override and the activated profiles into one policy.
 *
 * A name in both the enabled and the disabled set is disabled. Reference
 * problems (unknown rules, unknown slices, duplicate names, bad patterns) end
 * up as warnings on the policy and never fail composition.
 */
export class RuleComposer {
  constructor(private logger: Logger = Logger.silent()) {}

  compose(input: ComposeInput): EffectivePolicy {
    const { mode, override, store } = input;
    const warnings: string[] = [];
    const warn = (message: string) => {
      warnings.push(message);
      this.logger.warn(message);
    };

    const requested = new Set(input.activatedProfiles);
    const profiles: ProfileDocument[] = store.profiles.filter((p) => requested.has(p.metadata.name));
    for (const name of requested) {
      if (!store.profile(name)) warn(`Activated profile "${name}" is not defined`);
    }

    const enabled = new Set<string>(override.enabledChecks);
    const disabled = new Set<string>(override.disabledChecks);
    for (const profile of profiles) {
      profile.checks.enable.forEach((n) => enabled.add(n));
      profile.checks.disable.forEach((n) => disabled.add(n));
    }

    const candidates: RuleDefinition[] = [];
    if (store.base) candidates.push(...store.base.rules);
    const seenSlices = new Set<string>();
    for (const profile of profiles) {
      for (const sliceName of profile.slices) {
        if (seenSlices.has(sliceName)) continue;
        seenSlices.add(sliceName);
        const slice = store.slice(sliceName);
        if (!slice) {
          warn(`Profile "${profile.metadata.name}" references unknown slice "${sliceName}"`);
          continue;
        }
        candidates.push(...sliceRules(slice));
      }
    }
    candidates.push(...override.rules);
    for (const doc of store.activeRules) candidates.push(...doc.rules);

    const unique = new Map<string, RuleDefinition>();
    for (const rule of candidates) {
      const first = unique.get(rule.name);
      if (first) {
        warn(`Duplicate rule "${rule.name}" in ${rule.source} ignored (first declared in ${first.source})`);
        continue;
      }
      unique.set(rule.name, rule);
    }

    const known = store.allRuleNames();
    override.rules.forEach((r) => known.add(r.name));
    for (const name of enabled) {
      if (!known.has(name)) warn(`Enabled check "${name}" does not name any rule`);
    }
    for (const name of disabled) {
      if (!known.has(name)) warn(`Disabled check "${name}" does not name any rule`);
    }

    const runs = (name: string) =>
      !disabled.has(name) && (mode === 'denylist' || enabled.has(name));

    const rules: CompiledRule[] = [];
    for (const rule of unique.values()) {
      if (!runs(rule.name)) continue;
      const compiled = compileRule(rule);
      if (!compiled.ok) {
        warn(`${compiled.error.message}; rule skipped`);
        continue;
      }
      rules.push(compiled.value);
    }

    this.logger.debug('Policy composed', {
      mode,
      profiles: profiles.length,
      candidates: unique.size,
      rules: rules.length,
    });

    const policy: EffectivePolicy = {
      mode,
      enabled,
      disabled,
      rules: Object.freeze(rules),
      activatedProfiles: Object.freeze(profiles.map((p) => p.metadata.name)),
      warnings: Object.freeze(warnings),
    };
    return Object.freeze(policy);
  }
}
