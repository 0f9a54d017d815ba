import { Logger, stderrTransport } from '../logging/logger.js';
import type { LogLevel } from '../logging/logger.js';
import { resolveConfig } from '../domain/config/loader.js';
import { resolveConfigDir } from '../domain/config/paths.js';
import type { RulegateConfig } from '../domain/config/types.js';
import { RuleComposer } from '../domain/policy/composer.js';
import type { EffectivePolicy } from '../domain/policy/types.js';
import { ProfileActivator } from '../domain/profile/activator.js';
import type { ProjectEvidence } from '../domain/profile/types.js';
import { RuleStoreLoader } from '../domain/rule/loader.js';
import type { RuleStore } from '../domain/rule/store.js';

export interface RuntimeOptions {
  cwd?: string;
  /** `--config`; skips discovery when set. */
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Forces a level over the configured one. */
  logLevel?: LogLevel;
  logger?: Logger;
}

/** Everything one invocation needs, built fresh and dropped when it ends. */
export interface Runtime {
  configDir: string;
  store: RuleStore;
  config: RulegateConfig;
  logger: Logger;
  policyFor(evidence: ProjectEvidence): Promise<EffectivePolicy>;
}

/** Logs to stderr; stdout carries command output and hook responses. */
export function defaultLogger(): Logger {
  return new Logger({ level: 'warn', context: 'rulegate' }).addTransport(stderrTransport);
}

export async function createRuntime(opts: RuntimeOptions = {}): Promise<Runtime> {
  const logger = opts.logger ?? defaultLogger();
  const configDir = await resolveConfigDir({ explicit: opts.configDir, cwd: opts.cwd, env: opts.env });

  const store = await new RuleStoreLoader(logger.child('store')).load(configDir);
  const config = resolveConfig(store.base, store.override);
  logger.setLevel(opts.logLevel ?? config.logging.level);
  logger.debug('Runtime ready', { configDir, mode: config.mode });

  const activator = new ProfileActivator(logger.child('activation'));
  const composer = new RuleComposer(logger.child('policy'));

  return {
    configDir,
    store,
    config,
    logger,
    async policyFor(evidence) {
      const activatedProfiles = await activator.activate(store.profiles, evidence);
      return composer.compose({ mode: config.mode, override: store.override, activatedProfiles, store });
    },
  };
}
