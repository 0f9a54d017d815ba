import { resolve } from 'node:path';
import { AppError, errorMessage } from '../infra/errors.js';
import { createMapper } from '../domain/event/mappers/index.js';
import { DecisionEngine, exitCodeFor } from '../domain/hook/engine.js';
import { collectProjectEvidence, needsFileList } from '../domain/profile/evidence.js';
import type { CommandIO } from './lint.js';
import type { ProjectLintEvent } from '../domain/event/types.js';
import { createRuntime, defaultLogger } from './runtime.js';
import type { Runtime, RuntimeOptions } from './runtime.js';

export interface HookArgs {
  source?: string;
  path?: string;
  configDir?: string;
}

/**
 * `rulegate hook`: one event on stdin, one response on stdout, exit code 2 on
 * deny. Empty or unparseable input and broken rule documents all allow.
 */
export async function runHook(args: HookArgs, input: string, io: CommandIO, opts: RuntimeOptions = {}): Promise<number> {
  if (input.trim() === '') return 0;

  const cwd = resolve(opts.cwd ?? process.cwd(), args.path ?? '.');
  const logger = opts.logger ?? defaultLogger();
  let runtime: Runtime;
  try {
    runtime = await createRuntime({ ...opts, logger, cwd, configDir: args.configDir ?? opts.configDir });
  } catch (e) {
    if (!(e instanceof AppError)) throw e;
    logger.error('Rules could not be loaded; allowing event', { error: errorMessage(e) });
    return 0;
  }
  const { config, store } = runtime;

  const mapper = createMapper(args.source ?? config.hook.defaultSource, logger);
  let event: ProjectLintEvent;
  try {
    event = mapper.mapEvent(input);
  } catch (e) {
    logger.error('Hook payload rejected; allowing event', { source: mapper.source, error: errorMessage(e) });
    return 0;
  }

  const root = args.path !== undefined ? cwd : resolve(event.cwd ?? cwd);
  const evidence = await collectProjectEvidence(root, {
    ignore: config.lint.ignore,
    listFiles: needsFileList(store.profiles),
  });
  const policy = await runtime.policyFor(evidence);
  const outcome = new DecisionEngine(logger.child('hook')).evaluate(event, policy);

  const response = mapper.formatResponse(outcome);
  if (response !== '') io.stdout(response + '\n');
  if (outcome.decision.kind !== 'allow') logger.info(outcome.decision.message, { rules: outcome.matches.map((m) => m.ruleName) });
  return exitCodeFor(outcome.decision);
}
