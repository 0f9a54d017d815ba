import { parseArgs } from 'node:util';
import { AppError, UsageError, errorMessage } from '../infra/errors.js';
import { runHook } from './hook.js';
import { runLint } from './lint.js';
import type { CommandIO } from './lint.js';
import type { RuntimeOptions } from './runtime.js';

export const VERSION = '0.1.0';

export const USAGE = `Usage:
  rulegate lint [path] [--fix | --dry-run] [--config <dir>] [--verbose]
  rulegate hook [--source claude|windsurf|kiro|generic] [--path <dir>] [--config <dir>] [--verbose]

Exit codes:
  lint  0 clean, 1 error or critical issues found
  hook  0 allow or warn, 2 deny
  any   64 usage error, 70 rules or settings could not be loaded`;

export const EXIT_USAGE = 64;
export const EXIT_SOFTWARE = 70;

export interface MainIO extends CommandIO {
  stderr(text: string): void;
  readStdin(): Promise<string>;
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', default: false },
      verbose: { type: 'boolean', short: 'v', default: false },
      fix: { type: 'boolean', default: false },
      'dry-run': { type: 'boolean', default: false },
      config: { type: 'string', short: 'c' },
      source: { type: 'string', short: 's' },
      path: { type: 'string', short: 'p' },
    },
    allowPositionals: true,
    strict: true,
  });
}

/** Runs one CLI invocation and resolves to its exit code. */
export async function main(argv: string[], io: MainIO, opts: RuntimeOptions = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (e) {
    io.stderr(`${errorMessage(e)}\n\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  if (values.version) {
    io.stdout(`rulegate ${VERSION}\n`);
    return 0;
  }
  const [command, ...rest] = positionals;
  if (values.help || command === undefined || command === 'help') {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  const runtimeOpts: RuntimeOptions = { ...opts, logLevel: values.verbose ? 'debug' : opts.logLevel };
  try {
    switch (command) {
      case 'lint':
        if (rest.length > 1) throw new UsageError('lint takes at most one path');
        return await runLint(
          { path: rest[0], fix: values.fix, dryRun: values['dry-run'], configDir: values.config },
          io,
          runtimeOpts,
        );
      case 'hook':
        if (rest.length > 0) throw new UsageError('hook takes no positional arguments');
        return await runHook(
          { source: values.source, path: values.path, configDir: values.config },
          await io.readStdin(),
          io,
          runtimeOpts,
        );
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (e) {
    if (e instanceof UsageError) {
      io.stderr(`${e.message}\n\n${USAGE}\n`);
      return EXIT_USAGE;
    }
    if (e instanceof AppError) {
      io.stderr(`${e.message}\n`);
      return EXIT_SOFTWARE;
    }
    throw e;
  }
}
