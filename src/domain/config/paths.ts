import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { pathExists } from '../../infra/fs-utils.js';

export const PROJECT_DIR_NAME = '.rulegate';
export const APP_NAME = 'rulegate';

/**
 * Walk up from `startDir` looking for a `.rulegate` directory.
 * Returns its path, or null when no ancestor has one.
 */
export async function findProjectConfigDir(startDir: string = process.cwd()): Promise<string | null> {
  let current = resolve(startDir);

  while (true) {
    const candidate = join(current, PROJECT_DIR_NAME);
    if (await pathExists(candidate)) return candidate;
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return null;
}

/** `$XDG_CONFIG_HOME/rulegate`, falling back to `~/.config/rulegate`. */
export function globalConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdg = env.XDG_CONFIG_HOME;
  return join(xdg && xdg.length > 0 ? xdg : join(homedir(), '.config'), APP_NAME);
}

/** Explicit dir first, then the nearest project dir, then the global one. */
export async function resolveConfigDir(opts: { explicit?: string; cwd?: string; env?: NodeJS.ProcessEnv } = {}): Promise<string> {
  if (opts.explicit) return resolve(opts.cwd ?? process.cwd(), opts.explicit);
  return (await findProjectConfigDir(opts.cwd)) ?? globalConfigDir(opts.env);
}
