import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import { glob } from 'glob';
import { pathExists, readHead } from '../../infra/fs-utils.js';
import { PROJECT_DIR_NAME } from '../config/paths.js';
import type { ProfileDocument } from '../rule/types.js';
import type { ProjectEvidence } from './types.js';

export const DEFAULT_IGNORE = ['node_modules/**', '.git/**', `${PROJECT_DIR_NAME}/**`];

function trimSlashes(path: string): string {
  return path.replace(/^\.\//, '').replace(/\/+$/, '');
}

/** Evidence over a fixed set of files; a directory exists when some file lives under it. */
export function createInMemoryEvidence(files: Readonly<Record<string, string>>): ProjectEvidence {
  const paths = Object.keys(files).map(trimSlashes).sort();
  const contents = new Map(Object.entries(files).map(([path, text]) => [trimSlashes(path), text]));

  return {
    files: paths,
    async pathExists(path) {
      const wanted = trimSlashes(path);
      return contents.has(wanted) || paths.some((p) => p.startsWith(`${wanted}/`));
    },
    async readText(path, limitBytes) {
      const text = contents.get(trimSlashes(path));
      if (text === undefined) throw new Error(`No such file: ${path}`);
      if (limitBytes === undefined) return text;
      return Buffer.from(text, 'utf-8').subarray(0, limitBytes).toString('utf-8');
    },
  };
}

export interface CollectOptions {
  ignore?: readonly string[];
  /** Skip the tree walk; `files` is then empty. For callers whose profiles use no globs or content checks. */
  listFiles?: boolean;
}

/** Walks `root` once and answers every later question from disk. */
export async function collectProjectEvidence(root: string, opts: CollectOptions = {}): Promise<ProjectEvidence> {
  const files = opts.listFiles === false
    ? []
    : await glob('**/*', {
        cwd: root,
        nodir: true,
        dot: true,
        posix: true,
        ignore: [...DEFAULT_IGNORE, ...(opts.ignore ?? [])],
      });
  files.sort();

  return {
    files,
    pathExists: (path) => pathExists(join(root, path)),
    async readText(path, limitBytes) {
      const full = join(root, path);
      return limitBytes === undefined ? fs.readFile(full, 'utf-8') : readHead(full, limitBytes);
    },
  };
}

/** Whether any profile needs the project's file list to decide activation. */
export function needsFileList(profiles: readonly ProfileDocument[]): boolean {
  return profiles.some((p) => p.activation.globs.length > 0 || p.activation.content.length > 0);
}
