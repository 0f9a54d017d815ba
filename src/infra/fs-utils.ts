import { promises as fs } from 'node:fs';
import { dirname, basename, join } from 'node:path';
import { nanoid } from 'nanoid';

export function isEnoent(error: unknown): boolean {
  return (error as NodeJS.ErrnoException).code === 'ENOENT';
}

export async function readFileOrNull(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (e) {
    if (isEnoent(e)) return null;
    throw e;
  }
}

export async function readdirOrEmpty(dirPath: string): Promise<string[]> {
  try {
    return (await fs.readdir(dirPath)).sort();
  } catch (e) {
    if (isEnoent(e)) return [];
    throw e;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (e) {
    if (isEnoent(e)) return false;
    throw e;
  }
}

/** Reads at most `limitBytes` from the start of a file. */
export async function readHead(filePath: string, limitBytes: number): Promise<string> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(limitBytes);
    const { bytesRead } = await handle.read(buffer, 0, limitBytes, 0);
    return buffer.subarray(0, bytesRead).toString('utf-8');
  } finally {
    await handle.close();
  }
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decodes `bytes` as UTF-8, keeping any byte order mark, or returns null when
 * they are not valid UTF-8. Encoding the result again gives back the same bytes.
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return strictUtf8.decode(bytes);
  } catch (e) {
    if (e instanceof TypeError) return null;
    throw e;
  }
}

async function permissionBits(filePath: string): Promise<number | undefined> {
  try {
    return (await fs.stat(filePath)).mode & 0o7777;
  } catch (e) {
    if (isEnoent(e)) return undefined;
    throw e;
  }
}

/**
 * Writes through a sibling temp file and renames it over the target, so
 * readers see either the old content or the new content. An existing
 * target's permission bits carry over to the new file.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const mode = await permissionBits(filePath);
  const tmp = join(dirname(filePath), `.${basename(filePath)}.${nanoid(8)}.tmp`);
  try {
    await fs.writeFile(tmp, content, 'utf-8');
    if (mode !== undefined) await fs.chmod(tmp, mode);
    await fs.rename(tmp, filePath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw e;
  }
}
