import { describe, it, expect, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import {
  collectProjectEvidence, createInMemoryEvidence, needsFileList,
} from '../../src/domain/profile/evidence.js';
import type { ProfileDocument } from '../../src/domain/rule/types.js';
import { makeTempDir, writeTree } from '../fixtures/test-helpers.js';

describe('createInMemoryEvidence', () => {
  const evidence = createInMemoryEvidence({
    './src/index.ts': 'export const a = 1;',
    'README.md': 'héllo',
  });

  it('normalizes and sorts paths', () => {
    expect(evidence.files).toEqual(['README.md', 'src/index.ts']);
  });

  it('knows files and the directories above them', async () => {
    expect(await evidence.pathExists('src/index.ts')).toBe(true);
    expect(await evidence.pathExists('./src/')).toBe(true);
    expect(await evidence.pathExists('sr')).toBe(false);
  });

  it('truncates reads by bytes', async () => {
    expect(await evidence.readText('README.md', 2)).toBe('h\uFFFD');
    expect(await evidence.readText('src/index.ts')).toBe('export const a = 1;');
  });

  it('rejects reads of unknown files', async () => {
    await expect(evidence.readText('missing.ts')).rejects.toThrow('No such file: missing.ts');
  });
});

describe('collectProjectEvidence', () => {
  let dir: string;

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists files relative to the root, skipping dependencies and ignored paths', async () => {
    dir = await makeTempDir('evidence');
    await writeTree(dir, {
      'src/b.ts': 'b',
      'src/a.ts': 'a',
      '.env.example': 'KEY=test-secret',
      'node_modules/pkg/index.js': '',
      'dist/out.js': '',
    });
    const evidence = await collectProjectEvidence(dir, { ignore: ['dist/**'] });
    expect(evidence.files).toEqual(['.env.example', 'src/a.ts', 'src/b.ts']);
  });

  it('answers path and content questions from disk', async () => {
    dir = await makeTempDir('evidence');
    await writeTree(dir, { 'pkg/package.json': '{"name":"demo"}' });
    const evidence = await collectProjectEvidence(dir, { listFiles: false });
    expect(evidence.files).toEqual([]);
    expect(await evidence.pathExists('pkg')).toBe(true);
    expect(await evidence.pathExists('pkg/missing.json')).toBe(false);
    expect(await evidence.readText('pkg/package.json', 4)).toBe('{"na');
    expect(await evidence.readText('pkg/package.json')).toBe('{"name":"demo"}');
  });
});

describe('needsFileList', () => {
  const base: ProfileDocument = {
    metadata: { name: 'p', version: '1', scope: 'project', description: '' },
    activation: { indicators: ['package.json'], paths: [], globs: [], content: [] },
    checks: { enable: [], disable: [] },
    slices: [],
    source: 'p.toml',
  };

  it('is false for indicator and path checks only', () => {
    expect(needsFileList([base])).toBe(false);
  });

  it('is true once a profile uses globs or content', () => {
    expect(needsFileList([base, { ...base, activation: { ...base.activation, globs: ['**/*.py'] } }])).toBe(true);
  });
});
