import { describe, it, expect } from 'vitest';
import {
  AppError, DocumentError, DocumentLoadError, EventParseError,
  FixApplicationError, RuleCompileError, UsageError, errorMessage,
} from '../../src/infra/errors.js';

describe('DocumentError', () => {
  it('sets message, code, and details', () => {
    const err = new DocumentError('slices/a.toml', ['metadata is required', 'rules must be a table']);
    expect(err.message).toBe('Invalid document slices/a.toml: metadata is required; rules must be a table');
    expect(err.code).toBe('DOCUMENT_ERROR');
    expect(err.name).toBe('DocumentError');
    expect(err.details).toEqual({ file: 'slices/a.toml', reasons: ['metadata is required', 'rules must be a table'] });
    expect(err).toBeInstanceOf(AppError);
  });
});

describe('DocumentLoadError', () => {
  it('lists every failing document', () => {
    const err = new DocumentLoadError([
      new DocumentError('a.toml', ['x']),
      new DocumentError('b.toml', ['y']),
    ]);
    expect(err.message).toBe('Failed to load 2 document(s):\n  Invalid document a.toml: x\n  Invalid document b.toml: y');
    expect(err.code).toBe('DOCUMENT_LOAD_ERROR');
    expect(err.details).toEqual({ files: ['a.toml', 'b.toml'] });
  });
});

describe('RuleCompileError', () => {
  it('names the rule', () => {
    const err = new RuleCompileError('no-eval', 'Unterminated group');
    expect(err.message).toBe('Rule no-eval cannot be compiled: Unterminated group');
    expect(err.ruleName).toBe('no-eval');
  });
});

describe('FixApplicationError', () => {
  it('keeps the cause', () => {
    const cause = new Error('EACCES');
    const err = new FixApplicationError('src/a.ts', 'EACCES', { cause });
    expect(err.message).toBe('Failed to apply fixes to src/a.ts: EACCES');
    expect(err.cause).toBe(cause);
    expect(err.file).toBe('src/a.ts');
  });
});

describe('EventParseError and UsageError', () => {
  it('set their codes', () => {
    expect(new EventParseError('claude', 'bad json').message).toBe('Cannot parse claude hook payload: bad json');
    expect(new EventParseError('claude', 'bad json').code).toBe('EVENT_PARSE_ERROR');
    expect(new UsageError('nope').code).toBe('USAGE_ERROR');
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
