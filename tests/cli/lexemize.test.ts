/**
 * lexemize CLI Tests
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { parseLexemizeArgs, runLexemize } from '../../src/cli-lexemize.js';
import { readVersion } from '../../src/cli-shared.js';
import {
  createIO,
  createTempDir,
  removeTempDirs,
} from '../helpers/lexemes.js';

afterEach(() => {
  removeTempDirs();
});

describe('parseLexemizeArgs', () => {
  it('shows help without arguments', () => {
    expect(parseLexemizeArgs([])).toEqual({ mode: 'help' });
    expect(parseLexemizeArgs(['a.rs', '-h'])).toEqual({ mode: 'help' });
  });

  it('reads version flags', () => {
    expect(parseLexemizeArgs(['--version'])).toEqual({ mode: 'version' });
  });

  it('parses a file with options', () => {
    expect(
      parseLexemizeArgs(['--format', 'json', 'main.rs', '--edition', '2018'])
    ).toEqual({
      mode: 'file',
      file: 'main.rs',
      format: 'json',
      edition: '2018',
    });
  });

  it('parses eval mode, including snippets that start with a dash', () => {
    expect(parseLexemizeArgs(['-e', '-1'])).toEqual({
      mode: 'eval',
      source: '-1',
      format: 'text',
      edition: undefined,
    });
  });

  it('takes the snippet before looking at flags', () => {
    expect(parseLexemizeArgs(['--eval', '-v'])).toEqual({
      mode: 'eval',
      source: '-v',
      format: 'text',
      edition: undefined,
    });
    expect(parseLexemizeArgs(['--eval', '--format'])).toEqual({
      mode: 'eval',
      source: '--format',
      format: 'text',
      edition: undefined,
    });
    expect(parseLexemizeArgs(['-e', '-h', '--format', 'json'])).toEqual({
      mode: 'eval',
      source: '-h',
      format: 'json',
      edition: undefined,
    });
  });

  it('still honours help after an eval snippet', () => {
    expect(parseLexemizeArgs(['-e', 'x', '--help'])).toEqual({ mode: 'help' });
  });

  it.each([
    [['--eval'], '--eval requires argument: source text'],
    [['--eval', 'x', 'a.rs'], 'Cannot combine --eval with a file argument'],
    [['--format', 'json'], 'Missing file argument'],
    [['a.rs', 'b.rs'], 'Unexpected argument: b.rs'],
    [['--format', 'xml', 'a.rs'], 'Invalid format: xml. Expected text or json'],
    [['--edition'], '--edition requires argument: edition name'],
    [['--colour', 'a.rs'], 'Unknown option: --colour'],
  ])('rejects %j', (argv, message) => {
    expect(() => parseLexemizeArgs(argv)).toThrow(message);
  });
});

describe('runLexemize', () => {
  it('prints a text table for --eval', () => {
    const io = createIO();
    expect(runLexemize(['--eval', 'a+b'], io)).toBe(0);
    expect(io.out).toEqual([
      [
        'Lexemes: 3',
        'Identifier          0  a',
        'Operator(Plus)      1  +',
        'Identifier          2  b',
      ].join('\n'),
    ]);
    expect(io.err).toEqual([]);
  });

  it('prints JSON for a file', () => {
    const dir = createTempDir({ 'main.rs': 'fn' });
    const io = createIO();
    expect(
      runLexemize(['--format', 'json', join(dir, 'main.rs')], io)
    ).toBe(0);
    const output: unknown = JSON.parse(io.out.join(''));
    expect(output).toEqual({
      count: 1,
      lexemes: [
        {
          kind: { tag: 'Keyword' },
          text: 'fn',
          span: {
            start: { line: 1, column: 1, offset: 0 },
            end: { line: 1, column: 3, offset: 2 },
          },
        },
      ],
    });
  });

  it('exits 2 for a missing file', () => {
    const file = join(createTempDir(), 'missing.rs');
    const io = createIO();
    expect(runLexemize([file], io)).toBe(2);
    expect(io.err).toEqual([`Error: File not found: ${file}`]);
  });

  it('exits 2 for a directory', () => {
    const dir = join(createTempDir(), 'src');
    mkdirSync(dir);
    const io = createIO();
    expect(runLexemize([dir], io)).toBe(2);
    expect(io.err).toEqual([`Error: Path is a directory: ${dir}`]);
  });

  it('exits 1 for an unsupported edition', () => {
    const io = createIO();
    expect(runLexemize(['--edition', '2099', '-e', 'x'], io)).toBe(1);
    expect(io.err).toEqual([
      'Error [LEX-C001]: Unsupported edition 2099 (supported: 2018)',
    ]);
  });

  it('exits 1 for usage errors', () => {
    const io = createIO();
    expect(runLexemize(['a.rs', 'b.rs'], io)).toBe(1);
    expect(io.err).toEqual(['Error: Unexpected argument: b.rs']);
  });

  it('prints the package version', () => {
    const io = createIO();
    expect(runLexemize(['-v'], io)).toBe(0);
    expect(io.out).toEqual([readVersion()]);
    expect(readVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });

  it('prints help', () => {
    const io = createIO();
    expect(runLexemize(['--help'], io)).toBe(0);
    expect(io.out[0]).toContain('Usage: lexemize [options] <file>');
  });
});
