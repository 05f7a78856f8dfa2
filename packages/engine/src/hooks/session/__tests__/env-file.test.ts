/**
 * @fileoverview Tests for the environment propagation file
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs/promises';
import { createEnvFile, parseEnvFile } from '../env-file.js';

describe('parseEnvFile', () => {
  it('should parse KEY=VALUE lines', () => {
    expect(parseEnvFile('FOO=bar\nBAZ=qux=1\n')).toEqual({
      entries: [
        { key: 'FOO', value: 'bar' },
        { key: 'BAZ', value: 'qux=1' },
      ],
      skippedLines: [],
    });
  });

  it('should ignore blank lines and comments', () => {
    const parsed = parseEnvFile('# setup\n\n  \nFOO=bar\n');
    expect(parsed.entries).toEqual([{ key: 'FOO', value: 'bar' }]);
    expect(parsed.skippedLines).toEqual([]);
  });

  it('should accept an export prefix and strip matching quotes', () => {
    const parsed = parseEnvFile([
      'export NODE_ENV=test',
      'GREETING="hello world"',
      "SINGLE='quoted'",
      'MISMATCHED="open',
      'EMPTY=',
    ].join('\n'));

    expect(parsed.entries).toEqual([
      { key: 'NODE_ENV', value: 'test' },
      { key: 'GREETING', value: 'hello world' },
      { key: 'SINGLE', value: 'quoted' },
      { key: 'MISMATCHED', value: '"open' },
      { key: 'EMPTY', value: '' },
    ]);
  });

  it('should skip malformed lines with their line numbers', () => {
    const parsed = parseEnvFile('FOO=bar\nnot an assignment\n1BAD=x\n=novalue\nOK=1\r\n');
    expect(parsed.entries).toEqual([
      { key: 'FOO', value: 'bar' },
      { key: 'OK', value: '1' },
    ]);
    expect(parsed.skippedLines).toEqual([2, 3, 4]);
  });
});

describe('createEnvFile', () => {
  it('should create an empty private file and read back appended lines', async () => {
    const handle = await createEnvFile();
    try {
      const stat = await fs.stat(handle.path);
      expect(stat.size).toBe(0);
      expect(stat.mode & 0o777).toBe(0o600);

      await fs.appendFile(handle.path, 'FOO=bar\n');
      const parsed = await handle.read();
      expect(parsed.entries).toEqual([{ key: 'FOO', value: 'bar' }]);
    } finally {
      await handle.cleanup();
    }

    await expect(fs.access(handle.path)).rejects.toThrow();
  });
});
