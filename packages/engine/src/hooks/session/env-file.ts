/**
 * @fileoverview Environment propagation file
 *
 * SessionStart command handlers receive HOOKLINE_ENV_FILE pointing at an
 * empty file. Lines they append in `KEY=VALUE` form are loaded into the
 * session environment once the handler exits.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

export const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface EnvFileEntry {
  key: string;
  value: string;
}

export interface ParsedEnvFile {
  entries: EnvFileEntry[];
  /** 1-based line numbers that were not `KEY=VALUE` */
  skippedLines: number[];
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Parse `KEY=VALUE` lines. Blank lines and `#` comments are ignored, an
 * `export ` prefix is accepted and matching outer quotes are removed.
 */
export function parseEnvFile(content: string): ParsedEnvFile {
  const entries: EnvFileEntry[] = [];
  const skippedLines: number[] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      return;
    }

    const assignment = line.startsWith('export ') ? line.slice('export '.length).trimStart() : line;
    const eq = assignment.indexOf('=');
    const key = eq > 0 ? assignment.slice(0, eq).trim() : '';

    if (!ENV_KEY_PATTERN.test(key)) {
      skippedLines.push(index + 1);
      return;
    }

    entries.push({ key, value: unquote(assignment.slice(eq + 1).trim()) });
  });

  return { entries, skippedLines };
}

export interface EnvFileHandle {
  readonly path: string;
  read(): Promise<ParsedEnvFile>;
  cleanup(): Promise<void>;
}

/**
 * Create an empty env file in a private temp directory
 */
export async function createEnvFile(baseDir: string = os.tmpdir()): Promise<EnvFileHandle> {
  const dir = await fs.mkdtemp(path.join(baseDir, 'hookline-env-'));
  const filePath = path.join(dir, 'session.env');
  await fs.writeFile(filePath, '', { mode: 0o600 });

  return {
    path: filePath,
    async read() {
      return parseEnvFile(await fs.readFile(filePath, 'utf-8'));
    },
    async cleanup() {
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}
