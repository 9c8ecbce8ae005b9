import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import chalk from 'chalk';
import { ConfigValidationError } from '@dbconverge/core/domain';
import { validateCommand } from '../validate.js';

const SCHEMA = `
version: "1"
server:
  logins:
    - name: reader
  databases:
    - name: app
      owner: sa
      users:
        - name: reader
      tables:
        - name: Person
          columns:
            - { name: ID, type: int, primaryKey: true }
            - { name: Name, type: nvarchar, length: 100 }
`;

describe('validateCommand', () => {
  let tempDir: string;
  let file: string;
  let level: typeof chalk.level;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dbconverge-validate-'));
    file = path.join(tempDir, 'schema.yaml');
    fs.writeFileSync(file, SCHEMA);
    level = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    chalk.level = level;
    vi.restoreAllMocks();
  });

  it('prints object counts in tree order', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await validateCommand({ file });

    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      `✓ ${file} is valid`,
      '  1 × Login',
      '  1 × Database',
      '  1 × Schema',
      '  1 × User',
      '  1 × Table',
      '  2 × Column',
      '  1 × PrimaryKey',
    ]);
  });

  it('prints JSON when asked', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await validateCommand({ file, json: true });

    expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
      success: true,
      file: path.resolve(file),
      objects: { login: 1, database: 1, schema: 1, user: 1, table: 1, column: 2, primary_key: 1 },
      warnings: [],
    });
  });

  it('prints nothing but warnings when quiet', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    await validateCommand({ file, quiet: true });

    expect(logSpy).not.toHaveBeenCalled();
  });

  it('rejects an invalid file', async () => {
    fs.writeFileSync(file, 'version: "1"\nserver:\n  databases:\n    - name: app\n');

    await expect(validateCommand({ file })).rejects.toThrow(ConfigValidationError);
  });
});
