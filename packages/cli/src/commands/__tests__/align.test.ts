/**
 * align / plan command tests
 *
 * The session is mocked; the engine stand-in asks the confirmation gate the
 * way the real engine does before each change.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import chalk from 'chalk';
import type { IConfirmationProvider } from '@dbconverge/core/ports';
import type { AlignReport } from '@dbconverge/reconciler';

const { openSession, close } = vi.hoisted(() => ({
  openSession: vi.fn(),
  close: vi.fn(),
}));

vi.mock('../session.js', () => ({ openSession }));

import { alignCommand } from '../align.js';
import { planCommand } from '../plan.js';

const SCHEMA = `
version: "1"
server:
  logins:
    - name: reader
`;

const CHANGES = ['Create login reader', 'Drop login legacy'];

/** Engine stand-in that records an outcome per change it is allowed to make */
function fakeSession(_options: unknown, confirm: IConfirmationProvider) {
  return {
    root: { name: 'SQL01' },
    close,
    engine: {
      align: async (): Promise<AlignReport> => {
        const report: AlignReport = {
          outcomes: [],
          summary: { total: 0, applied: 0, declined: 0, unsupported: 0, refused: 0, skipped: 0 },
        };
        for (const description of CHANGES) {
          const approved = await confirm.confirm(description);
          const status = approved ? 'applied' : 'declined';
          report.outcomes.push({ operation: 'create', entityType: 'login', path: description.split(' ')[2], status });
          report.summary[status] += 1;
          report.summary.total += 1;
        }
        return report;
      },
    },
  };
}

describe('commands', () => {
  let tempDir: string;
  let file: string;
  let level: typeof chalk.level;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dbconverge-align-'));
    file = path.join(tempDir, 'schema.yaml');
    fs.writeFileSync(file, SCHEMA);
    level = chalk.level;
    chalk.level = 0;
    openSession.mockImplementation(async (options: unknown, confirm: IConfirmationProvider) =>
      fakeSession(options, confirm)
    );
    close.mockResolvedValue(undefined);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    chalk.level = level;
    vi.restoreAllMocks();
    openSession.mockReset();
    close.mockReset();
  });

  describe('alignCommand', () => {
    it('applies every change with --auto-approve and closes the session', async () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

      const report = await alignCommand({ file, autoApprove: true, json: true });

      expect(report.summary).toEqual({ total: 2, applied: 2, declined: 0, unsupported: 0, refused: 0, skipped: 0 });
      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toMatchObject({ success: true, server: 'SQL01' });
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('passes the connection option to the session', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => {});

      await alignCommand({ file, connection: 'Server=test;', autoApprove: true, quiet: true });

      expect(openSession.mock.calls[0][0]).toMatchObject({ connection: 'Server=test;', quiet: true });
    });

    it('closes the session when alignment fails', async () => {
      openSession.mockImplementation(async () => ({
        root: { name: 'SQL01' },
        close,
        engine: {
          align: async () => {
            throw new Error('lost connection');
          },
        },
      }));

      await expect(alignCommand({ file, autoApprove: true, quiet: true })).rejects.toThrow('lost connection');
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('does not connect when the schema file is invalid', async () => {
      fs.writeFileSync(file, 'version: "2"\n');

      await expect(alignCommand({ file, autoApprove: true })).rejects.toThrow('Schema validation failed');
      expect(openSession).not.toHaveBeenCalled();
    });
  });

  describe('planCommand', () => {
    it('declines every change and lists it', async () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

      const planned = await planCommand({ file, json: true });

      expect(planned).toEqual(CHANGES);
      expect(JSON.parse(String(logSpy.mock.calls[0][0]))).toEqual({
        success: true,
        server: 'SQL01',
        planned: CHANGES,
      });
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('prints the plan', async () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

      await planCommand({ file });

      expect(String(logSpy.mock.calls[0][0]).split('\n').slice(3, 5)).toEqual([
        '  • Create login reader',
        '  • Drop login legacy',
      ]);
    });
  });
});
