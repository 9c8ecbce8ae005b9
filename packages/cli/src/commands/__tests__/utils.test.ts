import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { ConfigError, ErrorCodes } from '@dbconverge/core/domain';
import { CONNECTION_ENV, describeError, getConnectionString, handleError, printWarnings } from '../utils.js';

describe('getConnectionString', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prefers the --connection option', () => {
    vi.stubEnv(CONNECTION_ENV, 'Server=env;');
    expect(getConnectionString({ connection: 'Server=cli;' })).toBe('Server=cli;');
  });

  it('falls back to the environment', () => {
    vi.stubEnv(CONNECTION_ENV, 'Server=env;');
    expect(getConnectionString({})).toBe('Server=env;');
  });

  it('throws when neither is set', () => {
    vi.stubEnv(CONNECTION_ENV, '');
    expect(() => getConnectionString({})).toThrow(ConfigError);
    try {
      getConnectionString({});
    } catch (error) {
      expect(describeError(error).code).toBe(ErrorCodes.CONFIG_CONNECTION_MISSING);
    }
  });
});

describe('describeError', () => {
  it('uses the display string of our errors', () => {
    const error = new ConfigError('Schema file is empty', { suggestion: 'Declare a version.' });
    expect(describeError(error)).toEqual({
      message: 'Schema file is empty',
      code: ErrorCodes.CONFIG_PARSE_ERROR,
      display: 'Schema file is empty [E2002]\n\nSuggestion: Declare a version.',
    });
  });

  it('handles foreign errors and thrown values', () => {
    expect(describeError(new Error('boom'))).toEqual({ message: 'boom', code: 'UNKNOWN', display: 'boom [UNKNOWN]' });
    expect(describeError('plain')).toEqual({ message: 'plain', code: 'UNKNOWN', display: 'plain [UNKNOWN]' });
  });
});

describe('handleError', () => {
  let level: typeof chalk.level;

  beforeEach(() => {
    level = chalk.level;
    chalk.level = 0;
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  });

  afterEach(() => {
    chalk.level = level;
    vi.restoreAllMocks();
  });

  it('prints the error and exits with 1', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => handleError(new Error('boom'))).toThrow('exit 1');
    expect(errorSpy).toHaveBeenCalledWith('Error: boom [UNKNOWN]');
  });

  it('prints JSON when asked', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = new ConfigError('Connection string not found', { code: ErrorCodes.CONFIG_CONNECTION_MISSING });

    expect(() => handleError(error, true)).toThrow('exit 1');
    const printed: unknown = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(printed).toMatchObject({
      success: false,
      error: { code: 'E2004', message: 'Connection string not found', recoverable: false },
    });
  });
});

describe('printWarnings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes each warning to stderr', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const level = chalk.level;
    chalk.level = 0;

    printWarnings(['No logins or databases declared'], {});
    chalk.level = level;

    expect(warnSpy).toHaveBeenCalledWith('⚠ No logins or databases declared');
  });

  it('stays quiet in JSON and quiet modes', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    printWarnings(['x'], { json: true });
    printWarnings(['x'], { quiet: true });

    expect(warnSpy).not.toHaveBeenCalled();
  });
});
