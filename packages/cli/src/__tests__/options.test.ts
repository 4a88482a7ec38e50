import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  createCliLogging,
  formatLogLine,
  loadConfigFile,
  parseCliOptions,
  scanArguments,
  toConsolaLevel,
} from '../options.js';

vi.mock('fs', () => ({
  writeFileSync: vi.fn(),
  appendFileSync: vi.fn(),
}));

vi.mock('fs/promises', () => ({
  readFile: vi.fn(),
}));

import { appendFileSync, writeFileSync } from 'fs';
import { readFile } from 'fs/promises';

beforeEach(() => {
  vi.clearAllMocks();
});

// ═══════════════════════════════════════════════════════════════════════════
// ARGUMENTS
// ═══════════════════════════════════════════════════════════════════════════

describe('toConsolaLevel', () => {
  it('maps fatal, error, warning, info and debug', () => {
    expect([1, 2, 3, 4, 5].map(toConsolaLevel)).toEqual([0, 0, 1, 3, 4]);
  });

  it('falls back to info', () => {
    expect(toConsolaLevel(9)).toBe(3);
  });
});

describe('scanArguments', () => {
  it('takes values from the following argument', () => {
    expect(scanArguments(['-l', '/tmp/gw.log', '-v', '5', '-c', '/etc/gw.json'])).toEqual({
      ok: true,
      value: { log: '/tmp/gw.log', verbosity: '5', config: '/etc/gw.json' },
    });
  });

  it('takes values attached to short flags', () => {
    expect(scanArguments(['-v5', '-l/tmp/gw.log', '-c/etc/gw.json'])).toEqual({
      ok: true,
      value: { log: '/tmp/gw.log', verbosity: '5', config: '/etc/gw.json' },
    });
  });

  it('takes long flags with = or a following value', () => {
    expect(scanArguments(['--log=/tmp/gw.log', '--verbosity', '2', '-h'])).toEqual({
      ok: true,
      value: { log: '/tmp/gw.log', verbosity: '2' },
    });
  });

  it('lets a later flag override an earlier one', () => {
    expect(scanArguments(['-v', '2', '-v3'])).toEqual({ ok: true, value: { verbosity: '3' } });
  });

  it('reports an unknown flag', () => {
    expect(scanArguments(['-v', '3', '--verbose'])).toEqual({ ok: false, error: 'Unknown option: --verbose' });
    expect(scanArguments(['-x'])).toEqual({ ok: false, error: 'Unknown option: -x' });
    expect(scanArguments(['-h5'])).toEqual({ ok: false, error: 'Unknown option: -h5' });
  });

  it('reports a stray positional argument', () => {
    expect(scanArguments(['-v', '3', 'extra'])).toEqual({ ok: false, error: 'Unexpected argument: extra' });
  });

  it('reports a flag missing its value', () => {
    expect(scanArguments(['-c'])).toEqual({ ok: false, error: 'Option -c needs a value' });
  });
});

describe('parseCliOptions', () => {
  it('defaults to info verbosity and stdout', () => {
    expect(parseCliOptions([])).toEqual({
      ok: true,
      value: { logFile: undefined, verbosity: 4, configPath: undefined },
    });
  });

  it('reads every option', () => {
    expect(parseCliOptions(['-l', '/tmp/gw.log', '-v', '5', '-c', '/etc/gw.json'])).toEqual({
      ok: true,
      value: { logFile: '/tmp/gw.log', verbosity: 5, configPath: '/etc/gw.json' },
    });
  });

  it('reads an attached verbosity', () => {
    expect(parseCliOptions(['-v1'])).toEqual({
      ok: true,
      value: { logFile: undefined, verbosity: 1, configPath: undefined },
    });
  });

  it('rejects a verbosity out of range', () => {
    expect(parseCliOptions(['-v', '9'])).toEqual({
      ok: false,
      error: 'Verbosity must be between 1 and 5',
    });
  });

  it('rejects a verbosity that is not a number', () => {
    expect(parseCliOptions(['-v', 'loud'])).toEqual({
      ok: false,
      error: 'Verbosity must be a number',
    });
  });

  it('rejects an unknown flag', () => {
    expect(parseCliOptions(['--bogus'])).toEqual({ ok: false, error: 'Unknown option: --bogus' });
  });

  it('rejects a positional argument', () => {
    expect(parseCliOptions(['stray'])).toEqual({
      ok: false,
      error: 'Unexpected argument: stray',
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CONFIG FILE
// ═══════════════════════════════════════════════════════════════════════════

describe('loadConfigFile', () => {
  it('fills in defaults around the given keys', async () => {
    vi.mocked(readFile).mockResolvedValue('{"remote":{"port":6000},"timing":{"pollPulseMs":500}}');

    const result = await loadConfigFile('/etc/gw.json');

    expect(readFile).toHaveBeenCalledWith('/etc/gw.json', 'utf-8');
    if (!result.ok) throw new Error(result.error);
    expect(result.value.remote).toEqual({ address: '127.0.0.1', port: 6000 });
    expect(result.value.local).toEqual({ address: '127.0.0.1', port: 12345 });
    expect(result.value.timing.pollPulseMs).toBe(500);
    expect(result.value.timing.provisioningBackoffMs).toBe(2000);
  });

  it('reports an unreadable file', async () => {
    vi.mocked(readFile).mockRejectedValue(new Error('ENOENT: no such file'));

    expect(await loadConfigFile('/etc/gw.json')).toEqual({
      ok: false,
      error: 'Cannot read config file /etc/gw.json: ENOENT: no such file',
    });
  });

  it('reports malformed JSON', async () => {
    vi.mocked(readFile).mockResolvedValue('{ remote: ');

    const result = await loadConfigFile('/etc/gw.json');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatch(/^Config file \/etc\/gw\.json is not valid JSON: /);
    }
  });

  it('reports settings that fail validation with their path', async () => {
    vi.mocked(readFile).mockResolvedValue('{"remote":{"port":0}}');

    expect(await loadConfigFile('/etc/gw.json')).toEqual({
      ok: false,
      error: 'Invalid config file /etc/gw.json: remote.port: Number must be greater than or equal to 1',
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// LOGGING
// ═══════════════════════════════════════════════════════════════════════════

describe('formatLogLine', () => {
  const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));

  it('writes timestamp, type, tag and message', () => {
    expect(formatLogLine({ date, type: 'info', tag: 'ButtonGateway', args: ['Written', true, 'to server'] })).toBe(
      '2024-01-02T03:04:05.006Z [info] [ButtonGateway] Written true to server',
    );
  });

  it('leaves out an empty tag', () => {
    expect(formatLogLine({ date, type: 'warn', tag: '', args: ['Waiting...'] })).toBe(
      '2024-01-02T03:04:05.006Z [warn] Waiting...',
    );
  });

  it('renders non-string arguments inline', () => {
    expect(formatLogLine({ date, type: 'debug', tag: 'cli', args: ['counter', { value: 3 }] })).toBe(
      '2024-01-02T03:04:05.006Z [debug] [cli] counter { value: 3 }',
    );
  });
});

describe('createCliLogging', () => {
  const now = new Date(Date.UTC(2024, 5, 1, 12, 0, 0));

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(now);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('truncates the log file and appends tagged records', () => {
    const { loggerFor } = createCliLogging({ verbosity: 4, logFile: '/var/log/gw.log' });

    loggerFor('ButtonGateway').info('Set true on client');

    expect(writeFileSync).toHaveBeenCalledWith('/var/log/gw.log', '');
    expect(appendFileSync).toHaveBeenCalledWith(
      '/var/log/gw.log',
      '2024-06-01T12:00:00.000Z [info] [ButtonGateway] Set true on client\n',
    );
  });

  it('drops records above the chosen verbosity', () => {
    const { loggerFor } = createCliLogging({ verbosity: 2, logFile: '/var/log/gw.log' });
    const log = loggerFor('Presence');

    log.warn('Waiting for constrained device');
    log.error('Failed to list registered clients:', 'timeout');

    expect(appendFileSync).toHaveBeenCalledTimes(1);
    expect(appendFileSync).toHaveBeenCalledWith(
      '/var/log/gw.log',
      '2024-06-01T12:00:00.000Z [error] [Presence] Failed to list registered clients: timeout\n',
    );
  });

  it('writes debug records at the highest verbosity', () => {
    const { loggerFor } = createCliLogging({ verbosity: 5, logFile: '/var/log/gw.log' });

    loggerFor('PollLoop').debug('Counter 3 -> LED on');

    expect(appendFileSync).toHaveBeenCalledWith(
      '/var/log/gw.log',
      '2024-06-01T12:00:00.000Z [debug] [PollLoop] Counter 3 -> LED on\n',
    );
  });

  it('keeps logging to stdout when the file cannot be opened', () => {
    vi.mocked(writeFileSync).mockImplementationOnce(() => {
      throw new Error('EACCES: permission denied');
    });

    expect(() => createCliLogging({ verbosity: 1, logFile: '/root/gw.log' })).not.toThrow();
    expect(appendFileSync).not.toHaveBeenCalled();
  });
});
