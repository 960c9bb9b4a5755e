import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import {
  BACKTRACE_ENV_VAR,
  BACKTRACE_LIMIT_ENV_VAR,
  DEFAULT_FRAME_LIMIT,
  LIB_BACKTRACE_ENV_VAR,
  configureBacktrace,
  getBacktraceConfig,
  isBacktraceEnabled,
  parseBacktraceConfig,
} from '../../src/config/backtrace-config';
import { ConfigError } from '../../src/errors/config-error';
import { ErrorLogger, useLogger } from '../../src/errors/logger';

const ENV_VARS = [BACKTRACE_ENV_VAR, LIB_BACKTRACE_ENV_VAR, BACKTRACE_LIMIT_ENV_VAR] as const;

describe('parseBacktraceConfig', () => {
  test('defaults to disabled with the default frame limit', () => {
    expect(parseBacktraceConfig({})).toEqual({ enabled: false, frameLimit: DEFAULT_FRAME_LIMIT });
    expect(DEFAULT_FRAME_LIMIT).toBe(50);
  });

  test('any value other than an off switch enables capture', () => {
    expect(parseBacktraceConfig({ ERRBOX_BACKTRACE: '1' }).enabled).toBe(true);
    expect(parseBacktraceConfig({ ERRBOX_BACKTRACE: 'full' }).enabled).toBe(true);
    expect(parseBacktraceConfig({ ERRBOX_BACKTRACE: '0' }).enabled).toBe(false);
    expect(parseBacktraceConfig({ ERRBOX_BACKTRACE: 'OFF' }).enabled).toBe(false);
    expect(parseBacktraceConfig({ ERRBOX_BACKTRACE: 'false' }).enabled).toBe(false);
  });

  test('the library variable takes precedence', () => {
    expect(
      parseBacktraceConfig({ ERRBOX_LIB_BACKTRACE: '0', ERRBOX_BACKTRACE: '1' }).enabled
    ).toBe(false);
    expect(
      parseBacktraceConfig({ ERRBOX_LIB_BACKTRACE: '1', ERRBOX_BACKTRACE: '0' }).enabled
    ).toBe(true);
  });

  test('parses the frame limit', () => {
    expect(parseBacktraceConfig({ ERRBOX_BACKTRACE_LIMIT: '10' }).frameLimit).toBe(10);
  });

  test.each(['abc', '0', '2.5', '5000'])('rejects frame limit %s', (value) => {
    expect(() => parseBacktraceConfig({ ERRBOX_BACKTRACE_LIMIT: value })).toThrow(ConfigError);
  });
});

describe('process-wide backtrace configuration', () => {
  const saved: Partial<Record<string, string>> = {};

  beforeEach(() => {
    for (const name of ENV_VARS) {
      saved[name] = process.env[name];
      delete process.env[name];
    }
    configureBacktrace(null);
  });

  afterEach(() => {
    for (const name of ENV_VARS) {
      const value = saved[name];
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    configureBacktrace(null);
    useLogger(new ErrorLogger());
  });

  test('reads the environment lazily and caches the result', () => {
    process.env[BACKTRACE_ENV_VAR] = '1';
    expect(isBacktraceEnabled()).toBe(true);

    process.env[BACKTRACE_ENV_VAR] = '0';
    expect(isBacktraceEnabled()).toBe(true);

    configureBacktrace(null);
    expect(isBacktraceEnabled()).toBe(false);
  });

  test('overrides merge with the current settings', () => {
    process.env[BACKTRACE_LIMIT_ENV_VAR] = '7';
    configureBacktrace({ enabled: true });

    expect(getBacktraceConfig()).toEqual({ enabled: true, frameLimit: 7 });
  });

  test('overrides outside the frame limit bounds are rejected', () => {
    configureBacktrace({ enabled: true, frameLimit: 5 });

    expect(() => configureBacktrace({ frameLimit: 0 })).toThrow(ConfigError);
    expect(() => configureBacktrace({ frameLimit: Number.NaN })).toThrow(ConfigError);
    expect(() => configureBacktrace({ frameLimit: 1001 })).toThrow(
      'Invalid backtrace override: frameLimit: Frame limit must not exceed 1000'
    );
    expect(getBacktraceConfig()).toEqual({ enabled: true, frameLimit: 5 });
  });

  test('an invalid environment logs a warning and falls back', () => {
    const sink = {
      warn: jest.fn<(message: string) => void>(),
      error: jest.fn<(message: string) => void>(),
    };
    useLogger(new ErrorLogger(sink));
    process.env[BACKTRACE_ENV_VAR] = '1';
    process.env[BACKTRACE_LIMIT_ENV_VAR] = 'lots';

    expect(getBacktraceConfig()).toEqual({ enabled: true, frameLimit: DEFAULT_FRAME_LIMIT });
    expect(sink.warn).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(sink.warn.mock.calls[0][0]);
    expect(payload.message).toContain(BACKTRACE_LIMIT_ENV_VAR);
    expect(payload.context.module).toBe('config');
  });
});
