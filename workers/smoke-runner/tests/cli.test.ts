import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { ConfigError } from '@ragops/core';
import { capturePrinter } from '@ragops/test-utils';
import { parseTimeout, resolveSuite, runCli } from '../src/cli';

const fixtures = path.join(__dirname, 'fixtures');

describe('resolveSuite', () => {
  it('should map built-in tiers to the shipped suites', () => {
    expect(resolveSuite('small', '/opt/suites')).toEqual({ suite: 'small', dir: '/opt/suites/small', reportByDefault: false });
    expect(resolveSuite('release', '/opt/suites')).toEqual({
      suite: 'release',
      dir: '/opt/suites/release',
      reportByDefault: true
    });
  });

  it('should treat anything else as a directory', () => {
    expect(resolveSuite('/srv/checks/nightly')).toEqual({ suite: 'nightly', dir: '/srv/checks/nightly', reportByDefault: false });
  });
});

describe('parseTimeout', () => {
  it('should fall back to the configured timeout', () => {
    expect(parseTimeout(undefined, 30)).toBe(30);
    expect(parseTimeout('2', 30)).toBe(2);
  });

  it('should reject nonsense', () => {
    expect(() => parseTimeout('0', 30)).toThrow(ConfigError);
    expect(() => parseTimeout('soon', 30)).toThrow("--timeout must be a positive number of seconds, got 'soon'");
  });
});

describe('runCli', () => {
  const env = { ...process.env, LOG_LEVEL: 'silent' };
  const overrides = { cwd: fixtures, echo: () => undefined };

  it('should exit 0 when every test passes', async () => {
    const { printer } = capturePrinter();

    expect(await runCli([path.join(fixtures, 'passing-suite')], { env, printer, overrides })).toBe(0);
  });

  it('should exit 1 when a test fails or hangs', async () => {
    const { printer, lines } = capturePrinter();

    const code = await runCli([path.join(fixtures, 'mixed-suite'), '--timeout', '1'], { env, printer, overrides });

    expect(code).toBe(1);
    expect(lines).toContain('❌ 03_hang: TIMEOUT (1s)');
  });

  it('should exit 2 with usage when no suite is named', async () => {
    const { printer, lines } = capturePrinter();

    expect(await runCli([], { env, printer })).toBe(2);
    expect(lines[0]).toBe('Usage: smoke-runner <small|release|DIR> [--timeout SEC] [--report]');
  });

  it('should exit 2 for an unknown option', async () => {
    const { printer } = capturePrinter();

    expect(await runCli(['small', '--verbose'], { env, printer })).toBe(2);
  });

  it('should exit 2 for a missing suite directory', async () => {
    const { printer, lines } = capturePrinter();
    const missing = path.join(fixtures, 'no-such-suite');

    expect(await runCli([missing], { env, printer, overrides })).toBe(2);
    expect(lines[lines.length - 1]).toBe(`❌ RUNNER FAIL: Suite directory not readable: ${missing}`);
  });
});
