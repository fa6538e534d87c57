import { describe, it, expect } from 'vitest';
import * as path from 'path';
import { ConfigError } from '@ragops/core';
import { TEST_FILE_PATTERN, commandFor, discoverTests, testName } from '../src/runner/discovery';

const fixtures = path.join(__dirname, 'fixtures');

describe('discoverTests', () => {
  it('should find numbered tests in lexical order and skip everything else', async () => {
    const tests = await discoverTests(path.join(fixtures, 'mixed-suite'));

    expect(tests).toEqual([
      { name: '01_pass', file: path.join(fixtures, 'mixed-suite', '01_pass.mjs') },
      { name: '02_fail', file: path.join(fixtures, 'mixed-suite', '02_fail.mjs') },
      { name: '03_hang', file: path.join(fixtures, 'mixed-suite', '03_hang.mjs') }
    ]);
  });

  it('should find the shipped suites', async () => {
    const small = await discoverTests(path.join(__dirname, '../src/suites/small'));
    const release = await discoverTests(path.join(__dirname, '../src/suites/release'));

    expect(small.map((test) => test.name)).toEqual([
      '01_health_endpoints',
      '02_exact_phrase_es_vs_agent',
      '03_index_sanity',
      '04_chat_nonstream',
      '05_chat_stream',
      '06_file_proxy'
    ]);
    expect(release.map((test) => test.name)).toEqual([
      '01_matrix_exact_phrases',
      '02_service_surface',
      '03_index_health',
      '04_aggregations',
      '05_content_quality',
      '06_agent_rag_probes'
    ]);
  });

  it('should raise a config error for a missing directory', async () => {
    await expect(discoverTests(path.join(fixtures, 'no-such-suite'))).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('TEST_FILE_PATTERN', () => {
  it('should require a two-digit prefix and a runnable extension', () => {
    expect(TEST_FILE_PATTERN.test('01_health.sh')).toBe(true);
    expect(TEST_FILE_PATTERN.test('10_matrix.ts')).toBe(true);
    expect(TEST_FILE_PATTERN.test('1_health.sh')).toBe(false);
    expect(TEST_FILE_PATTERN.test('run.sh')).toBe(false);
    expect(TEST_FILE_PATTERN.test('01_.sh')).toBe(false);
    expect(TEST_FILE_PATTERN.test('01_matrix.json')).toBe(false);
  });
});

describe('commandFor', () => {
  it('should pick the interpreter by extension', () => {
    expect(commandFor('/suite/01_a.ts')).toEqual({ command: process.execPath, args: ['--import', 'tsx', '/suite/01_a.ts'] });
    expect(commandFor('/suite/02_b.mjs')).toEqual({ command: process.execPath, args: ['/suite/02_b.mjs'] });
    expect(commandFor('/suite/03_c.sh')).toEqual({ command: 'bash', args: ['/suite/03_c.sh'] });
  });

  it('should reject unknown extensions', () => {
    expect(() => commandFor('/suite/04_d.py')).toThrow(ConfigError);
  });
});

describe('testName', () => {
  it('should drop directory and extension', () => {
    expect(testName('/repo/tests/small/02_health_endpoints.sh')).toBe('02_health_endpoints');
  });
});
