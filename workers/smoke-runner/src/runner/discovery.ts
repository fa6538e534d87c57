import { promises as fs, type Dirent } from 'fs';
import * as path from 'path';
import { ConfigError } from '@ragops/core';

/** Two-digit prefix, a name, and an extension we know how to run */
export const TEST_FILE_PATTERN = /^\d{2}_.+\.(ts|mts|js|mjs|cjs|sh)$/;

export interface DiscoveredTest {
  name: string;
  file: string;
}

export interface TestCommand {
  command: string;
  args: string[];
}

/**
 * Test name shown in transcripts and reports: the file name without extension
 */
export function testName(file: string): string {
  return path.basename(file).replace(/\.[^.]+$/, '');
}

/**
 * Numbered test files in a directory, in lexical (hence numeric) order
 */
export async function discoverTests(dir: string): Promise<DiscoveredTest[]> {
  let entries: Dirent[];

  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw new ConfigError(`Suite directory not readable: ${dir}`, {
      dir,
      reason: error instanceof Error ? error.message : String(error)
    });
  }

  return entries
    .filter((entry) => entry.isFile() && TEST_FILE_PATTERN.test(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => ({ name: testName(name), file: path.join(dir, name) }));
}

/**
 * Interpreter for a test file, chosen by extension
 */
export function commandFor(file: string): TestCommand {
  const extension = path.extname(file);

  switch (extension) {
    case '.ts':
    case '.mts':
      return { command: process.execPath, args: ['--import', 'tsx', file] };
    case '.js':
    case '.mjs':
    case '.cjs':
      return { command: process.execPath, args: [file] };
    case '.sh':
      return { command: 'bash', args: [file] };
    default:
      throw new ConfigError(`No interpreter for ${file}`, { file, extension });
  }
}
