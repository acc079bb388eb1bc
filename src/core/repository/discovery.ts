/**
 * Eligible source file discovery.
 */
import * as path from 'node:path';
import { globFiles } from '../../utils/file-system.js';

/**
 * Path fragments skipped in every run. Matched as plain substrings of the
 * root-relative path, so `env/` also skips `myenv/`.
 */
export const DEFAULT_EXCLUSIONS: readonly string[] = [
  '__pycache__',
  '.git/',
  '.venv/',
  'venv/',
  'env/',
  'node_modules/',
  '.pytest_cache',
  '.mypy_cache',
  'dist/',
  'build/',
  '.tox/',
];

export const DEFAULT_INCLUDE: readonly string[] = ['**/*.py'];

export function isExcluded(relativePath: string, exclusions: readonly string[]): boolean {
  return exclusions.some((token) => token.length > 0 && relativePath.includes(token));
}

/**
 * Root-relative, `/`-separated paths of eligible files, sorted.
 */
export async function discoverSourceFiles(
  rootPath: string,
  include: readonly string[] = DEFAULT_INCLUDE,
  exclusions: readonly string[] = DEFAULT_EXCLUSIONS
): Promise<string[]> {
  const files = await globFiles([...include], {
    cwd: rootPath,
    ignore: [],
    absolute: false,
    dot: true,
  });

  return files
    .map((file) => file.split(path.sep).join('/'))
    .filter((file) => !isExcluded(file, exclusions))
    .sort();
}
