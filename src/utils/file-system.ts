/**
 * File system operations - reading, writing, and globbing.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

// Rejects invalid UTF-8 instead of substituting U+FFFD
const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a file and return its contents as a string.
 * Throws if the bytes are not valid UTF-8.
 */
export async function readFile(filePath: string): Promise<string> {
  return utf8.decode(await fs.promises.readFile(filePath));
}

/**
 * Read a file synchronously.
 */
export function readFileSync(filePath: string): string {
  return utf8.decode(fs.readFileSync(filePath));
}

/**
 * Write content to a file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  await ensureDir(dir);
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns.
 */
export async function globFiles(
  patterns: string | string[],
  options: {
    cwd?: string;
    ignore?: string[];
    absolute?: boolean;
    dot?: boolean;
  } = {}
): Promise<string[]> {
  return fg(patterns, {
    cwd: options.cwd || process.cwd(),
    ignore: options.ignore || ['**/node_modules/**', '**/dist/**'],
    absolute: options.absolute ?? true,
    dot: options.dot ?? false,
    onlyFiles: true,
  });
}
