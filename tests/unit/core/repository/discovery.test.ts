import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_EXCLUSIONS,
  discoverSourceFiles,
  isExcluded,
} from '../../../../src/core/repository/discovery.js';

describe('discovery', () => {
  describe('isExcluded', () => {
    it('should match tokens anywhere in the path', () => {
      expect(isExcluded('pkg/__pycache__/mod.py', DEFAULT_EXCLUSIONS)).toBe(true);
      expect(isExcluded('project/.venv/lib/site.py', DEFAULT_EXCLUSIONS)).toBe(true);
      expect(isExcluded('myenv/tool.py', DEFAULT_EXCLUSIONS)).toBe(true);
    });

    it('should keep ordinary paths', () => {
      expect(isExcluded('app/services/billing.py', DEFAULT_EXCLUSIONS)).toBe(false);
      expect(isExcluded('environment.py', DEFAULT_EXCLUSIONS)).toBe(false);
    });

    it('should ignore empty tokens', () => {
      expect(isExcluded('app/main.py', [''])).toBe(false);
    });
  });

  describe('discoverSourceFiles', () => {
    let testDir: string;

    const touch = async (relativePath: string): Promise<void> => {
      const fullPath = join(testDir, relativePath);
      await mkdir(dirname(fullPath), { recursive: true });
      await writeFile(fullPath, 'x = 1\n');
    };

    beforeEach(async () => {
      testDir = await mkdtemp(join(tmpdir(), 'pattern-scout-discovery-'));
      await touch('a.py');
      await touch('pkg/b.py');
      await touch('.hidden/e.py');
      await touch('notes.txt');
      await touch('venv/lib/c.py');
      await touch('myenv/f.py');
      await touch('__pycache__/d.py');
      await touch('node_modules/pkg/g.py');
      await touch('build/out.py');
    });

    afterEach(async () => {
      await rm(testDir, { recursive: true, force: true });
    });

    it('should list Python files outside excluded directories, sorted', async () => {
      expect(await discoverSourceFiles(testDir)).toEqual(['.hidden/e.py', 'a.py', 'pkg/b.py']);
    });

    it('should apply extra exclusion tokens', async () => {
      expect(await discoverSourceFiles(testDir, ['**/*.py'], [...DEFAULT_EXCLUSIONS, 'pkg/'])).toEqual([
        '.hidden/e.py',
        'a.py',
      ]);
    });

    it('should honour custom include patterns', async () => {
      expect(await discoverSourceFiles(testDir, ['pkg/**/*.py'])).toEqual(['pkg/b.py']);
    });

    it('should return nothing for an empty directory', async () => {
      const empty = await mkdtemp(join(tmpdir(), 'pattern-scout-empty-'));
      try {
        expect(await discoverSourceFiles(empty)).toEqual([]);
      } finally {
        await rm(empty, { recursive: true, force: true });
      }
    });
  });
});
