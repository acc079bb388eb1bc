import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadKnowledgeBase } from '../../../../src/core/knowledge/loader.js';
import { KnowledgeBaseError, ErrorCodes } from '../../../../src/utils/errors.js';

const MINIMAL_CATALOG = `
patterns:
  builder:
    name: Builder Pattern
    category: creational
    description: Step-by-step construction
    complexity_score: 5
    learning_difficulty: 4
    when_to_use:
      minimum_complexity: moderate
      indicators: [many parameters]
      thresholds:
        constructor_parameters: 5
    when_not_to_use:
      red_flags: [few properties]
`;

describe('loadKnowledgeBase', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'pattern-scout-kb-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should load the bundled catalog', () => {
    expect(loadKnowledgeBase().names()).toHaveLength(10);
  });

  it('should apply defaults to optional sections', async () => {
    const catalogPath = join(testDir, 'catalog.yaml');
    await writeFile(catalogPath, MINIMAL_CATALOG);

    const builder = loadKnowledgeBase(catalogPath).require('builder');

    expect(builder.alternatives).toEqual([]);
    expect(builder.advanced.threading).toEqual([]);
    expect(builder.when_to_use.use_cases).toEqual([]);
  });

  it('should reject an invalid catalog', async () => {
    const catalogPath = join(testDir, 'catalog.yaml');
    await writeFile(catalogPath, MINIMAL_CATALOG.replace('creational', 'architectural'));

    expect(() => loadKnowledgeBase(catalogPath)).toThrow(KnowledgeBaseError);
  });

  it('should reject upper-case pattern keys', async () => {
    const catalogPath = join(testDir, 'catalog.yaml');
    await writeFile(catalogPath, MINIMAL_CATALOG.replace('  builder:', '  Builder:'));

    expect(() => loadKnowledgeBase(catalogPath)).toThrow(/Pattern keys must be lowercase/);
  });

  it('should report a missing file as KNOWLEDGE_BASE_LOAD_ERROR', () => {
    let caught: unknown;
    try {
      loadKnowledgeBase(join(testDir, 'missing.yaml'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(KnowledgeBaseError);
    expect(caught).toMatchObject({ code: ErrorCodes.KNOWLEDGE_BASE_LOAD_ERROR });
  });
});
