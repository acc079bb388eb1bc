/**
 * Loads the bundled pattern catalog.
 */
import { fileURLToPath } from 'node:url';
import { loadYamlWithSchemaSync } from '../../utils/yaml.js';
import { KnowledgeBaseError, PatternScoutError, ErrorCodes } from '../../utils/errors.js';
import { PatternCatalogSchema } from './schema.js';
import { PatternKnowledgeBase } from './knowledge-base.js';

/** Path of the catalog shipped with the package. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../../data/patterns.yaml', import.meta.url)
);

/**
 * Read and validate a pattern catalog.
 * Synchronous: the catalog is loaded once, before any analysis starts.
 */
export function loadKnowledgeBase(catalogPath: string = DEFAULT_CATALOG_PATH): PatternKnowledgeBase {
  try {
    const catalog = loadYamlWithSchemaSync(catalogPath, PatternCatalogSchema);
    return new PatternKnowledgeBase(catalog.patterns);
  } catch (error) {
    if (error instanceof PatternScoutError) {
      throw new KnowledgeBaseError(
        ErrorCodes.KNOWLEDGE_BASE_LOAD_ERROR,
        `Failed to load pattern catalog: ${error.message}`,
        { catalogPath, cause: error.code }
      );
    }
    throw error;
  }
}
