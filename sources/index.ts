/**
 * Concept Source Registry
 */

export type { ConceptSource } from './types';
export { CatalogConceptSource } from './catalog-source';
export { ProcessConceptSource } from './process-source';
export { PostgresConceptSource } from './postgres-source';

import { configureDatabase } from '../db/client';
import { CatalogConceptSource } from './catalog-source';
import { ProcessConceptSource } from './process-source';
import { PostgresConceptSource } from './postgres-source';
import type { ConceptSource } from './types';
import type { RetentionConfig } from '../config';

/**
 * Build the concept source selected by RETENTION_SOURCE.
 */
export function createConceptSource(config: RetentionConfig): ConceptSource {
  switch (config.source) {
    case 'process':
      return new ProcessConceptSource({ command: config.backendCommand, timeoutMs: config.backendTimeoutMs });
    case 'postgres':
      if (config.databaseUrl) configureDatabase(config.databaseUrl);
      return new PostgresConceptSource();
    case 'catalog':
      return new CatalogConceptSource();
  }
}
