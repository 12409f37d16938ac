/**
 * Catalog Concept Source
 *
 * Bundled sample catalog of data-structure and algorithm concepts.
 * Used when no external backend is configured.
 */

import sampleCatalog from '../data/sample-concepts.json';
import { parseSnapshot } from './snapshot-schema';
import type { ConceptSource } from './types';
import type { ImportSnapshot } from '../simulation-state';

export interface ConceptCatalog {
  concepts?: unknown;
  counters?: unknown;
}

export class CatalogConceptSource implements ConceptSource {
  readonly kind = 'catalog';

  constructor(private readonly catalog: ConceptCatalog = sampleCatalog) {}

  async importSnapshot(): Promise<ImportSnapshot> {
    return parseSnapshot(this.catalog.concepts, this.catalog.counters, 'sample catalog');
  }

  async forwardDecayRate(rate: number): Promise<unknown> {
    return { status: 'success', rate };
  }
}
