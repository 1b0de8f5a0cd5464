import { CFG } from '../config';
import { loadCatalogFile } from './loadCatalog';
import type { Catalog } from '../types';

export { parseCatalog, loadCatalogFile, catalogTags } from './loadCatalog';

let loaded: Catalog | null = null;

/** The catalog at `CATALOG_PATH`, read on first use. */
export function getCatalog(): Catalog {
  if (!loaded) {
    loaded = loadCatalogFile(CFG.CATALOG_PATH);
  }
  return loaded;
}
