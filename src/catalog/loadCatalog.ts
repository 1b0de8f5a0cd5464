import { readFileSync } from 'fs';
import { CatalogFileSchema, type SuggestionItemRecord } from '../schemas/suggestion';
import { CatalogError } from '../errors';
import { createLogger } from '../util/logger';
import type { Catalog, SuggestionItem } from '../types';

const logger = createLogger('Catalog');

function freezeItem(input: SuggestionItemRecord): SuggestionItem {
  const tags = Object.freeze(Array.from(new Set(input.tags)).sort());
  const item: SuggestionItem = {
    id: input.id,
    text: input.text,
    ...(input.detail === undefined ? {} : { detail: input.detail }),
    polarity: input.polarity,
    tags,
    priority: input.priority
  };
  return Object.freeze(item);
}

function findDuplicateIds(ids: string[]): string[] {
  const counts = new Map<string, number>();
  for (const id of ids) counts.set(id, (counts.get(id) ?? 0) + 1);
  return [...counts.entries()].filter(([, n]) => n > 1).map(([id]) => id);
}

/**
 * Validates raw catalog data and returns a frozen catalog.
 * Throws `CatalogError` on schema violations or duplicate ids.
 */
export function parseCatalog(raw: unknown): Catalog {
  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new CatalogError(`Catalog is malformed (${issues.length} problem(s))`, issues);
  }

  const duplicates = findDuplicateIds(parsed.data.items.map(i => i.id));
  if (duplicates.length > 0) {
    throw new CatalogError(
      `Catalog has duplicate suggestion ids: ${duplicates.join(', ')}`,
      duplicates.map(id => `duplicate id: ${id}`)
    );
  }

  const items = Object.freeze(parsed.data.items.map(freezeItem));
  return Object.freeze({ version: parsed.data.version, items });
}

export function loadCatalogFile(filePath: string): Catalog {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new CatalogError(`Could not read catalog file ${filePath}`, [String(error)], { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CatalogError(`Catalog file ${filePath} is not valid JSON`, [String(error)], { cause: error });
  }

  const catalog = parseCatalog(raw);
  logger.debug(`Loaded ${catalog.items.length} suggestions (catalog v${catalog.version}) from ${filePath}`);
  return catalog;
}

/** Every tag used by the catalog, sorted. */
export function catalogTags(catalog: Catalog): string[] {
  const tags = new Set<string>();
  for (const item of catalog.items) {
    for (const tag of item.tags) tags.add(tag);
  }
  return [...tags].sort();
}
