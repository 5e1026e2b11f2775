import fs from 'fs';
import path from 'path';
import { CatalogEntry, ProductRepository } from '../store/types';

export const DEFAULT_CATALOG_FILE = path.resolve(process.cwd(), 'data', 'products.json');

function isCatalogEntry(value: unknown): value is CatalogEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'slug' in value &&
    typeof value.slug === 'string' &&
    'name' in value &&
    typeof value.name === 'string' &&
    'isActive' in value &&
    typeof value.isActive === 'boolean'
  );
}

export function parseCatalog(raw: string): CatalogEntry[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error('Catalog file must contain a JSON array');
  }
  return parsed.map((item, index) => {
    if (!isCatalogEntry(item)) {
      throw new Error(`Catalog entry ${index} needs slug, name and isActive`);
    }
    return { slug: item.slug, name: item.name, isActive: item.isActive };
  });
}

/**
 * Upserts catalog entries by slug. Ratings are left alone: they belong to
 * the rating aggregator.
 */
export async function seedCatalog(products: ProductRepository, entries: CatalogEntry[]): Promise<number> {
  for (const entry of entries) {
    await products.upsert(entry);
  }
  return entries.length;
}

export async function seedCatalogFile(products: ProductRepository, file: string = DEFAULT_CATALOG_FILE): Promise<number> {
  const raw = await fs.promises.readFile(file, 'utf8');
  return seedCatalog(products, parseCatalog(raw));
}
