import path from 'path';
import { env } from '../config/env';
import { createDataStore } from '../store';
import { seedCatalogFile } from '../utils/catalog';
import { logger } from '../observability/logger';

async function run() {
  const file = process.argv[2] ? path.resolve(process.argv[2]) : env.catalogFile;
  const store = await createDataStore({ ...env, dataStore: 'mongo' });
  try {
    const count = await seedCatalogFile(store.products, file);
    logger.info({ count, file }, 'Catalog seeded');
  } finally {
    await store.close();
  }
}

run().catch((err: unknown) => {
  logger.error({ err }, 'Catalog seed failed');
  process.exit(1);
});
