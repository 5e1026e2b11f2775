import { Env } from '../config/env';
import { connectDB } from '../config/database';
import { componentLogger } from '../observability/logger';
import { seedCatalogFile } from '../utils/catalog';
import { MemoryDataStore } from './memoryStore';
import { MongoDataStore } from './mongoStore';
import { DataStore } from './types';

export { MemoryDataStore } from './memoryStore';
export { MongoDataStore } from './mongoStore';
export * from './types';

const log = componentLogger('database');

/**
 * Opens the configured store. The memory store starts empty and lives only
 * as long as the process, so it is filled from the catalog file here.
 */
export const createDataStore = async (
  config: Pick<Env, 'dataStore' | 'mongodbUri' | 'catalogFile'>
): Promise<DataStore> => {
  if (config.dataStore === 'memory') {
    const store = new MemoryDataStore();
    const count = await seedCatalogFile(store.products, config.catalogFile);
    log.info({ count, file: config.catalogFile }, 'Memory store seeded from catalog');
    return store;
  }
  await connectDB(config.mongodbUri);
  return new MongoDataStore();
};
