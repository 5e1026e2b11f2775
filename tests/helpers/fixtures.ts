import { MemoryDataStore } from '../../src/store/memoryStore';
import { Product, UserRecord, UserRole } from '../../src/store/types';

export const TEST_SECRET = 'test-secret';

export async function addProduct(
  store: MemoryDataStore,
  slug = 'linen-bath-towel',
  isActive = true
): Promise<Product> {
  return store.products.upsert({ slug, name: slug.replace(/-/g, ' '), isActive });
}

export async function addUser(
  store: MemoryDataStore,
  role: UserRole,
  firstName: string,
  lastName: string
): Promise<UserRecord> {
  return store.users.create({
    email: `${firstName.toLowerCase()}@example.com`,
    passwordHash: 'not-a-real-hash',
    firstName,
    lastName,
    role,
  });
}
