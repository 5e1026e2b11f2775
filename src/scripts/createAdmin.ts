import { env } from '../config/env';
import { createDataStore } from '../store';
import { hashPassword } from '../utils/password';
import { logger } from '../observability/logger';

const createAdmin = async () => {
  const [adminEmail, adminPassword] = process.argv.slice(2);
  if (!adminEmail || !adminPassword) {
    logger.error('Usage: create-admin <email> <password>');
    process.exit(1);
  }

  const store = await createDataStore(env);
  try {
    const existingAdmin = await store.users.findByEmail(adminEmail);
    if (existingAdmin) {
      logger.info({ email: adminEmail }, 'User already exists');
      return;
    }

    const admin = await store.users.create({
      email: adminEmail,
      passwordHash: await hashPassword(adminPassword),
      firstName: 'Admin',
      lastName: 'User',
      role: 'admin',
    });
    logger.info({ email: admin.email, id: admin.id }, 'Admin user created');
  } finally {
    await store.close();
  }
};

createAdmin().catch((error: unknown) => {
  logger.error({ err: error }, 'Error creating admin');
  process.exit(1);
});
