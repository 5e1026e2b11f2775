import { UserRepository } from '../store/types';
import { hashPassword } from '../utils/password';
import { componentLogger } from '../observability/logger';

const log = componentLogger('bootstrap');

export interface DefaultAdminConfig {
  email: string;
  password: string;
}

/**
 * Creates the configured admin account if it doesn't exist yet.
 * Skipped when DEFAULT_ADMIN_EMAIL or DEFAULT_ADMIN_PASSWORD is unset.
 */
export const initDefaultAdmin = async (users: UserRepository, config: DefaultAdminConfig): Promise<void> => {
  if (!config.email || !config.password) {
    log.debug('No default admin configured');
    return;
  }

  const existingAdmin = await users.findByEmail(config.email);
  if (existingAdmin) {
    log.info({ email: config.email }, 'Default admin user already exists');
    return;
  }

  const admin = await users.create({
    email: config.email,
    passwordHash: await hashPassword(config.password),
    firstName: 'Admin',
    lastName: 'User',
    role: 'admin',
  });
  log.info({ email: admin.email }, 'Default admin user created, change its password after first login');
};
