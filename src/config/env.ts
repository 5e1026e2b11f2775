import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = parseInt(val, 10);
  if (Number.isNaN(parsed)) throw new Error(`Env var ${key} must be an integer, got "${val}"`);
  return parsed;
}

export type DataStoreKind = 'mongo' | 'memory';

function dataStoreKind(): DataStoreKind {
  const val = optional('DATA_STORE', 'mongo');
  if (val !== 'mongo' && val !== 'memory') {
    throw new Error(`DATA_STORE must be "mongo" or "memory", got "${val}"`);
  }
  return val;
}

const nodeEnv = optional('NODE_ENV', 'development');

function jwtSecret(): string {
  const val = process.env.JWT_SECRET;
  if (val) return val;
  if (nodeEnv === 'production') throw new Error('Missing required env var: JWT_SECRET');
  return 'dev-secret';
}

export const env = {
  nodeEnv,
  port: optionalInt('PORT', 5000),
  logLevel: optional('LOG_LEVEL', nodeEnv === 'test' ? 'silent' : 'info'),

  dataStore: dataStoreKind(),
  mongodbUri: optional('MONGODB_URI', 'mongodb://localhost:27017/product-reviews?replicaSet=rs0'),
  catalogFile: path.resolve(optional('CATALOG_FILE', path.join('data', 'products.json'))),

  jwt: {
    secret: jwtSecret(),
    expiresInSeconds: optionalInt('JWT_EXPIRE_SECONDS', 7 * 24 * 60 * 60),
  },
  bcryptRounds: optionalInt('BCRYPT_ROUNDS', nodeEnv === 'test' ? 4 : 12),

  reviews: {
    defaultLimit: optionalInt('REVIEWS_DEFAULT_LIMIT', 10),
    maxLimit: optionalInt('REVIEWS_MAX_LIMIT', 100),
  },

  defaultAdmin: {
    email: optional('DEFAULT_ADMIN_EMAIL', ''),
    password: optional('DEFAULT_ADMIN_PASSWORD', ''),
  },
};

export type Env = typeof env;
