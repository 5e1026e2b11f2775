import mongoose from 'mongoose';
import { componentLogger } from '../observability/logger';

const log = componentLogger('database');

export const connectDB = async (uri: string): Promise<void> => {
  const conn = await mongoose.connect(uri);
  log.info({ host: conn.connection.host, db: conn.connection.name }, 'MongoDB connected');

  mongoose.connection.on('error', (err) => {
    log.error({ err }, 'MongoDB connection error');
  });
  mongoose.connection.on('disconnected', () => {
    log.warn('MongoDB disconnected');
  });
};
