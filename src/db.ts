import mongoose, { type Connection } from 'mongoose';
import type { Logger } from './logger.js';

export async function connectDatabase(uri: string, dbName: string, logger: Logger): Promise<Connection> {
  const connection = await mongoose.createConnection(uri, { dbName }).asPromise();
  logger.info('MongoDB connected', { dbName });
  connection.on('disconnected', () => logger.warn('MongoDB disconnected'));
  connection.on('reconnected', () => logger.info('MongoDB reconnected'));
  return connection;
}
