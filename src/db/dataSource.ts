import 'reflect-metadata';
import fs from 'fs';
import path from 'path';
import { DataSource } from 'typeorm';
import { User } from './entities/User';
import { UserCity } from './entities/UserCity';
import { logger } from '../logger';

export const MEMORY_DATABASE = ':memory:';

export function createDataSource(databasePath: string): DataSource {
  return new DataSource({
    type: 'better-sqlite3',
    database: databasePath,
    entities: [User, UserCity],
    synchronize: true,
    logging: false,
  });
}

/**
 * Opens the database, creating its directory and tables when missing.
 */
export async function initDataSource(databasePath: string): Promise<DataSource> {
  if (databasePath !== MEMORY_DATABASE) {
    const dir = path.dirname(path.resolve(databasePath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
      logger.info({ dir }, 'Created database directory');
    }
  }

  const dataSource = createDataSource(databasePath);
  await dataSource.initialize();

  logger.info({ databasePath }, 'Database ready');
  return dataSource;
}
