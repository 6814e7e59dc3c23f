import fs from 'fs';
import path from 'path';
import { closeDatabase, query } from './connection';
import { dbLogger as logger } from '../utils/logger';

export const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

async function runMigration(schemaPath: string = SCHEMA_PATH): Promise<void> {
  logger.info('Starting database migration...');

  const schemaSql = fs.readFileSync(schemaPath, 'utf-8');
  await query(schemaSql);

  logger.info('Database migration completed successfully');
}

if (require.main === module) {
  runMigration()
    .then(closeDatabase)
    .catch(async (error) => {
      logger.error(`Migration failed: ${error}`);
      await closeDatabase();
      process.exit(1);
    });
}

export { runMigration };
