import { createDb, type DB } from '@splitloan/engine';

const dbPath = process.env.SPLITLOAN_DB_PATH ?? ':memory:';
export const db: DB = createDb(dbPath);
