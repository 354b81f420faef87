// Creates the finance database and loads the demo data from db/seed.json
// Usage: npm run db:init

import 'dotenv/config';
import { env } from '../src/env.js';
import { loadSeed, openDatabase, seedDatabase } from '../src/db.js';
import { logger } from '../src/utils/logger.js';

const db = openDatabase();
try {
  const seed = loadSeed();
  seedDatabase(db, seed);
  logger.info(
    { path: env.DATABASE_PATH, employees: seed.employees.length, reimbursements: seed.reimbursements.length },
    'Database initialised',
  );
} finally {
  db.close();
}
