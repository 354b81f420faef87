// Database client (better-sqlite3)
// Schema lives in db/schema.sql, demo data in db/seed.json

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { z } from 'zod';
import { env } from './env.js';

export type FinanceDatabase = Database.Database;

const SCHEMA_URL = new URL('../db/schema.sql', import.meta.url);
const SEED_URL = new URL('../db/seed.json', import.meta.url);

const EmployeeSeedSchema = z.object({
  employee_id: z.string(),
  name: z.string(),
  department: z.string().nullable(),
  position: z.string().nullable(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
});

const ReimbursementSeedSchema = z.object({
  reimbursement_id: z.string(),
  employee_id: z.string(),
  amount: z.number(),
  category: z.string().nullable(),
  description: z.string().nullable(),
  status: z.enum(['pending', 'approved', 'rejected', 'paid']),
  apply_date: z.string().nullable(),
  approve_date: z.string().nullable(),
});

const SeedSchema = z.object({
  employees: z.array(EmployeeSeedSchema),
  reimbursements: z.array(ReimbursementSeedSchema),
});

export type SeedData = z.infer<typeof SeedSchema>;

/**
 * Opens (or creates) the finance database and applies the schema.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string = env.DATABASE_PATH): FinanceDatabase {
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.exec(readFileSync(SCHEMA_URL, 'utf8'));
  return db;
}

export function loadSeed(): SeedData {
  return SeedSchema.parse(JSON.parse(readFileSync(SEED_URL, 'utf8')));
}

// Replaces all rows with the seed data in one transaction
export function seedDatabase(db: FinanceDatabase, seed: SeedData = loadSeed()): void {
  const insertEmployee = db.prepare(
    `INSERT INTO employees (employee_id, name, department, position, email, phone)
     VALUES (@employee_id, @name, @department, @position, @email, @phone)`,
  );
  const insertReimbursement = db.prepare(
    `INSERT INTO reimbursements
       (reimbursement_id, employee_id, amount, category, description, status, apply_date, approve_date)
     VALUES
       (@reimbursement_id, @employee_id, @amount, @category, @description, @status, @apply_date, @approve_date)`,
  );

  const apply = db.transaction((data: SeedData) => {
    db.exec('DELETE FROM work_orders; DELETE FROM reimbursements; DELETE FROM employees;');
    for (const employee of data.employees) insertEmployee.run(employee);
    for (const reimbursement of data.reimbursements) insertReimbursement.run(reimbursement);
  });

  apply(seed);
}
