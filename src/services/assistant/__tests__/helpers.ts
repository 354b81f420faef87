// Shared fakes for assistant engine tests

import pino from 'pino';
import { vi } from 'vitest';
import { openDatabase, seedDatabase } from '../../../db.js';
import type { FinanceDatabase } from '../../../db.js';
import { FinanceStore } from '../../finance-store.js';
import type { PolicySearch, RetrievalResult } from '../../retrieval.js';
import type { GenerationRequest, TextGenerator } from '../../generation.js';
import type { Mailer, MailMessage, MailReceipt } from '../../mailer.js';
import type { ArgValue, ToolArgs, ToolContext, ToolDefinition, ToolParameter, ToolResult } from '../../tools/types.js';

export const silentLogger = pino({ level: 'silent' });

export const TRAVEL_HIT: RetrievalResult = {
  text: '## Lodging\nHotel stays are capped at 200.00 per night.',
  origin: 'travel-expenses#2',
  score: 0.8,
  title: 'Travel Expense Policy',
  heading: 'Lodging',
};

export const TRAVEL_HIT_CONTENT = '[Travel Expense Policy › Lodging] Hotel stays are capped at 200.00 per night.';

export function fakePolicySearch(hits: RetrievalResult[] = [TRAVEL_HIT]): PolicySearch {
  return { search: vi.fn(async () => hits) };
}

export function fakeGenerator(reply: string | (() => Promise<string>)): TextGenerator {
  return {
    name: 'fake:model',
    generate: vi.fn(async (_request: GenerationRequest): Promise<string> => (typeof reply === 'string' ? reply : reply())),
  };
}

export class FakeMailer implements Mailer {
  sent: MailMessage[] = [];
  failWith?: Error;

  async send(message: MailMessage): Promise<MailReceipt> {
    if (this.failWith) throw this.failWith;
    this.sent.push(message);
    return { messageId: `msg-${this.sent.length}` };
  }
}

export function seededStore(now?: () => Date): { db: FinanceDatabase; store: FinanceStore } {
  const db = openDatabase(':memory:');
  seedDatabase(db);
  return { db, store: new FinanceStore(db, now) };
}

/** Adds `count` pending claims for one employee, one per day from 2023-01-01. */
export function addPendingClaims(db: FinanceDatabase, employeeId: string, count: number): void {
  const insert = db.prepare(
    `INSERT INTO reimbursements (reimbursement_id, employee_id, amount, category, description, status, apply_date)
     VALUES (?, ?, 25, 'office', 'Stationery', 'pending', ?)`,
  );
  const day = Date.UTC(2023, 0, 1);
  db.transaction(() => {
    for (let i = 0; i < count; i++) {
      const applyDate = new Date(day + i * 86_400_000).toISOString().slice(0, 10);
      insert.run(`R2023${String(i).padStart(5, '0')}`, employeeId, applyDate);
    }
  })();
}

type Invoke = (args: ToolArgs, context: ToolContext) => Promise<ToolResult>;

export function param(name: string, extra: Partial<ToolParameter> = {}): ToolParameter {
  return { name, type: 'string', description: name, required: true, ...extra };
}

export function ok(content: string, exports: Record<string, ArgValue> = {}): ToolResult {
  return { success: true, content, data: null, exports };
}

/** Structured-data tool with the given shape; invoke defaults to a plain success. */
export function fakeTool(
  name: string,
  shape: {
    parameters?: ToolParameter[];
    exports?: string[];
    effect?: ToolDefinition['effect'];
    requiresOneOf?: string[];
    invoke?: Invoke;
  } = {},
): ToolDefinition {
  return {
    name,
    description: name,
    kind: 'structured-data',
    category: 'data',
    effect: shape.effect ?? 'read',
    parameters: shape.parameters ?? [],
    exports: shape.exports ?? [],
    ...(shape.requiresOneOf ? { requiresOneOf: shape.requiresOneOf } : {}),
    invoke: shape.invoke ?? (async () => ok(`${name} done`)),
  };
}
