/**
 * Finance Store
 * Structured-data access for employees, reimbursements and work orders
 */

import { randomUUID } from 'crypto';
import type { FinanceDatabase } from '../db.js';

export type ReimbursementStatus = 'pending' | 'approved' | 'rejected' | 'paid';
export type WorkOrderPriority = 'low' | 'medium' | 'high' | 'urgent';

export const REIMBURSEMENT_STATUSES: ReimbursementStatus[] = ['pending', 'approved', 'rejected', 'paid'];
export const WORK_ORDER_PRIORITIES: WorkOrderPriority[] = ['low', 'medium', 'high', 'urgent'];
export const EXPENSE_CATEGORIES = ['travel', 'meals', 'office', 'training'];

export interface EmployeeRow {
  employee_id: string;
  name: string;
  department: string | null;
  position: string | null;
  email: string | null;
  phone: string | null;
}

export interface ReimbursementRow {
  reimbursement_id: string;
  employee_id: string;
  amount: number;
  category: string | null;
  description: string | null;
  status: ReimbursementStatus;
  apply_date: string | null;
  approve_date: string | null;
}

export interface WorkOrderRow {
  work_order_id: string;
  title: string;
  description: string | null;
  assignee_id: string;
  priority: WorkOrderPriority;
  category: string | null;
  status: string;
  created_at: string;
}

export interface EmployeeQuery {
  name?: string;
  employeeId?: string;
  department?: string;
}

export interface ReimbursementQuery {
  employeeId: string;
  startDate?: string;
  endDate?: string;
  status?: ReimbursementStatus;
  category?: string;
  limit?: number;
}

export interface ReimbursementSummary {
  employee: EmployeeRow;
  startDate: string;
  endDate: string;
  totalAmount: number;
  count: number;
  byCategory: Record<string, number>;
  byStatus: Partial<Record<ReimbursementStatus, number>>;
}

export interface WorkOrderInput {
  title: string;
  assigneeId: string;
  description?: string;
  priority: WorkOrderPriority;
  category?: string;
}

export interface WorkOrderOutcome {
  workOrder: WorkOrderRow;
  created: boolean;
}

interface FilterClause {
  where: string;
  params: Record<string, string | number>;
}

function reimbursementFilter(query: ReimbursementQuery): FilterClause {
  const conds = ['employee_id = @employeeId'];
  const params: Record<string, string | number> = { employeeId: query.employeeId };

  if (query.startDate) {
    conds.push('apply_date >= @startDate');
    params.startDate = query.startDate;
  }
  if (query.endDate) {
    conds.push('apply_date <= @endDate');
    params.endDate = query.endDate;
  }
  if (query.status) {
    conds.push('status = @status');
    params.status = query.status;
  }
  if (query.category) {
    conds.push('category = @category');
    params.category = query.category;
  }

  return { where: conds.join(' AND '), params };
}

function roundAmount(value: number): number {
  return Math.round(value * 100) / 100;
}

export class FinanceStore {
  constructor(
    private db: FinanceDatabase,
    private now: () => Date = () => new Date(),
  ) {}

  findEmployees(query: EmployeeQuery): EmployeeRow[] {
    const conds: string[] = [];
    const params: Record<string, string> = {};

    if (query.employeeId) {
      conds.push('employee_id = @employeeId');
      params.employeeId = query.employeeId.toUpperCase();
    }
    if (query.name) {
      conds.push('name LIKE @name');
      params.name = `%${query.name}%`;
    }
    if (query.department) {
      conds.push('department LIKE @department');
      params.department = query.department;
    }

    const where = conds.length > 0 ? `WHERE ${conds.join(' AND ')}` : '';
    return this.db
      .prepare<Record<string, string>, EmployeeRow>(
        `SELECT employee_id, name, department, position, email, phone
         FROM employees ${where} ORDER BY employee_id`,
      )
      .all(params);
  }

  getEmployee(employeeId: string): EmployeeRow | undefined {
    return this.db
      .prepare<[string], EmployeeRow>(
        `SELECT employee_id, name, department, position, email, phone
         FROM employees WHERE employee_id = ?`,
      )
      .get(employeeId.toUpperCase());
  }

  listReimbursements(query: ReimbursementQuery): ReimbursementRow[] {
    const filter = reimbursementFilter(query);
    const limit = Math.max(1, Math.min(500, query.limit ?? 100));
    return this.db
      .prepare<Record<string, string | number>, ReimbursementRow>(
        `SELECT reimbursement_id, employee_id, amount, category, description, status, apply_date, approve_date
         FROM reimbursements WHERE ${filter.where}
         ORDER BY apply_date DESC LIMIT ${limit}`,
      )
      .all(filter.params);
  }

  /** Claim counts per status over every matching row; `limit` does not apply. */
  countReimbursementsByStatus(query: ReimbursementQuery): Partial<Record<ReimbursementStatus, number>> {
    const filter = reimbursementFilter(query);
    const rows = this.db
      .prepare<Record<string, string | number>, { status: ReimbursementStatus; count: number }>(
        `SELECT status, COUNT(*) AS count
         FROM reimbursements WHERE ${filter.where}
         GROUP BY status ORDER BY status`,
      )
      .all(filter.params);

    const counts: Partial<Record<ReimbursementStatus, number>> = {};
    for (const row of rows) {
      counts[row.status] = row.count;
    }
    return counts;
  }

  /** Returns undefined when the employee does not exist. */
  summarizeReimbursements(
    query: ReimbursementQuery & { startDate: string; endDate: string },
  ): ReimbursementSummary | undefined {
    const employee = this.getEmployee(query.employeeId);
    if (!employee) return undefined;

    const scoped: ReimbursementQuery = { ...query, employeeId: employee.employee_id, status: undefined };
    const filter = reimbursementFilter(scoped);
    const categoryRows = this.db
      .prepare<Record<string, string | number>, { category: string | null; total: number; count: number }>(
        `SELECT category, SUM(amount) AS total, COUNT(*) AS count
         FROM reimbursements WHERE ${filter.where}
         GROUP BY category ORDER BY category`,
      )
      .all(filter.params);

    const byCategory: Record<string, number> = {};
    let totalAmount = 0;
    let count = 0;
    for (const row of categoryRows) {
      byCategory[row.category ?? 'uncategorized'] = roundAmount(row.total);
      totalAmount += row.total;
      count += row.count;
    }

    const byStatus = this.countReimbursementsByStatus(scoped);

    return {
      employee,
      startDate: query.startDate,
      endDate: query.endDate,
      totalAmount: roundAmount(totalAmount),
      count,
      byCategory,
      byStatus,
    };
  }

  findOpenWorkOrder(assigneeId: string, title: string): WorkOrderRow | undefined {
    return this.db
      .prepare<[string, string], WorkOrderRow>(
        `SELECT work_order_id, title, description, assignee_id, priority, category, status, created_at
         FROM work_orders
         WHERE assignee_id = ? AND title = ? AND status IN ('open', 'in_progress')
         ORDER BY created_at DESC LIMIT 1`,
      )
      .get(assigneeId, title);
  }

  /**
   * Creates a work order unless an open one with the same title and assignee
   * exists, in which case that one is returned. Repeating the call is safe.
   */
  createWorkOrder(input: WorkOrderInput): WorkOrderOutcome | undefined {
    const assignee = this.getEmployee(input.assigneeId);
    if (!assignee) return undefined;

    const insert = this.db.transaction((): WorkOrderOutcome => {
      const existing = this.findOpenWorkOrder(assignee.employee_id, input.title);
      if (existing) {
        return { workOrder: existing, created: false };
      }

      const workOrderId = this.nextWorkOrderId();
      this.db
        .prepare(
          `INSERT INTO work_orders (work_order_id, title, description, assignee_id, priority, category, status)
           VALUES (@workOrderId, @title, @description, @assigneeId, @priority, @category, 'open')`,
        )
        .run({
          workOrderId,
          title: input.title,
          description: input.description ?? null,
          assigneeId: assignee.employee_id,
          priority: input.priority,
          category: input.category ?? null,
        });

      const created = this.findOpenWorkOrder(assignee.employee_id, input.title);
      if (!created) {
        throw new Error(`Work order ${workOrderId} was not persisted`);
      }
      return { workOrder: created, created: true };
    });

    return insert();
  }

  private nextWorkOrderId(): string {
    const stamp = this.now().toISOString().replace(/[-:T]/g, '').slice(0, 14);
    const suffix = randomUUID().replace(/-/g, '').slice(0, 6).toUpperCase();
    return `WO${stamp}${suffix}`;
  }
}
