import { afterAll, describe, it, expect } from 'vitest';
import { addPendingClaims, seededStore } from '../assistant/__tests__/helpers.js';

describe('Finance Store', () => {
  const { db, store } = seededStore(() => new Date('2024-04-15T09:00:00Z'));

  afterAll(() => db.close());

  it('should find employees by department case-insensitively', () => {
    expect(store.findEmployees({ department: 'finance' }).map(e => e.employee_id)).toEqual(['E001', 'E004']);
  });

  it('should filter reimbursements by status', () => {
    expect(store.listReimbursements({ employeeId: 'E001', status: 'pending' }).map(r => r.reimbursement_id)).toEqual([
      'R20240320002',
    ]);
  });

  it('should summarize by category and status', () => {
    const summary = store.summarizeReimbursements({ employeeId: 'e002', startDate: '2024-03-01', endDate: '2024-03-31' });

    expect(summary).toMatchObject({
      totalAmount: 2500,
      count: 2,
      byCategory: { office: 500, travel: 2000 },
      byStatus: { approved: 1, rejected: 1 },
    });
    expect(summary?.employee.name).toBe('Brian Lee');
  });

  it('should count claims by status past the listing limit', () => {
    const busy = seededStore(() => new Date('2024-04-15T09:00:00Z'));
    addPendingClaims(busy.db, 'E005', 150);

    expect(busy.store.listReimbursements({ employeeId: 'E005' })).toHaveLength(100);
    expect(busy.store.countReimbursementsByStatus({ employeeId: 'E005' })).toEqual({ pending: 151 });
    expect(busy.store.countReimbursementsByStatus({ employeeId: 'E005', startDate: '2024-01-01' })).toEqual({
      pending: 1,
    });
    busy.db.close();
  });

  it('should return undefined for an unknown employee', () => {
    expect(store.summarizeReimbursements({ employeeId: 'E999', startDate: '2024-03-01', endDate: '2024-03-31' })).toBeUndefined();
    expect(store.createWorkOrder({ title: 'Audit', assigneeId: 'E999', priority: 'low' })).toBeUndefined();
  });

  it('should report whether a work order was created or reused', () => {
    const first = store.createWorkOrder({ title: 'Reconcile April', assigneeId: 'E004', priority: 'low' });
    const again = store.createWorkOrder({ title: 'Reconcile April', assigneeId: 'e004', priority: 'high' });

    expect(first?.created).toBe(true);
    expect(again?.created).toBe(false);
    expect(again?.workOrder.work_order_id).toBe(first?.workOrder.work_order_id);
    expect(again?.workOrder.priority).toBe('low');
  });
});
