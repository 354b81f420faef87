// Reimbursement Status Tool
// Reports where an employee's claims stand (pending, approved, rejected, paid)

import type { StructuredDataTool, ToolResult } from './types.js';
import { REIMBURSEMENT_STATUSES } from '../finance-store.js';
import type { FinanceStore } from '../finance-store.js';
import { entityNotFound, invalidParameter, readEnum, readIsoDate, readString } from './failures.js';

const LISTED_CLAIMS = 20;

export function createReimbursementStatusTool(store: FinanceStore): StructuredDataTool {
  return {
    name: 'reimbursement_status',
    description: "Show the approval status of an employee's reimbursement claims.",
    kind: 'structured-data',
    category: 'data',
    effect: 'read',
    parameters: [
      { name: 'employee_id', type: 'string', description: 'Employee id, e.g. E001', required: true, target: true },
      { name: 'start_date', type: 'string', description: 'First day, YYYY-MM-DD', required: false },
      { name: 'end_date', type: 'string', description: 'Last day, YYYY-MM-DD', required: false },
      {
        name: 'status',
        type: 'string',
        description: 'Only show claims in this status',
        required: false,
        enum: REIMBURSEMENT_STATUSES,
      },
    ],
    exports: ['pending_count'],
    invoke: async (args): Promise<ToolResult> => {
      const employeeId = readString(args, 'employee_id');
      if (!employeeId) return invalidParameter('employee_id', 'employee_id is required');

      const start = readIsoDate(args, 'start_date');
      if (!start.ok) return start.failure;
      const end = readIsoDate(args, 'end_date');
      if (!end.ok) return end.failure;
      const status = readEnum(args, 'status', REIMBURSEMENT_STATUSES);
      if (!status.ok) return status.failure;

      const employee = store.getEmployee(employeeId);
      if (!employee) {
        return entityNotFound(`Employee ${employeeId} does not exist`, { employee_id: employeeId });
      }

      const query = {
        employeeId: employee.employee_id,
        startDate: start.value,
        endDate: end.value,
        status: status.value,
      };
      const counts = store.countReimbursementsByStatus(query);
      const total = REIMBURSEMENT_STATUSES.reduce((sum, s) => sum + (counts[s] ?? 0), 0);
      const rows = total > 0 ? store.listReimbursements({ ...query, limit: LISTED_CLAIMS }) : [];

      const tally = REIMBURSEMENT_STATUSES.filter(s => counts[s]).map(s => `${counts[s]} ${s}`);
      const lines = rows.map(
        row => `- ${row.reimbursement_id} ${row.apply_date ?? 'undated'} ${row.amount.toFixed(2)}: ${row.status}`,
      );
      if (total > rows.length) {
        lines.push(`(showing the ${rows.length} most recent of ${total})`);
      }
      const content =
        total === 0
          ? `${employee.name} (${employee.employee_id}) has no matching claims`
          : [`${employee.name} (${employee.employee_id}): ${tally.join(', ')}`, ...lines].join('\n');

      return {
        success: true,
        content,
        data: { employee, counts, total, claims: rows },
        exports: { pending_count: counts.pending ?? 0 },
        source: { origin: `reimbursements:${employee.employee_id}`, excerpt: content.split('\n')[0] },
      };
    },
  };
}
