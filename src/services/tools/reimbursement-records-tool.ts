// Reimbursement Records Tool
// Lists an employee's individual claims, newest first

import type { StructuredDataTool, ToolResult } from './types.js';
import { REIMBURSEMENT_STATUSES } from '../finance-store.js';
import type { FinanceStore } from '../finance-store.js';
import { entityNotFound, invalidParameter, readEnum, readInteger, readIsoDate, readString } from './failures.js';

export function createReimbursementRecordsTool(store: FinanceStore): StructuredDataTool {
  return {
    name: 'reimbursement_records',
    description: "List an employee's reimbursement claims with amounts, categories and dates.",
    kind: 'structured-data',
    category: 'data',
    effect: 'read',
    parameters: [
      { name: 'employee_id', type: 'string', description: 'Employee id, e.g. E001', required: true, target: true },
      { name: 'start_date', type: 'string', description: 'First day, YYYY-MM-DD', required: false },
      { name: 'end_date', type: 'string', description: 'Last day, YYYY-MM-DD', required: false },
      { name: 'status', type: 'string', description: 'Claim status filter', required: false, enum: REIMBURSEMENT_STATUSES },
      { name: 'limit', type: 'number', description: 'Maximum rows (1-100)', required: false, default: 20 },
    ],
    exports: ['record_count'],
    invoke: async (args): Promise<ToolResult> => {
      const employeeId = readString(args, 'employee_id');
      if (!employeeId) return invalidParameter('employee_id', 'employee_id is required');

      const start = readIsoDate(args, 'start_date');
      if (!start.ok) return start.failure;
      const end = readIsoDate(args, 'end_date');
      if (!end.ok) return end.failure;
      const status = readEnum(args, 'status', REIMBURSEMENT_STATUSES);
      if (!status.ok) return status.failure;
      const limit = readInteger(args, 'limit', 1, 100);
      if (!limit.ok) return limit.failure;

      const employee = store.getEmployee(employeeId);
      if (!employee) {
        return entityNotFound(`Employee ${employeeId} does not exist`, { employee_id: employeeId });
      }

      const rows = store.listReimbursements({
        employeeId: employee.employee_id,
        startDate: start.value,
        endDate: end.value,
        status: status.value,
        limit: limit.value ?? 20,
      });

      const header = `${employee.name} (${employee.employee_id}) has ${rows.length} claim(s)`;
      const lines = rows.map(row =>
        [
          `- ${row.reimbursement_id}`,
          row.apply_date ?? 'undated',
          row.category ?? 'uncategorized',
          row.amount.toFixed(2),
          row.status,
        ].join(' ') + (row.description ? `: ${row.description}` : ''),
      );

      return {
        success: true,
        content: [header, ...lines].join('\n'),
        data: rows,
        exports: { record_count: rows.length },
        source: { origin: `reimbursements:${employee.employee_id}`, excerpt: header },
      };
    },
  };
}
