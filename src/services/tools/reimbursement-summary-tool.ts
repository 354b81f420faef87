// Reimbursement Summary Tool
// Totals an employee's claims over a date range, broken down by category

import type { StructuredDataTool, ToolResult } from './types.js';
import { EXPENSE_CATEGORIES } from '../finance-store.js';
import type { FinanceStore } from '../finance-store.js';
import { entityNotFound, invalidParameter, readEnum, readIsoDate, readString } from './failures.js';

const money = (value: number) => value.toFixed(2);

export function createReimbursementSummaryTool(store: FinanceStore): StructuredDataTool {
  return {
    name: 'reimbursement_summary',
    description: "Summarize an employee's reimbursement claims between two dates.",
    kind: 'structured-data',
    category: 'data',
    effect: 'read',
    parameters: [
      { name: 'employee_id', type: 'string', description: 'Employee id, e.g. E001', required: true, target: true },
      { name: 'start_date', type: 'string', description: 'First day, YYYY-MM-DD', required: true },
      { name: 'end_date', type: 'string', description: 'Last day, YYYY-MM-DD', required: true },
      {
        name: 'category',
        type: 'string',
        description: 'Only count one expense category',
        required: false,
        enum: EXPENSE_CATEGORIES,
      },
    ],
    exports: ['total_amount', 'claim_count'],
    invoke: async (args): Promise<ToolResult> => {
      const employeeId = readString(args, 'employee_id');
      if (!employeeId) return invalidParameter('employee_id', 'employee_id is required');

      const start = readIsoDate(args, 'start_date');
      if (!start.ok) return start.failure;
      const end = readIsoDate(args, 'end_date');
      if (!end.ok) return end.failure;
      if (!start.value) return invalidParameter('start_date', 'start_date is required');
      if (!end.value) return invalidParameter('end_date', 'end_date is required');
      if (start.value > end.value) {
        return invalidParameter('start_date', `start_date ${start.value} is after end_date ${end.value}`);
      }

      const category = readEnum(args, 'category', EXPENSE_CATEGORIES);
      if (!category.ok) return category.failure;

      const summary = store.summarizeReimbursements({
        employeeId,
        startDate: start.value,
        endDate: end.value,
        category: category.value,
      });
      if (!summary) {
        return entityNotFound(`Employee ${employeeId} does not exist`, { employee_id: employeeId });
      }

      const breakdown = Object.entries(summary.byCategory)
        .map(([name, amount]) => `${name} ${money(amount)}`)
        .join(', ');
      const scope = category.value ? ` ${category.value}` : '';
      const content =
        `${summary.employee.name} (${summary.employee.employee_id}) claimed ${money(summary.totalAmount)} ` +
        `across ${summary.count}${scope} claim(s) between ${summary.startDate} and ${summary.endDate}` +
        (breakdown ? ` (${breakdown})` : '');

      return {
        success: true,
        content,
        data: summary,
        exports: { total_amount: summary.totalAmount, claim_count: summary.count },
        source: { origin: `reimbursements:${summary.employee.employee_id}`, excerpt: content },
      };
    },
  };
}
