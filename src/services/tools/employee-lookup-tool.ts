// Employee Lookup Tool
// Resolves an employee id or a (partial) employee name to the employee's id and contact details

import type { StructuredDataTool, ToolResult } from './types.js';
import type { EmployeeRow, FinanceStore } from '../finance-store.js';
import { entityNotFound, invalidParameter, readString } from './failures.js';

function describeEmployee(employee: EmployeeRow): string {
  const parts = [
    `${employee.name} (${employee.employee_id})`,
    employee.position ?? undefined,
    employee.department ? `${employee.department} department` : undefined,
    employee.email ?? undefined,
  ];
  return parts.filter(Boolean).join(', ');
}

// An exact (case-insensitive) name match beats partial matches
function pickEmployee(matches: EmployeeRow[], name: string | undefined): EmployeeRow | undefined {
  if (matches.length === 1) return matches[0];
  if (!name) return undefined;
  const exact = matches.filter(m => m.name.toLowerCase() === name.toLowerCase());
  return exact.length === 1 ? exact[0] : undefined;
}

export function createEmployeeLookupTool(store: FinanceStore): StructuredDataTool {
  return {
    name: 'employee_lookup',
    description: 'Find an employee by id or name and return their employee id, email and department.',
    kind: 'structured-data',
    category: 'data',
    effect: 'read',
    parameters: [
      {
        name: 'employee_id',
        type: 'string',
        description: 'Employee id such as E001',
        required: false,
        target: true,
      },
      {
        name: 'name',
        type: 'string',
        description: 'Full or partial employee name',
        required: false,
        target: true,
      },
      {
        name: 'department',
        type: 'string',
        description: 'Restrict the search to one department',
        required: false,
      },
    ],
    exports: ['employee_id', 'employee_name', 'email', 'department'],
    requiresOneOf: ['employee_id', 'name'],
    invoke: async (args): Promise<ToolResult> => {
      const employeeId = readString(args, 'employee_id');
      const name = readString(args, 'name');
      if (!employeeId && !name) {
        return invalidParameter('employee_id', 'Provide an employee_id or a name');
      }
      const department = readString(args, 'department');

      const matches = store.findEmployees({ employeeId, name, department });
      if (matches.length === 0) {
        const where = department ? ` in the ${department} department` : '';
        if (employeeId) {
          const id = employeeId.toUpperCase();
          return entityNotFound(`No employee with id ${id}${where}`, { employee_id: id });
        }
        return entityNotFound(`No employee named "${name}"${where}`, { name: name ?? '' });
      }

      const employee = pickEmployee(matches, name);
      if (!employee) {
        const names = matches.map(m => `${m.name} (${m.employee_id})`).join(', ');
        return invalidParameter('name', `"${name ?? ''}" matches several employees: ${names}`);
      }

      const content = describeEmployee(employee);
      return {
        success: true,
        content,
        data: employee,
        exports: {
          employee_id: employee.employee_id,
          employee_name: employee.name,
          ...(employee.email ? { email: employee.email } : {}),
          ...(employee.department ? { department: employee.department } : {}),
        },
        source: { origin: `employees:${employee.employee_id}`, excerpt: content },
      };
    },
  };
}
