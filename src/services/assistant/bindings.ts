// Entity → parameter bindings
// Which entity in the bag fills which tool parameter

import type { ArgValue, ToolParameter, ToolSpec } from '../tools/types.js';
import type { ArgBinding, EntityBag, EntityKey } from './types.js';

export const PARAMETER_ENTITIES: Readonly<Record<string, EntityKey>> = {
  name: 'employeeName',
  employee_id: 'employeeId',
  assignee_id: 'employeeId',
  department: 'department',
  start_date: 'startDate',
  end_date: 'endDate',
  query: 'subject',
  topic: 'subject',
  title: 'subject',
  subject: 'subject',
  to_email: 'recipient',
  priority: 'priority',
  category: 'category',
};

export function entityValueFor(param: ToolParameter, entities: EntityBag): ArgValue | undefined {
  const key = PARAMETER_ENTITIES[param.name];
  if (!key) return undefined;
  const value = entities[key];
  if (value === undefined || value === '') return undefined;
  if (param.enum && !param.enum.includes(value)) return undefined;
  return value;
}

/**
 * Literal bindings for every parameter the bag can fill; remaining required
 * parameters are left unbound.
 */
export function bindFromEntities(tool: ToolSpec, entities: EntityBag): Record<string, ArgBinding> {
  const args: Record<string, ArgBinding> = {};
  for (const param of tool.parameters) {
    const value = entityValueFor(param, entities);
    if (value !== undefined) {
      args[param.name] = { kind: 'literal', value };
    } else if (param.required) {
      args[param.name] = { kind: 'unbound' };
    }
  }
  return args;
}

export function referencedSteps(args: Record<string, ArgBinding>): string[] {
  const ids: string[] = [];
  for (const binding of Object.values(args)) {
    if (binding.kind === 'ref' && !ids.includes(binding.stepId)) {
      ids.push(binding.stepId);
    }
  }
  return ids;
}
