// Work Order Tool
// Opens a follow-up work order for an employee; repeats return the open order

import type { StructuredDataTool, ToolResult } from './types.js';
import { WORK_ORDER_PRIORITIES } from '../finance-store.js';
import type { FinanceStore } from '../finance-store.js';
import { entityNotFound, invalidParameter, readEnum, readString } from './failures.js';

export function createWorkOrderTool(store: FinanceStore): StructuredDataTool {
  return {
    name: 'create_work_order',
    description: 'Create a work order assigned to an employee. An open order with the same title is reused.',
    kind: 'structured-data',
    category: 'action',
    effect: 'idempotent',
    parameters: [
      { name: 'title', type: 'string', description: 'Short summary of the work', required: true },
      {
        name: 'assignee_id',
        type: 'string',
        description: 'Employee id of the assignee',
        required: true,
        imports: 'employee_id',
        target: true,
      },
      { name: 'description', type: 'string', description: 'Details', required: false },
      {
        name: 'priority',
        type: 'string',
        description: 'Priority',
        required: false,
        enum: WORK_ORDER_PRIORITIES,
        default: 'medium',
      },
      { name: 'category', type: 'string', description: 'Free-form category', required: false },
    ],
    exports: ['work_order_id'],
    invoke: async (args): Promise<ToolResult> => {
      const title = readString(args, 'title');
      if (!title) return invalidParameter('title', 'title is required');
      if (title.length > 200) return invalidParameter('title', 'title must be at most 200 characters');
      const assigneeId = readString(args, 'assignee_id');
      if (!assigneeId) return invalidParameter('assignee_id', 'assignee_id is required');
      const priority = readEnum(args, 'priority', WORK_ORDER_PRIORITIES);
      if (!priority.ok) return priority.failure;

      const outcome = store.createWorkOrder({
        title,
        assigneeId,
        description: readString(args, 'description'),
        priority: priority.value ?? 'medium',
        category: readString(args, 'category'),
      });
      if (!outcome) {
        return entityNotFound(`Assignee ${assigneeId} does not exist`, { assignee_id: assigneeId });
      }

      const { workOrder, created } = outcome;
      const content =
        `${created ? 'Created' : 'Found open'} work order ${workOrder.work_order_id} "${workOrder.title}" ` +
        `for ${workOrder.assignee_id} (${workOrder.priority} priority)`;
      return {
        success: true,
        content,
        data: outcome,
        exports: { work_order_id: workOrder.work_order_id },
        source: { origin: `work_orders:${workOrder.work_order_id}`, excerpt: content },
      };
    },
  };
}
