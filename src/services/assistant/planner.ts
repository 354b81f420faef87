// Plan Synthesizer
// Maps a classification to an ordered draft plan with partially bound arguments

import type { ToolRegistry } from '../tools/registry.js';
import { exportSupplying } from '../tools/types.js';
import type { ToolDefinition } from '../tools/types.js';
import { bindFromEntities, referencedSteps } from './bindings.js';
import type { Classification, Intent, Plan, PlanStep, TaskKind } from './types.js';

// Tool families each intent may plan with
export const INTENT_TASKS: Readonly<Record<Intent, readonly TaskKind[]>> = {
  'simple-lookup': ['policy'],
  'data-query': ['employee', 'summary', 'status', 'records'],
  'content-generation': ['draft'],
  'composite-task': ['policy', 'employee', 'summary', 'status', 'records', 'work-order', 'draft', 'email'],
};

export const DEFAULT_TASK: Readonly<Record<Intent, TaskKind>> = {
  'simple-lookup': 'policy',
  'data-query': 'records',
  'content-generation': 'draft',
  'composite-task': 'policy',
};

export const TASK_TOOLS: Readonly<Record<TaskKind, string>> = {
  policy: 'policy_search',
  employee: 'employee_lookup',
  summary: 'reimbursement_summary',
  status: 'reimbursement_status',
  records: 'reimbursement_records',
  'work-order': 'create_work_order',
  draft: 'draft_content',
  email: 'send_email',
};

export function stepId(n: number): string {
  return `step-${n}`;
}

export class PlanSynthesizer {
  constructor(private registry: ToolRegistry) {}

  synthesize(classification: Classification): Plan {
    const { intent, entities } = classification;
    const tools = this.selectTools(intent, classification.tasks);

    const steps: PlanStep[] = [];
    for (const tool of tools) {
      const args = bindFromEntities(tool, entities);

      // Optional inputs another planned step already produces
      for (const param of tool.parameters) {
        if (param.required || args[param.name]) continue;
        const wanted = exportSupplying(param);
        const producer = steps.find(s => this.registry.require(s.tool).exports.includes(wanted));
        if (producer) {
          args[param.name] = { kind: 'ref', stepId: producer.id, export: wanted, optional: true };
        }
      }

      steps.push({
        id: stepId(steps.length + 1),
        position: steps.length,
        tool: tool.name,
        args,
        prerequisites: referencedSteps(args),
        retries: 0,
        status: 'pending',
        origin: 'planner',
      });
    }

    return { intent, steps };
  }

  /** Eligible, registered tools in registration order. */
  selectTools(intent: Intent, requested: readonly TaskKind[]): ToolDefinition[] {
    const eligible = INTENT_TASKS[intent];
    const chosen = requested.filter(task => eligible.includes(task));
    const order = this.registry.list().map(t => t.name);

    const registered = (tasks: readonly TaskKind[]) =>
      [...new Set(tasks.map(task => TASK_TOOLS[task]))]
        .map(name => this.registry.lookup(name))
        .filter((tool): tool is ToolDefinition => tool !== undefined)
        .sort((a, b) => order.indexOf(a.name) - order.indexOf(b.name));

    const selected = registered(chosen);
    if (selected.length > 0) return selected;

    const fallback = registered([DEFAULT_TASK[intent]]);
    return fallback.length > 0 ? fallback : registered(['policy']);
  }
}
