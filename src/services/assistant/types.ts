// Assistant engine types
// Plans, step results and answers exchanged between planner, resolver, executor and aggregator

import type { ArgValue, FailureDetail, FailureKind, SourceAttribution } from '../tools/types.js';

export type Intent = 'simple-lookup' | 'data-query' | 'composite-task' | 'content-generation';

export const INTENTS: readonly Intent[] = ['simple-lookup', 'data-query', 'composite-task', 'content-generation'];

export type TaskKind = 'policy' | 'employee' | 'summary' | 'status' | 'records' | 'work-order' | 'draft' | 'email';

export const TASK_KINDS: readonly TaskKind[] = [
  'policy',
  'employee',
  'summary',
  'status',
  'records',
  'work-order',
  'draft',
  'email',
];

export interface EntityBag {
  readonly employeeName?: string;
  readonly employeeId?: string;
  readonly department?: string;
  readonly startDate?: string; // YYYY-MM-DD
  readonly endDate?: string; // YYYY-MM-DD
  readonly subject?: string;
  readonly recipient?: string;
  readonly priority?: string;
  readonly category?: string;
}

export type EntityKey = keyof EntityBag;

/** Who is asking. Fills the employee for requests that speak in the first person. */
export interface Requester {
  employeeId?: string;
  employeeName?: string;
  department?: string;
}

export interface Classification {
  intent: Intent;
  entities: EntityBag;
  tasks: TaskKind[];
  confidence: number; // 0-1
  classifier: 'model' | 'heuristic';
  reasonCodes: string[];
}

export type ArgBinding =
  | { kind: 'literal'; value: ArgValue }
  | { kind: 'ref'; stepId: string; export: string; optional?: boolean }
  | { kind: 'unbound' };

export type StepStatus = 'pending' | 'running' | 'succeeded' | 'failed-retryable' | 'failed-terminal';

export interface PlanStep {
  id: string;
  position: number;
  tool: string;
  args: Record<string, ArgBinding>;
  /** Steps whose exports this step references. Kept in sync by the resolver. */
  prerequisites: string[];
  retries: number;
  status: StepStatus;
  /** Failure decided before execution, e.g. a parameter nothing can supply. */
  failure?: FailureDetail;
  origin: 'planner' | 'resolver';
}

export interface Plan {
  intent: Intent;
  steps: PlanStep[];
}

export interface StepResult {
  stepId: string;
  tool: string;
  success: boolean;
  output: unknown;
  content?: string;
  failure?: FailureDetail;
  exports: Record<string, ArgValue>;
  args: Record<string, ArgValue>;
  attempts: number;
  retries: number;
  source?: SourceAttribution;
  durationMs: number;
}

export type OrchestratorState =
  | 'received'
  | 'classified'
  | 'planned'
  | 'resolved'
  | 'executing'
  | 'aggregated'
  | 'done'
  | 'rejected'
  | 'faulted';

export type AnswerStatus = 'complete' | 'partial' | 'failed' | 'rejected';

export type StopReason = 'step-limit' | 'cancelled';

export interface AnswerSource extends SourceAttribution {
  stepId: string;
  tool: string;
}

export interface FailureNote {
  stepId: string;
  tool: string;
  kind: FailureKind;
  reason: string;
  attempted: boolean;
  blockedBy?: string;
  /** Next step for the user; part of `reason` as well. */
  suggestion?: string;
}

export interface AggregatedAnswer {
  readonly text: string;
  readonly intent: Intent;
  readonly status: AnswerStatus;
  readonly sources: readonly AnswerSource[];
  readonly steps: readonly StepResult[];
  readonly failures: readonly FailureNote[];
  readonly states: readonly OrchestratorState[];
}
