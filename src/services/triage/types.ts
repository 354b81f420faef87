// Triage System Types
// Heuristic intent classification: signal detection followed by a rules stage

import type { Classification, EntityBag, Intent, TaskKind } from '../assistant/types.js';

export type TaskFamily = 'policy' | 'data' | 'action' | 'generation';

export const TASK_FAMILIES: Readonly<Record<TaskKind, TaskFamily>> = {
  policy: 'policy',
  employee: 'data',
  summary: 'data',
  status: 'data',
  records: 'data',
  'work-order': 'action',
  email: 'action',
  draft: 'generation',
};

export interface TriageInput {
  user_message: string;
  now?: Date;
}

export interface TriageSignals {
  // Task signals
  asks_for_policy: boolean;
  asks_for_employee: boolean;
  asks_for_summary: boolean;
  asks_for_status: boolean;
  asks_for_records: boolean;
  asks_for_work_order: boolean;
  asks_for_draft: boolean;
  asks_for_email: boolean;

  // Entity signals
  mentions_employee: boolean;
  mentions_dates: boolean;
  mentions_recipient: boolean;

  short_input: boolean;
}

export interface TriageDecision {
  intent: Intent;
  tasks: TaskKind[];
  families: TaskFamily[];
  confidence: number; // 0-1
  reason_codes: string[];
}

export interface TriageResult {
  decision: TriageDecision;
  signals: TriageSignals;
  entities: EntityBag;
  elapsed_ms: number;
}

export interface IntentClassifier {
  classify(text: string, signal?: AbortSignal): Promise<Classification>;
}
