// Stage B: Rules Engine
// Map detected task families to exactly one intent

import type { Intent, TaskKind } from '../assistant/types.js';
import { TASK_FAMILIES } from './types.js';
import type { TaskFamily, TriageDecision, TriageSignals } from './types.js';

function requestedTasks(signals: TriageSignals): TaskKind[] {
  const tasks: TaskKind[] = [];
  if (signals.asks_for_policy) tasks.push('policy');
  if (signals.asks_for_employee) tasks.push('employee');
  if (signals.asks_for_summary) tasks.push('summary');
  if (signals.asks_for_status) tasks.push('status');
  if (signals.asks_for_records) tasks.push('records');
  if (signals.asks_for_work_order) tasks.push('work-order');
  if (signals.asks_for_draft) tasks.push('draft');
  if (signals.asks_for_email) tasks.push('email');

  // A named employee with a date range and no other data task reads as a summary request
  const dataTask = tasks.some(t => TASK_FAMILIES[t] === 'data');
  if (!dataTask && signals.mentions_employee && signals.mentions_dates && !signals.asks_for_policy) {
    tasks.push('summary');
  }
  return tasks;
}

function selectIntent(families: TaskFamily[]): { intent: Intent; reason: string } {
  if (families.length === 0) return { intent: 'composite-task', reason: 'NO_TASK_SIGNAL' };
  if (families.includes('action')) return { intent: 'composite-task', reason: 'ACTION_REQUESTED' };
  if (families.length > 1) return { intent: 'composite-task', reason: 'MULTIPLE_TASK_FAMILIES' };

  switch (families[0]) {
    case 'policy':
      return { intent: 'simple-lookup', reason: 'POLICY_ONLY' };
    case 'data':
      return { intent: 'data-query', reason: 'DATA_ONLY' };
    default:
      return { intent: 'content-generation', reason: 'GENERATION_ONLY' };
  }
}

function buildReasonCodes(signals: TriageSignals): string[] {
  const reasons: string[] = [];

  if (signals.asks_for_policy) reasons.push('ASKS_FOR_POLICY');
  if (signals.asks_for_employee) reasons.push('ASKS_FOR_EMPLOYEE');
  if (signals.asks_for_summary) reasons.push('ASKS_FOR_SUMMARY');
  if (signals.asks_for_status) reasons.push('ASKS_FOR_STATUS');
  if (signals.asks_for_records) reasons.push('ASKS_FOR_RECORDS');
  if (signals.asks_for_work_order) reasons.push('ASKS_FOR_WORK_ORDER');
  if (signals.asks_for_draft) reasons.push('ASKS_FOR_DRAFT');
  if (signals.asks_for_email) reasons.push('ASKS_FOR_EMAIL');

  if (signals.mentions_employee) reasons.push('MENTIONS_EMPLOYEE');
  if (signals.mentions_dates) reasons.push('MENTIONS_DATES');
  if (signals.mentions_recipient) reasons.push('MENTIONS_RECIPIENT');
  if (signals.short_input) reasons.push('SHORT_INPUT');

  return reasons;
}

export function applyRules(signals: TriageSignals): TriageDecision {
  const tasks = requestedTasks(signals);
  const families = [...new Set(tasks.map(t => TASK_FAMILIES[t]))];
  const { intent, reason } = selectIntent(families);

  let confidence = 0.8;
  if (families.length === 0) confidence = 0.3;
  else if (families.length > 1) confidence = 0.6;

  return {
    intent,
    tasks,
    families,
    confidence,
    reason_codes: [...buildReasonCodes(signals), reason],
  };
}
