// Stage A: Signal Detection
// Detect task keywords and mentioned entities without external calls

import type { EntityBag } from '../assistant/types.js';
import type { TriageInput, TriageSignals } from './types.js';

const POLICY_REQUEST_REGEX = /\b(polic(?:y|ies)|rules?|allowed|allowance|limits?|reimbursable|eligible|per diem|guidelines?|entitled|how (?:do|can|should) i)\b/i;
const EMPLOYEE_REQUEST_REGEX = /\b(who is|contact|email address|which department|employee (?:id|info|information|details))\b/i;
const SUMMARY_REQUEST_REGEX = /\b(summary|summari[sz]e|total|how much|overview|breakdown|spent)\b/i;
const STATUS_REQUEST_REGEX = /\b(status|pending|approved|progress|been paid|still waiting)\b/i;
const RECORDS_REQUEST_REGEX = /\b(records?|history|list (?:all|my|the)|itemi[sz]ed|each claim|every claim|all claims)\b/i;
const WORK_ORDER_REQUEST_REGEX = /\b(work ?order|ticket|follow[- ]up task|open a task|create a task)\b/i;
const DRAFT_REQUEST_REGEX = /\b(draft|compose|write (?:a|an|up)|prepare (?:a|an) (?:message|notice|announcement|reminder))\b/i;
const EMAIL_REQUEST_REGEX = /\b(send|forward|notify)\b|\be-?mail (?:it|this|that|them|him|her)\b/i;

export function detectSignals(input: TriageInput, entities: EntityBag): TriageSignals {
  const message = input.user_message;

  return {
    asks_for_policy: POLICY_REQUEST_REGEX.test(message),
    asks_for_employee: EMPLOYEE_REQUEST_REGEX.test(message),
    asks_for_summary: SUMMARY_REQUEST_REGEX.test(message),
    asks_for_status: STATUS_REQUEST_REGEX.test(message),
    asks_for_records: RECORDS_REQUEST_REGEX.test(message),
    asks_for_work_order: WORK_ORDER_REQUEST_REGEX.test(message),
    asks_for_draft: DRAFT_REQUEST_REGEX.test(message),
    asks_for_email: EMAIL_REQUEST_REGEX.test(message),

    mentions_employee: !!(entities.employeeName || entities.employeeId),
    mentions_dates: !!(entities.startDate || entities.endDate),
    mentions_recipient: !!entities.recipient,

    short_input: message.trim().length < 12,
  };
}
