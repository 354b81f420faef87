// Triage System Entry Point
// Extracts entities, runs Stage A (signal detection) then Stage B (rules engine)

import type { Classification } from '../assistant/types.js';
import type { IntentClassifier, TriageInput, TriageResult } from './types.js';
import { detectSignals } from './signals.js';
import { applyRules } from './rules.js';
import { extractEntities } from './entities.js';

export function runTriage(input: TriageInput): TriageResult {
  const start = performance.now();

  const entities = extractEntities(input.user_message, input.now);

  // Stage A: Detect signals from user message
  const signals = detectSignals(input, entities);

  // Stage B: Apply rules to produce decision
  const decision = applyRules(signals);

  const elapsed_ms = Math.round(performance.now() - start);

  return {
    decision,
    signals,
    entities,
    elapsed_ms,
  };
}

export class HeuristicClassifier implements IntentClassifier {
  constructor(private now: () => Date = () => new Date()) {}

  async classify(text: string): Promise<Classification> {
    return this.classifySync(text);
  }

  classifySync(text: string): Classification {
    const { decision, entities } = runTriage({ user_message: text, now: this.now() });
    return {
      intent: decision.intent,
      entities,
      tasks: decision.tasks,
      confidence: decision.confidence,
      classifier: 'heuristic',
      reasonCodes: decision.reason_codes,
    };
  }
}

// Re-export types for convenience
export type { IntentClassifier, TriageInput, TriageDecision, TriageSignals, TriageResult, TaskFamily } from './types.js';
export { extractEntities } from './entities.js';
