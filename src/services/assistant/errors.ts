// Assistant engine errors
// Plan-level failures that abort a request before aggregation

import { FailureKind } from '../tools/types.js';
import type { ArgValue } from '../tools/types.js';

export class AssistantError extends Error {
  constructor(
    public readonly kind: FailureKind,
    message: string,
    public readonly context?: Record<string, ArgValue>,
  ) {
    super(message);
    this.name = 'AssistantError';
  }
}

/**
 * The plan's reference graph has a cycle, or inserting producers did not
 * converge. Rejects the whole plan.
 */
export class DependencyCycleError extends AssistantError {
  constructor(
    message: string,
    public readonly stepIds: string[],
  ) {
    super(FailureKind.DEPENDENCY_UNSATISFIABLE, message, { steps: stepIds.join(',') });
    this.name = 'DependencyCycleError';
  }
}

export function internalFault(message: string, context?: Record<string, ArgValue>): AssistantError {
  return new AssistantError(FailureKind.INTERNAL_FAULT, message, context);
}
