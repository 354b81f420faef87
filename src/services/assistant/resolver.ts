// Dependency Resolver
// Inserts producer steps for unbound required parameters, then orders producers before consumers

import type { ToolRegistry } from '../tools/registry.js';
import { FailureKind, exportSupplying, requiredParameters } from '../tools/types.js';
import { bindFromEntities, referencedSteps } from './bindings.js';
import { DependencyCycleError, internalFault } from './errors.js';
import { stepId } from './planner.js';
import type { EntityBag, Plan, PlanStep } from './types.js';

function cloneStep(step: PlanStep): PlanStep {
  return {
    ...step,
    args: Object.fromEntries(Object.entries(step.args).map(([name, binding]) => [name, { ...binding }])),
    prerequisites: [...step.prerequisites],
    ...(step.failure ? { failure: { ...step.failure } } : {}),
  };
}

function nextStepNumber(steps: PlanStep[]): number {
  let max = 0;
  for (const step of steps) {
    const match = step.id.match(/^step-(\d+)$/);
    if (match) max = Math.max(max, parseInt(match[1], 10));
  }
  return max + 1;
}

function isBound(step: PlanStep, name: string): boolean {
  const binding = step.args[name];
  return binding !== undefined && binding.kind !== 'unbound';
}

/**
 * One insertion pass. Returns true when the plan changed.
 */
function insertProducers(steps: PlanStep[], entities: EntityBag, registry: ToolRegistry): boolean {
  let changed = false;

  for (const step of [...steps]) {
    if (step.status === 'failed-terminal') continue;
    const tool = registry.require(step.tool);

    const anyOf = tool.requiresOneOf ?? [];
    if (anyOf.length > 0 && !anyOf.some(name => isBound(step, name))) {
      step.status = 'failed-terminal';
      step.failure = {
        kind: FailureKind.DEPENDENCY_UNSATISFIABLE,
        message: `${step.tool} needs one of ${anyOf.map(name => `"${name}"`).join(', ')} and none is known`,
        context: { tool: step.tool, params: anyOf.join(',') },
      };
      changed = true;
      continue;
    }

    for (const param of requiredParameters(tool)) {
      if (isBound(step, param.name)) continue;

      const wanted = exportSupplying(param);
      const producers = registry.toolsExporting(wanted);
      if (producers.length === 0) {
        step.status = 'failed-terminal';
        step.failure = {
          kind: FailureKind.DEPENDENCY_UNSATISFIABLE,
          message: `No registered tool can supply "${wanted}" for ${step.tool}.${param.name}`,
          context: { tool: step.tool, param: param.name, export: wanted },
        };
        changed = true;
        break;
      }

      // A producer already in the plan beats inserting a new one
      const names = producers.map(p => p.name);
      let producerStep = steps.find(s => s !== step && names.includes(s.tool));
      if (!producerStep) {
        const producer = producers[0];
        const args = bindFromEntities(producer, entities);
        producerStep = {
          id: stepId(nextStepNumber(steps)),
          position: 0,
          tool: producer.name,
          args,
          prerequisites: referencedSteps(args),
          retries: 0,
          status: 'pending',
          origin: 'resolver',
        };
        steps.splice(steps.indexOf(step), 0, producerStep);
      }

      step.args[param.name] = { kind: 'ref', stepId: producerStep.id, export: wanted };
      step.prerequisites = referencedSteps(step.args);
      changed = true;
    }
  }

  return changed;
}

/**
 * Stable topological order: repeatedly take the earliest step whose
 * prerequisites are all placed.
 */
function orderByReferences(steps: PlanStep[]): PlanStep[] {
  const ids = new Set(steps.map(s => s.id));
  const placed = new Set<string>();
  const remaining = [...steps];
  const ordered: PlanStep[] = [];

  while (remaining.length > 0) {
    const index = remaining.findIndex(step =>
      step.prerequisites.every(id => placed.has(id) || !ids.has(id)),
    );
    if (index === -1) {
      throw new DependencyCycleError(
        `Circular reference between steps ${remaining.map(s => s.id).join(', ')}`,
        remaining.map(s => s.id),
      );
    }
    const [next] = remaining.splice(index, 1);
    placed.add(next.id);
    ordered.push(next);
  }

  return ordered.map((step, position) => ({ ...step, position }));
}

/**
 * Returns a new plan in which every required parameter is either bound or
 * its step is failed-terminal with DependencyUnsatisfiable, and every
 * back-reference points strictly backwards. Idempotent.
 *
 * @throws DependencyCycleError when the references form a cycle or producer
 *   insertion does not converge within |registry| + 1 passes
 */
export function resolve(plan: Plan, entities: EntityBag, registry: ToolRegistry): Plan {
  const steps = plan.steps.map(cloneStep);
  const maxPasses = registry.size + 1;

  let converged = false;
  for (let pass = 0; pass < maxPasses; pass++) {
    if (!insertProducers(steps, entities, registry)) {
      converged = true;
      break;
    }
  }
  if (!converged) {
    throw new DependencyCycleError(
      `Dependency resolution did not converge after ${maxPasses} passes`,
      steps.map(s => s.id),
    );
  }

  return { intent: plan.intent, steps: orderByReferences(steps) };
}

/**
 * @throws AssistantError (InternalFault) on a forward, self or dangling reference
 */
export function assertPlanOrdering(plan: Plan): void {
  const seen = new Set<string>();
  for (const step of plan.steps) {
    for (const [param, binding] of Object.entries(step.args)) {
      if (binding.kind === 'ref' && !seen.has(binding.stepId)) {
        throw internalFault(`Step ${step.id} references ${binding.stepId} which does not precede it`, {
          step: step.id,
          param,
          ref: binding.stepId,
        });
      }
    }
    if (seen.has(step.id)) {
      throw internalFault(`Duplicate step id ${step.id}`, { step: step.id });
    }
    seen.add(step.id);
  }
}
