import { describe, it, expect, vi } from 'vitest';
import { ToolRegistry } from '../../tools/registry.js';
import { FailureKind } from '../../tools/types.js';
import type { ToolCategory, ToolDefinition } from '../../tools/types.js';
import { ResultAggregator, describeFailure, sealAnswer } from '../aggregator.js';
import type { TextGenerator } from '../../generation.js';
import type { Plan, PlanStep, StepResult } from '../types.js';
import { fakeGenerator, fakeTool, silentLogger } from './helpers.js';

function categorised(name: string, category: ToolCategory): ToolDefinition {
  return { ...fakeTool(name), category };
}

const registry = new ToolRegistry();
registry.register(categorised('employee_lookup', 'data'));
registry.register(categorised('policy_search', 'policy'));
registry.register(categorised('reimbursement_summary', 'data'));
registry.register(categorised('create_work_order', 'action'));
registry.freeze();

function planStep(id: string, tool: string): PlanStep {
  return { id, position: 0, tool, args: {}, prerequisites: [], retries: 0, status: 'pending', origin: 'planner' };
}

function success(stepId: string, tool: string, content: string): StepResult {
  return {
    stepId,
    tool,
    success: true,
    output: null,
    content,
    exports: {},
    args: {},
    attempts: 1,
    retries: 0,
    source: { origin: `${tool}:origin`, excerpt: content },
    durationMs: 1,
  };
}

function failure(stepId: string, tool: string, kind: FailureKind, message: string, blockedBy?: string): StepResult {
  return {
    stepId,
    tool,
    success: false,
    output: null,
    failure: { kind, message, ...(blockedBy ? { blockedBy } : {}) },
    exports: {},
    args: {},
    attempts: blockedBy ? 0 : 1,
    retries: 0,
    durationMs: 1,
  };
}

const plan: Plan = {
  intent: 'composite-task',
  steps: [
    planStep('step-1', 'policy_search'),
    planStep('step-3', 'employee_lookup'),
    planStep('step-2', 'reimbursement_summary'),
  ],
};

function withGenerator(generator?: TextGenerator, generateTimeoutMs = 1000): ResultAggregator {
  return new ResultAggregator({ registry, generator, maxRetries: 1, generateTimeoutMs, logger: silentLogger });
}

describe('Result Aggregator', () => {
  const aggregator = withGenerator();

  it('groups policy and data results into sections', async () => {
    const answer = await aggregator.aggregate({
      request: 'travel policy and Alice Chen summary',
      plan,
      results: [
        success('step-1', 'policy_search', '[Travel Expense Policy] Economy class only.'),
        success('step-3', 'employee_lookup', 'Alice Chen (E001)'),
        success('step-2', 'reimbursement_summary', 'Alice Chen (E001) claimed 2300.00'),
      ],
    });

    expect(answer.status).toBe('complete');
    expect(answer.text).toBe(
      'Policy information:\n[Travel Expense Policy] Economy class only.\n\n' +
        'Data:\nAlice Chen (E001)\nAlice Chen (E001) claimed 2300.00',
    );
    expect(answer.sources.map(s => [s.stepId, s.tool, s.origin])).toEqual([
      ['step-1', 'policy_search', 'policy_search:origin'],
      ['step-3', 'employee_lookup', 'employee_lookup:origin'],
      ['step-2', 'reimbursement_summary', 'reimbursement_summary:origin'],
    ]);
    expect(answer.failures).toEqual([]);
  });

  it('reports failed and blocked steps in plain language', async () => {
    const answer = await aggregator.aggregate({
      request: 'travel policy and Zoe Quinn summary',
      plan,
      results: [
        success('step-1', 'policy_search', '[Travel Expense Policy] Economy class only.'),
        failure('step-3', 'employee_lookup', FailureKind.ENTITY_NOT_FOUND, 'No employee named "Zoe Quinn"'),
        failure('step-2', 'reimbursement_summary', FailureKind.ENTITY_NOT_FOUND, 'skipped', 'step-3'),
      ],
    });

    expect(answer.status).toBe('partial');
    expect(answer.text).toBe(
      'Policy information:\n[Travel Expense Policy] Economy class only.\n\n' +
        'Could not complete:\n' +
        '- Employee lookup failed: nothing was found (No employee named "Zoe Quinn"). Check the employee name or id.\n' +
        '- Reimbursement summary was skipped because Employee lookup did not succeed.',
    );
    expect(answer.failures[0].suggestion).toBe('Check the employee name or id.');
    expect(answer.failures[1]).toEqual({
      stepId: 'step-2',
      tool: 'reimbursement_summary',
      kind: FailureKind.ENTITY_NOT_FOUND,
      reason: 'Reimbursement summary was skipped because Employee lookup did not succeed.',
      attempted: true,
      blockedBy: 'step-3',
    });
    expect(answer.sources).toHaveLength(1);
  });

  it('apologises with reasons when nothing succeeded', async () => {
    const answer = await aggregator.aggregate({
      request: 'anything',
      plan: { intent: 'simple-lookup', steps: [planStep('step-1', 'policy_search')] },
      results: [failure('step-1', 'policy_search', FailureKind.TRANSIENT, 'index offline')],
    });

    expect(answer.status).toBe('failed');
    expect(answer.text).toBe(
      'Sorry, I could not complete your request.\n\nReasons:\n' +
        '- Policy search failed: a temporary problem occurred (index offline); please try again later.',
    );
  });

  it('marks steps that never ran as not attempted', async () => {
    const answer = await aggregator.aggregate({
      request: 'x',
      plan,
      results: [success('step-1', 'policy_search', 'policy text')],
      stopReason: 'step-limit',
    });

    expect(answer.failures.map(f => [f.stepId, f.attempted, f.reason])).toEqual([
      ['step-3', false, 'Employee lookup was not attempted because the step limit was reached.'],
      ['step-2', false, 'Reimbursement summary was not attempted because the step limit was reached.'],
    ]);
  });

  it('uses the generator when it answers and falls back when it keeps failing', async () => {
    const results = [success('step-1', 'policy_search', 'policy text')];
    const single: Plan = { intent: 'simple-lookup', steps: [planStep('step-1', 'policy_search')] };

    const writer = fakeGenerator('Economy class is required for flights under six hours.');
    const generated = await withGenerator(writer).aggregate({ request: 'flight class?', plan: single, results });
    expect(generated.text).toBe('Economy class is required for flights under six hours.');

    const broken = fakeGenerator(async () => {
      throw new Error('provider down');
    });
    const fallback = await withGenerator(broken).aggregate({ request: 'flight class?', plan: single, results });
    expect(fallback.text).toBe('Policy information:\npolicy text');
    expect(vi.mocked(broken.generate)).toHaveBeenCalledTimes(2);
  });

  it('gives up on a generator that never answers and composes the answer itself', async () => {
    const results = [success('step-1', 'policy_search', 'policy text')];
    const single: Plan = { intent: 'simple-lookup', steps: [planStep('step-1', 'policy_search')] };
    const stuck = fakeGenerator(() => new Promise<string>(() => {}));

    const answer = await withGenerator(stuck, 20).aggregate({ request: 'flight class?', plan: single, results });

    expect(answer.text).toBe('Policy information:\npolicy text');
    expect(vi.mocked(stuck.generate)).toHaveBeenCalledTimes(2);
    const [request] = vi.mocked(stuck.generate).mock.calls[0];
    expect(request.signal?.aborted).toBe(true);
  });

  it('explains a rejected plan without running anything', () => {
    const rejectedStep = planStep('step-1', 'reimbursement_summary');
    rejectedStep.status = 'failed-terminal';
    rejectedStep.failure = {
      kind: FailureKind.DEPENDENCY_UNSATISFIABLE,
      message: 'No registered tool can supply "start_date" for reimbursement_summary.start_date',
    };

    const draft = aggregator.rejected(
      { intent: 'data-query', steps: [planStep('step-2', 'employee_lookup'), rejectedStep] },
      rejectedStep.failure,
    );

    expect(draft.status).toBe('rejected');
    expect(draft.steps).toEqual([]);
    expect(draft.text).toBe(
      'I could not plan this request because some required information cannot be obtained.\n\n' +
        '- Reimbursement summary cannot run: No registered tool can supply "start_date" for reimbursement_summary.start_date.',
    );
  });

  it('seals answers against mutation', () => {
    const sealed = sealAnswer(
      { text: 't', intent: 'simple-lookup', status: 'complete', sources: [], steps: [], failures: [] },
      ['received', 'done'],
    );

    expect(Object.isFrozen(sealed)).toBe(true);
    expect(Object.isFrozen(sealed.states)).toBe(true);
    expect(sealed.states).toEqual(['received', 'done']);
  });

  it('describes each failure kind', () => {
    expect(describeFailure({ kind: FailureKind.EXTERNAL_MUTATION_UNCERTAIN, message: 'relay timeout' })).toBe(
      'it may or may not have been carried out (relay timeout); please check before trying again',
    );
    expect(describeFailure({ kind: FailureKind.INTERNAL_FAULT, message: 'secret detail' })).toBe(
      'an internal error occurred',
    );
  });
});
