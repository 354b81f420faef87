import { describe, it, expect, vi } from 'vitest';
import { ToolRegistry } from '../../tools/registry.js';
import { ToolFailureError, entityNotFound, invalidParameter, transient } from '../../tools/failures.js';
import { FailureKind } from '../../tools/types.js';
import type { ToolArgs, ToolDefinition, ToolResult } from '../../tools/types.js';
import { StepExecutor } from '../executor.js';
import type { ArgBinding, PlanStep, StepResult } from '../types.js';
import { fakeTool, ok, param, silentLogger } from './helpers.js';

function executorFor(tools: ToolDefinition[], overrides: { maxRetries?: number; stepTimeoutMs?: number } = {}) {
  const registry = new ToolRegistry();
  tools.forEach(t => registry.register(t));
  registry.freeze();
  return new StepExecutor({
    registry,
    maxRetries: overrides.maxRetries ?? 2,
    stepTimeoutMs: overrides.stepTimeoutMs ?? 1000,
    logger: silentLogger,
  });
}

function step(tool: string, args: Record<string, ArgBinding>, id = 'step-1'): PlanStep {
  return {
    id,
    position: 0,
    tool,
    args,
    prerequisites: [],
    retries: 0,
    status: 'pending',
    origin: 'planner',
  };
}

const literal = (value: string): ArgBinding => ({ kind: 'literal', value });

// Returns the given results in order, repeating the last one
function sequence(...results: ToolResult[]) {
  let call = 0;
  return vi.fn(async (_args: ToolArgs): Promise<ToolResult> => results[Math.min(call++, results.length - 1)]);
}

describe('Step Executor', () => {
  it('returns the tool output on first success', async () => {
    const invoke = sequence(ok('found', { employee_id: 'E001' }));
    const executor = executorFor([fakeTool('lookup', { parameters: [param('name')], invoke })]);
    const planStep = step('lookup', { name: literal('Alice Chen') });

    const result = await executor.execute(planStep, {}, new Map());

    expect(result).toMatchObject({
      stepId: 'step-1',
      tool: 'lookup',
      success: true,
      content: 'found',
      exports: { employee_id: 'E001' },
      args: { name: 'Alice Chen' },
      attempts: 1,
      retries: 0,
    });
    expect(planStep.status).toBe('succeeded');
  });

  it('retries transient failures and succeeds within the bound', async () => {
    const invoke = sequence(transient('busy'), transient('busy'), ok('done'));
    const executor = executorFor([fakeTool('flaky', { invoke })], { maxRetries: 2 });

    const result = await executor.execute(step('flaky', {}), {}, new Map());

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(3);
    expect(result.retries).toBe(2);
  });

  it('invokes a step at most 1 + maxRetries times', async () => {
    const invoke = sequence(transient('still down'));
    const executor = executorFor([fakeTool('down', { invoke })], { maxRetries: 2 });
    const planStep = step('down', {});

    const result = await executor.execute(planStep, {}, new Map());

    expect(invoke).toHaveBeenCalledTimes(3);
    expect(result.success).toBe(false);
    expect(result.failure).toEqual({ kind: FailureKind.TRANSIENT, message: 'still down' });
    expect(planStep.status).toBe('failed-terminal');
    expect(planStep.retries).toBe(2);
  });

  it('does not retry failures that are not retryable', async () => {
    const invoke = sequence(entityNotFound('No employee named "Zoe Quinn"'));
    const executor = executorFor([fakeTool('lookup', { invoke })]);

    const result = await executor.execute(step('lookup', {}), {}, new Map());

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(result.failure?.kind).toBe(FailureKind.ENTITY_NOT_FOUND);
  });

  it('keeps the kind carried by a thrown ToolFailureError', async () => {
    const invoke = vi.fn(async (): Promise<ToolResult> => {
      throw new ToolFailureError({ kind: FailureKind.ENTITY_NOT_FOUND, message: 'gone' });
    });
    const executor = executorFor([fakeTool('lookup', { invoke })]);

    const result = await executor.execute(step('lookup', {}), {}, new Map());

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(result.failure).toEqual({ kind: FailureKind.ENTITY_NOT_FOUND, message: 'gone' });
  });

  it('repairs a malformed date before retrying', async () => {
    const invoke = vi.fn(async (args: ToolArgs): Promise<ToolResult> =>
      args.start_date === '2024-03-05' ? ok('summary') : invalidParameter('start_date', 'start_date must be YYYY-MM-DD'),
    );
    const executor = executorFor([
      fakeTool('summary', { parameters: [param('employee_id', { target: true }), param('start_date')], invoke }),
    ]);

    const result = await executor.execute(
      step('summary', { employee_id: literal('E001'), start_date: literal('2024/3/5') }),
      {},
      new Map(),
    );

    expect(result.success).toBe(true);
    expect(result.attempts).toBe(2);
    expect(invoke.mock.calls[1][0]).toEqual({ employee_id: 'E001', start_date: '2024-03-05' });
  });

  it('never rewrites a target parameter and stops when repair changes nothing', async () => {
    const invoke = sequence(invalidParameter('employee_id', 'unknown id format'));
    const executor = executorFor([
      fakeTool('summary', { parameters: [param('employee_id', { target: true })], invoke }),
    ]);

    const result = await executor.execute(step('summary', { employee_id: literal('e-1') }), { employeeId: 'E001' }, new Map());

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(invoke.mock.calls[0][0]).toEqual({ employee_id: 'e-1' });
    expect(result.failure?.kind).toBe(FailureKind.PARAMETER_INVALID);
  });

  it('does not retry a mutating tool that threw', async () => {
    const invoke = vi.fn(async (): Promise<ToolResult> => {
      throw new Error('socket hang up');
    });
    const executor = executorFor([fakeTool('mail', { effect: 'mutating', invoke })]);

    const result = await executor.execute(step('mail', {}), {}, new Map());

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(result.failure).toEqual({
      kind: FailureKind.EXTERNAL_MUTATION_UNCERTAIN,
      message: 'socket hang up',
    });
  });

  it('treats a transient result from a mutating tool as uncertain', async () => {
    const invoke = sequence(transient('relay timeout'));
    const executor = executorFor([fakeTool('mail', { effect: 'mutating', invoke })]);

    const result = await executor.execute(step('mail', {}), {}, new Map());

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(result.failure?.kind).toBe(FailureKind.EXTERNAL_MUTATION_UNCERTAIN);
  });

  it('times out a hanging tool as a transient failure', async () => {
    const invoke = vi.fn((): Promise<ToolResult> => new Promise(() => undefined));
    const executor = executorFor([fakeTool('slow', { invoke })], { maxRetries: 0, stepTimeoutMs: 20 });

    const result = await executor.execute(step('slow', {}), {}, new Map());

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(result.failure).toEqual({
      kind: FailureKind.TRANSIENT,
      message: 'Timed out after 20ms',
      context: { timeout: true },
    });
  });

  it('blocks a step whose required reference failed, inheriting the failure kind', async () => {
    const invoke = sequence(ok('never'));
    const executor = executorFor([fakeTool('summary', { parameters: [param('employee_id')], invoke })]);
    const upstream: StepResult = {
      stepId: 'step-1',
      tool: 'lookup',
      success: false,
      output: null,
      failure: { kind: FailureKind.ENTITY_NOT_FOUND, message: 'No employee named "Zoe Quinn"' },
      exports: {},
      args: {},
      attempts: 1,
      retries: 0,
      durationMs: 1,
    };
    const planStep = step('summary', { employee_id: { kind: 'ref', stepId: 'step-1', export: 'employee_id' } }, 'step-2');

    const result = await executor.execute(planStep, {}, new Map([['step-1', upstream]]));

    expect(invoke).not.toHaveBeenCalled();
    expect(result.attempts).toBe(0);
    expect(result.failure).toEqual({
      kind: FailureKind.ENTITY_NOT_FOUND,
      message: 'Skipped because lookup (step-1) failed: No employee named "Zoe Quinn"',
      context: { param: 'employee_id', ref: 'step-1' },
      blockedBy: 'step-1',
    });
    expect(planStep.status).toBe('failed-terminal');
  });

  it('drops an optional reference to a failed step and runs anyway', async () => {
    const invoke = sequence(ok('drafted'));
    const executor = executorFor([
      fakeTool('draft', {
        parameters: [param('topic'), param('context', { required: false }), param('tone', { required: false, default: 'formal' })],
        invoke,
      }),
    ]);
    const upstream: StepResult = {
      stepId: 'step-1',
      tool: 'policy',
      success: false,
      output: null,
      failure: { kind: FailureKind.ENTITY_NOT_FOUND, message: 'no passage' },
      exports: {},
      args: {},
      attempts: 1,
      retries: 0,
      durationMs: 1,
    };

    const result = await executor.execute(
      step(
        'draft',
        { topic: literal('Meal limits'), context: { kind: 'ref', stepId: 'step-1', export: 'policy_excerpt', optional: true } },
        'step-2',
      ),
      {},
      new Map([['step-1', upstream]]),
    );

    expect(result.success).toBe(true);
    expect(invoke.mock.calls[0][0]).toEqual({ topic: 'Meal limits', tone: 'formal' });
  });

  it('passes exports of earlier steps into references', async () => {
    const invoke = sequence(ok('summary'));
    const executor = executorFor([fakeTool('summary', { parameters: [param('employee_id')], invoke })]);
    const upstream: StepResult = {
      stepId: 'step-1',
      tool: 'lookup',
      success: true,
      output: null,
      exports: { employee_id: 'E004' },
      args: {},
      attempts: 1,
      retries: 0,
      durationMs: 1,
    };

    await executor.execute(
      step('summary', { employee_id: { kind: 'ref', stepId: 'step-1', export: 'employee_id' } }, 'step-2'),
      {},
      new Map([['step-1', upstream]]),
    );

    expect(invoke.mock.calls[0][0]).toEqual({ employee_id: 'E004' });
  });

  it('returns the recorded failure of a step the resolver already failed', async () => {
    const invoke = sequence(ok('never'));
    const executor = executorFor([fakeTool('orphan', { invoke })]);
    const planStep = step('orphan', {});
    planStep.status = 'failed-terminal';
    planStep.failure = { kind: FailureKind.DEPENDENCY_UNSATISFIABLE, message: 'nothing supplies "ticket"' };

    const result = await executor.execute(planStep, {}, new Map());

    expect(invoke).not.toHaveBeenCalled();
    expect(result.failure?.kind).toBe(FailureKind.DEPENDENCY_UNSATISFIABLE);
  });
});
