// Step Executor
// Runs one plan step: bind arguments, invoke with a timeout, classify failures, retry within the bound

import type { ToolRegistry } from '../tools/registry.js';
import { ToolFailureError, isRetryableKind } from '../tools/failures.js';
import { FailureKind } from '../tools/types.js';
import type { FailureDetail, ToolArgs, ToolDefinition, ToolResult } from '../tools/types.js';
import { DeadlineExceededError, withDeadline } from '../../utils/deadline.js';
import type { Logger } from '../../utils/logger.js';
import { entityValueFor } from './bindings.js';
import { repairArguments } from './repair.js';
import type { EntityBag, PlanStep, StepResult } from './types.js';

export interface ExecutorOptions {
  registry: ToolRegistry;
  maxRetries: number;
  stepTimeoutMs: number;
  logger: Logger;
}

type Binding = { ok: true; args: ToolArgs } | { ok: false; failure: FailureDetail };

export class StepExecutor {
  constructor(private options: ExecutorOptions) {}

  async execute(
    step: PlanStep,
    entities: EntityBag,
    priorResults: ReadonlyMap<string, StepResult>,
    signal?: AbortSignal,
  ): Promise<StepResult> {
    const started = Date.now();
    const log = this.options.logger.child({ step: step.id, tool: step.tool });

    const finish = (partial: Omit<StepResult, 'stepId' | 'tool' | 'durationMs' | 'retries'>): StepResult => ({
      stepId: step.id,
      tool: step.tool,
      retries: step.retries,
      durationMs: Date.now() - started,
      ...partial,
    });

    if (step.status === 'failed-terminal') {
      const failure = step.failure ?? {
        kind: FailureKind.INTERNAL_FAULT,
        message: `Step ${step.id} was marked failed before execution`,
      };
      return finish({ success: false, output: null, failure, exports: {}, args: {}, attempts: 0 });
    }

    const tool = this.options.registry.require(step.tool);
    const binding = this.bindArguments(step, tool, entities, priorResults);
    if (!binding.ok) {
      step.status = 'failed-terminal';
      step.failure = binding.failure;
      log.info({ blockedBy: binding.failure.blockedBy, kind: binding.failure.kind }, 'Step precondition failed');
      return finish({ success: false, output: null, failure: binding.failure, exports: {}, args: {}, attempts: 0 });
    }

    let args = binding.args;
    let attempts = 0;
    let failure: FailureDetail;

    for (;;) {
      attempts++;
      step.status = 'running';
      const result = await this.invoke(tool, args, signal);

      if (result.success) {
        step.status = 'succeeded';
        log.debug({ attempts }, 'Step succeeded');
        return finish({
          success: true,
          output: result.data,
          content: result.content,
          exports: result.exports,
          args,
          attempts,
          source: result.source,
        });
      }

      failure = this.guardMutation(tool, result.error);
      if (!isRetryableKind(failure.kind) || step.retries >= this.options.maxRetries || signal?.aborted) {
        break;
      }

      if (failure.kind === FailureKind.PARAMETER_INVALID) {
        const repair = repairArguments(tool, args, failure, entities);
        if (!repair.changed) break;
        log.info({ applied: repair.applied }, 'Repaired arguments before retry');
        args = repair.args;
      }

      step.retries++;
      step.status = 'failed-retryable';
      log.warn({ kind: failure.kind, message: failure.message, retry: step.retries }, 'Retrying step');
    }

    step.status = 'failed-terminal';
    step.failure = failure;
    log.warn({ kind: failure.kind, message: failure.message, attempts }, 'Step failed');
    return finish({ success: false, output: null, failure, exports: {}, args, attempts });
  }

  /**
   * Resolves back-references against earlier results and fills defaults.
   * A failed or missing required reference blocks the step.
   */
  private bindArguments(
    step: PlanStep,
    tool: ToolDefinition,
    entities: EntityBag,
    priorResults: ReadonlyMap<string, StepResult>,
  ): Binding {
    const args: ToolArgs = {};

    for (const [name, binding] of Object.entries(step.args)) {
      if (binding.kind === 'literal') {
        args[name] = binding.value;
        continue;
      }

      if (binding.kind === 'unbound') {
        const param = tool.parameters.find(p => p.name === name);
        const value = param ? entityValueFor(param, entities) : undefined;
        if (value !== undefined) args[name] = value;
        continue;
      }

      const upstream = priorResults.get(binding.stepId);
      const value = upstream?.success ? upstream.exports[binding.export] : undefined;
      if (value !== undefined) {
        args[name] = value;
        continue;
      }
      if (binding.optional) continue;

      if (upstream && !upstream.success && upstream.failure) {
        return {
          ok: false,
          failure: {
            kind: upstream.failure.kind,
            message: `Skipped because ${upstream.tool} (${upstream.stepId}) failed: ${upstream.failure.message}`,
            context: { param: name, ref: binding.stepId },
            blockedBy: binding.stepId,
          },
        };
      }
      return {
        ok: false,
        failure: {
          kind: FailureKind.DEPENDENCY_UNSATISFIABLE,
          message: upstream
            ? `${upstream.tool} (${binding.stepId}) did not provide "${binding.export}"`
            : `No result from ${binding.stepId} for "${binding.export}"`,
          context: { param: name, ref: binding.stepId },
          blockedBy: binding.stepId,
        },
      };
    }

    for (const param of tool.parameters) {
      if (args[param.name] === undefined && param.default !== undefined) {
        args[param.name] = param.default;
      }
    }

    return { ok: true, args };
  }

  private async invoke(tool: ToolDefinition, args: ToolArgs, outer?: AbortSignal): Promise<ToolResult> {
    try {
      return await withDeadline(this.options.stepTimeoutMs, outer, signal => tool.invoke({ ...args }, { signal }));
    } catch (error) {
      return { success: false, error: this.classify(error) };
    }
  }

  // Thrown errors: tool failures keep their kind, everything else is transient
  private classify(error: unknown): FailureDetail {
    if (error instanceof ToolFailureError) {
      return error.detail;
    }
    if (error instanceof DeadlineExceededError) {
      return { kind: FailureKind.TRANSIENT, message: error.message, context: { timeout: true } };
    }
    return { kind: FailureKind.TRANSIENT, message: error instanceof Error ? error.message : String(error) };
  }

  // A mutating call that may have gone through must not be repeated
  private guardMutation(tool: ToolDefinition, failure: FailureDetail): FailureDetail {
    if (tool.effect === 'mutating' && failure.kind === FailureKind.TRANSIENT) {
      return { ...failure, kind: FailureKind.EXTERNAL_MUTATION_UNCERTAIN };
    }
    return failure;
  }
}
