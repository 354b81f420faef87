// Assistant Orchestrator
// Drives one request through classify → plan → resolve → execute → aggregate

import { randomUUID } from 'crypto';
import type { ToolRegistry } from '../tools/registry.js';
import { ToolFailureError } from '../tools/failures.js';
import { FailureKind } from '../tools/types.js';
import type { TextGenerator } from '../generation.js';
import { applyRequester } from '../triage/entities.js';
import type { IntentClassifier } from '../triage/types.js';
import { childLogger } from '../../utils/logger.js';
import type { Logger } from '../../utils/logger.js';
import { ResultAggregator, sealAnswer } from './aggregator.js';
import { AssistantError, DependencyCycleError, internalFault } from './errors.js';
import { StepExecutor } from './executor.js';
import { PlanSynthesizer } from './planner.js';
import { assertPlanOrdering, resolve } from './resolver.js';
import type {
  AggregatedAnswer,
  Classification,
  OrchestratorState,
  Plan,
  Requester,
  StepResult,
  StopReason,
} from './types.js';

export interface AssistantConfig {
  registry: ToolRegistry;
  classifier: IntentClassifier;
  planner?: PlanSynthesizer;
  generator?: TextGenerator;
  maxRetries: number;
  maxSteps: number;
  stepTimeoutMs: number;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
  requester?: Requester;
}

export class Orchestrator {
  private planner: PlanSynthesizer;
  private executor: StepExecutor;
  private aggregator: ResultAggregator;
  private log: Logger;

  constructor(private config: AssistantConfig) {
    if (!config.registry.isFrozen) {
      throw new Error('Tool registry must be frozen before the orchestrator starts');
    }
    this.log = config.logger ?? childLogger('orchestrator');
    this.planner = config.planner ?? new PlanSynthesizer(config.registry);
    this.executor = new StepExecutor({
      registry: config.registry,
      maxRetries: config.maxRetries,
      stepTimeoutMs: config.stepTimeoutMs,
      logger: this.log,
    });
    this.aggregator = new ResultAggregator({
      registry: config.registry,
      generator: config.generator,
      maxRetries: config.maxRetries,
      generateTimeoutMs: config.stepTimeoutMs,
      logger: this.log,
    });
  }

  /**
   * Always resolves with an answer unless an internal invariant breaks.
   *
   * @throws AssistantError (InternalFault)
   */
  async run(requestText: string, options: RunOptions = {}): Promise<AggregatedAnswer> {
    const { signal, requester } = options;
    const states: OrchestratorState[] = ['received'];
    const log = this.log.child({ request: randomUUID().slice(0, 8) });
    const enter = (state: OrchestratorState) => {
      states.push(state);
      log.debug({ state }, 'State transition');
    };

    try {
      const classified = await this.config.classifier.classify(requestText, signal);
      const classification: Classification = {
        ...classified,
        entities: applyRequester(classified.entities, requestText, requester),
      };
      enter('classified');
      log.info(
        { intent: classification.intent, tasks: classification.tasks, classifier: classification.classifier },
        'Request classified',
      );

      const draft = this.planner.synthesize(classification);
      enter('planned');

      let plan: Plan;
      try {
        plan = resolve(draft, classification.entities, this.config.registry);
      } catch (error) {
        if (!(error instanceof DependencyCycleError)) throw error;
        enter('resolved');
        enter('rejected');
        log.warn({ steps: error.stepIds }, error.message);
        return sealAnswer(this.aggregator.rejected(draft, { kind: error.kind, message: error.message }), states);
      }
      assertPlanOrdering(plan);
      enter('resolved');

      const unsatisfiable = plan.steps.find(
        step => step.status === 'failed-terminal' && step.failure?.kind === FailureKind.DEPENDENCY_UNSATISFIABLE,
      );
      if (unsatisfiable?.failure) {
        enter('rejected');
        log.warn({ step: unsatisfiable.id, reason: unsatisfiable.failure.message }, 'Plan rejected');
        return sealAnswer(this.aggregator.rejected(plan, unsatisfiable.failure), states);
      }
      log.info({ steps: plan.steps.map(s => s.tool) }, 'Plan resolved');

      enter('executing');
      const results = new Map<string, StepResult>();
      let stopReason: StopReason | undefined;
      for (const step of plan.steps) {
        if (signal?.aborted) {
          stopReason = 'cancelled';
          break;
        }
        if (results.size >= this.config.maxSteps) {
          stopReason = 'step-limit';
          break;
        }
        results.set(step.id, await this.executor.execute(step, classification.entities, results, signal));
      }
      if (stopReason) {
        log.warn({ stopReason, executed: results.size, planned: plan.steps.length }, 'Execution stopped early');
      }

      const answer = await this.aggregator.aggregate({
        request: requestText,
        plan,
        results: [...results.values()],
        stopReason,
        signal,
      });
      enter('aggregated');
      enter('done');
      log.info({ status: answer.status, sources: answer.sources.length }, 'Request answered');
      return sealAnswer(answer, states);
    } catch (error) {
      enter('faulted');
      const fault = this.toFault(error);
      log.error({ err: error, kind: fault.kind }, 'Request faulted');
      throw fault;
    }
  }

  private toFault(error: unknown): AssistantError {
    if (error instanceof AssistantError) return error;
    if (error instanceof ToolFailureError) {
      return new AssistantError(error.detail.kind, error.detail.message, error.detail.context);
    }
    return internalFault(error instanceof Error ? error.message : String(error));
  }
}
