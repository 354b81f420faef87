// Assistant engine entry point
// Wires collaborators into an orchestrator from environment configuration

import { engineLimitsFromEnv, env } from '../../env.js';
import type { FinanceDatabase } from '../../db.js';
import { FinanceStore } from '../finance-store.js';
import { createEmbedder } from '../embeddings.js';
import { PolicyIndex, DEFAULT_POLICY_DIR } from '../retrieval.js';
import { createTextGenerator } from '../generation.js';
import { createMailer } from '../mailer.js';
import { ModelClassifier } from '../interpreter.js';
import { HeuristicClassifier } from '../triage/index.js';
import { createDefaultRegistry } from '../tools/index.js';
import { childLogger } from '../../utils/logger.js';
import type { AssistantConfig } from './orchestrator.js';

export { Orchestrator } from './orchestrator.js';
export type { AssistantConfig, RunOptions } from './orchestrator.js';
export { PlanSynthesizer } from './planner.js';
export { resolve, assertPlanOrdering } from './resolver.js';
export { StepExecutor } from './executor.js';
export { ResultAggregator } from './aggregator.js';
export { AssistantError, DependencyCycleError } from './errors.js';
export type * from './types.js';

/**
 * Builds every collaborator from env and returns the explicit config struct
 * the orchestrator runs on.
 */
export async function assistantConfigFromEnv(db: FinanceDatabase): Promise<AssistantConfig> {
  const log = childLogger('assistant');
  const limits = engineLimitsFromEnv();

  const policies = await PolicyIndex.fromDirectory(env.POLICY_DIR || DEFAULT_POLICY_DIR, createEmbedder());
  const generator = createTextGenerator();
  const registry = createDefaultRegistry({
    store: new FinanceStore(db),
    policies,
    retrieval: { topK: env.RAG_TOP_K, minSimilarity: env.RAG_MIN_SIMILARITY },
    generator,
    mailer: createMailer(),
  });

  const classifier = generator
    ? new ModelClassifier(generator, { timeoutMs: limits.stepTimeoutMs })
    : new HeuristicClassifier();
  log.info({ classifier: generator ? 'model' : 'heuristic', generator: generator?.name }, 'Assistant configured');

  return { registry, classifier, generator, ...limits, logger: log };
}
