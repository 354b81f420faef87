// Result Aggregator
// Merges step results into one answer with sources and plain-language failure notes

import type { ToolRegistry } from '../tools/registry.js';
import { FailureKind } from '../tools/types.js';
import type { FailureDetail, ToolCategory } from '../tools/types.js';
import type { TextGenerator } from '../generation.js';
import { withDeadline } from '../../utils/deadline.js';
import type { Logger } from '../../utils/logger.js';
import type {
  AggregatedAnswer,
  AnswerSource,
  AnswerStatus,
  FailureNote,
  OrchestratorState,
  Plan,
  StepResult,
  StopReason,
} from './types.js';

export const TOOL_LABELS: Readonly<Record<string, string>> = {
  employee_lookup: 'Employee lookup',
  policy_search: 'Policy search',
  reimbursement_summary: 'Reimbursement summary',
  reimbursement_status: 'Reimbursement status',
  reimbursement_records: 'Reimbursement records',
  create_work_order: 'Work order',
  draft_content: 'Draft',
  send_email: 'Email',
};

export const labelFor = (tool: string) => TOOL_LABELS[tool] ?? tool;

// Next step offered after an input problem
const TOOL_SUGGESTIONS: Readonly<Record<string, string>> = {
  employee_lookup: 'Check the employee name or id.',
  policy_search: 'The policy documents may not cover this; try other keywords.',
  reimbursement_summary: 'Check the employee id and the date range.',
  reimbursement_status: 'Check the employee id and the date range.',
  reimbursement_records: 'Check the employee id and the date range.',
  create_work_order: 'Check the assignee and the title.',
  send_email: 'Check the recipient address.',
};

const DEFAULT_SUGGESTION = 'Check the details given in the request.';

export function suggestionFor(tool: string, failure: FailureDetail): string | undefined {
  if (failure.kind !== FailureKind.PARAMETER_INVALID && failure.kind !== FailureKind.ENTITY_NOT_FOUND) {
    return undefined;
  }
  return TOOL_SUGGESTIONS[tool] ?? DEFAULT_SUGGESTION;
}

const SECTION_TITLES: ReadonlyArray<{ title: string; categories: ToolCategory[] }> = [
  { title: 'Policy information', categories: ['policy'] },
  { title: 'Data', categories: ['data'] },
  { title: 'Other results', categories: ['action', 'generation'] },
];

const APOLOGY = 'Sorry, I could not complete your request.';

const SYSTEM_PROMPT =
  'You are a finance assistant. Answer the request using only the tool results provided. ' +
  'Do not invent figures, names or policy rules. If some tasks could not be completed, say so ' +
  'briefly using the reasons given. Keep identifiers such as employee ids exactly as written.';

export function describeFailure(failure: FailureDetail): string {
  switch (failure.kind) {
    case FailureKind.PARAMETER_INVALID:
      return `an input was invalid (${failure.message})`;
    case FailureKind.ENTITY_NOT_FOUND:
      return `nothing was found (${failure.message})`;
    case FailureKind.DEPENDENCY_UNSATISFIABLE:
      return `a required input is not available (${failure.message})`;
    case FailureKind.TRANSIENT:
      return `a temporary problem occurred (${failure.message}); please try again later`;
    case FailureKind.EXTERNAL_MUTATION_UNCERTAIN:
      return `it may or may not have been carried out (${failure.message}); please check before trying again`;
    default:
      return 'an internal error occurred';
  }
}

function noteFor(result: StepResult, failure: FailureDetail, results: Map<string, StepResult>): FailureNote {
  const label = labelFor(result.tool);
  let reason: string;
  let suggestion: string | undefined;
  if (failure.blockedBy) {
    const upstream = results.get(failure.blockedBy);
    const upstreamLabel = upstream ? labelFor(upstream.tool) : failure.blockedBy;
    reason = `${label} was skipped because ${upstreamLabel} did not succeed.`;
  } else {
    suggestion = suggestionFor(result.tool, failure);
    reason = `${label} failed: ${describeFailure(failure)}.${suggestion ? ` ${suggestion}` : ''}`;
  }

  return {
    stepId: result.stepId,
    tool: result.tool,
    kind: failure.kind,
    reason,
    attempted: true,
    ...(failure.blockedBy ? { blockedBy: failure.blockedBy } : {}),
    ...(suggestion ? { suggestion } : {}),
  };
}

export interface AggregateInput {
  request: string;
  plan: Plan;
  results: StepResult[];
  stopReason?: StopReason;
  signal?: AbortSignal;
}

export type AnswerDraft = Omit<AggregatedAnswer, 'states'>;

export interface AggregatorOptions {
  registry: ToolRegistry;
  generator?: TextGenerator;
  maxRetries: number;
  /** Deadline for each generator call; a call that runs past it counts as a failed attempt. */
  generateTimeoutMs: number;
  logger: Logger;
}

/** Freezes the answer together with its arrays. */
export function sealAnswer(draft: AnswerDraft, states: readonly OrchestratorState[]): AggregatedAnswer {
  return Object.freeze({
    ...draft,
    sources: Object.freeze([...draft.sources]),
    steps: Object.freeze([...draft.steps]),
    failures: Object.freeze([...draft.failures]),
    states: Object.freeze([...states]),
  });
}

export class ResultAggregator {
  constructor(private options: AggregatorOptions) {}

  async aggregate(input: AggregateInput): Promise<AnswerDraft> {
    const { plan, results } = input;
    const byStep = new Map(results.map(r => [r.stepId, r]));
    const successes = results.filter(r => r.success);

    const failures: FailureNote[] = [];
    for (const step of plan.steps) {
      const result = byStep.get(step.id);
      if (!result) {
        failures.push({
          stepId: step.id,
          tool: step.tool,
          kind: FailureKind.TRANSIENT,
          reason: `${labelFor(step.tool)} was not attempted because ${
            input.stopReason === 'cancelled' ? 'the request was cancelled' : 'the step limit was reached'
          }.`,
          attempted: false,
        });
      } else if (!result.success && result.failure) {
        failures.push(noteFor(result, result.failure, byStep));
      }
    }

    const sources: AnswerSource[] = successes.flatMap(r =>
      r.source ? [{ ...r.source, stepId: r.stepId, tool: r.tool }] : [],
    );

    let status: AnswerStatus;
    let text: string;
    if (successes.length === 0) {
      status = 'failed';
      text = this.apology(failures);
    } else {
      status = failures.length > 0 ? 'partial' : 'complete';
      text = (await this.generate(input, successes, failures)) ?? this.compose(successes, failures);
    }

    return { text, intent: plan.intent, status, sources, steps: [...results], failures };
  }

  /** Answer for a plan rejected before any tool ran. */
  rejected(plan: Plan, detail: FailureDetail): AnswerDraft {
    const failures: FailureNote[] = plan.steps
      .filter(step => step.status === 'failed-terminal' && step.failure)
      .map(step => ({
        stepId: step.id,
        tool: step.tool,
        kind: FailureKind.DEPENDENCY_UNSATISFIABLE,
        reason: `${labelFor(step.tool)} cannot run: ${step.failure?.message ?? detail.message}.`,
        attempted: false,
      }));
    if (failures.length === 0) {
      failures.push({
        stepId: '',
        tool: '',
        kind: detail.kind,
        reason: `The plan cannot run: ${detail.message}.`,
        attempted: false,
      });
    }

    const text = [
      'I could not plan this request because some required information cannot be obtained.',
      '',
      ...failures.map(f => `- ${f.reason}`),
    ].join('\n');

    return { text, intent: plan.intent, status: 'rejected', sources: [], steps: [], failures };
  }

  private apology(failures: FailureNote[]): string {
    if (failures.length === 0) {
      return `${APOLOGY} No tool was available for it.`;
    }
    return [APOLOGY, '', 'Reasons:', ...failures.map(f => `- ${f.reason}`)].join('\n');
  }

  // Deterministic composition, in step order within each section
  compose(successes: StepResult[], failures: FailureNote[]): string {
    const blocks: string[] = [];

    for (const section of SECTION_TITLES) {
      const contents = successes
        .filter(r => {
          const tool = this.options.registry.lookup(r.tool);
          return tool !== undefined && section.categories.includes(tool.category);
        })
        .map(r => r.content ?? '')
        .filter(content => content.length > 0);
      if (contents.length > 0) {
        blocks.push([`${section.title}:`, ...contents].join('\n'));
      }
    }

    if (failures.length > 0) {
      blocks.push(['Could not complete:', ...failures.map(f => `- ${f.reason}`)].join('\n'));
    }

    return blocks.join('\n\n');
  }

  private async generate(
    input: AggregateInput,
    successes: StepResult[],
    failures: FailureNote[],
  ): Promise<string | undefined> {
    const { generator, maxRetries, generateTimeoutMs, logger } = this.options;
    if (!generator || input.signal?.aborted) return undefined;

    const prompt = [
      `Request: ${input.request}`,
      '',
      'Results:',
      ...successes.map(r => `[${labelFor(r.tool)}]\n${r.content ?? ''}`),
      ...(failures.length > 0 ? ['', 'Not completed:', ...failures.map(f => `- ${f.reason}`)] : []),
    ].join('\n');

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (input.signal?.aborted) break;
      try {
        const text = await withDeadline(generateTimeoutMs, input.signal, signal =>
          generator.generate({ system: SYSTEM_PROMPT, prompt, maxTokens: 800, signal }),
        );
        if (text) return text;
        logger.warn({ attempt }, 'Generator returned an empty answer');
      } catch (error) {
        logger.warn({ err: error, attempt }, 'Answer generation failed');
      }
    }
    return undefined;
  }
}
