// Model-backed intent classifier
// Asks the language model for a JSON classification and falls back to triage heuristics

import { z } from 'zod';
import type { TextGenerator } from './generation.js';
import { HeuristicClassifier } from './triage/index.js';
import type { IntentClassifier } from './triage/index.js';
import { compactEntities } from './triage/entities.js';
import { normalizeDate } from './triage/dates.js';
import { EXPENSE_CATEGORIES, WORK_ORDER_PRIORITIES } from './finance-store.js';
import { INTENTS, TASK_KINDS } from './assistant/types.js';
import type { Classification, EntityBag, Intent, TaskKind } from './assistant/types.js';
import { DeadlineExceededError, withDeadline } from '../utils/deadline.js';
import { childLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

const optionalText = z
  .string()
  .nullish()
  .transform(v => v ?? undefined);

const ModelOutputSchema = z.object({
  intent: z.string(),
  tasks: z.array(z.string()).default([]),
  confidence: z.number().min(0).max(1).optional(),
  entities: z
    .object({
      employee_name: optionalText,
      employee_id: optionalText,
      department: optionalText,
      start_date: optionalText,
      end_date: optionalText,
      subject: optionalText,
      recipient: optionalText,
      priority: optionalText,
      category: optionalText,
    })
    .default({}),
});

type ModelOutput = z.infer<typeof ModelOutputSchema>;

const SYSTEM_PROMPT =
  'You classify requests sent to a company finance assistant. Return one JSON object only.\n\n' +
  'Schema: {"intent":"simple-lookup|data-query|composite-task|content-generation",' +
  '"tasks":["policy|employee|summary|status|records|work-order|draft|email"],' +
  '"confidence":0..1,"entities":{"employee_name":"string","employee_id":"E###","department":"string",' +
  '"start_date":"YYYY-MM-DD","end_date":"YYYY-MM-DD","subject":"string","recipient":"email address",' +
  '"priority":"low|medium|high|urgent","category":"travel|meals|office|training"}}\n\n' +
  'INSTRUCTIONS:\n' +
  '- simple-lookup: questions answered from policy documents only\n' +
  '- data-query: employee or reimbursement data only (summary, status, records)\n' +
  '- content-generation: drafting text only\n' +
  '- composite-task: anything that combines families or performs an action (work order, email); use it when unsure\n' +
  '- Omit entities that are not stated. Never guess ids, dates or addresses.\n' +
  '- Resolve relative dates against today: ';

function extractJsonObject(raw: string): string | null {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) return null;
  return raw.slice(start, end + 1);
}

function normalizeIntent(raw: string): Intent {
  const value = raw.trim().toLowerCase().replace(/[_\s]+/g, '-');
  return INTENTS.find(intent => intent === value) ?? 'composite-task';
}

function normalizeTasks(raw: string[]): TaskKind[] {
  const tasks: TaskKind[] = [];
  for (const item of raw) {
    const value = item.trim().toLowerCase().replace(/[_\s]+/g, '-');
    const task = TASK_KINDS.find(kind => kind === value);
    if (task && !tasks.includes(task)) tasks.push(task);
  }
  return tasks;
}

function normalizeModelEntities(raw: ModelOutput['entities']): EntityBag {
  const employeeId = raw.employee_id?.trim().toUpperCase();
  const category = raw.category?.trim().toLowerCase();
  const priority = raw.priority?.trim().toLowerCase();

  return compactEntities({
    employeeName: raw.employee_name,
    employeeId: employeeId && /^E\d{3,}$/.test(employeeId) ? employeeId : undefined,
    department: raw.department,
    startDate: raw.start_date ? normalizeDate(raw.start_date) : undefined,
    endDate: raw.end_date ? normalizeDate(raw.end_date) : undefined,
    subject: raw.subject,
    recipient: raw.recipient && raw.recipient.includes('@') ? raw.recipient.toLowerCase() : undefined,
    priority: WORK_ORDER_PRIORITIES.find(p => p === priority),
    category: EXPENSE_CATEGORIES.find(c => c === category),
  });
}

export interface ModelClassifierOptions {
  now?: () => Date;
  logger?: Logger;
  /** Deadline for each model call. Defaults to 10s. */
  timeoutMs?: number;
}

export class ModelClassifier implements IntentClassifier {
  private heuristic: HeuristicClassifier;
  private now: () => Date;
  private log: Logger;
  private timeoutMs: number;

  constructor(
    private generator: TextGenerator,
    options: ModelClassifierOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.heuristic = new HeuristicClassifier(this.now);
    this.log = options.logger ?? childLogger('interpreter');
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  async classify(text: string, signal?: AbortSignal): Promise<Classification> {
    const fallback = this.heuristic.classifySync(text);
    if (!text.trim()) {
      return fallback;
    }

    const today = this.now().toISOString().slice(0, 10);
    let lastProblem = '';
    let timedOut = false;

    // One retry on malformed or late output
    for (let attempt = 1; attempt <= 2; attempt++) {
      let raw: string;
      try {
        raw = await withDeadline(this.timeoutMs, signal, callSignal =>
          this.generator.generate({
            system: SYSTEM_PROMPT + today,
            prompt: text,
            json: true,
            maxTokens: 400,
            signal: callSignal,
          }),
        );
      } catch (error) {
        if (error instanceof DeadlineExceededError) {
          lastProblem = error.message;
          timedOut = true;
          continue;
        }
        this.log.warn({ err: error }, 'Model classification failed; using heuristics');
        return { ...fallback, reasonCodes: [...fallback.reasonCodes, 'MODEL_ERROR'] };
      }
      timedOut = false;

      const jsonText = extractJsonObject(raw);
      if (!jsonText) {
        lastProblem = 'non-JSON output';
        continue;
      }

      let json: unknown;
      try {
        json = JSON.parse(jsonText);
      } catch {
        lastProblem = 'unparseable JSON';
        continue;
      }

      const parsed = ModelOutputSchema.safeParse(json);
      if (!parsed.success) {
        lastProblem = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        continue;
      }

      return this.merge(parsed.data, fallback);
    }

    this.log.warn({ problem: lastProblem }, 'Model classification unusable twice; using heuristics');
    return { ...fallback, reasonCodes: [...fallback.reasonCodes, timedOut ? 'MODEL_TIMEOUT' : 'MODEL_MALFORMED'] };
  }

  // Model entities win over heuristic ones once normalized
  private merge(output: ModelOutput, fallback: Classification): Classification {
    const tasks = normalizeTasks(output.tasks);
    return {
      intent: normalizeIntent(output.intent),
      entities: compactEntities({ ...fallback.entities, ...normalizeModelEntities(output.entities) }),
      tasks: tasks.length > 0 ? tasks : fallback.tasks,
      confidence: output.confidence ?? 0.8,
      classifier: 'model',
      reasonCodes: ['MODEL_CLASSIFIED'],
    };
  }
}
