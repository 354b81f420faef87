import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import Fastify from 'fastify';
import { assistantRoutes } from '../assistant.js';
import { Orchestrator } from '../../services/assistant/index.js';
import { createDefaultRegistry } from '../../services/tools/index.js';
import { ToolFailureError } from '../../services/tools/failures.js';
import { FailureKind } from '../../services/tools/types.js';
import { HeuristicClassifier } from '../../services/triage/index.js';
import type { IntentClassifier } from '../../services/triage/index.js';
import {
  FakeMailer,
  TRAVEL_HIT_CONTENT,
  fakeGenerator,
  fakePolicySearch,
  seededStore,
  silentLogger,
} from '../../services/assistant/__tests__/helpers.js';

const NOW = new Date('2024-04-15T09:00:00Z');

describe.sequential('Assistant Routes', () => {
  const app = Fastify();
  const { db, store } = seededStore(() => NOW);
  const registry = createDefaultRegistry({
    store,
    policies: fakePolicySearch(),
    retrieval: { topK: 3, minSimilarity: 0.2 },
    generator: fakeGenerator('draft'),
    mailer: new FakeMailer(),
  });
  const broken: IntentClassifier = {
    classify: async () => {
      throw new Error('classifier exploded');
    },
  };
  const overloaded: IntentClassifier = {
    classify: async () => {
      throw new ToolFailureError({ kind: FailureKind.TRANSIENT, message: 'model overloaded' });
    },
  };

  function orchestrator(classifier: IntentClassifier): Orchestrator {
    return new Orchestrator({
      registry,
      classifier,
      maxRetries: 1,
      maxSteps: 8,
      stepTimeoutMs: 1000,
      logger: silentLogger,
    });
  }

  beforeAll(async () => {
    await app.register(assistantRoutes, {
      prefix: '/v1',
      orchestrator: orchestrator(new HeuristicClassifier(() => NOW)),
      registry,
      requestTimeoutMs: 5000,
    });
    await app.register(assistantRoutes, {
      prefix: '/broken',
      orchestrator: orchestrator(broken),
      registry,
      requestTimeoutMs: 5000,
    });
    await app.register(assistantRoutes, {
      prefix: '/busy',
      orchestrator: orchestrator(overloaded),
      registry,
      requestTimeoutMs: 5000,
    });
    await app.ready();
  });

  afterAll(async () => {
    await app.close();
    db.close();
  });

  it('lists the registered tools in registration order', async () => {
    const response = await app.inject({ method: 'GET', url: '/v1/assistant/tools' });

    expect(response.statusCode).toBe(200);
    expect(response.json().tools.map((t: { name: string }) => t.name)).toEqual([
      'employee_lookup',
      'policy_search',
      'reimbursement_summary',
      'reimbursement_status',
      'reimbursement_records',
      'create_work_order',
      'draft_content',
      'send_email',
    ]);
  });

  it('answers a request with sources and step details', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/assistant/run',
      payload: { request: 'What is the travel policy for hotel stays?' },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({
      answer: `Policy information:\n${TRAVEL_HIT_CONTENT}`,
      intent: 'simple-lookup',
      status: 'complete',
      failures: [],
      steps: [{ id: 'step-1', tool: 'policy_search', success: true, attempts: 1 }],
      states: ['received', 'classified', 'planned', 'resolved', 'executing', 'aggregated', 'done'],
    });
    expect(body.sources[0].origin).toBe('travel-expenses#2');
  });

  it('answers a first-person request for the given requester', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/assistant/run',
      payload: { request: 'How much did I spend on travel last month?', requester: { employee_id: 'E001' } },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      answer:
        'Data:\nAlice Chen (E001) claimed 1500.00 across 1 travel claim(s) between 2024-03-01 and 2024-03-31 (travel 1500.00)',
      status: 'complete',
      steps: [{ tool: 'reimbursement_summary', success: true }],
    });
  });

  it('rejects a malformed requester id', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/assistant/run',
      payload: { request: 'How much did I spend?', requester: { employee_id: 'alice' } },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().details).toEqual({ requester: ['employee_id must look like E001'] });
  });

  it('rejects an empty request', async () => {
    const response = await app.inject({ method: 'POST', url: '/v1/assistant/run', payload: { request: '   ' } });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'validation_error',
      message: 'Invalid request body',
      statusCode: 400,
      details: { request: ['request must not be empty'] },
    });
  });

  it('returns a generic 500 when the engine faults', async () => {
    const response = await app.inject({ method: 'POST', url: '/broken/assistant/run', payload: { request: 'anything' } });

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: 'internal_error',
      message: 'The assistant could not process this request',
      statusCode: 500,
      details: { kind: 'InternalFault' },
    });
  });

  it('returns 503 when the engine reports a temporary fault', async () => {
    const response = await app.inject({ method: 'POST', url: '/busy/assistant/run', payload: { request: 'anything' } });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      error: 'service_unavailable',
      message: 'The assistant is temporarily unavailable; try again shortly',
      statusCode: 503,
      details: { kind: 'Transient' },
    });
  });
});
