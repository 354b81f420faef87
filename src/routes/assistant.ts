/**
 * Assistant Routes - Finance assistant request/response API
 * One request in, one aggregated answer out
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Orchestrator } from '../services/assistant/index.js';
import { AssistantError } from '../services/assistant/index.js';
import type { ToolRegistry } from '../services/tools/index.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const RequesterSchema = z.object({
  employee_id: z
    .string()
    .trim()
    .regex(/^[Ee]\d{3,}$/, 'employee_id must look like E001')
    .optional(),
  name: z.string().trim().min(1).max(200).optional(),
  department: z.string().trim().min(1).max(100).optional(),
});

const RunRequestSchema = z.object({
  request: z.string().trim().min(1, 'request must not be empty').max(4000),
  requester: RequesterSchema.optional(),
});

export interface AssistantRouteOptions {
  orchestrator: Orchestrator;
  registry: ToolRegistry;
  requestTimeoutMs: number;
}

export async function assistantRoutes(server: FastifyInstance, options: AssistantRouteOptions) {
  const { orchestrator, registry, requestTimeoutMs } = options;

  // Catalog of registered tools
  server.get('/assistant/tools', async () => {
    return {
      tools: registry.list().map(tool => ({
        name: tool.name,
        description: tool.description,
        kind: tool.kind,
        category: tool.category,
        effect: tool.effect,
        parameters: tool.parameters.map(p => ({
          name: p.name,
          type: p.type,
          required: p.required,
          ...(p.enum ? { enum: p.enum } : {}),
        })),
        exports: tool.exports,
        ...(tool.requiresOneOf ? { requires_one_of: tool.requiresOneOf } : {}),
      })),
    };
  });

  server.post('/assistant/run', async (request, reply) => {
    const parsed = RunRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const error = AppError.validationError('Invalid request body', parsed.error.flatten().fieldErrors);
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    try {
      const { request: text, requester } = parsed.data;
      const answer = await orchestrator.run(text, {
        signal: AbortSignal.timeout(requestTimeoutMs),
        ...(requester
          ? {
              requester: {
                employeeId: requester.employee_id,
                employeeName: requester.name,
                department: requester.department,
              },
            }
          : {}),
      });

      return {
        answer: answer.text,
        intent: answer.intent,
        status: answer.status,
        sources: answer.sources,
        failures: answer.failures,
        steps: answer.steps.map(step => ({
          id: step.stepId,
          tool: step.tool,
          success: step.success,
          attempts: step.attempts,
          duration_ms: step.durationMs,
        })),
        states: answer.states,
      };
    } catch (err) {
      request.log.error({ err }, 'Assistant request faulted');
      const error =
        err instanceof AssistantError
          ? AppError.fromFailureKind(err.kind)
          : AppError.internal('The assistant could not process this request');
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }
  });
}
