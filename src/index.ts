// Finance Assistant API
// Port: 3737 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import type { FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import { env, logConfiguration } from './env.js';
import { openDatabase } from './db.js';
import { logger } from './utils/logger.js';
import { AppError, formatErrorResponse } from './utils/errors.js';
import { assistantConfigFromEnv, Orchestrator } from './services/assistant/index.js';
import { assistantRoutes } from './routes/assistant.js';
import { listAvailableProviders } from './providers/index.js';

const PORT = env.PORT;
const HOST = env.HOST;

const db = openDatabase();
const config = await assistantConfigFromEnv(db);
const orchestrator = new Orchestrator(config);

// Fastify shares the service logger
const serverLogger: FastifyBaseLogger = logger;
const server = Fastify({ logger: serverLogger });

// CORS for local development
await server.register(cors, {
  origin: ['http://localhost:3000', 'http://127.0.0.1:3000', 'http://localhost:8080', 'http://127.0.0.1:8080'],
});

server.get('/v1/health', async () => {
  return {
    status: 'ok',
    timestamp: new Date().toISOString(),
    version: '1.0.0',
    tools: config.registry.size,
    providers: listAvailableProviders(),
  };
});

server.setNotFoundHandler((request, reply) => {
  const error = AppError.notFound(`Route ${request.method} ${request.url} not found`);
  return reply.code(error.statusCode).send(formatErrorResponse(error));
});

// Body parse failures and other client errors raised before a handler runs
server.setErrorHandler((err, request, reply) => {
  const clientError = err.statusCode !== undefined && err.statusCode < 500;
  if (!clientError) {
    request.log.error({ err }, 'Unhandled route error');
  }
  const error = clientError ? AppError.badRequest(err.message) : AppError.internal();
  return reply.code(error.statusCode).send(formatErrorResponse(error));
});

await server.register(assistantRoutes, {
  prefix: '/v1',
  orchestrator,
  registry: config.registry,
  requestTimeoutMs: Math.max(1, env.ASSISTANT_REQUEST_TIMEOUT_MS),
});

async function shutdown(signal: string) {
  server.log.info({ signal }, 'Shutting down');
  try {
    await server.close();
  } finally {
    db.close();
  }
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      err => {
        server.log.error(err);
        process.exit(1);
      },
    );
  });
}

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  logConfiguration(server.log);
} catch (err) {
  server.log.error(err);
  db.close();
  process.exit(1);
}
