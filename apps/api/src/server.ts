import Fastify, { type FastifyError, type FastifyServerOptions } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { randomUUID } from 'node:crypto';
import { pathToFileURL } from 'node:url';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { AppError } from './lib/errors.js';
import { getEnv } from './lib/env.js';
import { createDb } from './lib/db.js';
import { rateLimitPluginFp, noRateLimit } from './plugins/rate-limit.plugin.js';
import { createAuditLogRepository } from './domains/audit/audit.repository.js';
import { createFailedBillRepository } from './domains/failed-bill/failed-bill.repository.js';
import { failedBillRoutes } from './domains/failed-bill/failed-bill.routes.js';
import type { FailedBillServiceDeps } from './domains/failed-bill/failed-bill.service.js';
import {
  createRateAssignmentRepository,
  createRateCategoryRepository,
} from './domains/rate-assignment/rate-assignment.repository.js';
import { rateAssignmentRoutes } from './domains/rate-assignment/rate-assignment.routes.js';
import type { RateAssignmentServiceDeps } from './domains/rate-assignment/rate-assignment.service.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface AppDeps {
  failedBills: FailedBillServiceDeps;
  rateAssignments: RateAssignmentServiceDeps;
}

export function createAppDeps(db: NodePgDatabase): AppDeps {
  const billRepo = createFailedBillRepository(db);
  const categoryRepo = createRateCategoryRepository(db);
  const assignmentRepo = createRateAssignmentRepository(db);
  const auditRepo = createAuditLogRepository(db);

  return {
    failedBills: { billRepo, categoryRepo, auditRepo },
    rateAssignments: { billRepo, categoryRepo, assignmentRepo, auditRepo },
  };
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export interface BuildAppOptions {
  deps: AppDeps;
  logger?: FastifyServerOptions['logger'];
  corsOrigin?: string;
  rateLimitMax?: number;
}

export function buildApp(opts: BuildAppOptions) {
  const app = Fastify({
    logger: opts.logger ?? { level: process.env.LOG_LEVEL ?? 'info' },
    genReqId: () => randomUUID(),
  });

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      return reply.code(error.statusCode).send({
        error: { code: error.code, message: error.message, details: error.details },
      });
    }
    if (error.validation) {
      return reply.code(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Validation failed',
          details: error.validation,
        },
      });
    }
    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.code(error.statusCode).send({
        error: { code: error.code, message: error.message },
      });
    }
    request.log.error({ err: error }, 'unhandled error');
    return reply.code(500).send({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' },
    });
  });

  // Register plugins
  app.register(helmet);
  app.register(cors, {
    origin: opts.corsOrigin ?? process.env.CORS_ORIGIN ?? 'http://localhost:3000',
  });
  app.register(rateLimitPluginFp, { defaultMax: opts.rateLimitMax ?? 100 });

  // Health check
  app.get('/health', { config: { rateLimit: noRateLimit() } }, async () => ({ status: 'ok' }));

  app.register(failedBillRoutes, { deps: opts.deps.failedBills });
  app.register(rateAssignmentRoutes, { deps: opts.deps.rateAssignments });

  return app;
}

// Start server when run directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const env = getEnv();
  const { db, close } = createDb(env.DATABASE_URL);
  const app = buildApp({
    deps: createAppDeps(db),
    logger: { level: env.LOG_LEVEL },
    corsOrigin: env.CORS_ORIGIN,
    rateLimitMax: env.RATE_LIMIT_MAX,
  });

  app.addHook('onClose', async () => {
    await close();
  });

  app.listen({ port: env.API_PORT, host: env.API_HOST }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
