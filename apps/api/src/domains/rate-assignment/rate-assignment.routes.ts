import { type FastifyInstance } from 'fastify';
import { failedBillFilenameParamSchema } from '@ratedesk/shared/schemas/failed-bill.schema.js';
import { assignmentRateLimit } from '../../plugins/rate-limit.plugin.js';
import { createRateAssignmentHandlers } from './rate-assignment.handlers.js';
import { type RateAssignmentServiceDeps } from './rate-assignment.service.js';

// ---------------------------------------------------------------------------
// Rate Assignment Routes
// ---------------------------------------------------------------------------

export async function rateAssignmentRoutes(
  app: FastifyInstance,
  opts: { deps: RateAssignmentServiceDeps },
) {
  const handlers = createRateAssignmentHandlers(opts.deps);

  // GET /api/v1/rate-categories — category → procedure codes
  app.get('/api/v1/rate-categories', {
    handler: handlers.listCategoriesHandler,
  });

  // POST /api/v1/failed-bills/:filename/rate-assignments — validate, apply, persist
  // No body schema: body shape is checked by the validator (MALFORMED_REQUEST).
  app.post('/api/v1/failed-bills/:filename/rate-assignments', {
    schema: { params: failedBillFilenameParamSchema },
    config: { rateLimit: assignmentRateLimit() },
    handler: handlers.assignHandler,
  });

  // GET /api/v1/failed-bills/:filename/rate-assignments/latest
  app.get('/api/v1/failed-bills/:filename/rate-assignments/latest', {
    schema: { params: failedBillFilenameParamSchema },
    handler: handlers.latestHandler,
  });
}
