import { type FastifyInstance } from 'fastify';
import {
  rawFailedBillSchema,
  failedBillListQuerySchema,
  failedBillFilenameParamSchema,
} from '@ratedesk/shared/schemas/failed-bill.schema.js';
import { createFailedBillHandlers } from './failed-bill.handlers.js';
import { type FailedBillServiceDeps } from './failed-bill.service.js';

// ---------------------------------------------------------------------------
// Failed Bill Triage Routes
// ---------------------------------------------------------------------------

export async function failedBillRoutes(
  app: FastifyInstance,
  opts: { deps: FailedBillServiceDeps },
) {
  const handlers = createFailedBillHandlers(opts.deps);

  // POST /api/v1/failed-bills — ingest (upsert) a failed bill
  app.post('/api/v1/failed-bills', {
    schema: { body: rawFailedBillSchema },
    handler: handlers.ingestHandler,
  });

  // GET /api/v1/failed-bills — filtered, optionally grouped triage list
  app.get('/api/v1/failed-bills', {
    schema: { querystring: failedBillListQuerySchema },
    handler: handlers.listHandler,
  });

  // GET /api/v1/failed-bills/filter-options
  // NOTE: registered BEFORE /:filename to avoid Fastify treating "filter-options" as a :filename param
  app.get('/api/v1/failed-bills/filter-options', {
    handler: handlers.filterOptionsHandler,
  });

  // GET /api/v1/failed-bills/:filename — bill detail with covering categories
  app.get('/api/v1/failed-bills/:filename', {
    schema: { params: failedBillFilenameParamSchema },
    handler: handlers.detailHandler,
  });
}
