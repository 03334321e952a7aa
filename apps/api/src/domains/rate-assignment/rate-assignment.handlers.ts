import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type FailedBillFilenameParam } from '@ratedesk/shared/schemas/failed-bill.schema.js';
import type { SelectRateAssignment } from '@ratedesk/shared/schemas/db/rate-assignment.schema.js';
import { RateAssignmentError, handleAppError } from '../../lib/errors.js';
import {
  assignRates,
  getLatestAssignment,
  listRateCategories,
  type AssignRatesOutcome,
  type RateAssignmentServiceDeps,
} from './rate-assignment.service.js';

// ---------------------------------------------------------------------------
// Response mapping helpers
// ---------------------------------------------------------------------------

function mapOutcome(outcome: AssignRatesOutcome) {
  const { result } = outcome;
  return {
    assignment_id: outcome.assignmentId,
    filename: outcome.filename,
    mode: result.mode,
    updated_rates: result.updatedRates.map((u) => ({
      procedure_code: u.procedureCode,
      rate: u.rate,
      modifier: u.modifier,
    })),
    category_summary: result.categorySummary ?? null,
    visible_category_summary: outcome.visibleSummary ?? null,
    unresolved_codes: result.unresolvedCodes,
    applied_at: result.appliedAt,
    message: outcome.message,
    warnings: outcome.warnings,
  };
}

function mapAssignmentRecord(record: SelectRateAssignment) {
  return {
    assignment_id: record.assignmentId,
    filename: record.filename,
    mode: record.mode,
    updated_rates: record.updatedRates.map((u) => ({
      procedure_code: u.procedureCode,
      rate: u.rate,
      modifier: u.modifier,
    })),
    category_summary: record.categorySummary,
    unresolved_codes: record.unresolvedCodes,
    applied_at: record.appliedAt.toISOString(),
  };
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export function createRateAssignmentHandlers(deps: RateAssignmentServiceDeps) {
  // POST /api/v1/failed-bills/:filename/rate-assignments
  async function assignHandler(
    request: FastifyRequest<{ Params: FailedBillFilenameParam; Body: unknown }>,
    reply: FastifyReply,
  ) {
    const { filename } = request.params;
    try {
      const outcome = await assignRates(deps, filename, request.body);
      request.log.info(
        {
          filename,
          assignmentId: outcome.assignmentId,
          mode: outcome.result.mode,
          updated: outcome.result.updatedRates.length,
          unresolved: outcome.result.unresolvedCodes.length,
        },
        'rate assignment applied',
      );
      for (const warning of outcome.warnings) {
        request.log.warn({ filename }, warning);
      }
      return reply.code(201).send({ data: mapOutcome(outcome) });
    } catch (err) {
      if (err instanceof RateAssignmentError) {
        request.log.warn(
          { filename, code: err.code, rule: err.details.rule, field: err.details.field },
          'rate assignment rejected',
        );
      }
      return handleAppError(err, reply);
    }
  }

  // GET /api/v1/failed-bills/:filename/rate-assignments/latest
  async function latestHandler(
    request: FastifyRequest<{ Params: FailedBillFilenameParam }>,
    reply: FastifyReply,
  ) {
    try {
      const record = await getLatestAssignment(deps, request.params.filename);
      return reply.code(200).send({ data: mapAssignmentRecord(record) });
    } catch (err) {
      return handleAppError(err, reply);
    }
  }

  // GET /api/v1/rate-categories
  async function listCategoriesHandler(
    _request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const categories = await listRateCategories(deps);
    return reply.code(200).send({
      data: categories.map((c) => ({
        category: c.category,
        procedure_codes: c.procedureCodes,
      })),
    });
  }

  return {
    assignHandler,
    latestHandler,
    listCategoriesHandler,
  };
}
