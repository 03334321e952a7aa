import { type FastifyReply } from 'fastify';
import {
  RATE_ASSIGNMENT_ERROR_STATUS,
  type RateAssignmentErrorCode,
  type RateAssignmentRule,
} from '@ratedesk/shared/constants/rate-assignment.constants.js';

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(404, 'NOT_FOUND', `${resource} not found`);
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(409, 'CONFLICT', message);
  }
}

export interface RateAssignmentErrorDetails {
  rule: RateAssignmentRule;
  /** Offending field path, e.g. `rates[2].rate` or `categoryRates.mri_wo`. */
  field?: string;
  /** Offending value as submitted. */
  value?: unknown;
  /** Procedure code the offending entry names, when there is one. */
  procedureCode?: string;
}

/**
 * Rejection raised by rate-assignment validation or application. Carries one
 * of the four assignment error codes; nothing is persisted when it is thrown.
 */
export class RateAssignmentError extends AppError {
  declare code: RateAssignmentErrorCode;
  declare details: RateAssignmentErrorDetails;

  constructor(
    code: RateAssignmentErrorCode,
    message: string,
    details: RateAssignmentErrorDetails,
  ) {
    super(RATE_ASSIGNMENT_ERROR_STATUS[code], code, message, details);
  }
}

// ---------------------------------------------------------------------------
// Reply helper
// ---------------------------------------------------------------------------

/**
 * Sends an AppError as `{ error: { code, message, details? } }`.
 * Anything else is rethrown to Fastify's error handler.
 */
export function handleAppError(err: unknown, reply: FastifyReply): FastifyReply {
  if (err instanceof AppError) {
    return reply.code(err.statusCode).send({
      error: {
        code: err.code,
        message: err.message,
        ...(err.details !== undefined ? { details: err.details } : {}),
      },
    });
  }
  throw err;
}
