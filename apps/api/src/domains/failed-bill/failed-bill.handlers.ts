import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type FailedBillListQuery,
  type FailedBillFilenameParam,
  type RawFailedBill,
} from '@ratedesk/shared/schemas/failed-bill.schema.js';
import { describeFailureKind } from '@ratedesk/shared/utils/failure-kind.utils.js';
import { handleAppError } from '../../lib/errors.js';
import { providerName } from './failed-bill.query.js';
import {
  ingestFailedBill,
  listFailedBills,
  getFilterOptions,
  getFailedBillDetail,
  type FailedBillServiceDeps,
  type FilterOptions,
  type TriageEntry,
} from './failed-bill.service.js';

// ---------------------------------------------------------------------------
// Response mapping helpers
// ---------------------------------------------------------------------------

function toDateString(date: Date | null): string | null {
  return date ? date.toISOString().slice(0, 10) : null;
}

export function mapTriageEntry({ bill, ageDays, ageBucket }: TriageEntry) {
  return {
    filename: bill.filename,
    provider: providerName(bill),
    failure_reasons: bill.failureReasons.map((reason) => {
      const display = describeFailureKind(reason.kind);
      return {
        kind: reason.kind,
        label: display.label,
        color: display.color,
        icon: display.icon,
        known: reason.type === 'known',
        detail: reason.detail ?? null,
        raw: reason.raw,
      };
    }),
    failing_codes: bill.failingCodes,
    service_lines: bill.serviceLines.map((line) => ({
      procedure_code: line.procedureCode,
      date_of_service: toDateString(line.dateOfService),
      units: line.units,
      modifiers: line.modifiers,
    })),
    earliest_service_date: toDateString(bill.earliestServiceDate),
    age_days: ageDays ?? null,
    age_bucket: ageBucket ?? null,
  };
}

function mapFilterOptions(options: FilterOptions) {
  return {
    kinds: options.kinds,
    providers: options.providers,
    age_buckets: options.ageBuckets,
  };
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export function createFailedBillHandlers(deps: FailedBillServiceDeps) {
  // POST /api/v1/failed-bills
  async function ingestHandler(
    request: FastifyRequest<{ Body: RawFailedBill }>,
    reply: FastifyReply,
  ) {
    const entry = await ingestFailedBill(deps, request.body);
    request.log.info(
      { filename: entry.bill.filename, failingCodes: entry.bill.failingCodes.length },
      'failed bill ingested',
    );
    return reply.code(201).send({ data: mapTriageEntry(entry) });
  }

  // GET /api/v1/failed-bills
  async function listHandler(
    request: FastifyRequest<{ Querystring: FailedBillListQuery }>,
    reply: FastifyReply,
  ) {
    const { kind, provider, age_bucket, search, group_by } = request.query;

    const list = await listFailedBills(
      deps,
      { kind, provider, ageBucket: age_bucket, searchText: search },
      group_by,
    );

    return reply.code(200).send({
      data: {
        bills: list.bills.map(mapTriageEntry),
        total: list.total,
        groups: list.groups ?? null,
        stats: {
          by_kind: list.stats.byKind,
          by_provider: list.stats.byProvider,
          by_age_bucket: list.stats.byAgeBucket,
        },
        filter_options: mapFilterOptions(list.filterOptions),
      },
    });
  }

  // GET /api/v1/failed-bills/filter-options
  async function filterOptionsHandler(
    _request: FastifyRequest,
    reply: FastifyReply,
  ) {
    const options = await getFilterOptions(deps);
    return reply.code(200).send({ data: mapFilterOptions(options) });
  }

  // GET /api/v1/failed-bills/:filename
  async function detailHandler(
    request: FastifyRequest<{ Params: FailedBillFilenameParam }>,
    reply: FastifyReply,
  ) {
    try {
      const detail = await getFailedBillDetail(deps, request.params.filename);
      return reply.code(200).send({
        data: {
          ...mapTriageEntry(detail),
          code_categories: detail.codeCategories,
        },
      });
    } catch (err) {
      return handleAppError(err, reply);
    }
  }

  return {
    ingestHandler,
    listHandler,
    filterOptionsHandler,
    detailHandler,
  };
}
