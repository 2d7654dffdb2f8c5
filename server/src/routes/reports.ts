import type { FastifyInstance } from 'fastify';
import type { ReportQuery, ReportResponse } from '@timekeep/shared';
import { ValidationError } from '../errors/AppError.js';
import { calculateReportPeriod, isReportPeriod } from '../services/reportPeriod.js';
import type { PeriodRange } from '../services/reportPeriod.js';
import { formatDuration, getReport } from '../services/reportService.js';

// JSON schema for GET /api/reports
const reportQuerySchema = {
  querystring: {
    type: 'object',
    properties: {
      period: { type: 'string', maxLength: 20 },
      startDate: { type: 'string', minLength: 1 },
      endDate: { type: 'string', minLength: 1 },
      categoryId: { type: 'integer', minimum: -1 },
      tagIds: { type: 'array', items: { type: 'integer', minimum: 1 } },
    },
    additionalProperties: false,
  },
};

/**
 * Explicit range from startDate/endDate, when both are given.
 * @throws ValidationError if only one bound is given or a bound is unparseable
 */
function customRange(query: ReportQuery): PeriodRange | null {
  if (query.startDate === undefined && query.endDate === undefined) {
    return null;
  }
  if (query.startDate === undefined || query.endDate === undefined) {
    throw new ValidationError('startDate and endDate must be provided together');
  }
  const start = new Date(query.startDate);
  const end = new Date(query.endDate);
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new ValidationError('startDate and endDate must be valid dates', {
      startDate: query.startDate,
      endDate: query.endDate,
    });
  }
  return { start, end };
}

export default async function reportRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/reports
   * Totals and category breakdown for a period (default: today) or an
   * explicit startDate/endDate range, optionally filtered by category and tags.
   */
  fastify.get<{ Querystring: ReportQuery }>(
    '/',
    { schema: reportQuerySchema },
    async (request, reply) => {
      const { query } = request;
      const requestedPeriod = query.period ?? 'today';
      const range = customRange(query) ?? calculateReportPeriod(requestedPeriod, new Date());

      const report = getReport(fastify.db, {
        startDate: range.start,
        endDate: range.end,
        categoryFilter: query.categoryId ?? 0,
        tagIds: query.tagIds ?? [],
      });

      const response: ReportResponse = {
        ...report,
        period:
          query.startDate !== undefined
            ? 'custom'
            : isReportPeriod(requestedPeriod)
              ? requestedPeriod
              : 'all',
        totalFormatted: formatDuration(report.totalSeconds),
      };
      return reply.status(200).send(response);
    },
  );
}
