import type { FastifyInstance } from 'fastify';
import type {
  StartTimerRequest,
  UpdateActiveTimeEntryRequest,
  UpdateTimeEntryRequest,
} from '@timekeep/shared';
import { ValidationError } from '../errors/AppError.js';
import * as timeEntryService from '../services/timeEntryService.js';

const categoryIdProperty = { type: ['integer', 'null'], minimum: 1 };

// JSON schema for GET /api/time-entries
const listTimeEntriesSchema = {
  querystring: {
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: 500 },
    },
    additionalProperties: false,
  },
};

// JSON schema for POST /api/time-entries/start (the body may be omitted)
const startTimerSchema = {
  body: {
    type: ['object', 'null'],
    properties: {
      description: { type: 'string', maxLength: 1000 },
      categoryId: categoryIdProperty,
    },
    additionalProperties: false,
  },
};

// JSON schema for PATCH /api/time-entries/active
const updateActiveSchema = {
  body: {
    type: 'object',
    required: ['description'],
    properties: {
      description: { type: 'string', maxLength: 1000 },
      categoryId: categoryIdProperty,
    },
    additionalProperties: false,
  },
};

// JSON schema for path parameter validation (GET/DELETE)
const timeEntryIdSchema = {
  params: {
    type: 'object',
    required: ['id'],
    properties: {
      id: { type: 'integer', minimum: 1 },
    },
  },
};

// JSON schema for PUT /api/time-entries/:id
const updateTimeEntrySchema = {
  ...timeEntryIdSchema,
  body: {
    type: 'object',
    required: ['description', 'startTime'],
    properties: {
      description: { type: 'string', minLength: 1, maxLength: 1000 },
      startTime: { type: 'string', minLength: 1 },
      endTime: { type: ['string', 'null'] },
      categoryId: categoryIdProperty,
    },
    additionalProperties: false,
  },
};

export default async function timeEntryRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/time-entries
   * Most recently started entries, newest first.
   */
  fastify.get<{ Querystring: { limit?: number } }>(
    '/',
    { schema: listTimeEntriesSchema },
    async (request, reply) => {
      const entries = timeEntryService.listTimeEntries(fastify.db, request.query.limit);
      return reply.status(200).send({ entries });
    },
  );

  /**
   * GET /api/time-entries/active
   * The running entry, or { entry: null }.
   */
  fastify.get('/active', async (_request, reply) => {
    const entry = timeEntryService.getActiveTimeEntry(fastify.db);
    return reply.status(200).send({ entry });
  });

  /**
   * POST /api/time-entries/start
   * Start a timer, stopping the running one.
   */
  fastify.post<{ Body: StartTimerRequest | undefined }>(
    '/start',
    { schema: startTimerSchema },
    async (request, reply) => {
      const entry = timeEntryService.startTimer(fastify.db, request.body ?? {});
      request.log.info({ timeEntryId: entry.id }, 'Timer started');
      return reply.status(201).send(entry);
    },
  );

  /**
   * POST /api/time-entries/stop
   * Stop the running timer. Succeeds with { entry: null } when idle.
   */
  fastify.post('/stop', async (request, reply) => {
    const entry = timeEntryService.stopTimer(fastify.db);
    if (entry) {
      request.log.info({ timeEntryId: entry.id }, 'Timer stopped');
    }
    return reply.status(200).send({ entry });
  });

  /**
   * PATCH /api/time-entries/active
   * Change the running entry's description and category.
   */
  fastify.patch<{ Body: UpdateActiveTimeEntryRequest }>(
    '/active',
    { schema: updateActiveSchema },
    async (request, reply) => {
      const entry = timeEntryService.updateActiveTimeEntry(fastify.db, request.body);
      return reply.status(200).send(entry);
    },
  );

  /**
   * GET /api/time-entries/:id
   */
  fastify.get<{ Params: { id: number } }>(
    '/:id',
    { schema: timeEntryIdSchema },
    async (request, reply) => {
      const entry = timeEntryService.getTimeEntry(fastify.db, request.params.id);
      return reply.status(200).send(entry);
    },
  );

  /**
   * PUT /api/time-entries/:id
   * Overwrite an entry. The end must come after the start.
   */
  fastify.put<{ Params: { id: number }; Body: UpdateTimeEntryRequest }>(
    '/:id',
    { schema: updateTimeEntrySchema },
    async (request, reply) => {
      const { startTime, endTime } = request.body;
      if (endTime !== undefined && endTime !== null && Date.parse(endTime) <= Date.parse(startTime)) {
        throw new ValidationError('End time must be after start time', { startTime, endTime });
      }

      const entry = timeEntryService.updateTimeEntry(fastify.db, request.params.id, request.body);
      return reply.status(200).send(entry);
    },
  );

  /**
   * DELETE /api/time-entries/:id
   * Delete an entry; unknown IDs are ignored.
   */
  fastify.delete<{ Params: { id: number } }>(
    '/:id',
    { schema: timeEntryIdSchema },
    async (request, reply) => {
      timeEntryService.deleteTimeEntry(fastify.db, request.params.id, request.log);
      return reply.status(204).send();
    },
  );
}
