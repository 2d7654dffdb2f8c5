import { Readable } from 'node:stream';
import type { FastifyInstance } from 'fastify';
import {
  exportTimeEntriesCsv,
  importTimeEntriesCsv,
  previewTimeEntriesCsv,
} from '../services/csvService.js';

// JSON schema for the CSV upload routes: the body is the raw file text
const csvUploadSchema = {
  body: { type: 'string' },
};

export default async function csvRoutes(fastify: FastifyInstance) {
  // Uploads are sent as the raw file with Content-Type: text/csv
  fastify.addContentTypeParser(
    'text/csv',
    { parseAs: 'string', bodyLimit: fastify.config.csvBodyLimit },
    (_request, body, done) => {
      done(null, body);
    },
  );

  /**
   * GET /api/csv/export
   * Download every time entry as CSV.
   */
  fastify.get('/export', async (_request, reply) => {
    return reply
      .status(200)
      .header('Content-Type', 'text/csv; charset=utf-8')
      .header('Content-Disposition', 'attachment; filename="time-entries.csv"')
      .send(Readable.from(exportTimeEntriesCsv(fastify.db)));
  });

  /**
   * POST /api/csv/preview
   * Show which rows an import would create or change, without writing.
   */
  fastify.post<{ Body: string }>(
    '/preview',
    { schema: csvUploadSchema },
    async (request, reply) => {
      const entries = previewTimeEntriesCsv(fastify.db, request.body);
      return reply.status(200).send({ entries });
    },
  );

  /**
   * POST /api/csv/import
   * Apply a CSV file atomically: one invalid row rejects the whole file.
   */
  fastify.post<{ Body: string }>(
    '/import',
    { schema: csvUploadSchema },
    async (request, reply) => {
      const result = importTimeEntriesCsv(fastify.db, request.body);
      request.log.info(result, 'CSV import completed');
      return reply.status(200).send(result);
    },
  );
}
