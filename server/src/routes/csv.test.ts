import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildApp } from '../app.js';
import type { FastifyInstance } from 'fastify';
import type {
  ApiErrorResponse,
  CsvImportResult,
  CsvPreviewResponse,
  TimeEntryListResponse,
} from '@timekeep/shared';

describe('CSV Routes', () => {
  let app: FastifyInstance;
  let tempDir: string;
  const originalEnv = process.env;

  const SAMPLE = [
    'id,description,start_time,end_time,category',
    ',Write tests #dev,2024-01-15 09:00,2024-01-15 10:30,Work',
    ',Groceries,2024-01-15 18:00,2024-01-15 18:45,',
  ].join('\n');

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'timekeep-csv-test-'));
    process.env = { ...originalEnv, DATABASE_URL: join(tempDir, 'test.db'), LOG_LEVEL: 'fatal' };
    app = await buildApp();
  });

  afterEach(async () => {
    await app.close();
    process.env = originalEnv;
    rmSync(tempDir, { recursive: true, force: true });
  });

  function postCsv(url: string, payload: string) {
    return app.inject({
      method: 'POST',
      url,
      headers: { 'content-type': 'text/csv' },
      payload,
    });
  }

  describe('POST /api/csv/import', () => {
    it('imports rows and reports the counts', async () => {
      const response = await postCsv('/api/csv/import', SAMPLE);

      expect(response.statusCode).toBe(200);
      expect(response.json<CsvImportResult>()).toEqual({ created: 2, updated: 0 });

      const entries = (
        await app.inject({ method: 'GET', url: '/api/time-entries' })
      ).json<TimeEntryListResponse>().entries;
      expect(entries.map((e) => [e.description, e.categoryName])).toEqual([
        ['Groceries', null],
        ['Write tests #dev', 'Work'],
      ]);
    });

    it('returns 400 and imports nothing when a row is invalid', async () => {
      const response = await postCsv(
        '/api/csv/import',
        `${SAMPLE}\n,Broken,2024-01-16 09:00,half past nine,`,
      );

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiErrorResponse>().error.message).toBe(
        "Invalid end_time 'half past nine' in row 3",
      );
      const entries = (
        await app.inject({ method: 'GET', url: '/api/time-entries' })
      ).json<TimeEntryListResponse>().entries;
      expect(entries).toEqual([]);
    });

    it('returns 413 when the file exceeds CSV_BODY_LIMIT', async () => {
      await app.close();
      process.env.CSV_BODY_LIMIT = '64';
      app = await buildApp();

      const response = await postCsv('/api/csv/import', SAMPLE);

      expect(response.statusCode).toBe(413);
      expect(response.json<ApiErrorResponse>().error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /api/csv/export', () => {
    it('downloads all entries as CSV', async () => {
      await postCsv('/api/csv/import', SAMPLE);

      const response = await app.inject({ method: 'GET', url: '/api/csv/export' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="time-entries.csv"',
      );
      expect(response.body).toBe(
        'id,description,start_time,end_time,category\n' +
          '1,Write tests #dev,2024-01-15T09:00:00.000Z,2024-01-15T10:30:00.000Z,Work\n' +
          '2,Groceries,2024-01-15T18:00:00.000Z,2024-01-15T18:45:00.000Z,\n',
      );
    });
  });

  describe('POST /api/csv/preview', () => {
    it('previews changes without writing', async () => {
      const response = await postCsv('/api/csv/preview', SAMPLE);

      expect(response.statusCode).toBe(200);
      const body = response.json<CsvPreviewResponse>();
      expect(body.entries.map((e) => [e.description, e.status])).toEqual([
        ['Write tests #dev', 'New'],
        ['Groceries', 'New'],
      ]);

      const entries = (
        await app.inject({ method: 'GET', url: '/api/time-entries' })
      ).json<TimeEntryListResponse>().entries;
      expect(entries).toEqual([]);
    });

    it('shows nothing to change after exporting and re-uploading', async () => {
      await postCsv('/api/csv/import', SAMPLE);
      const exported = (await app.inject({ method: 'GET', url: '/api/csv/export' })).body;

      const response = await postCsv('/api/csv/preview', exported);

      expect(response.json<CsvPreviewResponse>()).toEqual({ entries: [] });
    });

    it('returns 400 for a header without required columns', async () => {
      const response = await postCsv('/api/csv/preview', 'id,notes\n1,hello\n');

      expect(response.statusCode).toBe(400);
      expect(response.json<ApiErrorResponse>().error.message).toBe(
        'CSV header is missing required column(s): description, start_time',
      );
    });
  });
});
