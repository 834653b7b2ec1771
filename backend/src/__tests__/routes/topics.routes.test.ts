/**
 * Tests for vocabulary topic routes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import request from 'supertest';
import express from 'express';
import { createTopicsRouter } from '@/routes/topics.routes';
import { createErrorHandler } from '@/middleware/errorHandler';
import { VocabLoaderService } from '@/services/vocab-loader.service';
import { MemoryCardRepository } from '@/repositories/memory-card.repository';

vi.mock('@/utils/logger', () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  serializeError: (error: unknown) => ({ message: String(error) }),
}));

describe('Topic routes', () => {
  let vocabDir: string;
  let repository: MemoryCardRepository;
  let app: express.Express;

  beforeEach(async () => {
    vocabDir = await fs.mkdtemp(path.join(os.tmpdir(), 'topics-'));
    await fs.writeFile(path.join(vocabDir, 'family.csv'), 'vietnamese,english\nmẹ,mother\nbố,father\n', 'utf8');
    await fs.writeFile(path.join(vocabDir, 'time.csv'), 'vietnamese,english,category\nhôm nay,today,\nbây giờ,now,daily\n', 'utf8');

    repository = new MemoryCardRepository();
    app = express();
    app.use(express.json());
    app.use('/api/topics', createTopicsRouter({ vocabLoader: new VocabLoaderService(repository, vocabDir) }));
    app.use(createErrorHandler({ NODE_ENV: 'test' }));
  });

  afterEach(async () => {
    await fs.rm(vocabDir, { recursive: true, force: true });
  });

  it('GET /api/topics lists the files', async () => {
    const res = await request(app).get('/api/topics');

    expect(res.body).toEqual({
      success: true,
      data: [
        { name: 'Family', filename: 'family.csv' },
        { name: 'Time', filename: 'time.csv' },
      ],
    });
  });

  describe('POST /api/topics/load', () => {
    it('loads one file', async () => {
      const res = await request(app).post('/api/topics/load').send({ filename: 'time.csv' });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({
        filename: 'time.csv',
        category: 'time',
        inserted: 2,
        skipped: 0,
        rejected: 0,
        errors: [],
      });
      expect(await repository.listCategories()).toEqual(['daily', 'time']);
    });

    it('wipes existing cards when clearExisting is true', async () => {
      await request(app).post('/api/topics/load').send({ filename: 'family.csv' });
      await request(app).post('/api/topics/load').send({ filename: 'time.csv', clearExisting: true });

      expect(await repository.listCategories()).toEqual(['daily', 'time']);
    });

    it('rejects path traversal', async () => {
      const res = await request(app).post('/api/topics/load').send({ filename: '../family.csv' });

      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_ARGUMENT');
    });

    it('rejects a non-boolean clearExisting', async () => {
      const res = await request(app).post('/api/topics/load').send({ filename: 'time.csv', clearExisting: 'yes' });

      expect(res.status).toBe(400);
      expect(res.body.details[0].path).toBe('clearExisting');
    });

    it('returns 404 for a missing file', async () => {
      const res = await request(app).post('/api/topics/load').send({ filename: 'numbers.csv' });

      expect(res.status).toBe(404);
      expect(res.body.error).toBe('Vocabulary file "numbers.csv" not found');
    });
  });

  it('POST /api/topics/sync loads every file', async () => {
    const res = await request(app).post('/api/topics/sync');

    expect(res.status).toBe(200);
    expect(res.body.data.totals).toEqual({ files: 2, failed: 0, inserted: 4, skipped: 0, rejected: 0 });
    expect(Object.keys(res.body.data.files)).toEqual(['family.csv', 'time.csv']);
  });
});
