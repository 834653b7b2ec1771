/**
 * Vocabulary topic files: listing, loading one file, syncing the whole directory.
 *
 * Loading is insert-if-absent. A row whose (vietnamese, english) pair is already
 * stored is skipped and the stored card is left untouched.
 */

import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { CardRepository } from '@/repositories/card.repository';
import { REQUIRED_VOCAB_COLUMNS, TopicFilenameSchema, VocabRowSchema } from '@/schemas/topic.schemas';
import { AppError, type ErrorCode, NotFoundError, ValidationError } from '@/utils/errors';
import { parseCsv } from '@/utils/csv';
import { logger, serializeError } from '@/utils/logger';
import { canonicalText } from './card.service';

export interface TopicInfo {
  /** Display name, e.g. "Common Words" for common_words.csv */
  name: string;
  filename: string;
}

export interface RowRejection {
  row: number;
  reason: string;
}

export interface TopicLoadResult {
  filename: string;
  /** Category given to rows that do not name one */
  category: string;
  inserted: number;
  skipped: number;
  rejected: number;
  errors: RowRejection[];
}

export interface TopicLoadFailure {
  filename: string;
  error: { code: ErrorCode; message: string };
}

export interface SyncAllResult {
  files: Record<string, TopicLoadResult | TopicLoadFailure>;
  totals: {
    files: number;
    failed: number;
    inserted: number;
    skipped: number;
    rejected: number;
  };
}

function stem(filename: string): string {
  return path.basename(filename, path.extname(filename));
}

/** "common_words.csv" -> "common words" */
export function topicCategory(filename: string): string {
  return stem(filename).replace(/[_-]/g, ' ').trim();
}

/** "common_words.csv" -> "Common Words" */
export function topicDisplayName(filename: string): string {
  return topicCategory(filename).replace(/(^|\s)(\S)/g, (_match, space: string, letter: string) => space + letter.toUpperCase());
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isLoadFailure(outcome: TopicLoadResult | TopicLoadFailure): outcome is TopicLoadFailure {
  return 'error' in outcome;
}

export class VocabLoaderService {
  constructor(
    private readonly cards: CardRepository,
    private readonly vocabDir: string
  ) {}

  async listTopicFiles(): Promise<TopicInfo[]> {
    const entries = await fs.readdir(this.vocabDir, { withFileTypes: true }).catch((error: unknown): Dirent[] => {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    });
    return entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.csv'))
      .map((entry) => entry.name)
      .sort()
      .map((filename) => ({ name: topicDisplayName(filename), filename }));
  }

  /**
   * Load one topic file. With clearExisting === true every stored card is deleted
   * first; the wipe and the inserts commit together.
   */
  async loadTopic(filename: string, options: { clearExisting?: boolean } = {}): Promise<TopicLoadResult> {
    const parsedName = TopicFilenameSchema.safeParse(filename);
    if (!parsedName.success) {
      throw new ValidationError(
        'Invalid topic filename',
        parsedName.error.issues.map((issue) => ({ path: 'filename', message: issue.message }))
      );
    }
    const name = parsedName.data;
    const table = parseCsv(await this.readTopicFile(name));

    const missingColumns = table.records.length > 0
      ? REQUIRED_VOCAB_COLUMNS.filter((column) => !table.headers.includes(column))
      : [];
    if (missingColumns.length > 0) {
      throw new ValidationError(`Vocabulary file "${name}" is missing required column(s): ${missingColumns.join(', ')}`);
    }

    const defaultCategory = topicCategory(name);

    const result = await this.cards.transaction(async (repository) => {
      if (options.clearExisting === true) {
        const removed = await repository.deleteAll();
        logger.warn('Cleared all cards before loading topic', { filename: name, removed });
      }

      const outcome: TopicLoadResult = {
        filename: name,
        category: defaultCategory,
        inserted: 0,
        skipped: 0,
        rejected: 0,
        errors: [],
      };

      for (const record of table.records) {
        const parsed = VocabRowSchema.safeParse({
          vietnamese: record.values.vietnamese ?? '',
          english: record.values.english ?? '',
          category: record.values.category ?? '',
          difficulty_level: record.values.difficulty_level ?? '',
        });
        if (!parsed.success) {
          outcome.rejected += 1;
          outcome.errors.push({
            row: record.row,
            reason: parsed.error.issues.map((issue) => issue.message).join('; '),
          });
          continue;
        }

        const row = parsed.data;
        const { inserted } = await repository.insertIfAbsent({
          vietnamese: canonicalText(row.vietnamese),
          english: canonicalText(row.english),
          category: canonicalText(row.category) || defaultCategory,
          difficulty_level: row.difficulty_level,
        });
        if (inserted) {
          outcome.inserted += 1;
        } else {
          outcome.skipped += 1;
        }
      }

      return outcome;
    });

    logger.info('Topic loaded', {
      filename: name,
      inserted: result.inserted,
      skipped: result.skipped,
      rejected: result.rejected,
    });
    return result;
  }

  /**
   * Load every topic file. A file that cannot be loaded is reported under its
   * name and the remaining files are still processed.
   */
  async syncAllTopics(): Promise<SyncAllResult> {
    const created = await fs.mkdir(this.vocabDir, { recursive: true });
    if (created) {
      logger.info('Created vocabulary directory', { vocabDir: this.vocabDir });
    }

    const result: SyncAllResult = {
      files: {},
      totals: { files: 0, failed: 0, inserted: 0, skipped: 0, rejected: 0 },
    };

    for (const topic of await this.listTopicFiles()) {
      result.totals.files += 1;
      try {
        const outcome = await this.loadTopic(topic.filename);
        result.files[topic.filename] = outcome;
        result.totals.inserted += outcome.inserted;
        result.totals.skipped += outcome.skipped;
        result.totals.rejected += outcome.rejected;
      } catch (error) {
        if (!(error instanceof AppError)) {
          throw error;
        }
        logger.warn('Topic file skipped during sync', {
          filename: topic.filename,
          error: serializeError(error),
        });
        result.totals.failed += 1;
        result.files[topic.filename] = {
          filename: topic.filename,
          error: { code: error.code, message: error.message },
        };
      }
    }

    logger.info('Vocabulary sync finished', { ...result.totals });
    return result;
  }

  private async readTopicFile(filename: string): Promise<string> {
    const filePath = path.join(this.vocabDir, filename);
    try {
      return await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw new NotFoundError(`Vocabulary file "${filename}"`);
      }
      logger.error('Vocabulary file could not be read', { filePath, error: serializeError(error) });
      throw new AppError(500, `Vocabulary file "${filename}" could not be read`, true, 'INTERNAL');
    }
  }
}
