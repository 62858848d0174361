/**
 * Result Log Module
 *
 * Append-only, per-quiz log of attempt records persisted through the
 * storage port. The whole log lives under one key and is rewritten on every
 * append, so the storage adapter's write is the unit of atomicity.
 */

import type { IResultHistory } from '@/ports/IResultHistory';
import type { IStorageAdapter } from '@/ports/IStorageAdapter';
import { ResultLogError } from './errors';
import type { AttemptRecord, StoredResultLog } from './types';
import { RESULT_LOG_VERSION } from './types';

const RESULT_KEY_PREFIX = 'results';

/**
 * Hash a string using djb2, as an 8 character hex string
 */
function hashString(str: string): string {
  let hash = 5381;
  for (let i = 0; i < str.length; i++) {
    hash = (hash << 5) + hash + str.charCodeAt(i);
    hash = hash & hash;
  }
  return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * Storage key for a quiz's result log
 */
export function getResultLogKey(quizName: string): string {
  const slug = quizName
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return `${RESULT_KEY_PREFIX}/${slug || 'quiz'}-${hashString(quizName.trim())}`;
}

function isScore(value: unknown): value is number | null {
  return value === null || (typeof value === 'number' && value >= 0 && value <= 1);
}

function isResponse(value: unknown): value is string | string[] | undefined {
  return (
    value === undefined ||
    typeof value === 'string' ||
    (Array.isArray(value) && value.every((line) => typeof line === 'string'))
  );
}

function toRecord(value: unknown, questionId: string): AttemptRecord {
  if (typeof value !== 'object' || value === null) {
    throw new ResultLogError(`Malformed record for question '${questionId}'`, 'INVALID_RECORD');
  }

  const fields = new Map<string, unknown>(Object.entries(value));
  const timestamp = fields.get('timestamp');
  const score = fields.get('score');
  const elapsedSeconds = fields.get('elapsedSeconds');
  const isCorrection = fields.get('isCorrection');
  const response = fields.get('response');
  const timedOut = fields.get('timedOut');
  if (
    typeof timestamp !== 'number' ||
    !isScore(score) ||
    typeof elapsedSeconds !== 'number' ||
    typeof isCorrection !== 'boolean' ||
    !isResponse(response) ||
    (timedOut !== undefined && typeof timedOut !== 'boolean')
  ) {
    throw new ResultLogError(`Malformed record for question '${questionId}'`, 'INVALID_RECORD');
  }

  const record: AttemptRecord = { questionId, timestamp, score, elapsedSeconds, isCorrection };
  if (response !== undefined) record.response = response;
  if (timedOut !== undefined) record.timedOut = timedOut;
  return record;
}

function parseStoredLog(data: unknown, quizName: string): Map<string, AttemptRecord[]> {
  const records = new Map<string, AttemptRecord[]>();
  if (data === null || data === undefined) return records;

  if (typeof data !== 'object' || !('version' in data) || !('records' in data)) {
    throw new ResultLogError(`Result log for '${quizName}' is not a result log`, 'INVALID_RECORD');
  }
  if (data.version !== RESULT_LOG_VERSION) {
    throw new ResultLogError(
      `Result log for '${quizName}' has version ${String(data.version)}, expected ${RESULT_LOG_VERSION}`,
      'UNSUPPORTED_VERSION',
    );
  }

  const stored = data.records;
  if (typeof stored !== 'object' || stored === null) {
    throw new ResultLogError(`Result log for '${quizName}' has no records`, 'INVALID_RECORD');
  }

  for (const [questionId, list] of Object.entries(stored)) {
    if (!Array.isArray(list)) {
      throw new ResultLogError(`Malformed records for question '${questionId}'`, 'INVALID_RECORD');
    }
    records.set(
      questionId,
      list.map((value) => toRecord(value, questionId)),
    );
  }
  return records;
}

/**
 * Append-only result log for one quiz
 */
export class ResultLog implements IResultHistory {
  private constructor(
    private readonly storage: IStorageAdapter,
    private readonly quizName: string,
    private records: Map<string, AttemptRecord[]>,
  ) {}

  /**
   * Load the log for a quiz; empty when none was stored yet
   *
   * @throws ResultLogError when the stored log has another version or is malformed
   */
  static async open(storage: IStorageAdapter, quizName: string): Promise<ResultLog> {
    const data = await storage.read(getResultLogKey(quizName));
    return new ResultLog(storage, quizName, parseStoredLog(data, quizName));
  }

  get name(): string {
    return this.quizName;
  }

  history(questionId: string): readonly AttemptRecord[] {
    return this.records.get(questionId) ?? [];
  }

  questionIds(): string[] {
    return Array.from(this.records.keys());
  }

  /**
   * Every record, oldest first
   */
  allRecords(): AttemptRecord[] {
    return Array.from(this.records.values())
      .flat()
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  /**
   * Append a record and persist the whole log.
   *
   * Resolves once the storage write has resolved. If the write fails the
   * in-memory log is unchanged and a ResultLogError is thrown.
   */
  async append(record: AttemptRecord): Promise<void> {
    if (!isScore(record.score)) {
      throw new ResultLogError(
        `Score ${String(record.score)} for question '${record.questionId}' is outside [0, 1]`,
        'INVALID_RECORD',
      );
    }

    const next = new Map(this.records);
    next.set(record.questionId, [...this.history(record.questionId), { ...record }]);

    try {
      await this.storage.write(getResultLogKey(this.quizName), this.serialize(next));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ResultLogError(`Failed to write result log for '${this.quizName}': ${reason}`, 'WRITE_FAILED', {
        cause: error,
      });
    }

    this.records = next;
  }

  /**
   * Append a corrective record forcing the score of the latest attempt.
   * Prior records are never changed.
   */
  async recordOverride(questionId: string, forcedScore: number, now: number = Date.now()): Promise<AttemptRecord> {
    const record: AttemptRecord = {
      questionId,
      timestamp: now,
      score: forcedScore,
      elapsedSeconds: 0,
      isCorrection: true,
    };
    await this.append(record);
    return record;
  }

  private serialize(records: Map<string, AttemptRecord[]>): StoredResultLog {
    return {
      version: RESULT_LOG_VERSION,
      quiz: this.quizName,
      records: Object.fromEntries(records),
      lastUpdated: Date.now(),
    };
  }
}
