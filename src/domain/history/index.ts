export type { AttemptRecord, ResultRow, ResultSort, StoredResultLog } from './types';
export { RESULT_LOG_VERSION, RESULT_SORTS } from './types';
export { ResultLogError } from './errors';
export type { ResultLogErrorCode } from './errors';
export { effectiveAttempts, aggregateScore, historyFromRecords, EMPTY_HISTORY } from './attempts';
export { ResultLog, getResultLogKey } from './ResultLog';
export { buildResultRows, sortResultRows, summarizeResults } from './summarizeResults';
