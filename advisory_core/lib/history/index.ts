export { HistoryStoreError, HistoryWriteConflictError } from './errors';
export type { HistoryStoreErrorCode } from './errors';
export { KeyedLock } from './keyedLock';
export { DEFAULT_MAX_WRITE_ATTEMPTS, StateHistoryManager, currentRecordOf, hasChanged } from './stateHistoryManager';
export type { StateHistoryManagerOptions } from './stateHistoryManager';
export type {
    AdvisoryHistoryDocument,
    AdvisoryStateRecord,
    CommitOutcome,
    HistoryInvariantReport,
    HistoryInvariantViolation,
    HistoryInvariantViolationKind,
    HistoryStore,
    HistoryWriteResult,
    StoreRevision,
    StoredHistory,
} from './types';
export { verifyHistoryInvariants } from './verifyInvariants';
