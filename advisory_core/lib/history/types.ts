import type { Decision, TransitionAssessment } from '../decisioning';

/** One immutable version of an advisory's state. Only `effectiveTo` and `isCurrent` change, on close. */
export interface AdvisoryStateRecord extends Decision {
    recordId: string;
    advisoryId: string;
    component: string | null;
    vulnerabilityId: string;
    effectiveFrom: string;
    effectiveTo: string | null;
    isCurrent: boolean;
    runId: string;
}

/**
 * Arena of every version recorded for one advisory, with the index of the current one. Stores
 * persist it as a single document so closing the old version and adding the new one commit
 * together.
 */
export interface AdvisoryHistoryDocument {
    advisoryId: string;
    records: AdvisoryStateRecord[];
    currentIndex: number | null;
}

export interface StoreRevision {
    seqNo: number;
    primaryTerm: number;
}

export interface StoredHistory {
    document: AdvisoryHistoryDocument;
    revision: StoreRevision;
}

export type CommitOutcome = 'committed' | 'conflict';

export interface HistoryStore {
    read(advisoryId: string): Promise<StoredHistory | null>;
    /** Compare-and-set: `expected` null means the document must not exist yet. */
    commit(document: AdvisoryHistoryDocument, expected: StoreRevision | null): Promise<CommitOutcome>;
    listCurrent(): Promise<AdvisoryStateRecord[]>;
    listAdvisoryIds(): Promise<string[]>;
    ping(): Promise<void>;
}

export interface HistoryWriteResult {
    advisoryId: string;
    written: boolean;
    previous: AdvisoryStateRecord | null;
    current: AdvisoryStateRecord;
    transition: TransitionAssessment | null;
    attempts: number;
}

export type HistoryInvariantViolationKind =
    | 'MULTIPLE_CURRENT'
    | 'CURRENT_INDEX_MISMATCH'
    | 'CURRENT_NOT_OPEN'
    | 'CLOSED_NOT_ENDED'
    | 'CLOSED_AFTER_CURRENT';

export interface HistoryInvariantViolation {
    advisoryId: string;
    kind: HistoryInvariantViolationKind;
    recordId: string | null;
    message: string;
}

export interface HistoryInvariantReport {
    ok: boolean;
    advisoriesChecked: number;
    violations: HistoryInvariantViolation[];
}
