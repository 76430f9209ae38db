export class HistoryWriteConflictError extends Error {
    readonly code = 'WRITE_CONFLICT';
    readonly advisoryId: string;
    readonly attempts: number;

    constructor(advisoryId: string, attempts: number) {
        super(`History write for ${advisoryId} still conflicted after ${attempts} attempts.`);
        this.name = 'HistoryWriteConflictError';
        this.advisoryId = advisoryId;
        this.attempts = attempts;
    }
}

export type HistoryStoreErrorCode = 'STORE_UNAVAILABLE' | 'STORE_REQUEST_FAILED' | 'INVALID_DOCUMENT';

export class HistoryStoreError extends Error {
    readonly code: HistoryStoreErrorCode;

    constructor(code: HistoryStoreErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'HistoryStoreError';
        this.code = code;
    }
}
