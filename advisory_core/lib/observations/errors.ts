export type ObservationValidationErrorCode = 'INVALID_BATCH' | 'INVALID_FEED_RECORD';

export class ObservationValidationError extends Error {
    readonly code: ObservationValidationErrorCode;

    constructor(code: ObservationValidationErrorCode, message: string) {
        super(message);
        this.name = 'ObservationValidationError';
        this.code = code;
    }
}
