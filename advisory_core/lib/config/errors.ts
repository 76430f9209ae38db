export type PipelineConfigErrorCode =
    | 'UNREADABLE_FILE'
    | 'INVALID_JSON'
    | 'INVALID_CONFIG'
    | 'INVALID_RULES'
    | 'INVALID_AUTHORITY'
    | 'MISSING_CREDENTIALS';

export class PipelineConfigError extends Error {
    readonly code: PipelineConfigErrorCode;

    constructor(code: PipelineConfigErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PipelineConfigError';
        this.code = code;
    }
}
