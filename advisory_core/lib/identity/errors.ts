export type IdentityGenerationErrorCode = 'INVALID_IDENTITY_INPUT' | 'MISSING_REQUIRED_FIELD';

export class IdentityGenerationError extends Error {
    readonly code: IdentityGenerationErrorCode;
    readonly field: string | null;

    constructor(code: IdentityGenerationErrorCode, message: string, field: string | null = null) {
        super(message);
        this.name = 'IdentityGenerationError';
        this.code = code;
        this.field = field;
    }
}
