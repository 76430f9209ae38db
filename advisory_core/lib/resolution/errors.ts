export type AuthorityConfigurationErrorCode = 'EMPTY_TABLE' | 'DUPLICATE_SOURCE' | 'INVALID_RANK';

export class AuthorityConfigurationError extends Error {
    readonly code: AuthorityConfigurationErrorCode;

    constructor(code: AuthorityConfigurationErrorCode, message: string) {
        super(message);
        this.name = 'AuthorityConfigurationError';
        this.code = code;
    }
}
