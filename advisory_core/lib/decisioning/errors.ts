export type RuleConfigurationErrorCode =
    | 'EMPTY_RULE_SET'
    | 'DUPLICATE_RULE_ID'
    | 'DUPLICATE_PRIORITY'
    | 'UNKNOWN_STATE'
    | 'MISSING_DEFAULT_RULE'
    | 'INVALID_RULE_TABLE'
    | 'RULE_CHAIN_EXHAUSTED';

export class RuleConfigurationError extends Error {
    readonly code: RuleConfigurationErrorCode;

    constructor(code: RuleConfigurationErrorCode, message: string) {
        super(message);
        this.name = 'RuleConfigurationError';
        this.code = code;
    }
}
