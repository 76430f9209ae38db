export { AuthorityRanking, DEFAULT_AUTHORITY_TABLE, compareByAuthority, validateAuthorityTable } from './authority';
export { AuthorityConfigurationError } from './errors';
export type { AuthorityConfigurationErrorCode } from './errors';
export { computeConfidence, resolveConflicts } from './resolveConflicts';
export { AUTHORITY_ROLES } from './types';
export type {
    AuthorityEntry,
    AuthorityRole,
    AuthorityTable,
    Confidence,
    EnrichedAdvisory,
    RankedObservation,
} from './types';
