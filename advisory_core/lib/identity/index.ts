export { buildCanonicalHash, stableStringify } from './canonicalHash';
export {
    canonicalizeAdvisoryIdentity,
    generateHistoryRecordId,
    identityFromAdvisoryId,
    tryCanonicalizeAdvisoryIdentity,
} from './generateIds';
export { IdentityGenerationError } from './errors';
export type { IdentityGenerationErrorCode } from './errors';
export { IDENTITY_CONTRACT_VERSION } from './types';
export type { AdvisoryIdentity, AdvisoryIdentityInput, CanonicalHashInput, HistoryRecordIdentityInput } from './types';
