export const IDENTITY_CONTRACT_VERSION = '1.0';

export interface AdvisoryIdentityInput {
    component?: string | null;
    vulnerabilityId?: string | null;
}

/**
 * Canonical key of one advisory. `advisoryId` is `component:vulnerabilityId` when a component is
 * known, otherwise the vulnerability id alone.
 */
export interface AdvisoryIdentity {
    advisoryId: string;
    component: string | null;
    vulnerabilityId: string;
}

export interface HistoryRecordIdentityInput {
    advisoryId: string;
    runId: string;
    effectiveFrom: string;
}

export type CanonicalHashInput = Record<string, unknown>;
