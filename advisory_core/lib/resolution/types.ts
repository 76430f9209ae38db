import type { AdvisoryState, SourceObservation } from '../observations';

export const AUTHORITY_ROLES = ['override', 'registry', 'fix_feed', 'corpus'] as const;

export type AuthorityRole = typeof AUTHORITY_ROLES[number];

export interface AuthorityEntry {
    sourceId: string;
    rank: number;
    role: AuthorityRole;
}

/** Lower rank means higher authority. */
export type AuthorityTable = readonly AuthorityEntry[];

export type Confidence = 'high' | 'medium' | 'low';

export interface RankedObservation {
    observation: SourceObservation;
    rank: number;
    role: AuthorityRole;
    position: number;
}

export interface EnrichedAdvisory {
    advisoryId: string;
    component: string | null;
    vulnerabilityId: string;

    overrideStatus: AdvisoryState | null;
    overrideReason: string | null;
    overrideUpdatedAt: string | null;
    isRejected: boolean;
    rejectionStatus: string | null;
    fixAvailable: boolean;
    fixedVersion: string | null;
    severityScore: number | null;
    hasSignal: boolean;
    confidence: Confidence;

    sourceCount: number;
    contributingSources: string[];
    dissentingSources: string[];
    resolutionNotes: string[];
}
