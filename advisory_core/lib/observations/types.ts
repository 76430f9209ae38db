import type { AdvisoryIdentity } from '../identity';

export const ADVISORY_STATES = [
    'fixed',
    'not_applicable',
    'wont_fix',
    'pending_upstream',
    'under_investigation',
] as const;

export type AdvisoryState = typeof ADVISORY_STATES[number];

/**
 * One normalized signal from one provider about one advisory, produced by the ingestion
 * adapters. Every signal field is optional: an observation with none of them means the source
 * knows the advisory exists and has nothing more to say.
 */
export interface SourceObservation {
    sourceId: string;
    component?: string | null;
    vulnerabilityId?: string | null;
    observedAt: string;
    sourceUpdatedAt?: string | null;

    overrideStatus?: AdvisoryState | null;
    overrideReason?: string | null;
    rejectionStatus?: string | null;
    fixAvailable?: boolean | null;
    fixedVersion?: string | null;
    severityScore?: number | null;
    notes?: string | null;

    rawPayload?: Record<string, unknown>;
}

export interface ObservationGroup {
    identity: AdvisoryIdentity;
    observations: SourceObservation[];
    sourceIds: Set<string>;
}

export type DropReason = 'MISSING_VULNERABILITY_ID' | 'INVALID_IDENTITY';

export interface DroppedObservation {
    position: number;
    sourceId: string;
    reason: DropReason;
    message: string;
}

export interface AggregationResult {
    groups: Map<string, ObservationGroup>;
    dropped: DroppedObservation[];
    droppedCount: number;
}

export interface ObservationIssue {
    position: number;
    path: string;
    message: string;
}

export interface ParsedObservationBatch {
    observations: SourceObservation[];
    issues: ObservationIssue[];
}
