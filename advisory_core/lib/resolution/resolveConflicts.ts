import type { ObservationGroup } from '../observations';
import { AuthorityRanking, updatedAtMillis } from './authority';
import type { Confidence, EnrichedAdvisory, RankedObservation } from './types';

type Selected<T> = {
    value: T;
    winner: RankedObservation;
};

const REJECTED = 'rejected';

/**
 * Reduces one identity's observations to a single enriched advisory. Every scalar is taken in
 * authority order; `fixAvailable` is a logical OR so a silent high-authority source never hides a
 * fix reported further down.
 */
export function resolveConflicts(group: ObservationGroup, ranking: AuthorityRanking = new AuthorityRanking()): EnrichedAdvisory {
    const ranked = ranking.rank(group.observations);
    const notes: string[] = [];

    const override = selectFirst(ranked, 'overrideStatus', (entry) => entry.observation.overrideStatus ?? null, notes);
    const overrideStatus = override?.value ?? null;

    const registry = ranked.filter((entry) => entry.role === 'registry');
    const rejectionStatus = selectFirst(registry, 'rejectionStatus', (entry) => normalizeText(entry.observation.rejectionStatus), notes)?.value ?? null;
    const isRejected = registry.some((entry) => isRejection(entry.observation.rejectionStatus));

    const fixAvailable = ranked.some((entry) => entry.observation.fixAvailable === true);
    const fixedVersion = resolveFixedVersion(ranked, notes);

    const severityScore = selectFirst(registry, 'severityScore', (entry) => entry.observation.severityScore ?? null, notes)?.value
        ?? selectFirst(ranked, 'severityScore', (entry) => entry.observation.severityScore ?? null, notes)?.value
        ?? null;

    const hasSignal = overrideStatus !== null
        || isRejected
        || fixAvailable
        || fixedVersion !== null
        || severityScore !== null;

    const contributingSources = uniqueSourceIds(ranked);

    const dissentingSources = uniqueSourceIds(ranked.filter((entry) => {
        const observation = entry.observation;

        if (typeof observation.fixAvailable === 'boolean' && observation.fixAvailable !== fixAvailable) {
            return true;
        }

        if (observation.overrideStatus && overrideStatus !== null && observation.overrideStatus !== overrideStatus) {
            return true;
        }

        return entry.role === 'registry'
            && normalizeText(observation.rejectionStatus) !== null
            && isRejection(observation.rejectionStatus) !== isRejected;
    }));

    return {
        advisoryId: group.identity.advisoryId,
        component: group.identity.component,
        vulnerabilityId: group.identity.vulnerabilityId,

        overrideStatus,
        overrideReason: override ? normalizeText(override.winner.observation.overrideReason) : null,
        overrideUpdatedAt: override ? normalizeText(override.winner.observation.sourceUpdatedAt) : null,
        isRejected,
        rejectionStatus,
        fixAvailable,
        fixedVersion,
        severityScore,
        hasSignal,
        confidence: computeConfidence({ overrideStatus, fixAvailable, fixedVersion, isRejected, severityScore }),

        sourceCount: contributingSources.length,
        contributingSources,
        dissentingSources,
        resolutionNotes: notes,
    };
}

export function computeConfidence(
    advisory: Pick<EnrichedAdvisory, 'overrideStatus' | 'fixAvailable' | 'fixedVersion' | 'isRejected' | 'severityScore'>,
): Confidence {
    if (advisory.overrideStatus !== null || (advisory.fixAvailable && advisory.fixedVersion !== null) || advisory.isRejected) {
        return 'high';
    }

    if (advisory.severityScore !== null) {
        return 'medium';
    }

    return 'low';
}

function resolveFixedVersion(ranked: RankedObservation[], notes: string[]): string | null {
    const confirmed = ranked.filter((entry) => entry.observation.fixAvailable === true);
    const fromConfirmed = selectFirst(confirmed, 'fixedVersion', (entry) => normalizeText(entry.observation.fixedVersion), notes);
    if (fromConfirmed) {
        return fromConfirmed.value;
    }

    const notDenied = ranked.filter((entry) => entry.observation.fixAvailable !== false);
    return selectFirst(notDenied, 'fixedVersion', (entry) => normalizeText(entry.observation.fixedVersion), notes)?.value ?? null;
}

function selectFirst<T extends string | number>(
    ranked: RankedObservation[],
    field: string,
    read: (entry: RankedObservation) => T | null,
    notes: string[],
): Selected<T> | null {
    const candidates: Array<Selected<T>> = [];
    for (const entry of ranked) {
        const value = read(entry);
        if (value !== null) {
            candidates.push({ value, winner: entry });
        }
    }

    const [first, ...rest] = candidates;
    if (!first) {
        return null;
    }

    const tied = rest.find((candidate) => candidate.winner.rank === first.winner.rank && candidate.value !== first.value);
    if (tied) {
        const byTimestamp = updatedAtMillis(first.winner.observation.sourceUpdatedAt)
            !== updatedAtMillis(tied.winner.observation.sourceUpdatedAt);

        notes.push(
            `${field}: ${first.winner.observation.sourceId} (${String(first.value)}) over `
            + `${tied.winner.observation.sourceId} (${String(tied.value)}) at rank ${first.winner.rank} `
            + `by ${byTimestamp ? 'latest sourceUpdatedAt' : 'source id order'}`,
        );
    }

    return first;
}

function isRejection(value: string | null | undefined): boolean {
    return normalizeText(value)?.toLowerCase() === REJECTED;
}

function uniqueSourceIds(ranked: RankedObservation[]): string[] {
    const seen = new Set<string>();
    const ordered: string[] = [];

    for (const entry of ranked) {
        if (!seen.has(entry.observation.sourceId)) {
            seen.add(entry.observation.sourceId);
            ordered.push(entry.observation.sourceId);
        }
    }

    return ordered;
}

function normalizeText(value: string | null | undefined): string | null {
    if (typeof value !== 'string') {
        return null;
    }

    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
}
