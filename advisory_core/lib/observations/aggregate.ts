import { IdentityGenerationError, canonicalizeAdvisoryIdentity } from '../identity';
import type { AdvisoryIdentity } from '../identity';
import { SOURCE_IDS } from './sources';
import type { AggregationResult, DroppedObservation, ObservationGroup, SourceObservation } from './types';

export interface AggregationOptions {
    /** Sources whose vulnerability-only observations also apply to every component advisory of that CVE. */
    vulnerabilityWideSources?: readonly string[];
}

/**
 * Groups one run's observations by canonical advisory identity. No field values are merged here;
 * observations without a usable vulnerability id are dropped and counted.
 */
export function aggregateObservations(
    observations: readonly SourceObservation[],
    options: AggregationOptions = {},
): AggregationResult {
    const groups = new Map<string, ObservationGroup>();
    const dropped: DroppedObservation[] = [];
    const wideSources = new Set(options.vulnerabilityWideSources ?? [SOURCE_IDS.registry]);
    const vulnerabilityWide: Array<{ identity: AdvisoryIdentity; observation: SourceObservation }> = [];

    for (let position = 0; position < observations.length; position += 1) {
        const observation = observations[position];

        const resolved = resolveIdentity(observation, position);
        if ('reason' in resolved) {
            dropped.push(resolved);
            continue;
        }

        if (resolved.component === null && wideSources.has(observation.sourceId)) {
            vulnerabilityWide.push({ identity: resolved, observation });
        }

        addToGroup(groups, resolved, observation);
    }

    // The CVE-only group stays; component groups of the same CVE receive the observation as well.
    for (const wide of vulnerabilityWide) {
        for (const group of Array.from(groups.values())) {
            if (group.identity.component !== null && group.identity.vulnerabilityId === wide.identity.vulnerabilityId) {
                addToGroup(groups, group.identity, wide.observation);
            }
        }
    }

    return {
        groups,
        dropped,
        droppedCount: dropped.length,
    };
}

function addToGroup(groups: Map<string, ObservationGroup>, identity: AdvisoryIdentity, observation: SourceObservation): void {
    const existing = groups.get(identity.advisoryId);
    if (existing) {
        existing.observations.push(observation);
        existing.sourceIds.add(observation.sourceId);
        return;
    }

    groups.set(identity.advisoryId, {
        identity,
        observations: [observation],
        sourceIds: new Set([observation.sourceId]),
    });
}

function resolveIdentity(observation: SourceObservation, position: number): AdvisoryIdentity | DroppedObservation {
    try {
        return canonicalizeAdvisoryIdentity({
            component: observation.component,
            vulnerabilityId: observation.vulnerabilityId,
        });
    } catch (error) {
        if (!(error instanceof IdentityGenerationError)) {
            throw error;
        }

        return {
            position,
            sourceId: observation.sourceId,
            reason: error.field === 'vulnerabilityId' ? 'MISSING_VULNERABILITY_ID' : 'INVALID_IDENTITY',
            message: error.message,
        };
    }
}
