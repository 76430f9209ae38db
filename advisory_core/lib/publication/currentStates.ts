import type { Confidence } from '../resolution';
import type { AdvisoryState } from '../observations';
import type { Evidence, StateType } from '../decisioning';
import type { AdvisoryStateRecord, HistoryStore } from '../history';

export interface PublishedAdvisoryState {
    advisoryId: string;
    vulnerabilityId: string;
    component: string | null;
    state: AdvisoryState;
    stateType: StateType;
    fixedVersion: string | null;
    confidence: Confidence;
    explanation: string;
    reasonCode: string;
    evidence: Evidence;
    contributingSources: string[];
    dissentingSources: string[];
    effectiveFrom: string;
    runId: string;
}

export interface VulnerabilityStateGroup {
    vulnerabilityId: string;
    advisoryCount: number;
    stateCounts: Partial<Record<AdvisoryState, number>>;
    advisories: PublishedAdvisoryState[];
}

/** Read-only projection of every current record, ordered by advisory id. */
export async function projectCurrentStates(store: Pick<HistoryStore, 'listCurrent'>): Promise<PublishedAdvisoryState[]> {
    const current = await store.listCurrent();

    return current
        .filter((record) => record.isCurrent)
        .map(toPublishedState)
        .sort((left, right) => left.advisoryId.localeCompare(right.advisoryId));
}

export function toPublishedState(record: AdvisoryStateRecord): PublishedAdvisoryState {
    return {
        advisoryId: record.advisoryId,
        vulnerabilityId: record.vulnerabilityId,
        component: record.component,
        state: record.state,
        stateType: record.stateType,
        fixedVersion: record.fixedVersion,
        confidence: record.confidence,
        explanation: record.explanation,
        reasonCode: record.reasonCode,
        evidence: { ...record.evidence },
        contributingSources: [...record.contributingSources],
        dissentingSources: [...record.dissentingSources],
        effectiveFrom: record.effectiveFrom,
        runId: record.runId,
    };
}

export function groupCurrentStatesByVulnerability(rows: readonly PublishedAdvisoryState[]): VulnerabilityStateGroup[] {
    const groups = new Map<string, PublishedAdvisoryState[]>();

    for (const row of rows) {
        const bucket = groups.get(row.vulnerabilityId);
        if (bucket) {
            bucket.push(row);
        } else {
            groups.set(row.vulnerabilityId, [row]);
        }
    }

    return Array.from(groups.entries())
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([vulnerabilityId, advisories]) => {
            const stateCounts: Partial<Record<AdvisoryState, number>> = {};
            for (const advisory of advisories) {
                stateCounts[advisory.state] = (stateCounts[advisory.state] ?? 0) + 1;
            }

            return {
                vulnerabilityId,
                advisoryCount: advisories.length,
                stateCounts,
                advisories: [...advisories].sort((left, right) => left.advisoryId.localeCompare(right.advisoryId)),
            };
        });
}
