import type { Decision } from '../lib/decisioning';
import type { SourceObservation } from '../lib/observations';
import type { EnrichedAdvisory } from '../lib/resolution';

export const OBSERVED_AT = '2024-03-01T00:00:00.000Z';

export function observation(overrides: Partial<SourceObservation> & { sourceId: string }): SourceObservation {
    return {
        component: 'lodash',
        vulnerabilityId: 'CVE-2024-0001',
        observedAt: OBSERVED_AT,
        ...overrides,
    };
}

export function enrichedAdvisory(overrides: Partial<EnrichedAdvisory> = {}): EnrichedAdvisory {
    return {
        advisoryId: 'lodash:CVE-2024-0001',
        component: 'lodash',
        vulnerabilityId: 'CVE-2024-0001',
        overrideStatus: null,
        overrideReason: null,
        overrideUpdatedAt: null,
        isRejected: false,
        rejectionStatus: null,
        fixAvailable: false,
        fixedVersion: null,
        severityScore: null,
        hasSignal: false,
        confidence: 'low',
        sourceCount: 1,
        contributingSources: ['base_corpus'],
        dissentingSources: [],
        resolutionNotes: [],
        ...overrides,
    };
}

export function decision(overrides: Partial<Decision> = {}): Decision {
    return {
        state: 'pending_upstream',
        stateType: 'non_final',
        fixedVersion: null,
        confidence: 'medium',
        reasonCode: 'AWAITING_FIX',
        explanation: 'No fix currently available upstream. Sources consulted: nvd.',
        evidence: { applied_rule: 'R6' },
        decisionRuleId: 'R6',
        contributingSources: ['nvd'],
        dissentingSources: [],
        ...overrides,
    };
}
