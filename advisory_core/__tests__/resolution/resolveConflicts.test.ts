import { canonicalizeAdvisoryIdentity } from '../../lib/identity';
import type { ObservationGroup, SourceObservation } from '../../lib/observations';
import { AuthorityRanking, computeConfidence, resolveConflicts } from '../../lib/resolution';

const OBSERVED_AT = '2024-03-01T00:00:00.000Z';

function groupOf(observations: Array<Partial<SourceObservation> & { sourceId: string }>): ObservationGroup {
    const full = observations.map((entry) => ({
        component: 'lodash',
        vulnerabilityId: 'CVE-2024-0001',
        observedAt: OBSERVED_AT,
        ...entry,
    }));

    return {
        identity: canonicalizeAdvisoryIdentity({ component: 'lodash', vulnerabilityId: 'CVE-2024-0001' }),
        observations: full,
        sourceIds: new Set(full.map((entry) => entry.sourceId)),
    };
}

describe('resolveConflicts', () => {
    it('ORs fix availability so a lower-authority fix is not hidden', () => {
        const advisory = resolveConflicts(groupOf([
            { sourceId: 'csv_override', fixAvailable: false },
            { sourceId: 'base_corpus', fixAvailable: true, fixedVersion: '1.2.3' },
        ]));

        expect(advisory.fixAvailable).toBe(true);
        expect(advisory.fixedVersion).toBe('1.2.3');
        expect(advisory.contributingSources).toEqual(['csv_override', 'base_corpus']);
        expect(advisory.dissentingSources).toEqual(['csv_override']);
        expect(advisory.confidence).toBe('high');
        expect(advisory.resolutionNotes).toEqual([]);
    });

    it('takes the override status from the highest-authority source', () => {
        const advisory = resolveConflicts(groupOf([
            { sourceId: 'base_corpus', overrideStatus: 'fixed' },
            { sourceId: 'csv_override', overrideStatus: 'not_applicable', overrideReason: 'vendored copy unused', sourceUpdatedAt: '2024-02-01T00:00:00Z' },
        ]));

        expect(advisory.overrideStatus).toBe('not_applicable');
        expect(advisory.overrideReason).toBe('vendored copy unused');
        expect(advisory.overrideUpdatedAt).toBe('2024-02-01T00:00:00Z');
        expect(advisory.dissentingSources).toEqual(['base_corpus']);
    });

    it('prefers registry severity over other sources', () => {
        const advisory = resolveConflicts(groupOf([
            { sourceId: 'osv', severityScore: 9.8 },
            { sourceId: 'nvd', severityScore: 5 },
        ]));

        expect(advisory.severityScore).toBe(5);
        expect(advisory.hasSignal).toBe(true);
        expect(advisory.confidence).toBe('medium');
    });

    it('falls back to any ranked severity without a registry value', () => {
        const advisory = resolveConflicts(groupOf([{ sourceId: 'osv', severityScore: 9.8 }]));

        expect(advisory.severityScore).toBe(9.8);
    });

    it('reads rejection from registry sources only', () => {
        const rejected = resolveConflicts(groupOf([{ sourceId: 'nvd', rejectionStatus: 'Rejected' }]));
        expect(rejected.isRejected).toBe(true);
        expect(rejected.rejectionStatus).toBe('Rejected');
        expect(rejected.confidence).toBe('high');

        const ignored = resolveConflicts(groupOf([{ sourceId: 'osv', rejectionStatus: 'rejected' }]));
        expect(ignored.isRejected).toBe(false);
        expect(ignored.rejectionStatus).toBeNull();
    });

    it('reports no signal when sources only confirm the advisory exists', () => {
        const advisory = resolveConflicts(groupOf([
            { sourceId: 'base_corpus' },
            { sourceId: 'nvd', rejectionStatus: 'none' },
        ]));

        expect(advisory.hasSignal).toBe(false);
        expect(advisory.confidence).toBe('low');
        expect(advisory.sourceCount).toBe(2);
        expect(advisory.contributingSources).toEqual(['nvd', 'base_corpus']);
    });

    it('takes the next non-empty fixed version when the top fix signal has none', () => {
        const advisory = resolveConflicts(groupOf([
            { sourceId: 'csv_override', fixAvailable: true, fixedVersion: '' },
            { sourceId: 'osv', fixAvailable: true, fixedVersion: '1.2.0' },
        ]));

        expect(advisory.fixAvailable).toBe(true);
        expect(advisory.fixedVersion).toBe('1.2.0');
        expect(advisory.resolutionNotes).toEqual([]);
    });

    it('falls back to a version from a source that does not deny the fix', () => {
        const advisory = resolveConflicts(groupOf([
            { sourceId: 'csv_override', fixAvailable: true },
            { sourceId: 'nvd', fixAvailable: false, fixedVersion: '0.9.0' },
            { sourceId: 'osv', fixedVersion: '1.3.0' },
        ]));

        expect(advisory.fixAvailable).toBe(true);
        expect(advisory.fixedVersion).toBe('1.3.0');
    });

    describe('same-rank ties', () => {
        const ranking = new AuthorityRanking([
            { sourceId: 'feed-a', rank: 0, role: 'fix_feed' },
            { sourceId: 'feed-b', rank: 0, role: 'fix_feed' },
        ]);

        it('prefers the latest sourceUpdatedAt and records a note', () => {
            const advisory = resolveConflicts(groupOf([
                { sourceId: 'feed-a', fixAvailable: true, fixedVersion: '2.0.0', sourceUpdatedAt: '2024-01-01T00:00:00Z' },
                { sourceId: 'feed-b', fixAvailable: true, fixedVersion: '2.1.0', sourceUpdatedAt: '2024-02-01T00:00:00Z' },
            ]), ranking);

            expect(advisory.fixedVersion).toBe('2.1.0');
            expect(advisory.resolutionNotes).toEqual([
                'fixedVersion: feed-b (2.1.0) over feed-a (2.0.0) at rank 0 by latest sourceUpdatedAt',
            ]);
        });

        it('falls back to source id order when timestamps tie', () => {
            const advisory = resolveConflicts(groupOf([
                { sourceId: 'feed-b', fixAvailable: true, fixedVersion: '2.1.0' },
                { sourceId: 'feed-a', fixAvailable: true, fixedVersion: '2.0.0' },
            ]), ranking);

            expect(advisory.fixedVersion).toBe('2.0.0');
            expect(advisory.resolutionNotes).toEqual([
                'fixedVersion: feed-a (2.0.0) over feed-b (2.1.0) at rank 0 by source id order',
            ]);
        });

        it('is independent of input order', () => {
            const forward = resolveConflicts(groupOf([
                { sourceId: 'feed-a', fixAvailable: true, fixedVersion: '2.0.0' },
                { sourceId: 'feed-b', fixAvailable: true, fixedVersion: '2.1.0' },
            ]), ranking);
            const backward = resolveConflicts(groupOf([
                { sourceId: 'feed-b', fixAvailable: true, fixedVersion: '2.1.0' },
                { sourceId: 'feed-a', fixAvailable: true, fixedVersion: '2.0.0' },
            ]), ranking);

            expect(forward.fixedVersion).toBe(backward.fixedVersion);
            expect(forward.contributingSources).toEqual(backward.contributingSources);
        });
    });
});

describe('computeConfidence', () => {
    it('needs a version for a fix to count as high', () => {
        expect(computeConfidence({ overrideStatus: null, fixAvailable: true, fixedVersion: null, isRejected: false, severityScore: null })).toBe('low');
        expect(computeConfidence({ overrideStatus: null, fixAvailable: true, fixedVersion: '1.0.0', isRejected: false, severityScore: null })).toBe('high');
    });
});
