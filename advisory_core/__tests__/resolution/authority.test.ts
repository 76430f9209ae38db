import { AuthorityConfigurationError, AuthorityRanking, DEFAULT_AUTHORITY_TABLE, validateAuthorityTable } from '../../lib/resolution';

describe('authority table', () => {
    it('ranks configured sources and places unknown ones last as corpus', () => {
        const ranking = new AuthorityRanking();

        expect(ranking.rankOf('csv_override')).toBe(0);
        expect(ranking.rankOf('nvd')).toBe(1);
        expect(ranking.rankOf('mystery-feed')).toBe(4);
        expect(ranking.roleOf('mystery-feed')).toBe('corpus');
    });

    it('accepts an injected ordering', () => {
        const ranking = new AuthorityRanking([
            { sourceId: 'osv', rank: 0, role: 'fix_feed' },
            { sourceId: 'csv_override', rank: 1, role: 'override' },
        ]);

        const ranked = ranking.rank([
            { sourceId: 'csv_override', vulnerabilityId: 'CVE-2024-0001', observedAt: '2024-03-01T00:00:00Z' },
            { sourceId: 'osv', vulnerabilityId: 'CVE-2024-0001', observedAt: '2024-03-01T00:00:00Z' },
        ]);

        expect(ranked.map((entry) => entry.observation.sourceId)).toEqual(['osv', 'csv_override']);
        expect(DEFAULT_AUTHORITY_TABLE[0].sourceId).toBe('csv_override');
    });

    it('breaks rank and timestamp ties by code point order of source id', () => {
        const ranking = new AuthorityRanking([
            { sourceId: 'feed-a', rank: 0, role: 'fix_feed' },
            { sourceId: 'Feed-B', rank: 0, role: 'fix_feed' },
        ]);

        const ranked = ranking.rank([
            { sourceId: 'feed-a', vulnerabilityId: 'CVE-2024-0001', observedAt: '2024-03-01T00:00:00Z' },
            { sourceId: 'Feed-B', vulnerabilityId: 'CVE-2024-0001', observedAt: '2024-03-01T00:00:00Z' },
        ]);

        expect(ranked.map((entry) => entry.observation.sourceId)).toEqual(['Feed-B', 'feed-a']);
    });

    it('lists the sources holding a role', () => {
        expect(new AuthorityRanking().sourcesWithRole('registry')).toEqual(['nvd']);
    });

    it.each([
        [[], 'EMPTY_TABLE'],
        [[{ sourceId: 'nvd', rank: 0, role: 'registry' }, { sourceId: 'nvd', rank: 1, role: 'registry' }], 'DUPLICATE_SOURCE'],
        [[{ sourceId: 'nvd', rank: -1, role: 'registry' }], 'INVALID_RANK'],
        [[{ sourceId: 'nvd', rank: 0.5, role: 'registry' }], 'INVALID_RANK'],
    ] as const)('rejects invalid tables (%#)', (table, code) => {
        expect(() => validateAuthorityTable(table)).toThrow(AuthorityConfigurationError);
        expect(() => validateAuthorityTable(table)).toThrow(expect.objectContaining({ code }));
    });
});
