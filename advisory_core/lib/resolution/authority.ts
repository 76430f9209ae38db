import { SOURCE_IDS } from '../observations';
import type { SourceObservation } from '../observations';
import { AuthorityConfigurationError } from './errors';
import type { AuthorityEntry, AuthorityRole, AuthorityTable, RankedObservation } from './types';

export const DEFAULT_AUTHORITY_TABLE: AuthorityTable = [
    { sourceId: SOURCE_IDS.override, rank: 0, role: 'override' },
    { sourceId: SOURCE_IDS.registry, rank: 1, role: 'registry' },
    { sourceId: SOURCE_IDS.fixFeed, rank: 2, role: 'fix_feed' },
    { sourceId: SOURCE_IDS.corpus, rank: 3, role: 'corpus' },
];

export function validateAuthorityTable(table: AuthorityTable): void {
    if (table.length === 0) {
        throw new AuthorityConfigurationError('EMPTY_TABLE', 'Authority table must contain at least one source.');
    }

    const seen = new Set<string>();
    for (const entry of table) {
        if (!Number.isInteger(entry.rank) || entry.rank < 0) {
            throw new AuthorityConfigurationError(
                'INVALID_RANK',
                `Authority rank for ${entry.sourceId} must be a non-negative integer.`,
            );
        }

        if (seen.has(entry.sourceId)) {
            throw new AuthorityConfigurationError('DUPLICATE_SOURCE', `Source ${entry.sourceId} is ranked more than once.`);
        }

        seen.add(entry.sourceId);
    }
}

/**
 * Injected view over an authority table. Sources missing from the table rank after every
 * configured source and are treated as corpus data.
 */
export class AuthorityRanking {
    private readonly entries: Map<string, AuthorityEntry>;
    private readonly unknownRank: number;

    constructor(table: AuthorityTable = DEFAULT_AUTHORITY_TABLE) {
        validateAuthorityTable(table);

        this.entries = new Map(table.map((entry) => [entry.sourceId, entry]));
        this.unknownRank = Math.max(...table.map((entry) => entry.rank)) + 1;
    }

    rankOf(sourceId: string): number {
        return this.entries.get(sourceId)?.rank ?? this.unknownRank;
    }

    roleOf(sourceId: string): AuthorityRole {
        return this.entries.get(sourceId)?.role ?? 'corpus';
    }

    sourcesWithRole(role: AuthorityRole): string[] {
        return Array.from(this.entries.values())
            .filter((entry) => entry.role === role)
            .map((entry) => entry.sourceId);
    }

    rank(observations: readonly SourceObservation[]): RankedObservation[] {
        return observations
            .map((observation, position) => ({
                observation,
                rank: this.rankOf(observation.sourceId),
                role: this.roleOf(observation.sourceId),
                position,
            }))
            .sort(compareByAuthority);
    }
}

/**
 * Rank ascending, then most recent `sourceUpdatedAt` (missing last), then source id, then input
 * position.
 */
export function compareByAuthority(left: RankedObservation, right: RankedObservation): number {
    if (left.rank !== right.rank) {
        return left.rank - right.rank;
    }

    const byUpdate = compareUpdatedAtDesc(left.observation.sourceUpdatedAt, right.observation.sourceUpdatedAt);
    if (byUpdate !== 0) {
        return byUpdate;
    }

    if (left.observation.sourceId !== right.observation.sourceId) {
        return left.observation.sourceId < right.observation.sourceId ? -1 : 1;
    }

    return left.position - right.position;
}

export function updatedAtMillis(value: string | null | undefined): number | null {
    if (typeof value !== 'string') {
        return null;
    }

    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? null : parsed;
}

function compareUpdatedAtDesc(left: string | null | undefined, right: string | null | undefined): number {
    const leftMillis = updatedAtMillis(left);
    const rightMillis = updatedAtMillis(right);

    if (leftMillis === rightMillis) {
        return 0;
    }

    if (leftMillis === null) {
        return 1;
    }

    if (rightMillis === null) {
        return -1;
    }

    return rightMillis - leftMillis;
}
