export const SOURCE_IDS = {
    override: 'csv_override',
    registry: 'nvd',
    fixFeed: 'osv',
    corpus: 'base_corpus',
} as const;

export type KnownSourceId = typeof SOURCE_IDS[keyof typeof SOURCE_IDS];
