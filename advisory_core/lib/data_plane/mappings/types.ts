import type { estypes } from '@elastic/elasticsearch';

export const ADVISORY_MAPPING_VERSION = '1.0';

export const INDEX_ROLES = ['history', 'runs', 'tasklogs'] as const;

export type IndexRole = typeof INDEX_ROLES[number];

export type IndexNames = Record<IndexRole, string>;

export interface IndexContract {
    role: IndexRole;
    settings: estypes.IndicesIndexSettings;
    mappings: estypes.MappingTypeMapping;
}

export interface BootstrapIndexResult {
    index: string;
    role: IndexRole;
    action: 'created' | 'validated';
    message: string;
}

export interface BootstrapReport {
    mappingVersion: string;
    results: BootstrapIndexResult[];
}

export interface IndicesClientLike {
    exists(params: { index: string }): Promise<boolean>;
    create(params: { index: string; settings: estypes.IndicesIndexSettings; mappings: estypes.MappingTypeMapping }): Promise<unknown>;
    getMapping(params: { index: string }): Promise<unknown>;
}

export interface ElasticsearchClientLike {
    indices: IndicesClientLike;
}
