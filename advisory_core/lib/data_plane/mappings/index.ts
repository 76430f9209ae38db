export { ADVISORY_MAPPING_VERSION, INDEX_ROLES } from './types';
export type {
    BootstrapIndexResult,
    BootstrapReport,
    ElasticsearchClientLike,
    IndexContract,
    IndexNames,
    IndexRole,
    IndicesClientLike,
} from './types';
export { getAllIndexContracts, getIndexContract } from './contracts';
export { bootstrapIndices, MappingBootstrapError } from './bootstrap';
