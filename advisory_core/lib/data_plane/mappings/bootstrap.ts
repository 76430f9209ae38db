import { stableStringify } from '../../identity';
import { getIndexContract } from './contracts';
import { ADVISORY_MAPPING_VERSION, INDEX_ROLES } from './types';
import type { BootstrapReport, ElasticsearchClientLike, IndexContract, IndexNames } from './types';

type UnknownRecord = Record<string, unknown>;

export class MappingBootstrapError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'MappingBootstrapError';
    }
}

/**
 * Creates missing indices from their frozen contracts and validates existing ones. An existing
 * index whose mapping drifted from the contract is fatal.
 */
export async function bootstrapIndices(client: ElasticsearchClientLike, names: IndexNames): Promise<BootstrapReport> {
    const results: BootstrapReport['results'] = [];

    for (const role of INDEX_ROLES) {
        const index = names[role];
        const contract = getIndexContract(role);

        if (!(await client.indices.exists({ index }))) {
            await client.indices.create({
                index,
                settings: contract.settings,
                mappings: contract.mappings,
            });

            results.push({ index, role, action: 'created', message: 'Index created with expected mapping contract.' });
            continue;
        }

        const actual = normalizeMappingResponse(index, await client.indices.getMapping({ index }));
        assertMappingCompatible(index, contract, actual);

        results.push({ index, role, action: 'validated', message: 'Existing mapping validated successfully.' });
    }

    return {
        mappingVersion: ADVISORY_MAPPING_VERSION,
        results,
    };
}

function normalizeMappingResponse(index: string, response: unknown): UnknownRecord {
    if (!isRecord(response)) {
        throw new MappingBootstrapError(`indices.getMapping returned invalid response for ${index}.`);
    }

    const entry = response[index];
    if (!isRecord(entry)) {
        throw new MappingBootstrapError(`indices.getMapping missing index entry for ${index}.`);
    }

    const mappings = entry.mappings;
    if (!isRecord(mappings)) {
        throw new MappingBootstrapError(`indices.getMapping missing mappings for ${index}.`);
    }

    if (!isRecord(mappings._meta) || mappings._meta.advisory_mapping_version !== ADVISORY_MAPPING_VERSION) {
        throw new MappingBootstrapError(`Mapping version mismatch for ${index}. Expected ${ADVISORY_MAPPING_VERSION}.`);
    }

    return mappings;
}

function assertMappingCompatible(index: string, expected: IndexContract, actual: UnknownRecord): void {
    if (stableStringify(expected.mappings) !== stableStringify(actual)) {
        throw new MappingBootstrapError(
            `Mapping drift detected for ${index}. Existing mappings do not match the frozen contract.`,
        );
    }
}

function isRecord(value: unknown): value is UnknownRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
