import type { estypes } from '@elastic/elasticsearch';

import { ADVISORY_MAPPING_VERSION, INDEX_ROLES } from './types';
import type { IndexContract, IndexRole } from './types';

type Properties = Record<string, estypes.MappingProperty>;

const keyword = (): estypes.MappingProperty => ({ type: 'keyword' });
const text = (): estypes.MappingProperty => ({ type: 'text' });
const integer = (): estypes.MappingProperty => ({ type: 'integer' });
const date = (): estypes.MappingProperty => ({ type: 'date' });
const objectDisabled = (): estypes.MappingProperty => ({ type: 'object', enabled: false });

function baseContract(role: IndexRole, dynamic: estypes.MappingDynamicMapping, properties: Properties): IndexContract {
    return {
        role,
        settings: {
            number_of_shards: '1',
            number_of_replicas: '0',
        },
        mappings: {
            dynamic,
            date_detection: false,
            _meta: {
                advisory_mapping_version: ADVISORY_MAPPING_VERSION,
            },
            properties,
        },
    };
}

/*
 * The history index holds one arena document per advisory. The flattened `current*` fields are
 * query helpers; `records` is the source of truth and is not indexed.
 */
const contracts: Record<IndexRole, IndexContract> = {
    history: baseContract('history', 'strict', {
        advisoryId: keyword(),
        vulnerabilityId: keyword(),
        component: keyword(),
        currentIndex: integer(),
        versionCount: integer(),
        currentState: keyword(),
        currentStateType: keyword(),
        currentReasonCode: keyword(),
        currentConfidence: keyword(),
        currentFixedVersion: keyword(),
        currentEffectiveFrom: date(),
        currentRunId: keyword(),
        records: objectDisabled(),
    }),

    runs: baseContract('runs', false, {
        runId: keyword(),
        executionMode: keyword(),
        pipelineVersion: keyword(),
        status: keyword(),
        startedAt: date(),
        endedAt: date(),
        stageSummary: objectDisabled(),
        counts: objectDisabled(),
        errorSummary: objectDisabled(),
        updatedAt: date(),
    }),

    tasklogs: baseContract('tasklogs', false, {
        runId: keyword(),
        seq: integer(),
        stage: keyword(),
        taskKey: keyword(),
        taskId: keyword(),
        status: keyword(),
        startedAt: date(),
        endedAt: date(),
        durationMs: integer(),
        message: text(),
        error: {
            type: 'object',
            properties: {
                code: keyword(),
                message: text(),
                stack: { type: 'text', index: false },
                type: keyword(),
            },
        },
        createdAt: date(),
    }),
};

export function getIndexContract(role: IndexRole): IndexContract {
    return structuredClone(contracts[role]);
}

export function getAllIndexContracts(): IndexContract[] {
    return INDEX_ROLES.map((role) => getIndexContract(role));
}
