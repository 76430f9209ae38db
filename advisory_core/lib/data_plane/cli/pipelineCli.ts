import fs from 'node:fs';
import { v4 as uuidv4 } from 'uuid';

import { loadPipelineConfig, resolveRuntimeEnvironment } from '../../config';
import type { PipelineConfig } from '../../config';
import type { HistoryStore } from '../../history';
import { stableStringify } from '../../identity';
import { parseObservationBatch } from '../../observations';
import type { ObservationIssue } from '../../observations';
import type { QualityNote } from '../../reporting';
import { RunLogger } from '../../runtime/runLogging';
import { ElasticsearchHistoryStore } from '../es/ElasticsearchHistoryStore';
import { createElasticsearchClient, historyDocumentClientOf, indicesClientOf, runLogClientOf } from '../es/clients';
import { bootstrapIndices } from '../mappings';
import { runAdvisoryPipeline } from '../pipeline';
import type { PipelineRunSummary } from '../pipeline';
import { InMemoryHistoryStore } from '../testing/inMemoryHistoryStore';
import { InMemoryRunLogClient } from '../testing/inMemoryRunLogClient';
import { optionalFlag, parseFlags, requiredFlag } from './args';

type StoreKind = 'memory' | 'es';

type CliArgs = {
    observations: string;
    runId: string;
    config: string | null;
    store: StoreKind;
    dryRun: boolean;
};

type RunTarget = {
    store: HistoryStore;
    logger: RunLogger;
};

export async function runPipelineCli(
    argv: string[],
    env: NodeJS.ProcessEnv = process.env,
): Promise<{ summary: PipelineRunSummary; output: string }> {
    const args = parseArgs(argv);
    const config = loadPipelineConfig(args.config ?? undefined, env);
    const batch = parseObservationBatch(readJsonFile(args.observations));

    const target = await openTarget(args, config, env);

    const summary = await runAdvisoryPipeline({
        observations: batch.observations,
        runId: args.runId,
        store: target.store,
        config,
        logger: target.logger,
        dryRun: args.dryRun,
    });

    const withIssues: PipelineRunSummary = {
        ...summary,
        metrics: {
            ...summary.metrics,
            qualityNotes: [...batch.issues.map(toQualityNote), ...summary.metrics.qualityNotes],
        },
    };

    return {
        summary: withIssues,
        output: stableStringify(withIssues, 2),
    };
}

async function openTarget(args: CliArgs, config: PipelineConfig, env: NodeJS.ProcessEnv): Promise<RunTarget> {
    if (args.store === 'memory') {
        return {
            store: new InMemoryHistoryStore(),
            logger: new RunLogger({
                client: new InMemoryRunLogClient(),
                runId: args.runId,
                executionMode: 'memory',
                indices: config.indices,
            }),
        };
    }

    const runtime = resolveRuntimeEnvironment(env);
    const indices = { ...config.indices, history: runtime.historyIndex ?? config.indices.history };
    const client = createElasticsearchClient(runtime);

    const bootstrap = await bootstrapIndices(indicesClientOf(client), indices);
    for (const result of bootstrap.results) {
        console.log(`[PipelineCli] ${result.index}: ${result.action}`);
    }

    return {
        store: new ElasticsearchHistoryStore({ client: historyDocumentClientOf(client), index: indices.history }),
        logger: new RunLogger({
            client: runLogClientOf(client),
            runId: args.runId,
            executionMode: 'es',
            indices,
        }),
    };
}

function toQualityNote(issue: ObservationIssue): QualityNote {
    return {
        advisoryId: null,
        kind: 'INVALID_OBSERVATION',
        message: `Observation ${issue.position} skipped. ${issue.path || '(root)'}: ${issue.message}`,
    };
}

function readJsonFile(filePath: string): unknown {
    if (!fs.existsSync(filePath)) {
        throw new Error(`Observation file not found: ${filePath}`);
    }

    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
}

function parseArgs(argv: string[]): CliArgs {
    const flags = parseFlags(argv, ['dry-run']);

    const store = optionalFlag(flags, 'store') ?? 'memory';
    if (store !== 'memory' && store !== 'es') {
        throw new Error('--store must be memory or es.');
    }

    return {
        observations: requiredFlag(flags, 'observations'),
        runId: optionalFlag(flags, 'run-id') ?? uuidv4(),
        config: optionalFlag(flags, 'config'),
        store,
        dryRun: flags.get('dry-run') === true,
    };
}
