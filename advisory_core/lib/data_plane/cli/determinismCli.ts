import fs from 'node:fs';

import { loadPipelineConfig } from '../../config';
import { stableStringify } from '../../identity';
import { parseObservationBatch } from '../../observations';
import { runDeterminismHarness } from '../harness/determinismHarness';
import { optionalFlag, parseFlags, requiredFlag } from './args';

type CliArgs = {
    observations: string;
    config: string | null;
    runId: string;
    failFast: boolean;
};

export async function runDeterminismCli(
    argv: string[],
    env: NodeJS.ProcessEnv = process.env,
): Promise<{ output: string; exitCode: number }> {
    const args = parseArgs(argv);
    const config = loadPipelineConfig(args.config ?? undefined, env);

    if (!fs.existsSync(args.observations)) {
        throw new Error(`Observation file not found: ${args.observations}`);
    }
    const batch = parseObservationBatch(JSON.parse(fs.readFileSync(args.observations, 'utf8')));

    const report = await runDeterminismHarness({
        observations: batch.observations,
        runId: args.runId,
        config,
        failFast: args.failFast,
    });

    return {
        output: stableStringify(report, 2),
        exitCode: report.passed ? 0 : 1,
    };
}

function parseArgs(argv: string[]): CliArgs {
    const flags = parseFlags(argv, ['fail-fast']);

    return {
        observations: requiredFlag(flags, 'observations'),
        config: optionalFlag(flags, 'config'),
        runId: optionalFlag(flags, 'run-id') ?? 'determinism',
        failFast: flags.get('fail-fast') === true,
    };
}
