import type { PipelineConfig } from '../../config';
import { verifyHistoryInvariants } from '../../history';
import type { HistoryInvariantReport, HistoryStore } from '../../history';
import { IDENTITY_CONTRACT_VERSION, buildCanonicalHash, stableStringify } from '../../identity';
import type { SourceObservation } from '../../observations';
import { projectCurrentStates } from '../../publication';
import { runAdvisoryPipeline } from '../pipeline';
import { InMemoryHistoryStore } from '../testing/inMemoryHistoryStore';

export interface DeterminismCapture {
    advisoryCount: number;
    advisoryIds: string[];
    recordCount: number;
    currentHashById: Record<string, string>;
    projectionHash: string;
    identityContractVersion: string;
}

export interface DeterminismReport {
    passed: boolean;
    failures: string[];
    firstRunWritten: number;
    secondRunWritten: number;
    baseline: DeterminismCapture;
    rerun: DeterminismCapture;
    invariants: HistoryInvariantReport;
}

export interface DeterminismHarnessOptions {
    observations: readonly SourceObservation[];
    runId?: string;
    config?: PipelineConfig;
    clock?: () => Date;
    failFast?: boolean;
}

/**
 * Runs the full chain twice on the same batch against a fresh in-memory store. The second run
 * must write nothing and leave the current projection byte-identical.
 */
export async function runDeterminismHarness(options: DeterminismHarnessOptions): Promise<DeterminismReport> {
    const store = new InMemoryHistoryStore();
    const runId = options.runId ?? 'determinism';

    const first = await runAdvisoryPipeline({
        observations: options.observations,
        runId: `${runId}-1`,
        store,
        config: options.config,
        clock: options.clock,
    });
    const baseline = await captureState(store);

    const second = await runAdvisoryPipeline({
        observations: options.observations,
        runId: `${runId}-2`,
        store,
        config: options.config,
        clock: options.clock,
    });
    const rerun = await captureState(store);

    const invariants = await verifyHistoryInvariants(store);
    const failures = collectFailures(baseline, rerun, second.written, invariants, options.failFast === true);

    return {
        passed: failures.length === 0,
        failures,
        firstRunWritten: first.written,
        secondRunWritten: second.written,
        baseline,
        rerun,
        invariants,
    };
}

export async function captureState(store: HistoryStore): Promise<DeterminismCapture> {
    const rows = await projectCurrentStates(store);
    const advisoryIds = await store.listAdvisoryIds();

    let recordCount = 0;
    for (const advisoryId of advisoryIds) {
        const stored = await store.read(advisoryId);
        recordCount += stored?.document.records.length ?? 0;
    }

    const currentHashById = rows.reduce<Record<string, string>>((hashes, row) => {
        hashes[row.advisoryId] = buildCanonicalHash({ ...row });
        return hashes;
    }, {});

    return {
        advisoryCount: rows.length,
        advisoryIds,
        recordCount,
        currentHashById,
        projectionHash: buildCanonicalHash({ rows }),
        identityContractVersion: IDENTITY_CONTRACT_VERSION,
    };
}

export function diffCaptures(baseline: DeterminismCapture, rerun: DeterminismCapture, failFast: boolean): string[] {
    const failures: string[] = [];

    if (baseline.advisoryCount !== rerun.advisoryCount) {
        failures.push(`Advisory count drift: ${baseline.advisoryCount} -> ${rerun.advisoryCount}`);
        if (failFast) return failures;
    }

    if (stableStringify(baseline.advisoryIds) !== stableStringify(rerun.advisoryIds)) {
        failures.push('Advisory id set drift.');
        if (failFast) return failures;
    }

    if (baseline.recordCount !== rerun.recordCount) {
        failures.push(`History record count drift: ${baseline.recordCount} -> ${rerun.recordCount}`);
        if (failFast) return failures;
    }

    if (stableStringify(baseline.currentHashById) !== stableStringify(rerun.currentHashById)) {
        failures.push('Current state hash drift.');
        if (failFast) return failures;
    }

    if (baseline.projectionHash !== rerun.projectionHash) {
        failures.push('Projection hash drift.');
        if (failFast) return failures;
    }

    if (baseline.identityContractVersion !== rerun.identityContractVersion) {
        failures.push('Identity contract version drift.');
    }

    return failures;
}

function collectFailures(
    baseline: DeterminismCapture,
    rerun: DeterminismCapture,
    secondRunWritten: number,
    invariants: HistoryInvariantReport,
    failFast: boolean,
): string[] {
    const failures: string[] = [];

    if (secondRunWritten > 0) {
        failures.push(`Second run wrote ${secondRunWritten} records; expected 0.`);
        if (failFast) return failures;
    }

    failures.push(...diffCaptures(baseline, rerun, failFast));
    if (failFast && failures.length > 0) return failures;

    for (const violation of invariants.violations) {
        failures.push(`Invariant ${violation.kind} on ${violation.advisoryId}: ${violation.message}`);
        if (failFast) return failures;
    }

    return failures;
}
