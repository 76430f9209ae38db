import { RunMetrics, combineObservers } from '../../lib/reporting';
import { decision } from '../fixtures';

describe('RunMetrics', () => {
    it('counts decisions, writes and regressions', () => {
        const metrics = new RunMetrics('run-1');
        const fixed = decision({ state: 'fixed', stateType: 'final', reasonCode: 'UPSTREAM_FIX', decisionRuleId: 'R2' });

        metrics.onDecision('zlib:CVE-2024-0001', fixed, true, 'pending_upstream');
        metrics.onDecision('lodash:CVE-2024-0001', decision(), true, 'fixed');
        metrics.onDecision('lodash:CVE-2024-0002', decision(), false, 'pending_upstream');
        metrics.onDropped({ position: 3, sourceId: 'nvd', reason: 'MISSING_VULNERABILITY_ID', message: 'missing' });

        expect(metrics.toSummary()).toEqual({
            runId: 'run-1',
            decisions: 3,
            written: 2,
            unchanged: 1,
            dropped: 1,
            regressions: 1,
            byReasonCode: { AWAITING_FIX: 2, UPSTREAM_FIX: 1 },
            byState: { fixed: 1, pending_upstream: 2 },
            byRule: { R2: 1, R6: 2 },
            droppedByReason: { MISSING_VULNERABILITY_ID: 1 },
            transitions: [
                { advisoryId: 'lodash:CVE-2024-0001', from: 'fixed', to: 'pending_upstream' },
                { advisoryId: 'zlib:CVE-2024-0001', from: 'pending_upstream', to: 'fixed' },
            ],
            qualityNotes: [],
            errors: [],
        });
    });

    it('prefixes errors with the advisory id when there is one', () => {
        const metrics = new RunMetrics('run-1');

        metrics.onError(new Error('write failed'), 'lodash:CVE-2024-0001');
        metrics.onError('store offline', null);

        expect(metrics.toSummary().errors).toEqual(['lodash:CVE-2024-0001: write failed', 'store offline']);
    });
});

describe('combineObservers', () => {
    it('forwards callbacks to every observer and skips missing ones', () => {
        const metrics = new RunMetrics('run-1');
        const onQualityNote = vi.fn();
        const observer = combineObservers(metrics, undefined, { onQualityNote });
        const note = { advisoryId: null, kind: 'INVALID_OBSERVATION' as const, message: 'bad row' };

        observer.onQualityNote?.(note);

        expect(onQualityNote).toHaveBeenCalledWith(note);
        expect(metrics.toSummary().qualityNotes).toEqual([note]);
    });
});
