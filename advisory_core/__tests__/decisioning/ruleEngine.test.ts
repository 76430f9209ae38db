import { DecisionEngine, RuleConfigurationError } from '../../lib/decisioning';
import { stableStringify } from '../../lib/identity';
import { enrichedAdvisory } from '../fixtures';

describe('DecisionEngine', () => {
    const engine = new DecisionEngine();

    it('lets the override rule win over a rejection and an available fix', () => {
        const evaluation = engine.evaluate(enrichedAdvisory({
            overrideStatus: 'not_applicable',
            overrideReason: 'code path not shipped',
            overrideUpdatedAt: '2024-02-01T10:00:00Z',
            isRejected: true,
            rejectionStatus: 'rejected',
            fixAvailable: true,
            fixedVersion: '1.2.3',
            hasSignal: true,
            confidence: 'high',
            contributingSources: ['csv_override', 'nvd', 'osv'],
        }));

        expect(evaluation.decision).toEqual({
            state: 'not_applicable',
            stateType: 'final',
            fixedVersion: null,
            confidence: 'high',
            reasonCode: 'CSV_OVERRIDE',
            explanation: 'Marked as not applicable by internal security review. Reason: code path not shipped. Updated: 2024-02-01.',
            evidence: {
                override_status: 'not_applicable',
                override_reason: 'code path not shipped',
                override_updated_at: '2024-02-01T10:00:00Z',
                contributing_sources: ['csv_override', 'nvd', 'osv'],
                confidence: 'high',
                applied_rule: 'R0',
            },
            decisionRuleId: 'R0',
            contributingSources: ['csv_override', 'nvd', 'osv'],
            dissentingSources: [],
        });
        expect(evaluation.trace).toEqual([
            { ruleId: 'R0', priority: 0, matched: true, evaluated: true },
            { ruleId: 'R1', priority: 1, matched: false, evaluated: false },
            { ruleId: 'R2', priority: 2, matched: false, evaluated: false },
            { ruleId: 'R5', priority: 5, matched: false, evaluated: false },
            { ruleId: 'R6', priority: 6, matched: false, evaluated: false },
        ]);
        expect(evaluation.missingPlaceholders).toEqual([]);
    });

    it('rejects through the registry rule when no override applies', () => {
        const decision = engine.decide(enrichedAdvisory({
            isRejected: true,
            rejectionStatus: 'rejected',
            fixAvailable: true,
            fixedVersion: '1.2.3',
            hasSignal: true,
            confidence: 'high',
        }));

        expect(decision.state).toBe('not_applicable');
        expect(decision.reasonCode).toBe('REGISTRY_REJECTED');
        expect(decision.explanation).toBe('This vulnerability has been rejected by the authoritative registry.');
        expect(decision.evidence).toEqual({
            is_rejected: true,
            rejection_status: 'rejected',
            contributing_sources: ['base_corpus'],
            confidence: 'high',
            applied_rule: 'R1',
        });
    });

    it('marks an available fix with a version as fixed', () => {
        const decision = engine.decide(enrichedAdvisory({
            fixAvailable: true,
            fixedVersion: '4.17.21',
            hasSignal: true,
            confidence: 'high',
            contributingSources: ['osv'],
        }));

        expect(decision.state).toBe('fixed');
        expect(decision.stateType).toBe('final');
        expect(decision.fixedVersion).toBe('4.17.21');
        expect(decision.explanation).toBe('Fixed in version 4.17.21. Fix available from upstream.');
        expect(decision.evidence).toEqual({
            fix_available: true,
            fixed_version: '4.17.21',
            contributing_sources: ['osv'],
            confidence: 'high',
            applied_rule: 'R2',
        });
    });

    it('keeps an advisory pending when a fix has no version', () => {
        const decision = engine.decide(enrichedAdvisory({
            fixAvailable: true,
            hasSignal: true,
            sourceCount: 2,
            contributingSources: ['osv', 'base_corpus'],
        }));

        expect(decision.state).toBe('pending_upstream');
        expect(decision.reasonCode).toBe('AWAITING_FIX');
        expect(decision.fixedVersion).toBeNull();
        expect(decision.explanation).toBe('No fix currently available upstream. Sources consulted: osv, base_corpus.');
        expect(decision.evidence).toEqual({
            fix_available: true,
            severity_score: null,
            source_count: 2,
            contributing_sources: ['osv', 'base_corpus'],
            confidence: 'low',
            applied_rule: 'R6',
        });
    });

    it('puts advisories without any signal under investigation with low confidence', () => {
        const decision = engine.decide(enrichedAdvisory());

        expect(decision.state).toBe('under_investigation');
        expect(decision.reasonCode).toBe('NEW_ITEM');
        expect(decision.confidence).toBe('low');
        expect(decision.evidence).toEqual({
            has_signal: false,
            source_count: 1,
            contributing_sources: ['base_corpus'],
            confidence: 'low',
            applied_rule: 'R5',
        });
    });

    it('is deterministic for the same input', () => {
        const advisory = enrichedAdvisory({ fixAvailable: true, fixedVersion: '2.0.0', hasSignal: true, confidence: 'high' });

        expect(stableStringify(engine.decide(advisory))).toBe(stableStringify(engine.decide(advisory)));
    });

    it('renders unknown for missing placeholder values and reports them', () => {
        const evaluation = engine.evaluate(enrichedAdvisory({ overrideStatus: 'not_applicable', hasSignal: true, confidence: 'high' }));

        expect(evaluation.decision.explanation).toBe(
            'Marked as not applicable by internal security review. Reason: unknown. Updated: unknown.',
        );
        expect(evaluation.missingPlaceholders).toEqual(['override_reason', 'override_updated_at']);
    });

    it('accepts an injected rule chain and falls back to the default template', () => {
        const custom = new DecisionEngine({
            rules: [{ ruleId: 'only', priority: 0, reasonCode: 'CUSTOM', state: 'wont_fix', condition: { kind: 'always' } }],
            templates: {},
        });

        const decision = custom.decide(enrichedAdvisory());

        expect(decision.state).toBe('wont_fix');
        expect(decision.explanation).toBe('Advisory classified as wont_fix (CUSTOM).');
        expect(decision.evidence).toEqual({ contributing_sources: ['base_corpus'], confidence: 'low', applied_rule: 'only' });
    });

    it('refuses a chain without an unconditional default', () => {
        expect(() => new DecisionEngine({
            rules: [{ ruleId: 'R0', priority: 0, reasonCode: 'X', state: 'fixed', condition: { kind: 'isTrue', field: 'fixAvailable' } }],
        })).toThrow(RuleConfigurationError);
    });
});
