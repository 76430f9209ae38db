import type { AdvisoryState } from '../observations';
import type { Confidence, EnrichedAdvisory } from '../resolution';

export type StateType = 'final' | 'non_final';

/** Advisory fields a rule condition or an evidence list may reference. */
export const DECISION_FIELDS = [
    'overrideStatus',
    'overrideReason',
    'overrideUpdatedAt',
    'isRejected',
    'rejectionStatus',
    'fixAvailable',
    'fixedVersion',
    'severityScore',
    'hasSignal',
    'sourceCount',
] as const;

export type DecisionField = typeof DECISION_FIELDS[number];

export type ConditionValue = string | number | boolean;

export type RuleCondition =
    | { kind: 'equals'; field: DecisionField; value: ConditionValue }
    | { kind: 'isTrue'; field: DecisionField }
    | { kind: 'isFalse'; field: DecisionField }
    | { kind: 'present'; field: DecisionField }
    | { kind: 'all'; conditions: RuleCondition[] }
    | { kind: 'always' };

export interface RuleDefinition {
    ruleId: string;
    priority: number;
    reasonCode: string;
    state: AdvisoryState;
    condition: RuleCondition;
    /** Extra advisory fields copied into the evidence beside the ones the condition reads. */
    evidenceFields?: DecisionField[];
    /** Authority rank of the source class this rule speaks for; 0 and 1 may reopen final states. */
    authorityRank?: number;
}

export type EvidenceValue = string | number | boolean | null | string[];

export type Evidence = Record<string, EvidenceValue>;

export type ExplanationTemplates = Record<string, string>;

export interface Decision {
    state: AdvisoryState;
    stateType: StateType;
    fixedVersion: string | null;
    confidence: Confidence;
    reasonCode: string;
    explanation: string;
    evidence: Evidence;
    decisionRuleId: string;
    contributingSources: string[];
    dissentingSources: string[];
}

export interface RuleTraceEntry {
    ruleId: string;
    priority: number;
    matched: boolean;
    evaluated: boolean;
}

export interface DecisionEvaluation {
    advisoryId: string;
    decision: Decision;
    trace: RuleTraceEntry[];
    missingPlaceholders: string[];
}

export type DecisionInput = EnrichedAdvisory;
