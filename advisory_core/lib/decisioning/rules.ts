import { z } from 'zod';

import { ADVISORY_STATES } from '../observations';
import { RuleConfigurationError } from './errors';
import { DECISION_FIELDS } from './types';
import type { RuleCondition, RuleDefinition } from './types';

/*
 * Default chain. Priorities 3 and 4 stay free for authority-scoped rules (for example a
 * distribution-specific "not affected" determination) so they can be inserted without renumbering.
 */
export const DEFAULT_RULES: readonly RuleDefinition[] = [
    {
        ruleId: 'R0',
        priority: 0,
        reasonCode: 'CSV_OVERRIDE',
        state: 'not_applicable',
        condition: { kind: 'equals', field: 'overrideStatus', value: 'not_applicable' },
        evidenceFields: ['overrideReason', 'overrideUpdatedAt'],
        authorityRank: 0,
    },
    {
        ruleId: 'R1',
        priority: 1,
        reasonCode: 'REGISTRY_REJECTED',
        state: 'not_applicable',
        condition: { kind: 'isTrue', field: 'isRejected' },
        evidenceFields: ['rejectionStatus'],
        authorityRank: 1,
    },
    {
        ruleId: 'R2',
        priority: 2,
        reasonCode: 'UPSTREAM_FIX',
        state: 'fixed',
        condition: {
            kind: 'all',
            conditions: [
                { kind: 'isTrue', field: 'fixAvailable' },
                { kind: 'present', field: 'fixedVersion' },
            ],
        },
        authorityRank: 2,
    },
    {
        ruleId: 'R5',
        priority: 5,
        reasonCode: 'NEW_ITEM',
        state: 'under_investigation',
        condition: { kind: 'isFalse', field: 'hasSignal' },
        evidenceFields: ['sourceCount'],
    },
    {
        ruleId: 'R6',
        priority: 6,
        reasonCode: 'AWAITING_FIX',
        state: 'pending_upstream',
        condition: { kind: 'always' },
        evidenceFields: ['fixAvailable', 'severityScore', 'sourceCount'],
    },
];

const DecisionFieldSchema = z.enum(DECISION_FIELDS);

export const RuleConditionSchema: z.ZodType<RuleCondition> = z.lazy(() => z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('equals'), field: DecisionFieldSchema, value: z.union([z.string(), z.number(), z.boolean()]) }),
    z.object({ kind: z.literal('isTrue'), field: DecisionFieldSchema }),
    z.object({ kind: z.literal('isFalse'), field: DecisionFieldSchema }),
    z.object({ kind: z.literal('present'), field: DecisionFieldSchema }),
    z.object({ kind: z.literal('all'), conditions: z.array(RuleConditionSchema) }),
    z.object({ kind: z.literal('always') }),
]));

export const RuleDefinitionSchema = z.object({
    ruleId: z.string().trim().min(1),
    priority: z.number().int().min(0),
    reasonCode: z.string().trim().min(1),
    state: z.enum(ADVISORY_STATES),
    condition: RuleConditionSchema,
    evidenceFields: z.array(DecisionFieldSchema).optional(),
    authorityRank: z.number().int().min(0).optional(),
});

export const RuleTableSchema = z.array(RuleDefinitionSchema);

export function parseRuleTable(input: unknown): RuleDefinition[] {
    const parsed = RuleTableSchema.safeParse(input);
    if (!parsed.success) {
        const first = parsed.error.issues[0];
        const detail = first ? `${first.path.join('.')}: ${first.message}` : 'invalid rule table';
        throw new RuleConfigurationError('INVALID_RULE_TABLE', `Rule table is invalid. ${detail}`);
    }

    return validateRuleSet(parsed.data);
}

/**
 * Checks a rule chain and returns it in evaluation order. The lowest-priority rule must match
 * unconditionally so that the chain can never be exhausted.
 */
export function validateRuleSet(rules: readonly RuleDefinition[]): RuleDefinition[] {
    if (rules.length === 0) {
        throw new RuleConfigurationError('EMPTY_RULE_SET', 'Rule chain must contain at least one rule.');
    }

    const ruleIds = new Set<string>();
    const priorities = new Set<number>();
    const knownStates: readonly string[] = ADVISORY_STATES;

    for (const rule of rules) {
        if (ruleIds.has(rule.ruleId)) {
            throw new RuleConfigurationError('DUPLICATE_RULE_ID', `Rule id ${rule.ruleId} is used more than once.`);
        }

        if (priorities.has(rule.priority)) {
            throw new RuleConfigurationError('DUPLICATE_PRIORITY', `Priority ${rule.priority} is used more than once.`);
        }

        if (!knownStates.includes(rule.state)) {
            throw new RuleConfigurationError('UNKNOWN_STATE', `Rule ${rule.ruleId} targets unknown state ${rule.state}.`);
        }

        ruleIds.add(rule.ruleId);
        priorities.add(rule.priority);
    }

    const ordered = [...rules].sort((left, right) => left.priority - right.priority);
    const last = ordered[ordered.length - 1];

    if (last.condition.kind !== 'always') {
        throw new RuleConfigurationError(
            'MISSING_DEFAULT_RULE',
            `Lowest-priority rule ${last.ruleId} must match unconditionally.`,
        );
    }

    return ordered;
}

/** Reason codes of rules speaking for rank 0 or 1 authorities; their regressions need no review. */
export function trustedReasonCodes(rules: readonly RuleDefinition[]): Set<string> {
    return new Set(
        rules
            .filter((rule) => rule.authorityRank !== undefined && rule.authorityRank <= 1)
            .map((rule) => rule.reasonCode),
    );
}
