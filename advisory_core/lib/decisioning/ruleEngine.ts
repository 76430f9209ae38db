import type { EnrichedAdvisory } from '../resolution';
import { conditionFields, evaluateCondition, readField } from './conditions';
import { RuleConfigurationError } from './errors';
import { DEFAULT_TEMPLATES, findMissingPlaceholders, formatDay, renderExplanation, templateFor } from './explainer';
import type { TemplateValues } from './explainer';
import { DEFAULT_RULES, validateRuleSet } from './rules';
import { stateTypeOf } from './stateMachine';
import { DECISION_FIELDS } from './types';
import type {
    Decision,
    DecisionEvaluation,
    DecisionField,
    Evidence,
    ExplanationTemplates,
    RuleDefinition,
    RuleTraceEntry,
} from './types';

export interface DecisionEngineOptions {
    rules?: readonly RuleDefinition[];
    templates?: ExplanationTemplates;
}

/**
 * Evaluates an ordered rule chain against one enriched advisory. The first matching rule wins;
 * rules are data, so a new rule is a table entry rather than an engine change.
 */
export class DecisionEngine {
    readonly rules: readonly RuleDefinition[];
    private readonly templates: ExplanationTemplates;

    constructor(options: DecisionEngineOptions = {}) {
        this.rules = validateRuleSet(options.rules ?? DEFAULT_RULES);
        this.templates = options.templates ?? DEFAULT_TEMPLATES;
    }

    decide(advisory: EnrichedAdvisory): Decision {
        return this.evaluate(advisory).decision;
    }

    evaluate(advisory: EnrichedAdvisory): DecisionEvaluation {
        const trace: RuleTraceEntry[] = [];
        let winner: RuleDefinition | null = null;

        for (const rule of this.rules) {
            if (winner) {
                trace.push({ ruleId: rule.ruleId, priority: rule.priority, matched: false, evaluated: false });
                continue;
            }

            const matched = evaluateCondition(rule.condition, advisory);
            trace.push({ ruleId: rule.ruleId, priority: rule.priority, matched, evaluated: true });

            if (matched) {
                winner = rule;
            }
        }

        if (!winner) {
            throw new RuleConfigurationError(
                'RULE_CHAIN_EXHAUSTED',
                `No rule matched advisory ${advisory.advisoryId}; the rule chain has no default.`,
            );
        }

        const template = templateFor(this.templates, winner.reasonCode);
        const values = buildTemplateValues(advisory, winner);

        return {
            advisoryId: advisory.advisoryId,
            decision: {
                state: winner.state,
                stateType: stateTypeOf(winner.state),
                fixedVersion: winner.state === 'fixed' ? advisory.fixedVersion : null,
                confidence: advisory.confidence,
                reasonCode: winner.reasonCode,
                explanation: renderExplanation(template, values),
                evidence: buildEvidence(advisory, winner),
                decisionRuleId: winner.ruleId,
                contributingSources: [...advisory.contributingSources],
                dissentingSources: [...advisory.dissentingSources],
            },
            trace,
            missingPlaceholders: findMissingPlaceholders(template, values),
        };
    }
}

export function evidenceKey(field: string): string {
    return field.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

function buildEvidence(advisory: EnrichedAdvisory, rule: RuleDefinition): Evidence {
    const fields: DecisionField[] = conditionFields(rule.condition);
    for (const field of rule.evidenceFields ?? []) {
        if (!fields.includes(field)) {
            fields.push(field);
        }
    }

    const evidence: Evidence = {};
    for (const field of fields) {
        evidence[evidenceKey(field)] = readField(advisory, field);
    }

    evidence.contributing_sources = [...advisory.contributingSources];
    evidence.confidence = advisory.confidence;
    evidence.applied_rule = rule.ruleId;

    return evidence;
}

function buildTemplateValues(advisory: EnrichedAdvisory, rule: RuleDefinition): TemplateValues {
    const values: TemplateValues = {
        advisory_id: advisory.advisoryId,
        vulnerability_id: advisory.vulnerabilityId,
        component: advisory.component,
        state: rule.state,
        reason_code: rule.reasonCode,
        rule_id: rule.ruleId,
        confidence: advisory.confidence,
        sources_list: advisory.contributingSources,
    };

    for (const field of DECISION_FIELDS) {
        values[evidenceKey(field)] = readField(advisory, field);
    }

    values.override_updated_at = formatDay(advisory.overrideUpdatedAt);

    return values;
}
