export { conditionFields, evaluateCondition } from './conditions';
export { RuleConfigurationError } from './errors';
export type { RuleConfigurationErrorCode } from './errors';
export {
    DEFAULT_TEMPLATES,
    DEFAULT_TEMPLATE_KEY,
    UNKNOWN_PLACEHOLDER_VALUE,
    findMissingPlaceholders,
    formatDay,
    renderExplanation,
    templateFor,
} from './explainer';
export type { TemplateValue, TemplateValues } from './explainer';
export { DecisionEngine, evidenceKey } from './ruleEngine';
export type { DecisionEngineOptions } from './ruleEngine';
export {
    DEFAULT_RULES,
    RuleConditionSchema,
    RuleDefinitionSchema,
    RuleTableSchema,
    parseRuleTable,
    trustedReasonCodes,
    validateRuleSet,
} from './rules';
export { FINAL_STATES, NON_FINAL_STATES, assessTransition, isFinalState, stateTypeOf } from './stateMachine';
export type { TransitionAssessment, TransitionContext, TransitionKind } from './stateMachine';
export { DECISION_FIELDS } from './types';
export type {
    ConditionValue,
    Decision,
    DecisionEvaluation,
    DecisionField,
    DecisionInput,
    Evidence,
    EvidenceValue,
    ExplanationTemplates,
    RuleCondition,
    RuleDefinition,
    RuleTraceEntry,
    StateType,
} from './types';
