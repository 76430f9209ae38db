import type { EnrichedAdvisory } from '../resolution';
import type { DecisionField, RuleCondition } from './types';

export function readField(advisory: EnrichedAdvisory, field: DecisionField): EnrichedAdvisory[DecisionField] {
    return advisory[field];
}

export function evaluateCondition(condition: RuleCondition, advisory: EnrichedAdvisory): boolean {
    switch (condition.kind) {
        case 'always':
            return true;
        case 'equals':
            return readField(advisory, condition.field) === condition.value;
        case 'isTrue':
            return readField(advisory, condition.field) === true;
        case 'isFalse':
            return readField(advisory, condition.field) === false;
        case 'present':
            return isPresent(readField(advisory, condition.field));
        case 'all':
            return condition.conditions.every((child) => evaluateCondition(child, advisory));
    }
}

/** Fields a condition reads, in first-reference order. */
export function conditionFields(condition: RuleCondition): DecisionField[] {
    const fields: DecisionField[] = [];
    collectFields(condition, fields);
    return fields;
}

function collectFields(condition: RuleCondition, into: DecisionField[]): void {
    switch (condition.kind) {
        case 'always':
            return;
        case 'all':
            condition.conditions.forEach((child) => collectFields(child, into));
            return;
        default:
            if (!into.includes(condition.field)) {
                into.push(condition.field);
            }
    }
}

function isPresent(value: EnrichedAdvisory[DecisionField]): boolean {
    if (value === null) {
        return false;
    }

    return typeof value !== 'string' || value.trim().length > 0;
}
