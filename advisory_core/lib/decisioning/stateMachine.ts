import type { AdvisoryState } from '../observations';
import type { StateType } from './types';

export const FINAL_STATES: readonly AdvisoryState[] = ['fixed', 'not_applicable', 'wont_fix'];
export const NON_FINAL_STATES: readonly AdvisoryState[] = ['pending_upstream', 'under_investigation'];

export type TransitionKind = 'initial' | 'unchanged' | 'progress' | 'final_change' | 'regression';

export interface TransitionAssessment {
    from: AdvisoryState | null;
    to: AdvisoryState;
    kind: TransitionKind;
    requiresReview: boolean;
}

export interface TransitionContext {
    reasonCode: string;
    trustedReasonCodes: ReadonlySet<string>;
}

export function stateTypeOf(state: AdvisoryState): StateType {
    return FINAL_STATES.includes(state) ? 'final' : 'non_final';
}

export function isFinalState(state: AdvisoryState): boolean {
    return stateTypeOf(state) === 'final';
}

/**
 * Classifies a state change. Moving a final state back to a non-final one is a regression: it is
 * recorded, and it needs review unless the deciding reason code belongs to a trusted authority.
 */
export function assessTransition(
    previous: AdvisoryState | null,
    next: AdvisoryState,
    context: TransitionContext,
): TransitionAssessment {
    const kind = classify(previous, next);

    return {
        from: previous,
        to: next,
        kind,
        requiresReview: kind === 'regression' && !context.trustedReasonCodes.has(context.reasonCode),
    };
}

function classify(previous: AdvisoryState | null, next: AdvisoryState): TransitionKind {
    if (previous === null) {
        return 'initial';
    }

    if (previous === next) {
        return 'unchanged';
    }

    if (!isFinalState(previous)) {
        return 'progress';
    }

    return isFinalState(next) ? 'final_change' : 'regression';
}
