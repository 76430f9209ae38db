export { runQualityChecks } from './qualityChecks';
export type { QualityCheckOptions } from './qualityChecks';
export { RunMetrics, combineObservers } from './runMetrics';
export type {
    QualityCheckResult,
    QualityNote,
    QualityNoteKind,
    RunMetricsSummary,
    RunObserver,
    StateTransition,
} from './types';
