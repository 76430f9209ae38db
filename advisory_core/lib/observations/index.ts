export { aggregateObservations } from './aggregate';
export type { AggregationOptions } from './aggregate';
export { ObservationValidationError } from './errors';
export type { ObservationValidationErrorCode } from './errors';
export {
    normalizeCorpusRow,
    normalizeEcosystemAdvisory,
    normalizeOverrideRow,
    normalizeRegistryRecord,
} from './rawFeeds';
export type { CorpusRow, EcosystemAdvisory, OverrideCsvRow, RegistryRecord } from './rawFeeds';
export { ObservationBatchSchema, SourceObservationSchema, parseObservationBatch } from './schema';
export { SOURCE_IDS } from './sources';
export type { KnownSourceId } from './sources';
export { ADVISORY_STATES } from './types';
export type {
    AdvisoryState,
    AggregationResult,
    DropReason,
    DroppedObservation,
    ObservationGroup,
    ObservationIssue,
    ParsedObservationBatch,
    SourceObservation,
} from './types';
