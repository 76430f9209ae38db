export { runWithConcurrency } from './concurrency';
export { runAdvisoryPipeline } from './runAdvisoryPipeline';
export type { AdvisoryOutcome, AdvisoryPipelineOptions, PipelineRunSummary } from './types';
