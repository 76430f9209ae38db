export { PipelineConfigError } from './errors';
export type { PipelineConfigErrorCode } from './errors';
export {
    DEFAULT_INDEX_NAMES,
    DEFAULT_PIPELINE_CONFIG,
    PipelineConfigSchema,
    loadPipelineConfig,
    parsePipelineConfig,
    resolveRuntimeEnvironment,
} from './pipelineConfig';
export type { PipelineConfig, PipelineConfigInput, RuntimeEnvironment } from './pipelineConfig';
