export {
  PipelineError,
  ConfigError,
  FetchError,
  TransformError,
  LoadError,
  wrapError,
} from './pipeline-error.js';
export type {
  ErrorCode,
  PipelineStage,
  PipelineErrorDetails,
  FetchErrorDetails,
  TransformErrorDetails,
} from './pipeline-error.js';
