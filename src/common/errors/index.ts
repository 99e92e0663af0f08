export {
  PipelineError,
  ParseError,
  FetchError,
  IngestRowError,
  CsvFormatError,
  InsufficientDataError,
  ConfigurationError,
  StageTransitionError,
  describeError,
} from './pipeline.errors';
export type { StrategyFailure, FetchErrorDetails } from './pipeline.errors';
