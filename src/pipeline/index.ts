export { PipelineModule } from './pipeline.module';
export { PipelineService, hasFailures } from './pipeline.service';
export type { PipelineRunSummary, StageSummary } from './pipeline.service';
