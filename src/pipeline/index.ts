export { runPipeline, DEFAULT_MAX_PENDING_BATCHES, type PipelineOptions } from './run-pipeline.js';
export {
  summarizeRun,
  formatRunSummary,
  type RunSummary,
  type RunStatus,
  type FailedBatchReport,
  type SkippedEntity,
  type ExtractionTally,
} from './summary.js';
