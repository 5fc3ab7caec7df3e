export {
  QueryPipeline,
  type PipelineDependencies,
  type PipelineOptions,
  type PipelineResult
} from './pipeline.js';
