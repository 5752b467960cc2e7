export { PrettifiedBlock } from './block'
export { PrettifierPipeline, type PipelineOptions, type RowLine } from './pipeline'
