export { encodeRowsToFrames, runPipeline, simulateNetworkLayer } from './pipeline';
export { formatEssential, formatStats } from './helpers';
export type {
  ClassifiedFrame,
  EncodeOptions,
  NetworkLayerOptions,
  NetworkLayerResult,
  PipelineConfig,
  PipelineResult
} from './types';
