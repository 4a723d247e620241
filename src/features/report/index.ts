export { buildPlotSeries, describeFrame, describeFrames, formatSummary, summarizeRun } from './report';
export type { PlotPoint, PlotSeries, PlotValue, RunSummary } from './types';
