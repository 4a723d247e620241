/**
 * Report type definitions
 */

/**
 * Counts from one pipeline run
 */
export interface RunSummary {
  /** Frames classified */
  total: number;
  /** Frames that matched a rule */
  essential: number;
  /** Signal frames derived */
  signal: number;
  /** essential * 100 / total, 0 for an empty run */
  essentialPercentage: number;
}

/**
 * Value plotted for one frame
 */
export type PlotValue = 'sensor' | 'essential' | 'High' | 'Low' | 'Off';

/**
 * One point on the run chart, split into date and time of day
 */
export interface PlotPoint {
  /** YYYY-MM-DD */
  date: string;
  /** HH:MM:SS */
  time: string;
  value: PlotValue;
}

/**
 * Chart data for a run
 */
export interface PlotSeries {
  /** Share of frames passed on as essential */
  percentage: number;
  sensors: PlotPoint[];
  essentials: PlotPoint[];
  signals: PlotPoint[];
}
