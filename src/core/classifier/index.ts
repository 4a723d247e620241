export { classify, classifyReading, trainStats, updateStats } from './classifier';
export { CLASSIFICATION_RULES, DEFAULT_TOLERANCE, validateTolerance } from './helpers';
export { deriveSignalFrame, toggle } from './toggle';
export type {
  Band,
  Classification,
  ClassificationRule,
  ClassifierStats,
  FrameFlag,
  Reading,
  SignalFrameOptions
} from './types';
