export {
  SIGNAL_NAMES,
  PRIOR_WEIGHTS,
  scoreSignals,
  applyFeedbackToWeights,
  replayFeedback,
  initialWeightState,
} from './weights';
export { MemoryFeedbackStore } from './store';
export { FileFeedbackStore } from './fileStore';
export {
  FeedbackEngine,
  getFeedbackEngine,
  resetFeedbackEngine,
  recordFeedback,
  getFeedbackStats,
} from './engine';
export type { FeedbackEngineOptions } from './engine';
