import type { SignalName, SignalVector, Verdict } from '../../types/bom';
import type { FeedbackEvent, FeedbackWeightState, SignalWeights } from '../../types/feedback';

export const SIGNAL_NAMES: SignalName[] = [
  'header_match_strength',
  'column_alignment',
  'callout_numeric_prefix',
  'listing_structure',
  'geometry_cluster_size',
  'geometry_cluster_tightness',
  'lexical_keyword_strength',
  'source_agreement',
  'extraction_prior',
];

export const PRIOR_WEIGHTS: SignalWeights = {
  header_match_strength: 1.2,
  column_alignment: 1.0,
  callout_numeric_prefix: 0.9,
  listing_structure: 0.6,
  geometry_cluster_size: 0.7,
  geometry_cluster_tightness: 0.7,
  lexical_keyword_strength: 0.8,
  source_agreement: 1.0,
  extraction_prior: 1.5,
};

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export function totalMass(weights: SignalWeights): number {
  return SIGNAL_NAMES.reduce((sum, name) => sum + weights[name], 0);
}

export function initialWeightState(prior: SignalWeights = PRIOR_WEIGHTS): FeedbackWeightState {
  const weights = { ...prior };
  for (const name of SIGNAL_NAMES) {
    if (!Number.isFinite(weights[name]) || weights[name] < 0) {
      throw new Error(`Prior weight for ${name} must be a non-negative number`);
    }
  }
  return { weights, totalMass: totalMass(weights), lastSeq: 0 };
}

export function activeSignals(signals: SignalVector): SignalName[] {
  return SIGNAL_NAMES.filter((name) => signals[name] !== undefined);
}

export function scoreSignals(signals: SignalVector, weights: SignalWeights): number {
  let weighted = 0;
  let mass = 0;
  for (const name of activeSignals(signals)) {
    const value = clamp01(signals[name] ?? 0);
    weighted += weights[name] * value;
    mass += weights[name];
  }
  if (mass <= 0) return 0;
  return clamp01(weighted / mass);
}

/**
 * Multiplicative update on the signals the rated item carried, then a uniform
 * rescale back to the state's total mass. The common factor cancels inside
 * `scoreSignals`, so an item's confidence moves by at most `learningRate`.
 */
export function applyFeedbackToWeights(
  state: FeedbackWeightState,
  signals: SignalVector,
  verdict: Verdict,
  learningRate: number
): FeedbackWeightState {
  const direction = verdict === 'correct' ? 1 : -1;
  const next = { ...state.weights };
  for (const name of activeSignals(signals)) {
    next[name] = next[name] * (1 + learningRate * direction * clamp01(signals[name] ?? 0));
  }

  const mass = totalMass(next);
  if (mass > 0) {
    const scale = state.totalMass / mass;
    for (const name of SIGNAL_NAMES) next[name] *= scale;
  }
  return { ...state, weights: next };
}

export function applyFeedbackEvent(
  state: FeedbackWeightState,
  event: FeedbackEvent,
  learningRate: number
): FeedbackWeightState {
  const updated = event.signals
    ? applyFeedbackToWeights(state, event.signals, event.verdict, learningRate)
    : state;
  return { ...updated, lastSeq: Math.max(state.lastSeq, event.seq) };
}

export function replayFeedback(
  events: FeedbackEvent[],
  prior: FeedbackWeightState,
  learningRate: number
): FeedbackWeightState {
  return [...events]
    .filter((e) => e.seq > prior.lastSeq)
    .sort((a, b) => a.seq - b.seq)
    .reduce((state, event) => applyFeedbackEvent(state, event, learningRate), prior);
}
