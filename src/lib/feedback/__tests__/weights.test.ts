import { describe, it, expect } from 'vitest';
import type { SignalVector } from '../../../types/bom';
import type { FeedbackEvent } from '../../../types/feedback';
import {
  PRIOR_WEIGHTS,
  applyFeedbackEvent,
  applyFeedbackToWeights,
  initialWeightState,
  replayFeedback,
  scoreSignals,
  totalMass,
} from '../weights';

const signals: SignalVector = { header_match_strength: 1, extraction_prior: 0.9 };

function event(seq: number, verdict: FeedbackEvent['verdict'], s: SignalVector | null = signals): FeedbackEvent {
  return { seq, itemKey: `item-${seq}`, verdict, timestamp: '2026-01-01T00:00:00.000Z', signals: s };
}

describe('scoreSignals', () => {
  it('averages the signals an item carries', () => {
    expect(scoreSignals(signals, PRIOR_WEIGHTS)).toBeCloseTo(2.55 / 2.7);
  });

  it('ignores absent signals and clamps values', () => {
    expect(scoreSignals({}, PRIOR_WEIGHTS)).toBe(0);
    expect(scoreSignals({ column_alignment: 2 }, PRIOR_WEIGHTS)).toBe(1);
  });
});

describe('initialWeightState', () => {
  it('starts from the prior', () => {
    const state = initialWeightState();
    expect(state.weights).toEqual(PRIOR_WEIGHTS);
    expect(state.totalMass).toBeCloseTo(8.4);
    expect(state.lastSeq).toBe(0);
  });

  it('rejects negative weights', () => {
    expect(() => initialWeightState({ ...PRIOR_WEIGHTS, listing_structure: -1 })).toThrow(
      'Prior weight for listing_structure must be a non-negative number'
    );
  });
});

describe('applyFeedbackToWeights', () => {
  it('keeps the total weight mass', () => {
    const state = initialWeightState();
    const next = applyFeedbackToWeights(state, signals, 'needs_review', 0.05);
    expect(totalMass(next.weights)).toBeCloseTo(state.totalMass, 10);
  });

  it('moves a confidence by at most the learning rate', () => {
    const rate = 0.3;
    const vectors: SignalVector[] = [
      signals,
      { callout_numeric_prefix: 0.5, extraction_prior: 0.7 },
      { geometry_cluster_size: 0.2, geometry_cluster_tightness: 1, extraction_prior: 0.3 },
    ];
    for (const v of vectors) {
      for (const verdict of ['correct', 'needs_review'] as const) {
        const state = initialWeightState();
        const before = scoreSignals(v, state.weights);
        const after = scoreSignals(v, applyFeedbackToWeights(state, v, verdict, rate).weights);
        expect(Math.abs(after - before)).toBeLessThanOrEqual(rate);
      }
    }
  });

  it('lowers the strongest signal and the confidence on repeated rejections', () => {
    let state = initialWeightState();
    for (let i = 0; i < 10; i++) {
      const next = applyFeedbackToWeights(state, signals, 'needs_review', 0.05);
      expect(next.weights.header_match_strength).toBeLessThan(state.weights.header_match_strength);
      expect(scoreSignals(signals, next.weights)).toBeLessThan(scoreSignals(signals, state.weights));
      expect(totalMass(next.weights)).toBeCloseTo(8.4, 10);
      state = next;
    }
  });

  it('raises the confidence on approval', () => {
    const state = initialWeightState();
    const next = applyFeedbackToWeights(state, signals, 'correct', 0.05);
    expect(scoreSignals(signals, next.weights)).toBeGreaterThan(scoreSignals(signals, state.weights));
  });
});

describe('replayFeedback', () => {
  const events = [event(1, 'correct'), event(2, 'needs_review'), event(3, 'needs_review'), event(4, 'correct')];

  it('gives the same weights on every replay', () => {
    const first = replayFeedback(events, initialWeightState(), 0.05);
    const second = replayFeedback([...events].reverse(), initialWeightState(), 0.05);
    expect(second).toEqual(first);
    expect(first.lastSeq).toBe(4);
  });

  it('continues from a snapshot', () => {
    const full = replayFeedback(events, initialWeightState(), 0.05);
    const snapshot = replayFeedback(events.slice(0, 2), initialWeightState(), 0.05);
    expect(replayFeedback(events, snapshot, 0.05)).toEqual(full);
  });

  it('only advances the sequence for events without signals', () => {
    const state = applyFeedbackEvent(initialWeightState(), event(7, 'correct', null), 0.05);
    expect(state.weights).toEqual(PRIOR_WEIGHTS);
    expect(state.lastSeq).toBe(7);
  });
});
