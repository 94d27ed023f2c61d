import type { SignalName, SignalVector, Verdict } from './bom';

export type SignalWeights = Record<SignalName, number>;

export interface FeedbackWeightState {
  weights: SignalWeights;
  totalMass: number;
  lastSeq: number;
}

export interface FeedbackEvent {
  seq: number;
  itemKey: string;
  verdict: Verdict;
  timestamp: string;
  /** Null when the key was never scored; such events leave the weights alone. */
  signals: SignalVector | null;
}

export type FeedbackOutcome =
  | { applied: true; event: FeedbackEvent }
  | { applied: false; reason: 'unknown_item_key'; event: FeedbackEvent };

export interface FeedbackStats {
  count: number;
  correctRatio: number;
  weights: SignalWeights;
  unknownKeyCount: number;
}

export interface FeedbackStore {
  loadSnapshot(): Promise<FeedbackWeightState | null>;
  saveSnapshot(state: FeedbackWeightState): Promise<void>;
  loadEvents(): Promise<FeedbackEvent[]>;
  appendEvent(event: FeedbackEvent): Promise<void>;
  loadItemSignals(): Promise<Record<string, SignalVector>>;
  saveItemSignals(items: Record<string, SignalVector>): Promise<void>;
}
