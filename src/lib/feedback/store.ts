import type { SignalVector } from '../../types/bom';
import type { FeedbackEvent, FeedbackStore, FeedbackWeightState } from '../../types/feedback';
import { SIGNAL_NAMES } from './weights';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSignalVector(value: unknown): value is SignalVector {
  if (!isRecord(value)) return false;
  return Object.entries(value).every(
    ([name, v]) => SIGNAL_NAMES.some((s) => s === name) && (v === undefined || typeof v === 'number')
  );
}

export function isWeightState(value: unknown): value is FeedbackWeightState {
  if (!isRecord(value) || !isRecord(value.weights)) return false;
  const weights = value.weights;
  return (
    typeof value.totalMass === 'number' &&
    typeof value.lastSeq === 'number' &&
    SIGNAL_NAMES.every((name) => typeof weights[name] === 'number')
  );
}

export function isFeedbackEvent(value: unknown): value is FeedbackEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.seq === 'number' &&
    typeof value.itemKey === 'string' &&
    (value.verdict === 'correct' || value.verdict === 'needs_review') &&
    typeof value.timestamp === 'string' &&
    (value.signals === null || isSignalVector(value.signals))
  );
}

export class MemoryFeedbackStore implements FeedbackStore {
  private snapshot: FeedbackWeightState | null = null;
  private events: FeedbackEvent[] = [];
  private items: Record<string, SignalVector> = {};

  async loadSnapshot(): Promise<FeedbackWeightState | null> {
    return this.snapshot ? { ...this.snapshot, weights: { ...this.snapshot.weights } } : null;
  }

  async saveSnapshot(state: FeedbackWeightState): Promise<void> {
    this.snapshot = { ...state, weights: { ...state.weights } };
  }

  async loadEvents(): Promise<FeedbackEvent[]> {
    return [...this.events];
  }

  async appendEvent(event: FeedbackEvent): Promise<void> {
    this.events.push(event);
  }

  async loadItemSignals(): Promise<Record<string, SignalVector>> {
    return { ...this.items };
  }

  async saveItemSignals(items: Record<string, SignalVector>): Promise<void> {
    this.items = { ...items };
  }
}
