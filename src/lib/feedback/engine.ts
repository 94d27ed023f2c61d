import type {
  BomItem,
  FeedbackSummary,
  ReconciledItem,
  SignalVector,
  Verdict,
} from '../../types/bom';
import type {
  FeedbackEvent,
  FeedbackOutcome,
  FeedbackStats,
  FeedbackStore,
  FeedbackWeightState,
  SignalWeights,
} from '../../types/feedback';
import { DEFAULT_CONFIG, loadConfig, type BomExtractorConfig } from '../bom/config';
import { BomExtractionError } from '../bom/errors';
import { FileFeedbackStore } from './fileStore';
import { SerialQueue } from './serialQueue';
import { MemoryFeedbackStore } from './store';
import { applyFeedbackEvent, initialWeightState, replayFeedback, scoreSignals } from './weights';

export interface FeedbackEngineOptions {
  store?: FeedbackStore;
  learningRate?: number;
  priorWeights?: SignalWeights;
  snapshotInterval?: number;
  now?: () => Date;
}

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

function sameSignals(a: SignalVector | undefined, b: SignalVector): boolean {
  return a !== undefined && JSON.stringify(a) === JSON.stringify(b);
}

export class FeedbackEngine {
  private state: FeedbackWeightState;
  private readonly events: FeedbackEvent[];
  private readonly itemSignals: Map<string, SignalVector>;
  private readonly verdicts = new Map<string, Verdict>();
  private readonly queue = new SerialQueue();
  private readonly store: FeedbackStore;
  private readonly learningRate: number;
  private readonly snapshotInterval: number;
  private readonly now: () => Date;
  private sinceSnapshot = 0;

  private constructor(
    store: FeedbackStore,
    state: FeedbackWeightState,
    events: FeedbackEvent[],
    itemSignals: Record<string, SignalVector>,
    options: Required<Pick<FeedbackEngineOptions, 'learningRate' | 'snapshotInterval' | 'now'>>
  ) {
    this.store = store;
    this.state = state;
    this.events = [...events].sort((a, b) => a.seq - b.seq);
    this.itemSignals = new Map(Object.entries(itemSignals));
    this.learningRate = options.learningRate;
    this.snapshotInterval = options.snapshotInterval;
    this.now = options.now;
    for (const event of this.events) this.verdicts.set(event.itemKey, event.verdict);
  }

  /** Loads the latest snapshot (or the prior) and replays every event recorded after it. */
  static async open(options: FeedbackEngineOptions = {}): Promise<FeedbackEngine> {
    const learningRate = options.learningRate ?? DEFAULT_CONFIG.learningRate;
    if (!(learningRate > 0 && learningRate < 1)) {
      throw new BomExtractionError(`learningRate must be in (0, 1), got ${learningRate}`, 'feedback');
    }

    const store = options.store ?? new MemoryFeedbackStore();
    const [snapshot, events, itemSignals] = await Promise.all([
      store.loadSnapshot(),
      store.loadEvents(),
      store.loadItemSignals(),
    ]);
    const state = replayFeedback(events, snapshot ?? initialWeightState(options.priorWeights), learningRate);

    return new FeedbackEngine(store, state, events, itemSignals, {
      learningRate,
      snapshotInterval: options.snapshotInterval ?? DEFAULT_CONFIG.snapshotInterval,
      now: options.now ?? (() => new Date()),
    });
  }

  getWeightState(): FeedbackWeightState {
    return { ...this.state, weights: { ...this.state.weights } };
  }

  async scoreItems(items: ReconciledItem[]): Promise<BomItem[]> {
    const weights = { ...this.state.weights };
    let changed = false;

    const scored = items.map((item): BomItem => {
      if (!sameSignals(this.itemSignals.get(item.itemKey), item.signals)) {
        this.itemSignals.set(item.itemKey, item.signals);
        changed = true;
      }
      return {
        ...item,
        confidence: round4(scoreSignals(item.signals, weights)),
        verdict: this.verdicts.get(item.itemKey) ?? 'unrated',
      };
    });

    if (changed) {
      await this.queue.run(() => this.store.saveItemSignals(Object.fromEntries(this.itemSignals)));
    }
    return scored;
  }

  recordFeedback(itemKey: string, verdict: Verdict): Promise<FeedbackOutcome> {
    if (verdict !== 'correct' && verdict !== 'needs_review') {
      return Promise.reject(new BomExtractionError(`Unknown verdict: ${String(verdict)}`, 'feedback'));
    }

    return this.queue.run(async (): Promise<FeedbackOutcome> => {
      const signals = this.itemSignals.get(itemKey) ?? null;
      const event: FeedbackEvent = {
        seq: this.state.lastSeq + 1,
        itemKey,
        verdict,
        timestamp: this.now().toISOString(),
        signals,
      };

      await this.store.appendEvent(event);
      this.events.push(event);
      this.state = applyFeedbackEvent(this.state, event, this.learningRate);
      this.verdicts.set(itemKey, verdict);

      this.sinceSnapshot++;
      if (this.sinceSnapshot >= this.snapshotInterval) {
        await this.store.saveSnapshot(this.state);
        this.sinceSnapshot = 0;
      }

      if (!signals) {
        console.warn(`[feedback] No scored item has key ${itemKey}; event recorded, weights unchanged`);
        return { applied: false, reason: 'unknown_item_key', event };
      }
      return { applied: true, event };
    });
  }

  getFeedbackStats(): FeedbackStats {
    const count = this.events.length;
    const correct = this.events.filter((e) => e.verdict === 'correct').length;
    return {
      count,
      correctRatio: count > 0 ? correct / count : 0,
      weights: { ...this.state.weights },
      unknownKeyCount: this.events.filter((e) => e.signals === null).length,
    };
  }

  summary(): FeedbackSummary {
    const { count, correctRatio } = this.getFeedbackStats();
    return { count, correctRatio };
  }

  /** Waits for queued writes and persists a snapshot of the current weights. */
  flush(): Promise<void> {
    return this.queue.run(async () => {
      await this.store.saveSnapshot(this.state);
      this.sinceSnapshot = 0;
    });
  }
}

let defaultEngine: Promise<FeedbackEngine> | null = null;

export function getFeedbackEngine(config: BomExtractorConfig = loadConfig()): Promise<FeedbackEngine> {
  if (!defaultEngine) {
    defaultEngine = FeedbackEngine.open({
      store: new FileFeedbackStore(config.learningPath),
      learningRate: config.learningRate,
      snapshotInterval: config.snapshotInterval,
    }).catch((err: unknown) => {
      defaultEngine = null;
      throw err;
    });
  }
  return defaultEngine;
}

export function resetFeedbackEngine(): void {
  defaultEngine = null;
}

export async function recordFeedback(itemKey: string, verdict: Verdict): Promise<FeedbackOutcome> {
  const engine = await getFeedbackEngine();
  return engine.recordFeedback(itemKey, verdict);
}

export async function getFeedbackStats(): Promise<FeedbackStats> {
  const engine = await getFeedbackEngine();
  return engine.getFeedbackStats();
}
