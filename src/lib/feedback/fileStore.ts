import { appendFile, mkdir, readFile, rename, truncate, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { SignalVector } from '../../types/bom';
import type { FeedbackEvent, FeedbackStore, FeedbackWeightState } from '../../types/feedback';
import { getErrorMessage } from '../bom/errors';
import { isFeedbackEvent, isRecord, isSignalVector, isWeightState } from './store';

const EVENTS_FILE = 'events.jsonl';
const SNAPSHOT_FILE = 'snapshot.json';
const ITEMS_FILE = 'items.json';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf8');
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

/**
 * Events go to a JSON-lines log, one append per event. Snapshot and item
 * signals are replaced whole through a temp file and rename.
 */
export class FileFeedbackStore implements FeedbackStore {
  readonly dir: string;
  private ready: Promise<void> | null = null;

  constructor(dir: string) {
    this.dir = dir;
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = mkdir(this.dir, { recursive: true }).then(() => undefined);
    }
    return this.ready;
  }

  private async writeAtomic(file: string, data: unknown): Promise<void> {
    await this.ensureDir();
    const target = join(this.dir, file);
    const tmp = `${target}.${process.pid}.tmp`;
    await writeFile(tmp, JSON.stringify(data, null, 2), 'utf8');
    await rename(tmp, target);
  }

  async loadSnapshot(): Promise<FeedbackWeightState | null> {
    const raw = await readOptional(join(this.dir, SNAPSHOT_FILE));
    if (raw === null) return null;
    const parsed: unknown = JSON.parse(raw);
    if (!isWeightState(parsed)) {
      console.warn(`[feedback] Ignoring malformed snapshot in ${this.dir}`);
      return null;
    }
    return parsed;
  }

  async saveSnapshot(state: FeedbackWeightState): Promise<void> {
    await this.writeAtomic(SNAPSHOT_FILE, state);
  }

  /**
   * A torn final line is what an interrupted append leaves behind. It is cut
   * off the file so the next append starts on a fresh line.
   */
  async loadEvents(): Promise<FeedbackEvent[]> {
    const path = join(this.dir, EVENTS_FILE);
    const raw = await readOptional(path);
    if (raw === null) return [];

    const events: FeedbackEvent[] = [];
    const lines = raw.split('\n');
    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (err) {
        if (index === lines.length - 1) {
          console.warn(`[feedback] Dropping truncated event line ${index + 1}: ${getErrorMessage(err)}`);
          await truncate(path, Buffer.byteLength(raw.slice(0, raw.lastIndexOf('\n') + 1), 'utf8'));
          break;
        }
        throw new Error(`Corrupt feedback log at line ${index + 1}: ${getErrorMessage(err)}`);
      }
      if (!isFeedbackEvent(parsed)) {
        throw new Error(`Corrupt feedback log at line ${index + 1}: not a feedback event`);
      }
      events.push(parsed);
    }
    return events;
  }

  async appendEvent(event: FeedbackEvent): Promise<void> {
    await this.ensureDir();
    await appendFile(join(this.dir, EVENTS_FILE), `${JSON.stringify(event)}\n`, 'utf8');
  }

  async loadItemSignals(): Promise<Record<string, SignalVector>> {
    const raw = await readOptional(join(this.dir, ITEMS_FILE));
    if (raw === null) return {};
    const parsed: unknown = JSON.parse(raw);
    const items: Record<string, SignalVector> = {};
    if (!isRecord(parsed)) return items;
    for (const [key, value] of Object.entries(parsed)) {
      if (isSignalVector(value)) items[key] = value;
    }
    return items;
  }

  async saveItemSignals(items: Record<string, SignalVector>): Promise<void> {
    await this.writeAtomic(ITEMS_FILE, items);
  }
}
