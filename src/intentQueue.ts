// src/intentQueue.ts
import { logEvent } from './logger';

export type Sink<T> = (record: Readonly<T>) => void | Promise<void>;

/**
 * Buffers egress records and hands them to sinks on a later turn of the
 * event loop. The engine enqueues and moves on; sinks never run inside tick
 * processing, and a failing sink is logged without affecting the others.
 */
export class IntentQueue<T extends object> {
  private readonly name: string;
  private readonly sinks: Sink<T>[] = [];
  private readonly buffer: Readonly<T>[] = [];
  private readonly history: Readonly<T>[] = [];
  private readonly historyLimit: number;
  private scheduled = false;
  private inFlight: Promise<void> = Promise.resolve();

  constructor(name: string, historyLimit = 200) {
    this.name = name;
    this.historyLimit = historyLimit;
  }

  subscribe(sink: Sink<T>): () => void {
    this.sinks.push(sink);
    return () => {
      const idx = this.sinks.indexOf(sink);
      if (idx !== -1) this.sinks.splice(idx, 1);
    };
  }

  enqueue(record: T): Readonly<T> {
    const frozen = Object.freeze(record);
    this.buffer.push(frozen);
    this.history.push(frozen);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
    this.schedule();
    return frozen;
  }

  get pending(): number {
    return this.buffer.length;
  }

  // Most recent records, oldest first.
  recent(): readonly Readonly<T>[] {
    return this.history;
  }

  // Resolves once everything queued so far has been delivered.
  async drain(): Promise<void> {
    while (this.scheduled || this.buffer.length > 0) {
      await new Promise<void>((resolve) => setImmediate(resolve));
      await this.inFlight;
    }
    await this.inFlight;
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => {
      this.scheduled = false;
      const batch = this.buffer.splice(0, this.buffer.length);
      this.inFlight = this.inFlight.then(() => this.deliver(batch));
    });
  }

  private async deliver(batch: Readonly<T>[]): Promise<void> {
    for (const record of batch) {
      for (const sink of this.sinks) {
        try {
          await sink(record);
        } catch (e) {
          logEvent('error', `${this.name} sink failed`, { error: String(e) });
        }
      }
    }
  }
}
