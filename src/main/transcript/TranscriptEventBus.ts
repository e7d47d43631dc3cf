import { EventEmitter } from 'events';
import {
  EventEnvelope,
  TranscriptionEvent,
  TranscriptionEventBody,
  TranscriptionEventType,
} from '../../shared/types/events';
import { describeError } from '../errors';

export type DeliveryMode = 'lossless' | 'best-effort';

export type TranscriptListener<E extends TranscriptionEvent = TranscriptionEvent> =
  (event: E) => void | Promise<void>;

export type EventOfType<K extends TranscriptionEventType> = Extract<TranscriptionEvent, { type: K }>;

export interface SubscribeOptions {
  /** Only these event types are delivered. Defaults to all. */
  types?: TranscriptionEventType[];
  /**
   * lossless: every event is delivered, however slow the listener.
   * best-effort: at most `maxQueue` events wait; the oldest is dropped first.
   */
  mode?: DeliveryMode;
  maxQueue?: number;
  /** Used in log lines. */
  name?: string;
}

export type Unsubscribe = () => void;

export function isEventOfType<K extends TranscriptionEventType>(
  event: TranscriptionEvent,
  type: K,
): event is EventOfType<K> {
  return event.type === type;
}

class Subscription {
  private queue: TranscriptionEvent[] = [];
  private draining: Promise<void> | null = null;
  private _dropped = 0;
  private active = true;

  constructor(
    readonly name: string,
    private readonly listener: TranscriptListener,
    private readonly types: ReadonlySet<TranscriptionEventType> | null,
    private readonly mode: DeliveryMode,
    private readonly maxQueue: number,
  ) {}

  get dropped(): number {
    return this._dropped;
  }

  get isDraining(): boolean {
    return this.draining !== null;
  }

  deliver(event: TranscriptionEvent): void {
    if (!this.active) return;
    if (this.types && !this.types.has(event.type)) return;

    if (this.mode === 'best-effort' && this.queue.length >= this.maxQueue) {
      this.queue.shift();
      this._dropped++;
    }
    this.queue.push(event);

    if (!this.draining) {
      this.draining = this.drain();
    }
  }

  /** Resolves once everything queued so far has been handled. */
  settled(): Promise<void> {
    return this.draining ?? Promise.resolve();
  }

  cancel(): void {
    this.active = false;
    this.queue = [];
  }

  private async drain(): Promise<void> {
    // Yield first so publish() never runs listener code synchronously.
    await Promise.resolve();

    let event = this.queue.shift();
    while (event) {
      try {
        await this.listener(event);
      } catch (err) {
        console.error(`[Bus] Subscriber "${this.name}" failed on ${event.type} #${event.seq}:`, describeError(err));
      }
      event = this.queue.shift();
    }
    this.draining = null;
  }
}

/**
 * Fan-out of transcription events. `publish` stamps each event with a
 * monotonically increasing `seq`; every subscriber sees its events in that
 * order, one at a time.
 *
 * Also emits every event synchronously as 'event' for in-process observers.
 */
export class TranscriptEventBus extends EventEmitter {
  private seq = 0;
  private subscriptions = new Set<Subscription>();

  get lastSeq(): number {
    return this.seq;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  publish<B extends TranscriptionEventBody>(body: B): B & EventEnvelope {
    const event = { ...body, seq: ++this.seq, timestamp: Date.now() };
    try {
      this.emit('event', event);
    } catch (err) {
      console.error(`[Bus] Observer failed on ${event.type} #${event.seq}:`, describeError(err));
    }
    for (const subscription of this.subscriptions) {
      subscription.deliver(event);
    }
    return event;
  }

  subscribe(listener: TranscriptListener, options: SubscribeOptions = {}): Unsubscribe {
    const subscription = new Subscription(
      options.name ?? `subscriber-${this.subscriptions.size + 1}`,
      listener,
      options.types ? new Set(options.types) : null,
      options.mode ?? 'lossless',
      Math.max(1, options.maxQueue ?? 64),
    );
    this.subscriptions.add(subscription);

    return () => {
      subscription.cancel();
      this.subscriptions.delete(subscription);
    };
  }

  /** Subscribe to one event type with a listener typed for it. */
  subscribeTo<K extends TranscriptionEventType>(
    type: K,
    listener: TranscriptListener<EventOfType<K>>,
    options: Omit<SubscribeOptions, 'types'> = {},
  ): Unsubscribe {
    return this.subscribe(
      (event) => (isEventOfType(event, type) ? listener(event) : undefined),
      { ...options, types: [type] },
    );
  }

  /** Resolves once every subscriber has caught up with what was published. */
  async settled(): Promise<void> {
    let pending = [...this.subscriptions].map((s) => s.settled());
    while (pending.length > 0) {
      await Promise.all(pending);
      pending = [...this.subscriptions].filter((s) => s.isDraining).map((s) => s.settled());
    }
  }

  /** Best-effort events dropped across all current subscribers. */
  get droppedDeliveries(): number {
    let total = 0;
    for (const subscription of this.subscriptions) total += subscription.dropped;
    return total;
  }

  clear(): void {
    for (const subscription of this.subscriptions) subscription.cancel();
    this.subscriptions.clear();
  }
}
