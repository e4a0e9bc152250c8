import type { Logger } from "../lib/log";
import { metrics } from "../lib/metrics";

export type ChangeType = "created" | "updated" | "deleted";

export type ChangeEvent<T> = {
  type: ChangeType;
  channel: string;
  entity: T;
  at: number;
};

/**
 * One subscriber's ordered view of a channel. Iterate it with `for await`, or take what is buffered with `drain()`.
 * Only events published after `subscribe()` are seen.
 */
export interface ChangeStream<T> extends AsyncIterable<ChangeEvent<T>> {
  next(): Promise<IteratorResult<ChangeEvent<T>, undefined>>;
  drain(): ChangeEvent<T>[];
  close(): void;
  readonly dropped: number;
  readonly closed: boolean;
}

export type SubscribeOptions = { bufferSize?: number };

type Waiter<T> = (result: IteratorResult<ChangeEvent<T>, undefined>) => void;

class BufferedStream<T> implements ChangeStream<T> {
  private buffer: ChangeEvent<T>[] = [];
  private waiters: Waiter<T>[] = [];
  private droppedCount = 0;
  private isClosed = false;

  constructor(
    private readonly capacity: number,
    private readonly onDrop: () => void,
    private readonly onClose: (stream: BufferedStream<T>) => void,
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  push(event: ChangeEvent<T>): void {
    if (this.isClosed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ done: false, value: event });
      return;
    }
    this.buffer.push(event);
    if (this.buffer.length > this.capacity) {
      // Oldest entries go first; the publisher never waits.
      this.buffer.shift();
      this.droppedCount += 1;
      this.onDrop();
    }
  }

  next(): Promise<IteratorResult<ChangeEvent<T>, undefined>> {
    const event = this.buffer.shift();
    if (event) return Promise.resolve({ done: false, value: event });
    if (this.isClosed) return Promise.resolve({ done: true, value: undefined });
    return new Promise(resolve => this.waiters.push(resolve));
  }

  drain(): ChangeEvent<T>[] {
    const out = this.buffer;
    this.buffer = [];
    return out;
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.onClose(this);
    for (const waiter of this.waiters.splice(0)) waiter({ done: true, value: undefined });
  }

  [Symbol.asyncIterator](): AsyncIterator<ChangeEvent<T>, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { done: true, value: undefined };
      },
    };
  }
}

/** Broadcast channel for one entity kind. `publish` is fire-and-forget and never blocks on slow subscribers. */
export class ChangeNotifier<T> {
  private readonly subscribers = new Set<BufferedStream<T>>();

  constructor(
    readonly channel: string,
    private readonly defaultBufferSize = 256,
    private readonly logger?: Logger,
    private readonly clock: () => number = Date.now,
  ) {}

  publish(type: ChangeType, entity: T): void {
    const at = this.clock();
    for (const subscriber of this.subscribers) {
      subscriber.push({ type, channel: this.channel, entity: structuredClone(entity), at });
    }
  }

  subscribe(options: SubscribeOptions = {}): ChangeStream<T> {
    const capacity = Math.max(1, options.bufferSize ?? this.defaultBufferSize);
    const stream = new BufferedStream<T>(
      capacity,
      () => {
        metrics.notifierDroppedTotal.inc({ channel: this.channel });
        this.logger?.debug("change_event_dropped", { channel: this.channel });
      },
      s => this.subscribers.delete(s),
    );
    this.subscribers.add(stream);
    return stream;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  closeAll(): void {
    for (const subscriber of [...this.subscribers]) subscriber.close();
  }
}
