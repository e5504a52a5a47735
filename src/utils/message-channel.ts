export class ChannelClosedError extends Error {
  constructor(message = 'Channel closed') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

/**
 * Bounded multi-producer, single-consumer queue. Messages are received in
 * the order they were sent.
 */
export interface MessageChannel<T> {
  iterable: AsyncIterable<T>;
  /**
   * Enqueue a message. Suspends while the channel holds `capacity` messages
   * and rejects with ChannelClosedError once the channel is closed.
   */
  send(message: T): Promise<void>;
  /**
   * Close the channel. Blocked senders are rejected; messages already
   * accepted but not yet received are returned to the caller.
   */
  close(): T[];
  readonly closed: boolean;
  /** Messages accepted but not yet received. */
  readonly size: number;
}

interface BlockedSender<T> {
  message: T;
  resolve: () => void;
  reject: (err: Error) => void;
}

export function createMessageChannel<T>(capacity = Number.POSITIVE_INFINITY): MessageChannel<T> {
  if (!(capacity >= 1)) {
    throw new RangeError(`createMessageChannel: capacity must be at least 1, got ${capacity}`);
  }

  let receiver: ((value: IteratorResult<T, undefined>) => void) | null = null;
  let done = false;
  // Boxed so that any T, including undefined, can travel through
  const pending: { message: T }[] = [];
  const blocked: BlockedSender<T>[] = [];

  // Move the oldest blocked sender into the freed slot
  function admitBlocked(): void {
    const next = blocked.shift();
    if (next) {
      pending.push({ message: next.message });
      next.resolve();
    }
  }

  function close(): T[] {
    done = true;
    const undelivered = pending.splice(0, pending.length).map((box) => box.message);
    for (const sender of blocked.splice(0, blocked.length)) {
      sender.reject(new ChannelClosedError());
    }
    if (receiver) {
      const r = receiver;
      receiver = null;
      r({ value: undefined, done: true });
    }
    return undelivered;
  }

  const iterable: AsyncIterable<T> = {
    [Symbol.asyncIterator]() {
      return {
        next(): Promise<IteratorResult<T, undefined>> {
          const head = pending.shift();
          if (head) {
            admitBlocked();
            return Promise.resolve({ value: head.message, done: false });
          }
          if (done) {
            return Promise.resolve({ value: undefined, done: true });
          }
          return new Promise((r) => {
            receiver = r;
          });
        },
        return(): Promise<IteratorResult<T, undefined>> {
          close();
          return Promise.resolve({ value: undefined, done: true });
        },
      };
    },
  };

  return {
    iterable,
    send(message: T): Promise<void> {
      if (done) {
        return Promise.reject(new ChannelClosedError());
      }
      if (receiver) {
        const r = receiver;
        receiver = null;
        r({ value: message, done: false });
        return Promise.resolve();
      }
      if (pending.length < capacity) {
        pending.push({ message });
        return Promise.resolve();
      }
      return new Promise<void>((resolve, reject) => {
        blocked.push({ message, resolve, reject });
      });
    },
    close,
    get closed() {
      return done;
    },
    get size() {
      return pending.length;
    },
  };
}
