import { QuoteSource } from '../types';
import { Logger } from '../utils/logger';
import { createMessageChannel, MessageChannel } from '../utils/message-channel';

export class BrokerUnavailableError extends Error {
  constructor(message = 'Quote broker is not running', options?: ErrorOptions) {
    super(message, options);
    this.name = 'BrokerUnavailableError';
  }
}

/** One pending quote request; the reply is delivered exactly once. */
interface QuoteRequest {
  resolve: (quote: Buffer) => void;
  reject: (err: Error) => void;
}

export type BrokerState = 'idle' | 'running' | 'stopped' | 'failed';

/** Default bound of the request queue. */
export const DEFAULT_BROKER_CAPACITY = 32;

/**
 * Single worker that owns a quote source and serializes every read of it.
 *
 * The worker reads one quote ahead of demand, then waits for a request,
 * hands the quote over, and only then reads the next one. At most one read
 * is in flight at any time, and requests are answered in submission order.
 */
export class QuoteBroker {
  private readonly requests: MessageChannel<QuoteRequest>;
  private readonly logger: Logger;
  private _state: BrokerState = 'idle';
  private stopping = false;
  private done: Promise<void> | null = null;

  constructor(
    private readonly source: QuoteSource,
    logger: Logger,
    capacity = DEFAULT_BROKER_CAPACITY,
  ) {
    this.logger = logger.child({ task: 'quote_broker' });
    this.requests = createMessageChannel<QuoteRequest>(capacity);
  }

  get state(): BrokerState {
    return this._state;
  }

  /**
   * Start the worker. The returned promise resolves after stop() and
   * rejects when the worker fails; either way no request is served again.
   * Calling start() twice returns the same promise.
   */
  start(): Promise<void> {
    if (!this.done) {
      this._state = 'running';
      this.done = this.run();
    }
    return this.done;
  }

  /** Submit a request and wait for its quote. */
  requestQuote(): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      this.requests.send({ resolve, reject }).catch(() => {
        reject(new BrokerUnavailableError());
      });
    });
  }

  /** Finish the worker after its current read. Queued requests are rejected. */
  stop(): void {
    if (this._state === 'stopped' || this._state === 'failed') {
      return;
    }
    this.stopping = true;
    this.shutdown('Quote broker stopped');
    if (!this.done) {
      this._state = 'stopped';
    }
  }

  private async run(): Promise<void> {
    const iterator = this.requests.iterable[Symbol.asyncIterator]();
    try {
      for (;;) {
        const quote = await this.nextQuote();
        this.logger.debug('Chose quote, waiting');

        const request = await iterator.next();
        if (request.done) {
          if (this.stopping) {
            this._state = 'stopped';
            this.logger.debug('Quote broker stopped');
            return;
          }
          throw new BrokerUnavailableError('Quote request channel closed');
        }

        this.logger.info('Sending quote to requesting task');
        this.logger.traceBlock('quote', quote.toString('utf-8'));
        request.value.resolve(quote);
      }
    } catch (err) {
      if (this.stopping) {
        this._state = 'stopped';
        this.logger.debug('Quote broker stopped during a read');
        return;
      }
      this._state = 'failed';
      this.logger.error('Quote broker failed', err);
      this.shutdown(`Quote broker failed: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }
  }

  private async nextQuote(): Promise<Buffer> {
    try {
      return await this.source.randomQuote();
    } catch (err) {
      throw new Error(
        `Failed to choose quote: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }
  }

  private shutdown(reason: string): void {
    for (const request of this.requests.close()) {
      request.reject(new BrokerUnavailableError(reason));
    }
  }
}
