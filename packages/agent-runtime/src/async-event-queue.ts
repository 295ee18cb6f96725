type QueueState = { kind: 'open' } | { kind: 'completed' } | { kind: 'failed'; error: unknown };

interface Waiter<T> {
  resolve: (result: IteratorResult<T>) => void;
  reject: (err: unknown) => void;
}

/**
 * Single-consumer queue that turns the run loop's observer callbacks into
 * an AsyncIterable. Items pushed before the consumer asks are buffered;
 * a terminal error is raised only after the buffer has drained.
 */
export class AsyncEventQueue<T> implements AsyncIterable<T> {
  private readonly buffer: { value: T }[] = [];
  private waiter: Waiter<T> | undefined;
  private state: QueueState = { kind: 'open' };

  /** @param onReturn called when the consumer stops iterating before the producer finished. */
  constructor(private readonly onReturn?: () => void) {}

  push(item: T): void {
    if (this.state.kind !== 'open') return;
    const waiter = this.takeWaiter();
    if (waiter) waiter.resolve({ value: item, done: false });
    else this.buffer.push({ value: item });
  }

  complete(): void {
    this.close({ kind: 'completed' });
  }

  error(err: unknown): void {
    this.close({ kind: 'failed', error: err });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: () => this.next(),
      return: () => this.stop(),
    };
  }

  private next(): Promise<IteratorResult<T>> {
    const head = this.buffer.shift();
    if (head) return Promise.resolve({ value: head.value, done: false });

    const { state } = this;
    if (state.kind === 'failed') {
      this.state = { kind: 'completed' };
      return Promise.reject(state.error);
    }
    if (state.kind !== 'open') return Promise.resolve({ value: undefined, done: true });

    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  private stop(): Promise<IteratorResult<T>> {
    const producerFinished = this.state.kind !== 'open';
    this.state = { kind: 'completed' };
    this.buffer.length = 0;
    this.takeWaiter()?.resolve({ value: undefined, done: true });
    if (!producerFinished) this.onReturn?.();
    return Promise.resolve({ value: undefined, done: true });
  }

  private close(final: Exclude<QueueState, { kind: 'open' }>): void {
    if (this.state.kind !== 'open') return;
    const waiter = this.takeWaiter();
    if (!waiter) {
      this.state = final;
      return;
    }
    this.state = { kind: 'completed' };
    if (final.kind === 'failed') waiter.reject(final.error);
    else waiter.resolve({ value: undefined, done: true });
  }

  private takeWaiter(): Waiter<T> | undefined {
    const waiter = this.waiter;
    this.waiter = undefined;
    return waiter;
  }
}
