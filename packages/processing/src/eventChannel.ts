/**
 * Event Channel
 *
 * Unbounded push queue consumed with `for await`. Producers never wait:
 * `push` enqueues or hands the value straight to a waiting reader.
 */

export class EventChannel<T> implements AsyncIterable<T> {
  private readonly queue: { value: T }[] = [];
  private readonly readers: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private closed = false;

  /**
   * Returns false once the channel is closed
   */
  push(value: T): boolean {
    if (this.closed) return false;

    const reader = this.readers.shift();
    if (reader) {
      reader({ value, done: false });
    } else {
      this.queue.push({ value });
    }
    return true;
  }

  /**
   * Stop accepting values. Readers drain what is queued, then finish.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const reader of this.readers.splice(0)) {
      reader({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const queued = this.queue.shift();
    if (queued) {
      return Promise.resolve({ value: queued.value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.readers.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
