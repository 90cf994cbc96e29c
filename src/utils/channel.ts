/**
 * Unbounded single-consumer mailbox. Producers `push` from any callback;
 * one consumer drains it with `for await`. Iteration ends once the channel
 * is closed and every buffered message has been delivered.
 */
export class Channel<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private waiting: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  push(message: T): void {
    if (this.closed) {
      throw new Error('Cannot push to a closed channel');
    }

    const receiver = this.waiting.shift();
    if (receiver) {
      receiver({ value: message, done: false });
    } else {
      this.buffer.push(message);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.waiting.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      return Promise.resolve({ value, done: false });
    }
    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return { next: () => this.next() };
  }
}
