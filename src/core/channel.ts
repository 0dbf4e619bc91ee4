// core/channel.ts — Single-consumer async channel: producers push, one reader iterates.
// Closing ends iteration once buffered values are drained.

type Waiter<T> = (result: IteratorResult<T>) => void;

export class Channel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiter: Waiter<T> | null = null;
  private closed = false;
  private iterating = false;

  push(value: T): void {
    if (this.closed) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value, done: false });
    } else {
      this.buffer.push(value);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  private next(): Promise<IteratorResult<T>> {
    const value = this.buffer.shift();
    if (value !== undefined) return Promise.resolve({ value, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    if (this.iterating) throw new Error("Channel supports a single reader");
    this.iterating = true;
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        this.buffer.length = 0;
        return { value: undefined, done: true };
      },
    };
  }
}
