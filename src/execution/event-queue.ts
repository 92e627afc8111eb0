/**
 * Unbounded single-consumer queue. Any number of producers may `push`; one
 * consumer awaits `next()`. Messages are delivered in push order.
 */
export class EventQueue<T> {
  private readonly buffer: { message: T }[] = [];
  private waiting: ((message: T) => void) | undefined;

  push(message: T): void {
    const resolveNext = this.waiting;
    if (resolveNext) {
      this.waiting = undefined;
      resolveNext(message);
      return;
    }
    this.buffer.push({ message });
  }

  next(): Promise<T> {
    const queued = this.buffer.shift();
    if (queued) {
      return Promise.resolve(queued.message);
    }
    if (this.waiting) {
      return Promise.reject(new Error("EventQueue supports a single consumer"));
    }
    return new Promise((resolveNext) => {
      this.waiting = resolveNext;
    });
  }
}
