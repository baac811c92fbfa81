/**
 * Render Queue
 *
 * Bounded, serial work queue. Each exporter owns one; jobs start on a later
 * macrotask so `enqueue` never runs rendering work on the caller's stack.
 * The returned promise settles exactly once with the job's value or error.
 */

import { TablesmithError } from '../errors/index.js';

export interface RenderQueueOptions {
  /** Maximum running + waiting jobs (default: 4) */
  capacity?: number;
}

export class RenderQueue {
  private readonly capacity: number;
  private readonly pending: Array<() => Promise<void>> = [];
  private running = false;

  constructor(options: RenderQueueOptions = {}) {
    this.capacity = options.capacity ?? 4;
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new TablesmithError(`Queue capacity must be a positive integer, got: ${this.capacity}`, 'CONFIG_ERROR');
    }
  }

  /** Jobs running or waiting. */
  get size(): number {
    return this.pending.length + (this.running ? 1 : 0);
  }

  enqueue<T>(job: () => Promise<T>): Promise<T> {
    if (this.size >= this.capacity) {
      return Promise.reject(
        new TablesmithError(`Render queue is full (capacity ${this.capacity})`, 'QUEUE_FULL', {
          capacity: this.capacity,
        })
      );
    }
    return new Promise<T>((resolve, reject) => {
      this.pending.push(() => Promise.resolve().then(job).then(resolve, reject));
      this.drain();
    });
  }

  private drain(): void {
    if (this.running) return;
    const next = this.pending.shift();
    if (!next) return;
    this.running = true;
    setImmediate(() => {
      void next().finally(() => {
        this.running = false;
        this.drain();
      });
    });
  }
}
