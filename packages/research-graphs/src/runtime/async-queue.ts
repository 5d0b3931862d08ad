// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/runtime/async-queue`
 * Purpose: Single-consumer async queue bridging synchronous event emission to an AsyncIterable.
 * Scope: Used by the research runner to stream AiEvents while the engine runs.
 * Invariants:
 *   - push() is synchronous; emitters never await
 *   - FIFO: items are yielded in push order
 *   - After close(), queued items drain, then iteration ends; later pushes are ignored
 * Side-effects: none
 * Links: runner/research-runner.ts
 * @public
 */

export class AsyncQueue<T> implements AsyncIterableIterator<T> {
  // Boxed so that T may itself include undefined
  private readonly items: Array<{ readonly value: T }> = [];
  private readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> =
    [];
  private closed = false;

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter({ value: item, done: false });
    else this.items.push({ value: item });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter({ value: undefined, done: true });
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Items pushed but not yet consumed */
  get size(): number {
    return this.items.length;
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const box = this.items.shift();
    if (box) return Promise.resolve({ value: box.value, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<T> {
    return this;
  }
}
