/**
 * Serial executor.
 *
 * Runs async tasks one at a time in submission order. The custody
 * service pushes every mutation through one executor, so concurrent
 * HTTP requests reach the core sequentially and a busy core only ever
 * sees true reentrant calls.
 *
 * A failed task rejects its own promise and does not stop the queue.
 */

export class SerialExecutor {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this._pending++;
    const result = this._tail.then(task);
    this._tail = result.then(
      () => this._settled(),
      () => this._settled(),
    );
    return result;
  }

  /** Tasks submitted and not yet settled, including the running one. */
  get pending(): number {
    return this._pending;
  }

  /** Resolves once every task submitted so far has settled. */
  idle(): Promise<void> {
    return this._tail;
  }

  private _settled(): void {
    this._pending--;
  }
}
