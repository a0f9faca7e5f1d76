/**
 * @covenant/event-store: Append serializer.
 *
 * A promise-chain mutex: tasks run one at a time in arrival order.
 * The store runs its whole validate-then-append step inside `run`, so
 * two callers can never validate against the same head state.
 */

export class AppendSerializer {
  private _tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /**
   * Run `task` after every previously queued task has settled.
   * A failing task does not block the tasks queued behind it.
   */
  run<T>(task: () => Promise<T> | T): Promise<T> {
    this._pending++;
    const result = this._tail.then(task);
    this._tail = result.then(
      () => this._settle(),
      () => this._settle(),
    );
    return result;
  }

  /** Tasks queued or running */
  get pending(): number {
    return this._pending;
  }

  /** Resolves once everything queued so far has settled */
  drain(): Promise<void> {
    return this._tail;
  }

  private _settle(): void {
    this._pending--;
  }
}
