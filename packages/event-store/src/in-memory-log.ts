/**
 * @covenant/event-store: In-memory EventLog implementation.
 *
 * Stores committed events in a plain array. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Development and prototyping
 *
 * Not suitable for production (all state lost on process exit).
 */

import type { CommittedEvent, DomainEvent } from "@covenant/types";
import type { EventLog } from "./types.js";
import { EventStoreError } from "./types.js";

export class InMemoryEventLog<TEvent extends DomainEvent = DomainEvent>
  implements EventLog<TEvent>
{
  private readonly _events: CommittedEvent<TEvent>[] = [];
  private _closed = false;

  /**
   * @param initial - Events to seed the log with (must start at position 0, gapless)
   */
  constructor(initial: readonly CommittedEvent<TEvent>[] = []) {
    for (const event of initial) {
      this.write(event);
    }
  }

  get length(): number {
    return this._events.length;
  }

  at(position: number): CommittedEvent<TEvent> | undefined {
    return this._events[position];
  }

  slice(from: number, to: number): readonly CommittedEvent<TEvent>[] {
    return this._events.slice(from, to);
  }

  write(record: CommittedEvent<TEvent>): void {
    if (this._closed) {
      throw new EventStoreError("STORE_CLOSED", "Event log is closed");
    }
    if (record.position !== this._events.length) {
      throw new EventStoreError(
        "INVALID_POSITION",
        `Expected position ${this._events.length}, got ${record.position}`,
        record.position,
      );
    }
    this._events.push(record);
  }

  close(): void {
    this._closed = true;
  }
}
