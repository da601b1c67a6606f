import type { ILogger } from "../logging";
import type { LedgerEvent, Listener } from "../types";
import type { Journal } from "./journal";

/**
 * Notifications are buffered while an operation runs and handed to
 * listeners only after the outermost scope commits; a reverted scope takes
 * its notifications with it.
 */
export class EventLog {
  private pending: LedgerEvent[] = [];
  private readonly listeners = new Set<Listener>();

  constructor(
    private readonly journal: Journal,
    private readonly log: ILogger,
  ) {
    journal.onCommit(() => this.flush());
  }

  emit(event: LedgerEvent): void {
    this.pending.push(event);
    if (!this.journal.inScope) {
      this.flush();
      return;
    }
    this.journal.record(() => {
      this.pending.pop();
    });
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private flush(): void {
    const batch = this.pending;
    this.pending = [];
    for (const event of batch) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          // already committed
          this.log.error({ err, event: event.type }, "event listener threw");
        }
      }
    }
  }
}
