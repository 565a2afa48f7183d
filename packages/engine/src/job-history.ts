import type { HistoryStore } from './types';

export const DEFAULT_HISTORY_LIMIT = 10;

/** Newest-first log that evicts its oldest entries beyond `limit`. Entries are frozen on record. */
export class InMemoryHistoryStore<TEntry extends object> implements HistoryStore<TEntry> {
  private list: TEntry[] = [];

  constructor(private readonly limit = DEFAULT_HISTORY_LIMIT) {}

  record(entry: TEntry): void {
    this.list.unshift(Object.freeze({ ...entry }));
    if (this.list.length > this.limit) {
      this.list = this.list.slice(0, this.limit);
    }
  }

  entries(): TEntry[] {
    return [...this.list];
  }
}
