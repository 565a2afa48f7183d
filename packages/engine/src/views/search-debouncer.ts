export const DEFAULT_SEARCH_DEBOUNCE_MS = 220;

export type SearchListener = (query: string) => void;

/** Debounces raw search input into a committed, normalized (trimmed, lowercased) query. */
export class SearchDebouncer {
  private readonly delayMs: number;
  private timeout: ReturnType<typeof setTimeout> | null = null;
  private committed = '';
  private listener: SearchListener | null = null;

  constructor(delayMs = DEFAULT_SEARCH_DEBOUNCE_MS) {
    this.delayMs = delayMs;
  }

  get query(): string {
    return this.committed;
  }

  onCommit(listener: SearchListener): void {
    this.listener = listener;
  }

  input(raw: string): void {
    const normalized = raw.trim().toLowerCase();
    this.cancel();
    if (!normalized) {
      // Clearing the box applies at once.
      if (this.committed) {
        this.commit('');
      }
      return;
    }
    this.timeout = setTimeout(() => {
      this.timeout = null;
      if (normalized !== this.committed) {
        this.commit(normalized);
      }
    }, this.delayMs);
  }

  cancel(): void {
    if (this.timeout) {
      clearTimeout(this.timeout);
      this.timeout = null;
    }
  }

  private commit(query: string): void {
    this.committed = query;
    this.listener?.(query);
  }
}
