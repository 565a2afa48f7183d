import { EventEmitter } from 'node:events';

export type StateListener<TState> = (state: TState, previous: TState) => void;

/**
 * Holds one immutable state snapshot and notifies subscribers whenever it is replaced.
 * Subclasses are the only writers.
 */
export class StateContainer<TState> extends EventEmitter {
  constructor(private state: TState) {
    super();
  }

  getState(): TState {
    return this.state;
  }

  subscribe(listener: StateListener<TState>): () => void {
    this.on('change', listener);
    return () => {
      this.off('change', listener);
    };
  }

  protected setState(next: TState): void {
    if (Object.is(next, this.state)) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.emit('change', next, previous);
  }
}
