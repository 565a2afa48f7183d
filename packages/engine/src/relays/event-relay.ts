import { describeError } from '../job-errors';
import { StateContainer } from '../state-container';
import type { EngineLogger } from '../types';

export type RelayStatus = 'idle' | 'listening' | 'completed' | 'failed';

export interface RelayState<TValue> {
  status: RelayStatus;
  value: TValue;
  error: string | null;
}

export interface EventRelayOptions<TPayload, TValue> {
  /** Used in log tags, e.g. `[Relay:queue]`. */
  name: string;
  subscribe: (signal: AbortSignal) => AsyncIterable<TPayload>;
  initialValue: TValue;
  reduce: (current: TValue, payload: TPayload) => TValue;
  logger?: EngineLogger;
}

/**
 * Re-exposes one backend subscription as observable state. The value survives the stream ending,
 * so consumers keep the last snapshot while the relay is restarted.
 */
export class EventRelay<TPayload, TValue> extends StateContainer<RelayState<TValue>> {
  private readonly options: EventRelayOptions<TPayload, TValue>;
  private controller: AbortController | null = null;
  private disposed = false;

  constructor(options: EventRelayOptions<TPayload, TValue>) {
    super({ status: 'idle', value: options.initialValue, error: null });
    this.options = options;
  }

  get name(): string {
    return this.options.name;
  }

  start(): void {
    if (this.disposed || this.getState().status === 'listening') {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;

    let stream: AsyncIterable<TPayload>;
    try {
      stream = this.options.subscribe(controller.signal);
    } catch (error) {
      this.controller = null;
      this.fail(error);
      return;
    }
    this.setState({ ...this.getState(), status: 'listening', error: null });
    void this.consume(stream, controller);
  }

  stop(): void {
    this.controller?.abort();
    this.controller = null;
    if (this.getState().status === 'listening') {
      this.setState({ ...this.getState(), status: 'idle' });
    }
  }

  dispose(): void {
    this.stop();
    this.disposed = true;
    this.removeAllListeners();
  }

  protected override setState(next: RelayState<TValue>): void {
    if (this.disposed) {
      return;
    }
    super.setState(next);
  }

  private async consume(stream: AsyncIterable<TPayload>, controller: AbortController): Promise<void> {
    try {
      for await (const payload of stream) {
        if (controller.signal.aborted) {
          return;
        }
        const current = this.getState();
        this.setState({ ...current, value: this.options.reduce(current.value, payload) });
      }
    } catch (error) {
      if (!controller.signal.aborted) {
        this.release(controller);
        this.fail(error);
      }
      return;
    }
    if (!controller.signal.aborted) {
      this.release(controller);
      this.setState({ ...this.getState(), status: 'completed' });
    }
  }

  private fail(error: unknown): void {
    const message = describeError(error);
    this.options.logger?.warn?.(`[Relay:${this.options.name}] stream failed: ${message}`);
    this.setState({ ...this.getState(), status: 'failed', error: message });
  }

  private release(controller: AbortController): void {
    if (this.controller === controller) {
      this.controller = null;
    }
  }
}
