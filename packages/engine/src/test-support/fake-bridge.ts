import { vi } from 'vitest';

import { EventChannel } from '@pressplay/bridge';
import type {
  AutomationJobPayload,
  BridgePort,
  HydrateGameRequest,
  SchedulerStatePayload,
  StartCompressionRequest,
  WatcherEventPayload
} from '@pressplay/bridge';
import type { AutomationConfig, CompressionProgress, GameInfo } from '@pressplay/models';

/** Every subscription opened against one backend stream; the newest one receives pushes. */
export class FakeStream<T> {
  readonly channels: EventChannel<T>[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(private readonly capacity = 1) {}

  open(signal: AbortSignal): EventChannel<T> {
    const channel = new EventChannel<T>({ signal, capacity: this.capacity });
    this.channels.push(channel);
    this.signals.push(signal);
    return channel;
  }

  get current(): EventChannel<T> | undefined {
    return this.channels[this.channels.length - 1];
  }

  get currentSignal(): AbortSignal | undefined {
    return this.signals[this.signals.length - 1];
  }

  emit(value: T): boolean {
    return this.current?.push(value) ?? false;
  }

  end(): void {
    this.current?.close();
  }

  error(error: unknown): void {
    this.current?.fail(error);
  }
}

export class FakeBridge implements BridgePort {
  readonly progress = new FakeStream<CompressionProgress>();
  readonly queue = new FakeStream<AutomationJobPayload[]>();
  readonly autoCompressionStatus = new FakeStream<boolean>();
  readonly schedulerState = new FakeStream<SchedulerStatePayload>();
  readonly watcherEvents = new FakeStream<WatcherEventPayload>(16);

  readonly startCompression = vi.fn(async (_request: StartCompressionRequest) => {});
  readonly cancelCompression = vi.fn(async () => {});
  readonly decompressGame = vi.fn(async (_gamePath: string) => {});
  readonly getAllGamesQuick = vi.fn(async (): Promise<GameInfo[]> => []);
  readonly getAllGames = vi.fn(async (): Promise<GameInfo[]> => []);
  readonly hydrateGame = vi.fn(async (_request: HydrateGameRequest): Promise<GameInfo | null> => null);
  readonly updateAutomationConfig = vi.fn(async (_config: AutomationConfig) => {});
  readonly startAutoCompression = vi.fn(async () => {});
  readonly stopAutoCompression = vi.fn(async () => {});

  readonly watchCompressionProgress = vi.fn((signal: AbortSignal) => this.progress.open(signal));
  readonly watchAutomationQueue = vi.fn((signal: AbortSignal) => this.queue.open(signal));
  readonly watchAutoCompressionStatus = vi.fn((signal: AbortSignal) => this.autoCompressionStatus.open(signal));
  readonly watchSchedulerState = vi.fn((signal: AbortSignal) => this.schedulerState.open(signal));
  readonly watchWatcherEvents = vi.fn((signal: AbortSignal) => this.watcherEvents.open(signal));
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export const createDeferred = <T = void>(): Deferred<T> => {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

/** Drains pending promise callbacks. Safe under fake timers. */
export const flushMicrotasks = async (rounds = 20): Promise<void> => {
  for (let index = 0; index < rounds; index += 1) {
    await Promise.resolve();
  }
};

export const createGame = (overrides: Partial<GameInfo> = {}): GameInfo => ({
  name: 'Test Game',
  path: 'C:/Games/Test Game',
  platform: 'steam',
  sizeBytes: 1_000,
  compressedSize: null,
  isCompressed: false,
  isDirectStorage: false,
  excluded: false,
  lastPlayed: null,
  ...overrides
});

export const createProgress = (overrides: Partial<CompressionProgress> = {}): CompressionProgress => ({
  gameName: 'Test Game',
  filesTotal: 10,
  filesProcessed: 0,
  bytesOriginal: 1_000,
  bytesCompressed: 0,
  bytesSaved: 0,
  estimatedTimeRemainingMs: null,
  isComplete: false,
  ...overrides
});
