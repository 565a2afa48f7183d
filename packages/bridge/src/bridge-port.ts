import type {
  AutomationConfig,
  CompressionAlgorithm,
  CompressionProgress,
  GameInfo,
  Platform
} from '@pressplay/models';

import type { AutomationJobPayload, SchedulerStatePayload, WatcherEventPayload } from './wire';

export interface StartCompressionRequest {
  gamePath: string;
  gameName: string;
  algorithm: CompressionAlgorithm;
}

export interface HydrateGameRequest {
  gamePath: string;
  gameName: string;
  platform: Platform;
}

/** Request/response calls into the execution backend. Any call may throw or reject. */
export interface CompressionBridge {
  startCompression(request: StartCompressionRequest): Promise<void>;
  /**
   * Subscribes to progress for the running compression. The subscription is live once this
   * returns; the stream ends when the compression finishes and errors when it fails.
   */
  watchCompressionProgress(signal: AbortSignal): AsyncIterable<CompressionProgress>;
  cancelCompression(): Promise<void>;
  decompressGame(gamePath: string): Promise<void>;
}

export interface DiscoveryBridge {
  getAllGamesQuick(): Promise<GameInfo[]>;
  getAllGames(): Promise<GameInfo[]>;
  hydrateGame(request: HydrateGameRequest): Promise<GameInfo | null>;
}

export interface AutomationBridge {
  updateAutomationConfig(config: AutomationConfig): Promise<void>;
  startAutoCompression(): Promise<void>;
  stopAutoCompression(): Promise<void>;
  watchAutomationQueue(signal: AbortSignal): AsyncIterable<AutomationJobPayload[]>;
  watchAutoCompressionStatus(signal: AbortSignal): AsyncIterable<boolean>;
  watchSchedulerState(signal: AbortSignal): AsyncIterable<SchedulerStatePayload>;
  watchWatcherEvents(signal: AbortSignal): AsyncIterable<WatcherEventPayload>;
}

export interface BridgePort extends CompressionBridge, DiscoveryBridge, AutomationBridge {}
