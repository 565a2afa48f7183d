import type { CompressionAlgorithm, CompressionProgress, GameInfo } from '@pressplay/models';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type EngineLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export type CompressionJobKind = 'compression' | 'decompression';

export type CompressionJobStatus = 'running' | 'completed' | 'failed' | 'cancelled';

export interface CompressionJob {
  jobId: string;
  gamePath: string;
  gameName: string;
  kind: CompressionJobKind;
  /** Null for decompression jobs. */
  algorithm: CompressionAlgorithm | null;
  status: CompressionJobStatus;
  progress: CompressionProgress | null;
  progressUpdatedAt: number | null;
  error: string | null;
  startedAt: number;
  finishedAt: number | null;
}

export interface CompressionHistoryEntry extends CompressionJob {
  logLevel: LogLevel;
}

export interface CompressionState {
  activeJob: CompressionJob | null;
  history: readonly CompressionHistoryEntry[];
}

export interface HistoryStore<TEntry> {
  record(entry: TEntry): void;
  entries(): TEntry[];
}

/** The entity listing a finished job refreshes, either one game at a time or wholesale. */
export interface GameListing {
  findGame(gamePath: string): GameInfo | null;
  updateGame(game: GameInfo): void;
  refresh(): Promise<void>;
}
