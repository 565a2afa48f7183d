import type { DiscoveryBridge } from '@pressplay/bridge';
import { sameGame } from '@pressplay/models';
import type { GameInfo } from '@pressplay/models';

import { describeError } from '../job-errors';
import { StateContainer } from '../state-container';
import type { EngineLogger, GameListing } from '../types';

export type GameLibraryStatus = 'idle' | 'loading' | 'ready';

export interface GameLibraryState {
  games: readonly GameInfo[];
  status: GameLibraryStatus;
  lastRefreshedAt: Date | null;
  error: string | null;
}

export interface GameLibraryOptions {
  bridge: Pick<DiscoveryBridge, 'getAllGamesQuick' | 'getAllGames'>;
  logger?: EngineLogger;
}

type LoadMode = 'quick' | 'full';

/**
 * The discovered game listing. Only the newest load request may write; responses to older
 * requests are dropped. A failed load keeps the previous games and records the error.
 */
export class GameLibrary extends StateContainer<GameLibraryState> implements GameListing {
  private readonly bridge: GameLibraryOptions['bridge'];
  private readonly logger?: EngineLogger;
  private generation = 0;
  private disposed = false;

  constructor(options: GameLibraryOptions) {
    super({ games: [], status: 'idle', lastRefreshedAt: null, error: null });
    this.bridge = options.bridge;
    this.logger = options.logger;
  }

  get isLoaded(): boolean {
    return this.getState().lastRefreshedAt !== null;
  }

  /** Initial load through the quick discovery scan. */
  load(): Promise<void> {
    return this.fetch('quick');
  }

  refresh(): Promise<void> {
    return this.fetch('full');
  }

  findGame(gamePath: string): GameInfo | null {
    if (!this.isLoaded) {
      return null;
    }
    return this.getState().games.find(game => game.path === gamePath) ?? null;
  }

  updateGame(game: GameInfo): void {
    if (this.disposed || !this.isLoaded) {
      return;
    }
    const { games } = this.getState();
    const index = games.findIndex(entry => entry.path === game.path);
    const existing = games[index];
    if (!existing || sameGame(existing, game)) {
      return;
    }
    const next = [...games];
    next[index] = game;
    this.setState({ ...this.getState(), games: next });
  }

  dispose(): void {
    this.disposed = true;
    this.generation += 1;
    this.removeAllListeners();
  }

  private async fetch(mode: LoadMode): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.generation += 1;
    const request = this.generation;
    this.setState({ ...this.getState(), status: 'loading' });

    try {
      const games = mode === 'quick' ? await this.bridge.getAllGamesQuick() : await this.bridge.getAllGames();
      if (this.isStale(request)) {
        return;
      }
      this.setState({ games, status: 'ready', lastRefreshedAt: new Date(), error: null });
      this.logger?.info?.(`[Library] ${mode} load found ${games.length} games`);
    } catch (error) {
      if (this.isStale(request)) {
        return;
      }
      const message = `Failed to load games: ${describeError(error)}`;
      this.logger?.error?.(`[Library] ${message}`);
      this.setState({ ...this.getState(), status: 'ready', lastRefreshedAt: new Date(), error: message });
    }
  }

  private isStale(request: number): boolean {
    return this.disposed || request !== this.generation;
  }
}
