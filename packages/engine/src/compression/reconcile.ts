import type { DiscoveryBridge } from '@pressplay/bridge';
import type { GameInfo } from '@pressplay/models';

import { describeError } from '../job-errors';
import type { CompressionJob, EngineLogger, GameListing } from '../types';

export type RefreshReason = 'unknown-game' | 'not-found' | 'hydrate-failed';

export type ReconcileOutcome =
  | { kind: 'hydrated'; game: GameInfo }
  | { kind: 'refreshed'; reason: RefreshReason; refreshError: string | null };

export interface ReconcileDependencies {
  bridge: Pick<DiscoveryBridge, 'hydrateGame'>;
  listing: GameListing;
  isDisposed: () => boolean;
  logger?: EngineLogger;
}

/**
 * Brings the listing up to date after a finished job: a targeted hydrate when the listing knows
 * the game, otherwise (or when hydrating yields nothing) a full refresh.
 * Resolves `null` when disposal interrupted the work. Never rejects.
 */
export const reconcileCompletedGame = async (
  job: Pick<CompressionJob, 'gamePath'>,
  deps: ReconcileDependencies
): Promise<ReconcileOutcome | null> => {
  const { bridge, listing, isDisposed, logger } = deps;

  let reason: RefreshReason = 'unknown-game';
  const existing = listing.findGame(job.gamePath);
  if (existing) {
    try {
      const hydrated = await bridge.hydrateGame({
        gamePath: existing.path,
        gameName: existing.name,
        platform: existing.platform
      });
      if (isDisposed()) {
        return null;
      }
      if (hydrated) {
        listing.updateGame(hydrated);
        return { kind: 'hydrated', game: hydrated };
      }
      reason = 'not-found';
    } catch (error) {
      if (isDisposed()) {
        return null;
      }
      logger?.warn?.(`[Compression] hydrate failed for ${job.gamePath}, refreshing listing`, error);
      reason = 'hydrate-failed';
    }
  }

  try {
    await listing.refresh();
    return { kind: 'refreshed', reason, refreshError: null };
  } catch (error) {
    const refreshError = describeError(error);
    if (!isDisposed()) {
      logger?.error?.(`[Compression] listing refresh failed: ${refreshError}`);
    }
    return { kind: 'refreshed', reason, refreshError };
  }
};
