import { bytesSaved } from '@pressplay/models';
import type { GameInfo, Platform } from '@pressplay/models';

import { memoizeLast } from './memo';

export interface LibraryTotals {
  totalBytes: number;
  savedBytes: number;
  compressedCount: number;
}

export const countByPlatform = (games: readonly GameInfo[]): ReadonlyMap<Platform, number> => {
  const counts = new Map<Platform, number>();
  for (const game of games) {
    counts.set(game.platform, (counts.get(game.platform) ?? 0) + 1);
  }
  return counts;
};

export const summarizeLibrary = (games: readonly GameInfo[]): LibraryTotals => {
  let totalBytes = 0;
  let savedBytes = 0;
  let compressedCount = 0;
  for (const game of games) {
    totalBytes += game.sizeBytes;
    savedBytes += bytesSaved(game);
    if (game.isCompressed) {
      compressedCount += 1;
    }
  }
  return { totalBytes, savedBytes, compressedCount };
};

export const indexByPath = (games: readonly GameInfo[]): ReadonlyMap<string, GameInfo> =>
  new Map(games.map(game => [game.path, game]));

export interface LibraryViews {
  platformCounts: (games: readonly GameInfo[]) => ReadonlyMap<Platform, number>;
  totals: (games: readonly GameInfo[]) => LibraryTotals;
  byPath: (games: readonly GameInfo[]) => ReadonlyMap<string, GameInfo>;
}

export const createLibraryViews = (): LibraryViews => ({
  platformCounts: memoizeLast(countByPlatform),
  totals: memoizeLast(summarizeLibrary),
  byPath: memoizeLast(indexByPath)
});
