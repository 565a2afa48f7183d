import { platformLabel, savingsRatio } from '@pressplay/models';
import type { GameInfo, Platform } from '@pressplay/models';

export type GameSortField = 'name' | 'originalSize' | 'savingsPercent' | 'platform';

export type SortDirection = 'ascending' | 'descending';

export type CompressionFilter = 'all' | 'compressed' | 'uncompressed';

export interface GameProjectionInput {
  games: readonly GameInfo[];
  query: string;
  sortField: GameSortField;
  direction: SortDirection;
  /** Empty or absent means every platform. Compared by identity. */
  platforms?: ReadonlySet<Platform> | null;
  compression?: CompressionFilter;
}

export const normalizeQuery = (query: string): string => query.trim().toLowerCase();

const compareText = (left: string, right: string): number => {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
};

export const compareGames = (field: GameSortField, left: GameInfo, right: GameInfo): number => {
  switch (field) {
    case 'name':
      return compareText(left.name, right.name);
    case 'originalSize':
      return left.sizeBytes - right.sizeBytes;
    case 'savingsPercent':
      return savingsRatio(left) - savingsRatio(right);
    case 'platform':
      return compareText(platformLabel(left.platform), platformLabel(right.platform));
  }
};

export const matchesCompressionFilter = (game: GameInfo, filter: CompressionFilter): boolean => {
  switch (filter) {
    case 'all':
      return true;
    case 'compressed':
      return game.isCompressed;
    case 'uncompressed':
      return !game.isCompressed && !game.isDirectStorage;
  }
};

export const projectGames = (input: GameProjectionInput): GameInfo[] => {
  const query = normalizeQuery(input.query);
  const platforms = input.platforms && input.platforms.size > 0 ? input.platforms : null;
  const compression = input.compression ?? 'all';
  const sign = input.direction === 'descending' ? -1 : 1;

  const filtered = input.games.filter(
    game =>
      (!query || game.name.toLowerCase().includes(query)) &&
      (!platforms || platforms.has(game.platform)) &&
      matchesCompressionFilter(game, compression)
  );
  return filtered.sort((left, right) => sign * compareGames(input.sortField, left, right));
};

export type GameProjection = (input: GameProjectionInput) => GameInfo[];

/**
 * Returns a projector that recomputes only when an input changed: the game list and platform
 * set by identity, everything else by value. Otherwise the previous list instance comes back.
 */
export const createGameProjection = (): GameProjection => {
  let last: { input: GameProjectionInput; query: string; result: GameInfo[] } | null = null;

  return input => {
    const query = normalizeQuery(input.query);
    if (
      last &&
      last.input.games === input.games &&
      last.query === query &&
      last.input.sortField === input.sortField &&
      last.input.direction === input.direction &&
      (last.input.platforms ?? null) === (input.platforms ?? null) &&
      (last.input.compression ?? 'all') === (input.compression ?? 'all')
    ) {
      return last.result;
    }
    const result = projectGames(input);
    last = { input, query, result };
    return result;
  };
};
