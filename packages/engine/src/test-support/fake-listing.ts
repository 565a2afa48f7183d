import { vi } from 'vitest';

import type { GameInfo } from '@pressplay/models';

import type { GameListing } from '../types';

export const createFakeListing = (games: GameInfo[] = []) => {
  const listing = {
    findGame: vi.fn((gamePath: string): GameInfo | null => games.find(game => game.path === gamePath) ?? null),
    updateGame: vi.fn((_game: GameInfo) => {}),
    refresh: vi.fn(async () => {})
  } satisfies GameListing;
  return listing;
};
