export const PLATFORMS = [
  'steam',
  'epicGames',
  'gogGalaxy',
  'ubisoftConnect',
  'eaApp',
  'battleNet',
  'xboxGamePass',
  'custom'
] as const;

export type Platform = (typeof PLATFORMS)[number];

const PLATFORM_LABELS: Record<Platform, string> = {
  steam: 'Steam',
  epicGames: 'Epic Games',
  gogGalaxy: 'GOG Galaxy',
  ubisoftConnect: 'Ubisoft Connect',
  eaApp: 'EA App',
  battleNet: 'Battle.net',
  xboxGamePass: 'Xbox Game Pass',
  custom: 'Custom'
};

export const platformLabel = (platform: Platform): string => PLATFORM_LABELS[platform];

export const isPlatform = (value: unknown): value is Platform =>
  PLATFORMS.some(platform => platform === value);

export interface GameInfo {
  name: string;
  path: string;
  platform: Platform;
  sizeBytes: number;
  compressedSize: number | null;
  isCompressed: boolean;
  isDirectStorage: boolean;
  excluded: boolean;
  lastPlayed: Date | null;
}

export const bytesSaved = (game: GameInfo): number => {
  if (game.compressedSize === null) {
    return 0;
  }
  const saved = game.sizeBytes - game.compressedSize;
  return saved > 0 ? saved : 0;
};

/** Fraction of the original size reclaimed; 0 for games that are not compressed. */
export const savingsRatio = (game: GameInfo): number => {
  if (game.sizeBytes === 0 || !game.isCompressed) {
    return 0;
  }
  return bytesSaved(game) / game.sizeBytes;
};

export const sameGame = (a: GameInfo, b: GameInfo): boolean =>
  a === b ||
  (a.path === b.path &&
    a.name === b.name &&
    a.platform === b.platform &&
    a.sizeBytes === b.sizeBytes &&
    a.compressedSize === b.compressedSize &&
    a.isCompressed === b.isCompressed &&
    a.isDirectStorage === b.isDirectStorage &&
    a.excluded === b.excluded &&
    (a.lastPlayed?.getTime() ?? null) === (b.lastPlayed?.getTime() ?? null));
