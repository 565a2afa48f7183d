import { describe, expect, it } from 'vitest';

import type { GameInfo, Platform } from '@pressplay/models';

import { createGame } from '../test-support/fake-bridge';
import { createGameProjection, projectGames } from './game-projection';
import type { GameProjectionInput } from './game-projection';

const games: GameInfo[] = [
  createGame({ name: 'Zeta Quest', path: 'C:/Games/Zeta', platform: 'steam', sizeBytes: 300 }),
  createGame({
    name: 'alpha strike',
    path: 'C:/Games/Alpha',
    platform: 'epicGames',
    sizeBytes: 100,
    isCompressed: true,
    compressedSize: 50
  }),
  createGame({
    name: 'Mid Zone',
    path: 'C:/Games/Mid',
    platform: 'battleNet',
    sizeBytes: 200,
    isCompressed: true,
    compressedSize: 150
  }),
  createGame({ name: 'Bolt', path: 'C:/Games/Bolt', platform: 'custom', sizeBytes: 200, isDirectStorage: true })
];

const names = (list: GameInfo[]) => list.map(game => game.name);

const input = (overrides: Partial<GameProjectionInput> = {}): GameProjectionInput => ({
  games,
  query: '',
  sortField: 'name',
  direction: 'ascending',
  ...overrides
});

describe('projectGames', () => {
  it('sorts names by code unit so uppercase comes first', () => {
    expect(names(projectGames(input()))).toEqual(['Bolt', 'Mid Zone', 'Zeta Quest', 'alpha strike']);
  });

  it('filters on a normalized substring of the name', () => {
    expect(names(projectGames(input({ query: '  ZONE ' })))).toEqual(['Mid Zone']);
  });

  it('keeps input order for equal keys and negates for descending', () => {
    expect(names(projectGames(input({ sortField: 'originalSize' })))).toEqual([
      'alpha strike',
      'Mid Zone',
      'Bolt',
      'Zeta Quest'
    ]);
    expect(names(projectGames(input({ sortField: 'originalSize', direction: 'descending' })))).toEqual([
      'Zeta Quest',
      'Mid Zone',
      'Bolt',
      'alpha strike'
    ]);
  });

  it('sorts by savings ratio and platform label', () => {
    expect(names(projectGames(input({ sortField: 'savingsPercent', direction: 'descending' })))).toEqual([
      'alpha strike',
      'Mid Zone',
      'Zeta Quest',
      'Bolt'
    ]);
    expect(names(projectGames(input({ sortField: 'platform' })))).toEqual([
      'Mid Zone',
      'Bolt',
      'alpha strike',
      'Zeta Quest'
    ]);
  });

  it('applies platform and compression filters', () => {
    expect(names(projectGames(input({ platforms: new Set<Platform>(['steam', 'custom']) })))).toEqual(['Bolt', 'Zeta Quest']);
    expect(names(projectGames(input({ compression: 'compressed' })))).toEqual(['Mid Zone', 'alpha strike']);
    expect(names(projectGames(input({ compression: 'uncompressed' })))).toEqual(['Zeta Quest']);
  });
});

describe('createGameProjection', () => {
  it('returns the same instance while inputs are unchanged', () => {
    const project = createGameProjection();
    const first = project(input({ query: 'a' }));

    expect(project(input({ query: ' A ' }))).toBe(first);
    expect(project(input({ query: 'a', direction: 'descending' }))).not.toBe(first);
  });

  it('recomputes when the list instance changes', () => {
    const project = createGameProjection();
    const first = project(input());
    const second = project(input({ games: [...games] }));

    expect(second).not.toBe(first);
    expect(second).toEqual(first);
  });
});
