import type { CompressionProgress } from '@pressplay/models';

import type { CompressionState } from '../types';

export const selectActiveProgress = (state: CompressionState): CompressionProgress | null =>
  state.activeJob?.status === 'running' ? state.activeJob.progress : null;

export const selectCompressingGameName = (state: CompressionState): string | null =>
  state.activeJob?.status === 'running' ? state.activeJob.gameName : null;

export const isGameBusy = (state: CompressionState, gamePath: string): boolean =>
  state.activeJob?.status === 'running' && state.activeJob.gamePath === gamePath;
