import { afterEach, describe, expect, it, vi } from 'vitest';

import type { GameInfo } from '@pressplay/models';

import {
  FakeBridge,
  createDeferred,
  createGame,
  createProgress,
  flushMicrotasks
} from '../test-support/fake-bridge';
import { createFakeListing } from '../test-support/fake-listing';
import { CompressionCoordinator } from './compression-coordinator';
import type { CompressionCoordinatorOptions } from './compression-coordinator';

const createLogger = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const setup = (games: GameInfo[] = [], options: Partial<CompressionCoordinatorOptions> = {}) => {
  const bridge = new FakeBridge();
  const listing = createFakeListing(games);
  const logger = createLogger();
  const coordinator = new CompressionCoordinator({ bridge, listing, logger, ...options });
  return { bridge, listing, logger, coordinator };
};

afterEach(() => {
  vi.useRealTimers();
});

describe('CompressionCoordinator', () => {
  it('allows only one running job at a time', async () => {
    const { bridge, coordinator } = setup();

    const first = coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });
    await coordinator.startCompression({ gamePath: 'C:/Games/B', gameName: 'B' });
    await coordinator.startDecompression({ gamePath: 'C:/Games/B', gameName: 'B' });
    await first;

    expect(bridge.startCompression).toHaveBeenCalledTimes(1);
    expect(bridge.startCompression).toHaveBeenCalledWith({
      gamePath: 'C:/Games/A',
      gameName: 'A',
      algorithm: 'xpress8k'
    });
    expect(bridge.decompressGame).not.toHaveBeenCalled();
    expect(coordinator.getState().activeJob?.gamePath).toBe('C:/Games/A');
    expect(coordinator.hasActiveJob()).toBe(true);
    coordinator.dispose();
  });

  it('uses the caller algorithm, then the configured default', async () => {
    const { bridge, coordinator } = setup([], { resolveDefaultAlgorithm: () => 'lzx' });

    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });
    expect(bridge.startCompression).toHaveBeenLastCalledWith(expect.objectContaining({ algorithm: 'lzx' }));
    expect(coordinator.getState().activeJob?.algorithm).toBe('lzx');

    coordinator.cancelCompression();
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A', algorithm: 'xpress4k' });
    expect(bridge.startCompression).toHaveBeenLastCalledWith(expect.objectContaining({ algorithm: 'xpress4k' }));
    coordinator.dispose();
  });

  it('subscribes to progress before issuing the start call', async () => {
    const { bridge, coordinator } = setup();
    const calls: string[] = [];
    bridge.watchCompressionProgress.mockImplementationOnce((signal: AbortSignal) => {
      calls.push('subscribe');
      return bridge.progress.open(signal);
    });
    bridge.startCompression.mockImplementationOnce(async () => {
      calls.push('start');
    });

    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    expect(calls).toEqual(['subscribe', 'start']);
    coordinator.dispose();
  });

  it('keeps only the newest progress snapshot', async () => {
    const { bridge, coordinator } = setup();
    const onProgress = vi.fn();
    coordinator.on('job:progress', onProgress);
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    bridge.progress.emit(createProgress({ filesProcessed: 1 }));
    bridge.progress.emit(createProgress({ filesProcessed: 2 }));
    bridge.progress.emit(createProgress({ filesProcessed: 3 }));
    await flushMicrotasks();

    const active = coordinator.getState().activeJob;
    expect(active?.progress?.filesProcessed).toBe(3);
    expect(active?.progressUpdatedAt).not.toBeNull();
    expect(bridge.progress.current?.droppedCount).toBe(1);
    expect(onProgress).toHaveBeenCalledTimes(2);
    coordinator.dispose();
  });

  it('completes, reconciles and demotes a job when the progress stream ends', async () => {
    const game = createGame({ name: 'A', path: 'C:/Games/A' });
    const { bridge, listing, coordinator } = setup([game]);
    const hydrated = { ...game, isCompressed: true, compressedSize: 600 };
    bridge.hydrateGame.mockResolvedValueOnce(hydrated);
    const events: string[] = [];
    for (const event of ['job:started', 'job:finished', 'job:demoted', 'job:reconciled']) {
      coordinator.on(event, () => events.push(event));
    }

    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });
    bridge.progress.emit(createProgress({ filesProcessed: 10, isComplete: true }));
    bridge.progress.end();
    await flushMicrotasks();
    await coordinator.waitForReconciliation();

    const state = coordinator.getState();
    expect(state.activeJob).toBeNull();
    expect(state.history).toHaveLength(1);
    expect(state.history[0]).toMatchObject({ status: 'completed', logLevel: 'info', error: null });
    expect(state.history[0]?.finishedAt).not.toBeNull();
    expect(listing.updateGame).toHaveBeenCalledWith(hydrated);
    expect(listing.refresh).not.toHaveBeenCalled();
    expect(bridge.progress.currentSignal?.aborted).toBe(true);
    expect(events).toEqual(['job:started', 'job:finished', 'job:demoted', 'job:reconciled']);
    coordinator.dispose();
  });

  it('unsubscribes before the backend cancel and transitions last', async () => {
    vi.useFakeTimers();
    const { bridge, coordinator } = setup();
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });
    const order: string[] = [];
    bridge.progress.currentSignal?.addEventListener('abort', () => order.push('unsubscribe'));
    bridge.cancelCompression.mockImplementation(async () => {
      order.push('backend-cancel');
    });
    coordinator.subscribe(state => order.push(`state:${state.activeJob?.status ?? 'none'}`));

    coordinator.cancelCompression();
    coordinator.cancelCompression();

    expect(order).toEqual(['unsubscribe', 'backend-cancel', 'state:cancelled']);
    expect(bridge.cancelCompression).toHaveBeenCalledTimes(1);
    expect(coordinator.hasActiveJob()).toBe(false);

    bridge.progress.emit(createProgress({ filesProcessed: 9 }));
    await flushMicrotasks();
    expect(coordinator.getState().activeJob?.progress).toBeNull();

    await vi.advanceTimersByTimeAsync(2_999);
    expect(coordinator.getState().activeJob?.status).toBe('cancelled');
    await vi.advanceTimersByTimeAsync(1);
    expect(coordinator.getState().activeJob).toBeNull();
    expect(coordinator.getState().history[0]).toMatchObject({ status: 'cancelled', logLevel: 'warn' });
    coordinator.dispose();
  });

  it('still cancels locally when the backend cancel fails', async () => {
    const { bridge, logger, coordinator } = setup();
    bridge.cancelCompression.mockRejectedValueOnce(new Error('no job'));
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    coordinator.cancelCompression();
    await flushMicrotasks();

    expect(coordinator.getState().activeJob?.status).toBe('cancelled');
    expect(logger.warn).toHaveBeenCalledWith('[Compression] backend cancel failed: no job');
    coordinator.dispose();
  });

  it('fails the job when the start call rejects', async () => {
    vi.useFakeTimers();
    const { bridge, logger, coordinator } = setup();
    bridge.startCompression.mockRejectedValueOnce(new Error('access denied'));

    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    const active = coordinator.getState().activeJob;
    expect(active?.status).toBe('failed');
    expect(active?.error).toBe('Failed to start: access denied');
    expect(bridge.progress.currentSignal?.aborted).toBe(true);
    expect(logger.error).toHaveBeenCalledWith('[Compression] A: Failed to start: access denied');

    await vi.advanceTimersByTimeAsync(3_000);
    expect(coordinator.getState().history[0]).toMatchObject({ status: 'failed', logLevel: 'error' });
    coordinator.dispose();
  });

  it('fails the job when the progress stream errors', async () => {
    const { bridge, coordinator } = setup();
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    bridge.progress.error(new Error('disk full'));
    await flushMicrotasks();

    expect(coordinator.getState().activeJob).toMatchObject({ status: 'failed', error: 'disk full' });
    coordinator.dispose();
  });

  it('demotes a settled job immediately when the next job starts', async () => {
    const { bridge, coordinator } = setup();
    bridge.startCompression.mockRejectedValueOnce(new Error('busy'));
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    await coordinator.startCompression({ gamePath: 'C:/Games/B', gameName: 'B' });

    const state = coordinator.getState();
    expect(state.activeJob).toMatchObject({ gamePath: 'C:/Games/B', status: 'running' });
    expect(state.history[0]).toMatchObject({ gamePath: 'C:/Games/A', status: 'failed' });
    coordinator.dispose();
  });

  it('keeps a job started from a job:finished listener in the slot', async () => {
    const { bridge, coordinator } = setup();
    coordinator.once('job:finished', () => {
      void coordinator.startCompression({ gamePath: 'C:/Games/B', gameName: 'B' });
    });
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    bridge.progress.end();
    await flushMicrotasks();

    const state = coordinator.getState();
    expect(state.activeJob).toMatchObject({ gamePath: 'C:/Games/B', status: 'running' });
    expect(state.history).toHaveLength(1);
    expect(state.history[0]).toMatchObject({ gamePath: 'C:/Games/A', status: 'completed' });
    expect(coordinator.hasActiveJob()).toBe(true);

    await coordinator.startCompression({ gamePath: 'C:/Games/C', gameName: 'C' });
    expect(bridge.startCompression).toHaveBeenCalledTimes(2);

    bridge.progress.emit(createProgress({ gameName: 'B', filesProcessed: 5 }));
    await flushMicrotasks();
    expect(coordinator.getState().activeJob?.progress?.filesProcessed).toBe(5);
    await coordinator.waitForReconciliation();
    coordinator.dispose();
  });

  it('keeps the ten most recent jobs in history', async () => {
    const { coordinator } = setup();

    for (let index = 0; index < 11; index += 1) {
      await coordinator.startDecompression({ gamePath: `C:/Games/${index}`, gameName: `Game ${index}` });
    }

    const { history } = coordinator.getState();
    expect(history).toHaveLength(10);
    expect(history[0]?.gameName).toBe('Game 10');
    expect(history[9]?.gameName).toBe('Game 1');
    expect(history.every(entry => entry.kind === 'decompression' && entry.algorithm === null)).toBe(true);
    await coordinator.waitForReconciliation();
    coordinator.dispose();
  });

  it('reports decompression failures', async () => {
    const { bridge, coordinator } = setup();
    bridge.decompressGame.mockRejectedValueOnce(new Error('file locked'));

    await coordinator.startDecompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    expect(coordinator.getState().activeJob).toMatchObject({
      kind: 'decompression',
      status: 'failed',
      error: 'Decompression failed: file locked'
    });
    coordinator.dispose();
  });

  it('ignores a decompression result once the job was cancelled', async () => {
    const { bridge, listing, coordinator } = setup();
    const decompress = createDeferred();
    bridge.decompressGame.mockReturnValueOnce(decompress.promise);

    const pending = coordinator.startDecompression({ gamePath: 'C:/Games/A', gameName: 'A' });
    coordinator.cancelCompression();
    decompress.resolve();
    await pending;

    expect(coordinator.getState().activeJob?.status).toBe('cancelled');
    expect(listing.refresh).not.toHaveBeenCalled();
    coordinator.dispose();
  });

  it('stops writing state after dispose', async () => {
    const { bridge, coordinator } = setup();
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });
    const before = coordinator.getState();

    coordinator.dispose();
    bridge.progress.emit(createProgress({ filesProcessed: 4 }));
    await flushMicrotasks();
    await coordinator.startCompression({ gamePath: 'C:/Games/B', gameName: 'B' });

    expect(coordinator.getState()).toBe(before);
    expect(bridge.progress.currentSignal?.aborted).toBe(true);
    expect(bridge.startCompression).toHaveBeenCalledTimes(1);
  });

  it('drops a decompression result that lands after dispose', async () => {
    const { bridge, listing, coordinator } = setup();
    const decompress = createDeferred();
    bridge.decompressGame.mockReturnValueOnce(decompress.promise);

    const pending = coordinator.startDecompression({ gamePath: 'C:/Games/A', gameName: 'A' });
    const before = coordinator.getState();
    coordinator.dispose();
    decompress.resolve();
    await pending;
    await coordinator.waitForReconciliation();

    expect(coordinator.getState()).toBe(before);
    expect(before.activeJob?.status).toBe('running');
    expect(listing.refresh).not.toHaveBeenCalled();
  });

  it('clears a pending demotion on dispose', async () => {
    vi.useFakeTimers();
    const { coordinator } = setup();
    await coordinator.startCompression({ gamePath: 'C:/Games/A', gameName: 'A' });
    coordinator.cancelCompression();
    const before = coordinator.getState();

    coordinator.dispose();
    expect(vi.getTimerCount()).toBe(0);
    await vi.advanceTimersByTimeAsync(3_000);

    expect(coordinator.getState()).toBe(before);
    expect(before.activeJob?.status).toBe('cancelled');
    expect(before.history).toHaveLength(0);
  });

  it('logs a throwing job:reconciled listener without rejecting', async () => {
    const { logger, coordinator } = setup();
    coordinator.on('job:reconciled', () => {
      throw new Error('listener broke');
    });

    await coordinator.startDecompression({ gamePath: 'C:/Games/A', gameName: 'A' });

    await expect(coordinator.waitForReconciliation()).resolves.toBeUndefined();
    expect(logger.error).toHaveBeenCalledWith('[Compression] job:reconciled listener failed: listener broke');
    coordinator.dispose();
  });
});
