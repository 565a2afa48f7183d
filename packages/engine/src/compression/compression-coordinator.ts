import { randomUUID } from 'node:crypto';

import type { CompressionBridge, DiscoveryBridge } from '@pressplay/bridge';
import { DEFAULT_COMPRESSION_ALGORITHM } from '@pressplay/models';
import type { CompressionAlgorithm, CompressionProgress } from '@pressplay/models';

import { describeError } from '../job-errors';
import { DEFAULT_HISTORY_LIMIT, InMemoryHistoryStore } from '../job-history';
import { StateContainer } from '../state-container';
import type {
  CompressionHistoryEntry,
  CompressionJob,
  CompressionJobKind,
  CompressionJobStatus,
  CompressionState,
  EngineLogger,
  GameListing,
  HistoryStore,
  LogLevel
} from '../types';
import { reconcileCompletedGame } from './reconcile';
import type { ReconcileOutcome } from './reconcile';

export const DEFAULT_DEMOTION_DELAY_MS = 3_000;

export interface CompressionCoordinatorOptions {
  bridge: CompressionBridge & Pick<DiscoveryBridge, 'hydrateGame'>;
  listing: GameListing;
  /** Consulted when a start request names no algorithm. */
  resolveDefaultAlgorithm?: () => CompressionAlgorithm | null;
  demotionDelayMs?: number;
  historyStore?: HistoryStore<CompressionHistoryEntry>;
  historyLimit?: number;
  logger?: EngineLogger;
}

export interface StartCompressionOptions {
  gamePath: string;
  gameName: string;
  algorithm?: CompressionAlgorithm | null;
}

export interface StartDecompressionOptions {
  gamePath: string;
  gameName: string;
}

/**
 * Owns the single active-job slot. Every job moves Running -> Completed | Failed | Cancelled and
 * is then demoted into the bounded history, immediately for Completed and after
 * `demotionDelayMs` (or at the next start) otherwise.
 *
 * Events: `job:started`, `job:progress`, `job:finished`, `job:demoted` and `job:reconciled`.
 */
export class CompressionCoordinator extends StateContainer<CompressionState> {
  private readonly bridge: CompressionCoordinatorOptions['bridge'];
  private readonly listing: GameListing;
  private readonly resolveDefaultAlgorithm?: () => CompressionAlgorithm | null;
  private readonly demotionDelayMs: number;
  private readonly history: HistoryStore<CompressionHistoryEntry>;
  private readonly logger?: EngineLogger;
  private readonly reconciliations = new Set<Promise<ReconcileOutcome | null>>();
  private progressController: AbortController | null = null;
  private demotionTimer: ReturnType<typeof setTimeout> | null = null;
  private disposed = false;

  constructor(options: CompressionCoordinatorOptions) {
    const history =
      options.historyStore ??
      new InMemoryHistoryStore<CompressionHistoryEntry>(options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    super({ activeJob: null, history: history.entries() });
    this.history = history;
    this.bridge = options.bridge;
    this.listing = options.listing;
    this.resolveDefaultAlgorithm = options.resolveDefaultAlgorithm;
    this.demotionDelayMs = options.demotionDelayMs ?? DEFAULT_DEMOTION_DELAY_MS;
    this.logger = options.logger;
  }

  hasActiveJob(): boolean {
    return this.getState().activeJob?.status === 'running';
  }

  async startCompression(options: StartCompressionOptions): Promise<void> {
    if (this.disposed || this.hasActiveJob()) {
      return;
    }
    const algorithm = options.algorithm ?? this.resolveDefaultAlgorithm?.() ?? DEFAULT_COMPRESSION_ALGORITHM;

    this.demoteSettledJob();
    this.closeProgressSubscription();
    const job = this.beginJob(options.gamePath, options.gameName, 'compression', algorithm);
    const controller = new AbortController();
    this.progressController = controller;

    try {
      const progress = this.bridge.watchCompressionProgress(controller.signal);
      await this.bridge.startCompression({ gamePath: job.gamePath, gameName: job.gameName, algorithm });
      if (this.isStale(job, controller)) {
        return;
      }
      void this.consumeProgress(job, progress, controller);
    } catch (error) {
      if (this.isStale(job, controller)) {
        return;
      }
      this.failJob(job, `Failed to start: ${describeError(error)}`);
    }
  }

  async startDecompression(options: StartDecompressionOptions): Promise<void> {
    if (this.disposed || this.hasActiveJob()) {
      return;
    }

    this.demoteSettledJob();
    this.closeProgressSubscription();
    const job = this.beginJob(options.gamePath, options.gameName, 'decompression', null);

    try {
      await this.bridge.decompressGame(job.gamePath);
    } catch (error) {
      if (this.isCurrent(job)) {
        this.failJob(job, `Decompression failed: ${describeError(error)}`);
      }
      return;
    }
    if (this.isCurrent(job)) {
      this.completeJob(job);
    }
  }

  /** Local-first: the job is Cancelled even when the backend cancel request fails. */
  cancelCompression(): void {
    const job = this.getState().activeJob;
    if (this.disposed || !job || job.status !== 'running') {
      return;
    }

    this.closeProgressSubscription();
    this.requestBackendCancel();
    const cancelled = this.settleJob(job, 'cancelled', null);
    this.logger?.warn?.(`[Compression] ${job.gameName} cancelled`);
    if (cancelled && this.holdsJob(cancelled)) {
      this.scheduleDemotion();
    }
  }

  async waitForReconciliation(): Promise<void> {
    while (this.reconciliations.size > 0) {
      await Promise.all([...this.reconciliations]);
    }
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.clearDemotionTimer();
    this.closeProgressSubscription();
    this.removeAllListeners();
  }

  protected override setState(next: CompressionState): void {
    if (this.disposed) {
      return;
    }
    super.setState(next);
  }

  private beginJob(
    gamePath: string,
    gameName: string,
    kind: CompressionJobKind,
    algorithm: CompressionAlgorithm | null
  ): CompressionJob {
    const job: CompressionJob = {
      jobId: randomUUID(),
      gamePath,
      gameName,
      kind,
      algorithm,
      status: 'running',
      progress: null,
      progressUpdatedAt: null,
      error: null,
      startedAt: Date.now(),
      finishedAt: null
    };
    this.setState({ ...this.getState(), activeJob: job });
    this.emit('job:started', job);
    this.logger?.info?.(`[Compression] ${kind} started for ${gameName}`);
    return job;
  }

  private async consumeProgress(
    job: CompressionJob,
    progress: AsyncIterable<CompressionProgress>,
    controller: AbortController
  ): Promise<void> {
    try {
      for await (const snapshot of progress) {
        if (this.isStale(job, controller)) {
          return;
        }
        this.applyProgress(job, snapshot);
      }
    } catch (error) {
      if (!this.isStale(job, controller)) {
        this.failJob(job, describeError(error));
      }
      return;
    }
    if (!this.isStale(job, controller)) {
      this.completeJob(job);
    }
  }

  private applyProgress(job: CompressionJob, snapshot: CompressionProgress): void {
    const active = this.getState().activeJob;
    if (!active || active.jobId !== job.jobId) {
      return;
    }
    const updated: CompressionJob = { ...active, progress: snapshot, progressUpdatedAt: Date.now() };
    this.setState({ ...this.getState(), activeJob: updated });
    this.emit('job:progress', updated);
  }

  private completeJob(job: CompressionJob): void {
    this.closeProgressSubscription();
    const completed = this.settleJob(job, 'completed', null);
    if (!completed) {
      return;
    }
    this.logger?.info?.(`[Compression] ${completed.kind} completed for ${completed.gameName}`);
    this.trackReconciliation(completed);
    this.demote(completed);
  }

  private failJob(job: CompressionJob, message: string): void {
    this.closeProgressSubscription();
    const failed = this.settleJob(job, 'failed', message);
    if (!failed) {
      return;
    }
    this.logger?.error?.(`[Compression] ${job.gameName}: ${message}`);
    if (this.holdsJob(failed)) {
      this.scheduleDemotion();
    }
  }

  private settleJob(job: CompressionJob, status: CompressionJobStatus, error: string | null): CompressionJob | null {
    const active = this.getState().activeJob;
    if (!active || active.jobId !== job.jobId || active.status !== 'running') {
      return null;
    }
    const settled: CompressionJob = { ...active, status, error, finishedAt: Date.now() };
    this.setState({ ...this.getState(), activeJob: settled });
    this.emit('job:finished', settled);
    return settled;
  }

  private trackReconciliation(job: CompressionJob): void {
    const pending = reconcileCompletedGame(job, {
      bridge: this.bridge,
      listing: this.listing,
      isDisposed: () => this.disposed,
      logger: this.logger
    })
      .then(outcome => {
        if (outcome && !this.disposed) {
          this.emit('job:reconciled', job, outcome);
        }
        return outcome;
      })
      .catch((error: unknown) => {
        this.logger?.error?.(`[Compression] job:reconciled listener failed: ${describeError(error)}`);
        return null;
      });
    this.reconciliations.add(pending);
    void pending.finally(() => {
      this.reconciliations.delete(pending);
    });
  }

  private requestBackendCancel(): void {
    const onError = (error: unknown) => {
      this.logger?.warn?.(`[Compression] backend cancel failed: ${describeError(error)}`);
    };
    try {
      void this.bridge.cancelCompression().catch(onError);
    } catch (error) {
      onError(error);
    }
  }

  /** A `job:finished` listener may already have started the next job, which demoted this one. */
  private demote(job: CompressionJob): void {
    if (!this.holdsJob(job)) {
      return;
    }
    const entry: CompressionHistoryEntry = { ...job, logLevel: this.resolveLogLevel(job.status) };
    this.history.record(entry);
    this.setState({ activeJob: null, history: this.history.entries() });
    this.emit('job:demoted', entry);
  }

  private demoteSettledJob(): void {
    this.clearDemotionTimer();
    const active = this.getState().activeJob;
    if (active && active.status !== 'running') {
      this.demote(active);
    }
  }

  private scheduleDemotion(): void {
    this.clearDemotionTimer();
    this.demotionTimer = setTimeout(() => {
      this.demotionTimer = null;
      if (!this.disposed) {
        this.demoteSettledJob();
      }
    }, this.demotionDelayMs);
    if (typeof this.demotionTimer.unref === 'function') {
      this.demotionTimer.unref();
    }
  }

  private clearDemotionTimer(): void {
    if (this.demotionTimer) {
      clearTimeout(this.demotionTimer);
      this.demotionTimer = null;
    }
  }

  private closeProgressSubscription(): void {
    if (this.progressController) {
      this.progressController.abort();
      this.progressController = null;
    }
  }

  private resolveLogLevel(status: CompressionJobStatus): LogLevel {
    if (status === 'failed') {
      return 'error';
    }
    if (status === 'cancelled') {
      return 'warn';
    }
    return 'info';
  }

  private holdsJob(job: CompressionJob): boolean {
    return this.getState().activeJob?.jobId === job.jobId;
  }

  private isCurrent(job: CompressionJob): boolean {
    const active = this.getState().activeJob;
    return !this.disposed && active?.jobId === job.jobId && active.status === 'running';
  }

  private isStale(job: CompressionJob, controller: AbortController): boolean {
    return controller.signal.aborted || !this.isCurrent(job);
  }
}
