import type { CompressionAlgorithm } from './compression';

export type AutomationJobStatus =
  | 'pending'
  | 'waitingForSettle'
  | 'waitingForIdle'
  | 'compressing'
  | 'completed'
  | 'failed'
  | 'skipped';

export type AutomationJobKind = 'newInstall' | 'reconcile' | 'opportunistic';

export interface AutomationJob {
  gamePath: string;
  gameName: string | null;
  kind: AutomationJobKind;
  status: AutomationJobStatus;
  queuedAt: Date;
  startedAt: Date | null;
  error: string | null;
}

export const PENDING_AUTOMATION_STATUSES: ReadonlySet<AutomationJobStatus> = new Set<AutomationJobStatus>([
  'pending',
  'waitingForSettle',
  'waitingForIdle'
]);

export type SchedulerState =
  | 'idle'
  | 'settling'
  | 'waitingForIdle'
  | 'safetyCheck'
  | 'compressing'
  | 'paused'
  | 'backoff';

export type WatcherEventType = 'installed' | 'modified' | 'uninstalled';

export interface WatcherEvent {
  type: WatcherEventType;
  gamePath: string;
  gameName: string | null;
  timestamp: Date;
}

/** Complete automation configuration; the backend always receives every field together. */
export interface AutomationConfig {
  cpuThresholdPercent: number;
  idleDurationSeconds: number;
  cooldownSeconds: number;
  watchPaths: string[];
  excludedPaths: string[];
  algorithm: CompressionAlgorithm;
}
