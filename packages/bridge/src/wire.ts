import type { AutomationJobKind, AutomationJobStatus } from '@pressplay/models';

/** Automation queue entry as serialized by the backend. Timestamps are epoch milliseconds. */
export interface AutomationJobPayload {
  gamePath: string;
  gameName: string | null;
  kind: AutomationJobKind;
  status: AutomationJobStatus;
  queuedAtMs: number;
  startedAtMs: number | null;
  error: string | null;
}

export type WatcherEventPayload =
  | { type: 'gameInstalled'; path: string; gameName: string | null }
  | { type: 'gameModified'; path: string; gameName: string | null }
  | { type: 'gameUninstalled'; path: string; gameName: string | null };

/** Scheduler phases using the backend's own names. */
export type SchedulerStatePayload =
  | 'waitingForEvents'
  | 'waitingForSettle'
  | 'waitingForIdle'
  | 'safetyCheck'
  | 'compressing'
  | 'paused'
  | 'backoff';
