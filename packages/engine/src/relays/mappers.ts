import type { AutomationJobPayload, SchedulerStatePayload, WatcherEventPayload } from '@pressplay/bridge';
import type { AutomationJob, SchedulerState, WatcherEvent, WatcherEventType } from '@pressplay/models';

export const mapAutomationJob = (payload: AutomationJobPayload): AutomationJob => ({
  gamePath: payload.gamePath,
  gameName: payload.gameName,
  kind: payload.kind,
  status: payload.status,
  queuedAt: new Date(payload.queuedAtMs),
  startedAt: payload.startedAtMs === null ? null : new Date(payload.startedAtMs),
  error: payload.error
});

export const mapSchedulerState = (payload: SchedulerStatePayload): SchedulerState => {
  switch (payload) {
    case 'waitingForEvents':
      return 'idle';
    case 'waitingForSettle':
      return 'settling';
    default:
      return payload;
  }
};

const WATCHER_EVENT_TYPES: Record<WatcherEventPayload['type'], WatcherEventType> = {
  gameInstalled: 'installed',
  gameModified: 'modified',
  gameUninstalled: 'uninstalled'
};

/** Watcher payloads carry no timestamp; events are stamped on arrival. */
export const mapWatcherEvent = (payload: WatcherEventPayload, receivedAt = new Date()): WatcherEvent => ({
  type: WATCHER_EVENT_TYPES[payload.type],
  gamePath: payload.path,
  gameName: payload.gameName,
  timestamp: receivedAt
});
