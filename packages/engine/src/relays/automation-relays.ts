import type {
  AutomationBridge,
  AutomationJobPayload,
  SchedulerStatePayload,
  WatcherEventPayload
} from '@pressplay/bridge';
import type { AutomationJob, SchedulerState, WatcherEvent } from '@pressplay/models';

import type { EngineLogger } from '../types';
import { EventRelay } from './event-relay';
import { mapAutomationJob, mapSchedulerState, mapWatcherEvent } from './mappers';

export const DEFAULT_WATCHER_EVENT_LIMIT = 50;

export type AutomationQueueRelay = EventRelay<AutomationJobPayload[], readonly AutomationJob[]>;
export type AutoCompressionStatusRelay = EventRelay<boolean, boolean>;
export type SchedulerStateRelay = EventRelay<SchedulerStatePayload, SchedulerState | null>;
export type WatcherEventsRelay = EventRelay<WatcherEventPayload, readonly WatcherEvent[]>;

export const createAutomationQueueRelay = (
  bridge: AutomationBridge,
  logger?: EngineLogger
): AutomationQueueRelay =>
  new EventRelay<AutomationJobPayload[], readonly AutomationJob[]>({
    name: 'queue',
    subscribe: signal => bridge.watchAutomationQueue(signal),
    initialValue: [],
    reduce: (_current, payload) => payload.map(mapAutomationJob),
    logger
  });

export const createAutoCompressionStatusRelay = (
  bridge: AutomationBridge,
  logger?: EngineLogger
): AutoCompressionStatusRelay =>
  new EventRelay<boolean, boolean>({
    name: 'auto-compression',
    subscribe: signal => bridge.watchAutoCompressionStatus(signal),
    initialValue: false,
    reduce: (_current, running) => running,
    logger
  });

export const createSchedulerStateRelay = (
  bridge: AutomationBridge,
  logger?: EngineLogger
): SchedulerStateRelay =>
  new EventRelay<SchedulerStatePayload, SchedulerState | null>({
    name: 'scheduler',
    subscribe: signal => bridge.watchSchedulerState(signal),
    initialValue: null,
    reduce: (_current, payload) => mapSchedulerState(payload),
    logger
  });

/** Newest first, keeping at most `limit` events. */
export const createWatcherEventsRelay = (
  bridge: AutomationBridge,
  logger?: EngineLogger,
  limit = DEFAULT_WATCHER_EVENT_LIMIT
): WatcherEventsRelay =>
  new EventRelay<WatcherEventPayload, readonly WatcherEvent[]>({
    name: 'watcher',
    subscribe: signal => bridge.watchWatcherEvents(signal),
    initialValue: [],
    reduce: (current, payload) => [mapWatcherEvent(payload), ...current].slice(0, limit),
    logger
  });
