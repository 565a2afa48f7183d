/* c8 ignore file */
export { PressPlayRuntime } from './runtime';
export type { PressPlayRuntimeOptions } from './runtime';
export { CompressionCoordinator, DEFAULT_DEMOTION_DELAY_MS } from './compression/compression-coordinator';
export type {
  CompressionCoordinatorOptions,
  StartCompressionOptions,
  StartDecompressionOptions
} from './compression/compression-coordinator';
export { reconcileCompletedGame } from './compression/reconcile';
export type { ReconcileDependencies, ReconcileOutcome, RefreshReason } from './compression/reconcile';
export { isGameBusy, selectActiveProgress, selectCompressingGameName } from './compression/selectors';
export {
  AutomationSettingsSync,
  buildAutomationConfig,
  sameAutomationSettings,
  selectAutomationSettings
} from './automation/automation-settings-sync';
export type {
  AutomationSettingsProjection,
  AutomationSettingsSyncOptions
} from './automation/automation-settings-sync';
export { GameLibrary } from './library/game-library';
export type { GameLibraryOptions, GameLibraryState, GameLibraryStatus } from './library/game-library';
export { EventRelay } from './relays/event-relay';
export type { EventRelayOptions, RelayState, RelayStatus } from './relays/event-relay';
export {
  DEFAULT_WATCHER_EVENT_LIMIT,
  createAutoCompressionStatusRelay,
  createAutomationQueueRelay,
  createSchedulerStateRelay,
  createWatcherEventsRelay
} from './relays/automation-relays';
export type {
  AutoCompressionStatusRelay,
  AutomationQueueRelay,
  SchedulerStateRelay,
  WatcherEventsRelay
} from './relays/automation-relays';
export { mapAutomationJob, mapSchedulerState, mapWatcherEvent } from './relays/mappers';
export {
  countPendingAutomationJobs,
  createAutomationQueueViews,
  selectActiveAutomationJob
} from './views/automation-views';
export type { AutomationQueueViews } from './views/automation-views';
export {
  compareGames,
  createGameProjection,
  matchesCompressionFilter,
  normalizeQuery,
  projectGames
} from './views/game-projection';
export type {
  CompressionFilter,
  GameProjection,
  GameProjectionInput,
  GameSortField,
  SortDirection
} from './views/game-projection';
export { countByPlatform, createLibraryViews, indexByPath, summarizeLibrary } from './views/library-views';
export type { LibraryTotals, LibraryViews } from './views/library-views';
export { memoizeLast } from './views/memo';
export { DEFAULT_SEARCH_DEBOUNCE_MS, SearchDebouncer } from './views/search-debouncer';
export type { SearchListener } from './views/search-debouncer';
export { DEFAULT_HISTORY_LIMIT, InMemoryHistoryStore } from './job-history';
export { describeError } from './job-errors';
export { StateContainer } from './state-container';
export type { StateListener } from './state-container';
export type {
  CompressionHistoryEntry,
  CompressionJob,
  CompressionJobKind,
  CompressionJobStatus,
  CompressionState,
  EngineLogger,
  GameListing,
  HistoryStore,
  LogLevel
} from './types';
