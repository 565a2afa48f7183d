/* c8 ignore file */
export {
  PLATFORMS,
  bytesSaved,
  isPlatform,
  platformLabel,
  sameGame,
  savingsRatio
} from './games';
export type { GameInfo, Platform } from './games';
export {
  COMPRESSION_ALGORITHMS,
  DEFAULT_COMPRESSION_ALGORITHM,
  algorithmLabel,
  isCompressionAlgorithm,
  progressFraction,
  progressPercent
} from './compression';
export type { CompressionAlgorithm, CompressionProgress } from './compression';
export { PENDING_AUTOMATION_STATUSES } from './automation';
export type {
  AutomationConfig,
  AutomationJob,
  AutomationJobKind,
  AutomationJobStatus,
  SchedulerState,
  WatcherEvent,
  WatcherEventType
} from './automation';
