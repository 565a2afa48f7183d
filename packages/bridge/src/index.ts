/* c8 ignore file */
export { EventChannel } from './event-channel';
export type { EventChannelOptions } from './event-channel';
export type {
  AutomationBridge,
  BridgePort,
  CompressionBridge,
  DiscoveryBridge,
  HydrateGameRequest,
  StartCompressionRequest
} from './bridge-port';
export type { AutomationJobPayload, SchedulerStatePayload, WatcherEventPayload } from './wire';
