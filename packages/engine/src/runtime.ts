import type { BridgePort } from '@pressplay/bridge';
import type { SettingsSource } from '@pressplay/settings';

import { AutomationSettingsSync } from './automation/automation-settings-sync';
import { CompressionCoordinator } from './compression/compression-coordinator';
import { GameLibrary } from './library/game-library';
import {
  createAutoCompressionStatusRelay,
  createAutomationQueueRelay,
  createSchedulerStateRelay,
  createWatcherEventsRelay
} from './relays/automation-relays';
import type {
  AutoCompressionStatusRelay,
  AutomationQueueRelay,
  SchedulerStateRelay,
  WatcherEventsRelay
} from './relays/automation-relays';
import type { EngineLogger } from './types';

export interface PressPlayRuntimeOptions {
  bridge: BridgePort;
  settings: SettingsSource;
  logger?: EngineLogger;
  demotionDelayMs?: number;
}

interface Components {
  library?: GameLibrary;
  compression?: CompressionCoordinator;
  automationSync?: AutomationSettingsSync;
  queueRelay?: AutomationQueueRelay;
  autoCompressionRelay?: AutoCompressionStatusRelay;
  schedulerRelay?: SchedulerStateRelay;
  watcherRelay?: WatcherEventsRelay;
}

/**
 * Composition root: one instance of each component, created on first access and bound to the
 * same bridge, settings source and logger.
 */
export class PressPlayRuntime {
  private readonly bridge: BridgePort;
  private readonly settings: SettingsSource;
  private readonly logger: EngineLogger;
  private readonly demotionDelayMs?: number;
  private readonly components: Components = {};
  private started = false;
  private disposed = false;

  constructor(options: PressPlayRuntimeOptions) {
    this.bridge = options.bridge;
    this.settings = options.settings;
    this.logger = options.logger ?? console;
    this.demotionDelayMs = options.demotionDelayMs;
  }

  get library(): GameLibrary {
    this.assertActive();
    this.components.library ??= new GameLibrary({ bridge: this.bridge, logger: this.logger });
    return this.components.library;
  }

  get compression(): CompressionCoordinator {
    this.assertActive();
    this.components.compression ??= new CompressionCoordinator({
      bridge: this.bridge,
      listing: this.library,
      resolveDefaultAlgorithm: () => {
        const state = this.settings.getState();
        return state.isLoaded ? state.settings.algorithm : null;
      },
      demotionDelayMs: this.demotionDelayMs,
      logger: this.logger
    });
    return this.components.compression;
  }

  get automationSync(): AutomationSettingsSync {
    this.assertActive();
    this.components.automationSync ??= new AutomationSettingsSync({
      bridge: this.bridge,
      settings: this.settings,
      logger: this.logger
    });
    return this.components.automationSync;
  }

  get queueRelay(): AutomationQueueRelay {
    this.assertActive();
    this.components.queueRelay ??= createAutomationQueueRelay(this.bridge, this.logger);
    return this.components.queueRelay;
  }

  get autoCompressionRelay(): AutoCompressionStatusRelay {
    this.assertActive();
    this.components.autoCompressionRelay ??= createAutoCompressionStatusRelay(this.bridge, this.logger);
    return this.components.autoCompressionRelay;
  }

  get schedulerRelay(): SchedulerStateRelay {
    this.assertActive();
    this.components.schedulerRelay ??= createSchedulerStateRelay(this.bridge, this.logger);
    return this.components.schedulerRelay;
  }

  get watcherRelay(): WatcherEventsRelay {
    this.assertActive();
    this.components.watcherRelay ??= createWatcherEventsRelay(this.bridge, this.logger);
    return this.components.watcherRelay;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Opens the backend subscriptions, starts settings sync and loads the library. */
  async start(): Promise<void> {
    this.assertActive();
    if (this.started) {
      return;
    }
    this.started = true;
    this.queueRelay.start();
    this.autoCompressionRelay.start();
    this.schedulerRelay.start();
    this.watcherRelay.start();
    this.automationSync.start();
    await this.library.load();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    const { components } = this;
    components.compression?.dispose();
    components.automationSync?.dispose();
    components.queueRelay?.dispose();
    components.autoCompressionRelay?.dispose();
    components.schedulerRelay?.dispose();
    components.watcherRelay?.dispose();
    components.library?.dispose();
  }

  private assertActive(): void {
    if (this.disposed) {
      throw new Error('PressPlayRuntime has been disposed');
    }
  }
}
