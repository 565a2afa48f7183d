import type { AutomationBridge } from '@pressplay/bridge';
import { DEFAULT_COMPRESSION_ALGORITHM } from '@pressplay/models';
import type { AutomationConfig, CompressionAlgorithm } from '@pressplay/models';
import { defaultSettings } from '@pressplay/settings';
import type { SettingsSource, SettingsState } from '@pressplay/settings';

import { describeError } from '../job-errors';
import type { EngineLogger } from '../types';

/** The automation-relevant slice of settings. Every field is null until settings have loaded. */
export interface AutomationSettingsProjection {
  autoCompressEnabled: boolean | null;
  cpuThresholdPercent: number | null;
  idleDurationMinutes: number | null;
  cooldownMinutes: number | null;
  customFolders: readonly string[] | null;
  excludedPaths: readonly string[] | null;
  algorithm: CompressionAlgorithm | null;
}

export const selectAutomationSettings = (state: SettingsState): AutomationSettingsProjection => {
  if (!state.isLoaded) {
    return {
      autoCompressEnabled: null,
      cpuThresholdPercent: null,
      idleDurationMinutes: null,
      cooldownMinutes: null,
      customFolders: null,
      excludedPaths: null,
      algorithm: null
    };
  }
  const { settings } = state;
  return {
    autoCompressEnabled: settings.autoCompress,
    cpuThresholdPercent: settings.cpuThreshold,
    idleDurationMinutes: settings.idleDurationMinutes,
    cooldownMinutes: settings.cooldownMinutes,
    customFolders: settings.customFolders,
    excludedPaths: settings.excludedPaths,
    algorithm: settings.algorithm
  };
};

const sameList = (left: readonly string[] | null, right: readonly string[] | null): boolean => {
  if (left === right) {
    return true;
  }
  if (!left || !right || left.length !== right.length) {
    return false;
  }
  return left.every((entry, index) => entry === right[index]);
};

export const sameAutomationSettings = (
  left: AutomationSettingsProjection,
  right: AutomationSettingsProjection
): boolean =>
  left.autoCompressEnabled === right.autoCompressEnabled &&
  left.cpuThresholdPercent === right.cpuThresholdPercent &&
  left.idleDurationMinutes === right.idleDurationMinutes &&
  left.cooldownMinutes === right.cooldownMinutes &&
  left.algorithm === right.algorithm &&
  sameList(left.customFolders, right.customFolders) &&
  sameList(left.excludedPaths, right.excludedPaths);

export const buildAutomationConfig = (projection: AutomationSettingsProjection): AutomationConfig => {
  const defaults = defaultSettings();
  return {
    cpuThresholdPercent: projection.cpuThresholdPercent ?? defaults.cpuThreshold,
    idleDurationSeconds: (projection.idleDurationMinutes ?? defaults.idleDurationMinutes) * 60,
    cooldownSeconds: (projection.cooldownMinutes ?? defaults.cooldownMinutes) * 60,
    watchPaths: [...(projection.customFolders ?? [])],
    excludedPaths: [...(projection.excludedPaths ?? [])],
    algorithm: projection.algorithm ?? DEFAULT_COMPRESSION_ALGORITHM
  };
};

export interface AutomationSettingsSyncOptions {
  bridge: Pick<AutomationBridge, 'updateAutomationConfig' | 'startAutoCompression' | 'stopAutoCompression'>;
  settings: SettingsSource;
  logger?: EngineLogger;
}

/**
 * Mirrors automation settings into the backend. Enabling pushes the whole config and then starts
 * automation; disabling only stops it. Backend calls run one at a time in arrival order.
 */
export class AutomationSettingsSync {
  private readonly bridge: AutomationSettingsSyncOptions['bridge'];
  private readonly settings: SettingsSource;
  private readonly logger?: EngineLogger;
  private previous: AutomationSettingsProjection | null = null;
  private lastPushed: AutomationConfig | null = null;
  private pending: Promise<void> = Promise.resolve();
  private unsubscribe: (() => void) | null = null;
  private disposed = false;

  constructor(options: AutomationSettingsSyncOptions) {
    this.bridge = options.bridge;
    this.settings = options.settings;
    this.logger = options.logger;
  }

  start(): void {
    if (this.disposed || this.unsubscribe) {
      return;
    }
    this.unsubscribe = this.settings.subscribe(state => {
      this.evaluate(selectAutomationSettings(state));
    });
    this.evaluate(selectAutomationSettings(this.settings.getState()));
  }

  getLastPushedConfig(): AutomationConfig | null {
    return this.lastPushed;
  }

  /** Resolves once every queued backend call has settled. */
  whenIdle(): Promise<void> {
    return this.pending;
  }

  dispose(): void {
    this.disposed = true;
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  private evaluate(next: AutomationSettingsProjection): void {
    if (this.previous && sameAutomationSettings(this.previous, next)) {
      return;
    }
    this.previous = next;

    if (next.autoCompressEnabled === null) {
      return;
    }
    if (next.autoCompressEnabled) {
      const config = buildAutomationConfig(next);
      this.enqueue('enable automation', async () => {
        await this.bridge.updateAutomationConfig(config);
        this.lastPushed = config;
        await this.bridge.startAutoCompression();
      });
    } else {
      this.enqueue('disable automation', () => this.bridge.stopAutoCompression());
    }
  }

  // A failed call is not retried here; the next relevant settings change re-sends everything.
  private enqueue(label: string, task: () => Promise<void>): void {
    this.pending = this.pending.then(async () => {
      if (this.disposed) {
        return;
      }
      try {
        await task();
        this.logger?.info?.(`[AutomationSync] ${label}`);
      } catch (error) {
        this.logger?.error?.(`[AutomationSync] ${label} failed: ${describeError(error)}`);
      }
    });
  }
}
