import { EventEmitter } from 'node:events';

import type { CompressionAlgorithm } from '@pressplay/models';

import { defaultSettings, validateSettings } from './app-settings';
import type { AppSettings } from './app-settings';
import { FileSettingsPersistence } from './persistence';
import type { SettingsPersistence } from './persistence';

export interface SettingsState {
  settings: AppSettings;
  isLoaded: boolean;
  error: string | null;
}

export type SettingsListener = (state: SettingsState) => void;

/** Read side of the settings store, as seen by consumers that only observe settings. */
export interface SettingsSource {
  getState(): SettingsState;
  subscribe(listener: SettingsListener): () => void;
}

export type SettingsLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface SettingsStoreOptions {
  persistence?: SettingsPersistence;
  saveDelayMs?: number;
  logger?: SettingsLogger;
}

const DEFAULT_SAVE_DELAY_MS = 500;
export const SETTINGS_CORRUPTED_MESSAGE = 'Settings corrupted, using defaults.';

export class SettingsStore extends EventEmitter implements SettingsSource {
  private readonly persistence: SettingsPersistence;
  private readonly saveDelayMs: number;
  private readonly logger?: SettingsLogger;
  private state: SettingsState = { settings: defaultSettings(), isLoaded: false, error: null };
  private saveTimer: ReturnType<typeof setTimeout> | null = null;
  private pendingSave: AppSettings | null = null;
  private disposed = false;

  constructor(options: SettingsStoreOptions = {}) {
    super();
    this.persistence = options.persistence ?? new FileSettingsPersistence();
    this.saveDelayMs = options.saveDelayMs ?? DEFAULT_SAVE_DELAY_MS;
    this.logger = options.logger;
  }

  getState(): SettingsState {
    return this.state;
  }

  subscribe(listener: SettingsListener): () => void {
    this.on('change', listener);
    return () => {
      this.off('change', listener);
    };
  }

  async load(): Promise<SettingsState> {
    try {
      const settings = validateSettings(await this.persistence.load());
      this.setState({ settings, isLoaded: true, error: null });
    } catch (error) {
      this.logger?.warn?.('[Settings] load failed, falling back to defaults', error);
      this.setState({ settings: defaultSettings(), isLoaded: true, error: SETTINGS_CORRUPTED_MESSAGE });
    }
    return this.state;
  }

  setAlgorithm(algorithm: CompressionAlgorithm): void {
    this.update(settings => ({ ...settings, algorithm }));
  }

  setAutoCompress(enabled: boolean): void {
    this.update(settings => ({ ...settings, autoCompress: enabled }));
  }

  toggleAutoCompress(): void {
    this.update(settings => ({ ...settings, autoCompress: !settings.autoCompress }));
  }

  setCpuThreshold(percent: number): void {
    this.update(settings => ({ ...settings, cpuThreshold: percent }));
  }

  setIdleDuration(minutes: number): void {
    this.update(settings => ({ ...settings, idleDurationMinutes: minutes }));
  }

  setCooldown(minutes: number): void {
    this.update(settings => ({ ...settings, cooldownMinutes: minutes }));
  }

  addCustomFolder(folder: string): void {
    const normalized = folder.trim();
    if (!normalized) {
      return;
    }
    this.update(settings =>
      settings.customFolders.includes(normalized)
        ? settings
        : { ...settings, customFolders: [...settings.customFolders, normalized] }
    );
  }

  removeCustomFolder(folder: string): void {
    this.update(settings =>
      settings.customFolders.includes(folder)
        ? { ...settings, customFolders: settings.customFolders.filter(entry => entry !== folder) }
        : settings
    );
  }

  toggleExclusion(gamePath: string): void {
    this.update(settings => ({
      ...settings,
      excludedPaths: settings.excludedPaths.includes(gamePath)
        ? settings.excludedPaths.filter(entry => entry !== gamePath)
        : [...settings.excludedPaths, gamePath]
    }));
  }

  setNotificationsEnabled(enabled: boolean): void {
    this.update(settings => ({ ...settings, notificationsEnabled: enabled }));
  }

  setThemeVariant(variant: string): void {
    this.update(settings => ({ ...settings, themeVariant: variant }));
  }

  setDirectStorageOverride(enabled: boolean): void {
    this.update(settings => ({ ...settings, directStorageOverrideEnabled: enabled }));
  }

  setSteamGridDbApiKey(key: string | null): void {
    this.update(settings => ({ ...settings, steamGridDbApiKey: key }));
  }

  setInventoryAdvancedScan(enabled: boolean): void {
    this.update(settings => ({ ...settings, inventoryAdvancedScanEnabled: enabled }));
  }

  /**
   * Writes any pending change immediately instead of waiting for the save delay.
   * Resolves false when the write failed.
   */
  async flush(): Promise<boolean> {
    this.clearSaveTimer();
    const pending = this.pendingSave;
    this.pendingSave = null;
    return pending ? this.save(pending) : true;
  }

  dispose(): void {
    this.disposed = true;
    this.clearSaveTimer();
    this.pendingSave = null;
    this.removeAllListeners();
  }

  private update(updater: (current: AppSettings) => AppSettings): void {
    if (this.disposed || !this.state.isLoaded) {
      return;
    }
    const current = this.state.settings;
    const updated = updater(current);
    if (updated === current) {
      return;
    }
    const settings = validateSettings(updated);
    this.setState({ ...this.state, settings, error: null });
    this.scheduleSave(settings);
  }

  private setState(next: SettingsState): void {
    this.state = next;
    this.emit('change', next);
  }

  private scheduleSave(settings: AppSettings): void {
    this.clearSaveTimer();
    this.pendingSave = settings;
    this.saveTimer = setTimeout(() => {
      this.saveTimer = null;
      void this.flush();
    }, this.saveDelayMs);
    if (typeof this.saveTimer.unref === 'function') {
      this.saveTimer.unref();
    }
  }

  private clearSaveTimer(): void {
    if (this.saveTimer) {
      clearTimeout(this.saveTimer);
      this.saveTimer = null;
    }
  }

  // Settings stay in memory when a write fails; the next change retries.
  private async save(settings: AppSettings): Promise<boolean> {
    try {
      await this.persistence.save(settings);
      return true;
    } catch (error) {
      this.logger?.error?.('[Settings] save failed', error);
      return false;
    }
  }
}
