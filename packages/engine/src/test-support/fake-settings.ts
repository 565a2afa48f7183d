import { defaultSettings } from '@pressplay/settings';
import type { AppSettings, SettingsListener, SettingsSource, SettingsState } from '@pressplay/settings';

/** In-memory settings source; `update` replaces the snapshot and notifies like the real store. */
export class FakeSettingsSource implements SettingsSource {
  private readonly listeners = new Set<SettingsListener>();
  private state: SettingsState;

  constructor(settings: Partial<AppSettings> | null = {}) {
    this.state =
      settings === null
        ? { settings: defaultSettings(), isLoaded: false, error: null }
        : { settings: { ...defaultSettings(), ...settings }, isLoaded: true, error: null };
  }

  getState(): SettingsState {
    return this.state;
  }

  subscribe(listener: SettingsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  update(patch: Partial<AppSettings>): void {
    this.state = { ...this.state, isLoaded: true, settings: { ...this.state.settings, ...patch } };
    for (const listener of this.listeners) {
      listener(this.state);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}
