import { COMPRESSION_ALGORITHMS, isCompressionAlgorithm } from '@pressplay/models';
import { SettingsStore } from '@pressplay/settings';
import type { AppSettings, SettingsState } from '@pressplay/settings';

export interface PpctlContext {
  createStore: () => SettingsStore;
}

/* c8 ignore start */
export const createPpctlContext = (): PpctlContext => ({
  createStore: () => new SettingsStore()
});
/* c8 ignore end */

const withStore = async (ctx: PpctlContext, mutate: (store: SettingsStore) => void): Promise<AppSettings> => {
  const store = ctx.createStore();
  try {
    await store.load();
    mutate(store);
    if (!(await store.flush())) {
      throw new Error('Failed to write the settings file');
    }
    return store.getState().settings;
  } finally {
    store.dispose();
  }
};

export const parseNumberOption = (name: string, raw: string | undefined): number | undefined => {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`Invalid ${name}: '${raw}'`);
  }
  return value;
};

export const showSettingsAction = async (ctx = createPpctlContext()): Promise<SettingsState> => {
  const store = ctx.createStore();
  try {
    return await store.load();
  } finally {
    store.dispose();
  }
};

export const setAutomationAction = async (
  enabled: boolean,
  ctx = createPpctlContext()
): Promise<AppSettings> => withStore(ctx, store => store.setAutoCompress(enabled));

export interface ThresholdsActionInput {
  cpuPercent?: number;
  idleMinutes?: number;
  cooldownMinutes?: number;
}

/** Values outside the supported ranges are clamped by the settings store. */
export const setThresholdsAction = async (
  input: ThresholdsActionInput,
  ctx = createPpctlContext()
): Promise<AppSettings> => {
  if (input.cpuPercent === undefined && input.idleMinutes === undefined && input.cooldownMinutes === undefined) {
    throw new Error('Pass at least one of --cpu, --idle or --cooldown');
  }
  return withStore(ctx, store => {
    if (input.cpuPercent !== undefined) {
      store.setCpuThreshold(input.cpuPercent);
    }
    if (input.idleMinutes !== undefined) {
      store.setIdleDuration(input.idleMinutes);
    }
    if (input.cooldownMinutes !== undefined) {
      store.setCooldown(input.cooldownMinutes);
    }
  });
};

export const setAlgorithmAction = async (name: string, ctx = createPpctlContext()): Promise<AppSettings> => {
  const algorithm: string = name.trim().toLowerCase();
  if (!isCompressionAlgorithm(algorithm)) {
    throw new Error(`Unknown algorithm '${name}'. Expected one of: ${COMPRESSION_ALGORITHMS.join(', ')}`);
  }
  return withStore(ctx, store => store.setAlgorithm(algorithm));
};

export const addFolderAction = async (folder: string, ctx = createPpctlContext()): Promise<AppSettings> => {
  if (!folder.trim()) {
    throw new Error('Folder path must not be empty');
  }
  return withStore(ctx, store => store.addCustomFolder(folder));
};

export const removeFolderAction = async (folder: string, ctx = createPpctlContext()): Promise<AppSettings> =>
  withStore(ctx, store => store.removeCustomFolder(folder.trim()));

/** Resolves true when the path is excluded after the toggle. */
export const toggleExclusionAction = async (gamePath: string, ctx = createPpctlContext()): Promise<boolean> => {
  const settings = await withStore(ctx, store => store.toggleExclusion(gamePath));
  return settings.excludedPaths.includes(gamePath);
};

/** Settings as printed by `settings show`; the API key is masked. */
export const describeSettings = (settings: AppSettings): Record<string, unknown> => ({
  ...settings,
  steamGridDbApiKey: settings.steamGridDbApiKey ? '(set)' : null
});
