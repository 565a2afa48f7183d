import {
  DEFAULT_COMPRESSION_ALGORITHM,
  isCompressionAlgorithm
} from '@pressplay/models';
import type { CompressionAlgorithm } from '@pressplay/models';

export const SETTINGS_SCHEMA_VERSION = 2;
const DEFAULT_THEME_VARIANT = 'cinematicDesert';

export interface AppSettings {
  schemaVersion: number;
  algorithm: CompressionAlgorithm;
  autoCompress: boolean;
  cpuThreshold: number;
  idleDurationMinutes: number;
  cooldownMinutes: number;
  customFolders: string[];
  excludedPaths: string[];
  notificationsEnabled: boolean;
  themeVariant: string;
  directStorageOverrideEnabled: boolean;
  steamGridDbApiKey: string | null;
  inventoryAdvancedScanEnabled: boolean;
}

export const defaultSettings = (): AppSettings => ({
  schemaVersion: SETTINGS_SCHEMA_VERSION,
  algorithm: DEFAULT_COMPRESSION_ALGORITHM,
  autoCompress: false,
  cpuThreshold: 10,
  idleDurationMinutes: 5,
  cooldownMinutes: 5,
  customFolders: [],
  excludedPaths: [],
  notificationsEnabled: true,
  themeVariant: DEFAULT_THEME_VARIANT,
  directStorageOverrideEnabled: false,
  steamGridDbApiKey: null,
  inventoryAdvancedScanEnabled: false
});

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

const normalizeApiKey = (value: string | null): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

/** Clamps numeric fields into their supported ranges. */
export const validateSettings = (settings: AppSettings): AppSettings => ({
  ...settings,
  cpuThreshold: clamp(settings.cpuThreshold, 5, 20),
  idleDurationMinutes: clamp(Math.round(settings.idleDurationMinutes), 5, 30),
  cooldownMinutes: clamp(Math.round(settings.cooldownMinutes), 1, 120),
  themeVariant: settings.themeVariant ? settings.themeVariant : DEFAULT_THEME_VARIANT,
  steamGridDbApiKey: normalizeApiKey(settings.steamGridDbApiKey)
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (value: unknown, fallback: number): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback;

const readBoolean = (value: unknown, fallback: boolean): boolean => (typeof value === 'boolean' ? value : fallback);

const readStringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];

/** Builds settings from untrusted JSON, falling back to defaults field by field. */
export const parseSettings = (input: unknown): AppSettings => {
  const defaults = defaultSettings();
  if (!isRecord(input)) {
    return defaults;
  }

  const schemaVersion = readNumber(input.schemaVersion, 1);
  return validateSettings({
    schemaVersion: schemaVersion <= 0 ? 1 : schemaVersion,
    algorithm: isCompressionAlgorithm(input.algorithm) ? input.algorithm : defaults.algorithm,
    autoCompress: readBoolean(input.autoCompress, defaults.autoCompress),
    cpuThreshold: readNumber(input.cpuThreshold, defaults.cpuThreshold),
    idleDurationMinutes: readNumber(input.idleDurationMinutes, defaults.idleDurationMinutes),
    cooldownMinutes: readNumber(input.cooldownMinutes, defaults.cooldownMinutes),
    customFolders: readStringList(input.customFolders),
    excludedPaths: readStringList(input.excludedPaths),
    notificationsEnabled: readBoolean(input.notificationsEnabled, defaults.notificationsEnabled),
    themeVariant: typeof input.themeVariant === 'string' ? input.themeVariant : defaults.themeVariant,
    directStorageOverrideEnabled: readBoolean(
      input.directStorageOverrideEnabled,
      defaults.directStorageOverrideEnabled
    ),
    steamGridDbApiKey: typeof input.steamGridDbApiKey === 'string' ? input.steamGridDbApiKey : null,
    inventoryAdvancedScanEnabled: readBoolean(
      input.inventoryAdvancedScanEnabled,
      defaults.inventoryAdvancedScanEnabled
    )
  });
};
