import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { SETTINGS_SCHEMA_VERSION, defaultSettings, parseSettings } from './app-settings';
import type { AppSettings } from './app-settings';

const SETTINGS_FILE_NAME = 'settings.json';

interface SettingsFileShape {
  version: number;
  data: Omit<AppSettings, 'steamGridDbApiKey'>;
}

export class SettingsValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsValidationError';
  }
}

export const getSettingsDirectory = (): string =>
  process.env.PRESSPLAY_SETTINGS_DIR ?? path.join(os.homedir(), '.pressplay');

export const getSettingsFilePath = (): string =>
  process.env.PRESSPLAY_SETTINGS_FILE ?? path.join(getSettingsDirectory(), SETTINGS_FILE_NAME);

// The API key is a credential and never lands in the settings file.
const serialize = (settings: AppSettings): string => {
  const { steamGridDbApiKey: _omitted, ...data } = settings;
  return JSON.stringify(
    {
      version: SETTINGS_SCHEMA_VERSION,
      data
    } satisfies SettingsFileShape,
    null,
    2
  );
};

async function ensureDirectoryExists(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

async function readSettingsFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }

    throw new SettingsValidationError(`Failed to read settings file ${filePath}`);
  }
}

export interface SettingsPersistence {
  load(): Promise<AppSettings>;
  save(settings: AppSettings): Promise<void>;
}

/**
 * Stores settings as `{ version, data }` JSON. A missing file yields defaults; content that is
 * not valid JSON raises {@link SettingsValidationError}.
 */
export class FileSettingsPersistence implements SettingsPersistence {
  constructor(private readonly filePath: string = getSettingsFilePath()) {}

  async load(): Promise<AppSettings> {
    const raw = await readSettingsFile(this.filePath);
    if (raw === null) {
      return defaultSettings();
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new SettingsValidationError('Settings file is not valid JSON');
    }
    const data = typeof parsed === 'object' && parsed !== null && 'data' in parsed ? parsed.data : null;
    return parseSettings(data);
  }

  async save(settings: AppSettings): Promise<void> {
    await ensureDirectoryExists(path.dirname(this.filePath));
    await fs.writeFile(this.filePath, serialize(settings), 'utf-8');
  }
}
