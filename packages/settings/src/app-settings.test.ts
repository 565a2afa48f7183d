import { describe, expect, it } from 'vitest';

import { defaultSettings, parseSettings, validateSettings } from './app-settings';

describe('validateSettings', () => {
  it('clamps thresholds into their supported ranges', () => {
    const validated = validateSettings({
      ...defaultSettings(),
      cpuThreshold: 2,
      idleDurationMinutes: 45,
      cooldownMinutes: 0
    });

    expect(validated.cpuThreshold).toBe(5);
    expect(validated.idleDurationMinutes).toBe(30);
    expect(validated.cooldownMinutes).toBe(1);
  });

  it('restores the default theme and drops blank API keys', () => {
    const validated = validateSettings({
      ...defaultSettings(),
      themeVariant: '',
      steamGridDbApiKey: '   '
    });

    expect(validated.themeVariant).toBe('cinematicDesert');
    expect(validated.steamGridDbApiKey).toBeNull();
  });

  it('trims API keys', () => {
    expect(validateSettings({ ...defaultSettings(), steamGridDbApiKey: ' test-key ' }).steamGridDbApiKey).toBe(
      'test-key'
    );
  });
});

describe('parseSettings', () => {
  it('returns defaults for non-object input', () => {
    expect(parseSettings(null)).toEqual(defaultSettings());
    expect(parseSettings(['nope'])).toEqual(defaultSettings());
  });

  it('falls back field by field on mistyped values', () => {
    const parsed = parseSettings({
      schemaVersion: 0,
      algorithm: 'zstd',
      autoCompress: 'yes',
      cpuThreshold: 15,
      idleDurationMinutes: 'ten',
      customFolders: ['D:/Games', 42, 'E:/More'],
      excludedPaths: 'C:/skip'
    });

    expect(parsed.schemaVersion).toBe(1);
    expect(parsed.algorithm).toBe('xpress8k');
    expect(parsed.autoCompress).toBe(false);
    expect(parsed.cpuThreshold).toBe(15);
    expect(parsed.idleDurationMinutes).toBe(5);
    expect(parsed.customFolders).toEqual(['D:/Games', 'E:/More']);
    expect(parsed.excludedPaths).toEqual([]);
  });

  it('keeps valid stored values', () => {
    const parsed = parseSettings({
      schemaVersion: 2,
      algorithm: 'lzx',
      autoCompress: true,
      cooldownMinutes: 60,
      notificationsEnabled: false,
      themeVariant: 'midnight'
    });

    expect(parsed).toMatchObject({
      schemaVersion: 2,
      algorithm: 'lzx',
      autoCompress: true,
      cooldownMinutes: 60,
      notificationsEnabled: false,
      themeVariant: 'midnight'
    });
  });
});
