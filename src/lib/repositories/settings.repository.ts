/**
 * Settings Repository
 *
 * Key-value storage for engine settings. Values are JSON; each known key
 * has a schema and a default, so a missing or malformed row never stops
 * processing.
 */

import { z } from 'zod';
import { execute, select } from '../database';
import type {
  EngineSettings,
  WorkCalendarSettings,
  ProcessingSettings,
  RetentionSettings,
} from '../../types/models';
import type { SettingsRow } from '../../types/api';

// Monday to Friday, 8 hour days
export const DEFAULT_WORK_CALENDAR: WorkCalendarSettings = {
  workdays: [1, 2, 3, 4, 5],
  standardDailyHours: 8,
};

export const DEFAULT_PROCESSING_SETTINGS: ProcessingSettings = {
  batchSize: 1000,
  rebuildBatchSize: 100,
  minSessionSeconds: 0,
};

export const DEFAULT_RETENTION_SETTINGS: RetentionSettings = {
  olderThanDays: 365,
};

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  calendar: DEFAULT_WORK_CALENDAR,
  processing: DEFAULT_PROCESSING_SETTINGS,
  retention: DEFAULT_RETENTION_SETTINGS,
};

export const workCalendarSchema = z.object({
  workdays: z.array(z.number().int().min(0).max(6)),
  standardDailyHours: z.number().min(1).max(24),
});

export const processingSettingsSchema = z.object({
  batchSize: z.number().int().positive(),
  rebuildBatchSize: z.number().int().positive(),
  minSessionSeconds: z.number().int().min(0).default(0),
});

export const retentionSettingsSchema = z.object({
  olderThanDays: z.number().int().positive(),
});

const SETTING_KEYS = {
  calendar: 'calendar',
  processing: 'processing',
  retention: 'retention',
} as const;

/**
 * Get a setting value by key
 */
export async function getSetting(key: string): Promise<string | null> {
  const rows = await select<Pick<SettingsRow, 'value'>>(
    'SELECT value FROM settings WHERE key = ?',
    [key]
  );
  return rows[0]?.value ?? null;
}

/**
 * Set a setting value
 */
export async function setSetting(key: string, value: string): Promise<void> {
  await execute(
    `INSERT INTO settings (key, value, updated_at)
     VALUES (?, ?, datetime('now'))
     ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
    [key, value]
  );
}

/**
 * Delete a setting
 */
export async function deleteSetting(key: string): Promise<void> {
  await execute('DELETE FROM settings WHERE key = ?', [key]);
}

/**
 * Get typed setting value, falling back to the default when the stored
 * value is missing or does not match the schema
 */
export async function getTypedSetting<T>(
  key: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  defaultValue: T
): Promise<T> {
  const value = await getSetting(key);
  if (value === null) {
    return defaultValue;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch {
    console.warn(`[settings] Ignoring malformed JSON for "${key}"`);
    return defaultValue;
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[settings] Ignoring invalid value for "${key}": ${parsed.error.errors[0]?.message ?? 'unknown'}`);
    return defaultValue;
  }
  return parsed.data;
}

/**
 * Set typed setting value
 */
export async function setTypedSetting<T>(key: string, value: T): Promise<void> {
  await setSetting(key, JSON.stringify(value));
}

/**
 * Get all engine settings
 */
export async function getEngineSettings(): Promise<EngineSettings> {
  const [calendar, processing, retention] = await Promise.all([
    getTypedSetting(SETTING_KEYS.calendar, workCalendarSchema, DEFAULT_WORK_CALENDAR),
    getTypedSetting(SETTING_KEYS.processing, processingSettingsSchema, DEFAULT_PROCESSING_SETTINGS),
    getTypedSetting(SETTING_KEYS.retention, retentionSettingsSchema, DEFAULT_RETENTION_SETTINGS),
  ]);
  return { calendar, processing, retention };
}

/**
 * Update engine settings (partial update)
 */
export async function updateEngineSettings(settings: Partial<EngineSettings>): Promise<EngineSettings> {
  if (settings.calendar !== undefined) {
    await setTypedSetting(SETTING_KEYS.calendar, workCalendarSchema.parse(settings.calendar));
  }
  if (settings.processing !== undefined) {
    await setTypedSetting(SETTING_KEYS.processing, processingSettingsSchema.parse(settings.processing));
  }
  if (settings.retention !== undefined) {
    await setTypedSetting(SETTING_KEYS.retention, retentionSettingsSchema.parse(settings.retention));
  }
  return getEngineSettings();
}

/**
 * Reset settings to defaults
 */
export async function resetToDefaults(): Promise<EngineSettings> {
  await setTypedSetting(SETTING_KEYS.calendar, DEFAULT_ENGINE_SETTINGS.calendar);
  await setTypedSetting(SETTING_KEYS.processing, DEFAULT_ENGINE_SETTINGS.processing);
  await setTypedSetting(SETTING_KEYS.retention, DEFAULT_ENGINE_SETTINGS.retention);
  return DEFAULT_ENGINE_SETTINGS;
}

// Export repository object for consistency with other repositories
export const settingsRepository = {
  getSetting,
  setSetting,
  deleteSetting,
  getTypedSetting,
  setTypedSetting,
  getEngineSettings,
  updateEngineSettings,
  resetToDefaults,
};
