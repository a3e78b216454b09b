import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { migrateToCurrent } from '../domain/migrations';
import {
  SCHEMA_VERSION,
  SettingsEnvelopeSchema,
  SettingsSchema,
  type Settings,
} from '../domain/schemas';
import { createLogger } from '../logging/logger';

const logger = createLogger('settings');

export const defaultSettings = (): Settings => SettingsSchema.parse({});

export const loadSettings = (filePath: string): Settings => {
  if (!existsSync(filePath)) return defaultSettings();
  try {
    const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    const envelope = SettingsEnvelopeSchema.parse(raw);
    return migrateToCurrent(envelope, (payload) => SettingsSchema.parse(payload ?? {}));
  } catch (error) {
    // A hand-edited or newer file must not keep the assistant from starting.
    logger.error(`Failed to load settings from ${filePath}, using defaults.`, error);
    return defaultSettings();
  }
};

export const saveSettings = (filePath: string, settings: Settings) => {
  const envelope = {
    version: SCHEMA_VERSION,
    payload: SettingsSchema.parse(settings),
  };
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(envelope, null, 2), 'utf-8');
};
