/**
 * CLI Configuration
 *
 * The environment (see env.ts), then the settings document it points at.
 */

import { resolve } from 'node:path';
import {
  ConfigError,
  loadSettings,
  parseSettings,
  saveSettings,
  settingsSchema,
  toSettingsDocument,
  type Settings,
} from '@cutline/core';
import { env } from './env.js';

export const config = {
  settingsFile: resolve(env.CUTLINE_CONFIG),
} as const;

export type SettingKey = keyof typeof settingsSchema.shape;

const settingKeys = Object.keys(settingsSchema.shape);

function isSettingKey(key: string): key is SettingKey {
  return settingKeys.includes(key);
}

export interface SettingAssignment {
  key: SettingKey;
  value: unknown;
}

/**
 * Parse `key=value`. The value is read as JSON when it parses
 * (`18`, `false`, `["um"]`) and as a plain string otherwise.
 */
export function parseAssignment(raw: string): SettingAssignment {
  const eq = raw.indexOf('=');
  if (eq <= 0) {
    throw new ConfigError('--set', `expected key=value, got "${raw}"`);
  }

  const key = raw.slice(0, eq).trim();
  if (!isSettingKey(key)) {
    throw new ConfigError('--set', `unknown key "${key}"; expected one of ${settingKeys.join(', ')}`);
  }

  const text = raw.slice(eq + 1).trim();
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    value = text;
  }
  return { key, value };
}

/**
 * Apply assignments to a settings value. The result is validated as a whole.
 */
export function applyAssignments(settings: Settings, assignments: readonly SettingAssignment[]): Settings {
  const document: Record<string, unknown> = { ...toSettingsDocument(settings) };
  for (const { key, value } of assignments) {
    document[key] = value;
  }
  return parseSettings(document, '--set');
}

export function loadCliSettings(): Promise<Settings> {
  return loadSettings(config.settingsFile);
}

export function saveCliSettings(settings: Settings): Promise<void> {
  return saveSettings(config.settingsFile, settings);
}
