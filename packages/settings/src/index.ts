import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {
  clampParameter,
  createDefaultParameterSet,
  isParameterName,
  ParameterStore,
  PARAMETER_NAMES,
  toSettingsDocument,
  type GradingLogger,
  type ParameterName,
  type ParameterSet
} from '@softisp/color-grading';

const SETTINGS_SCHEMA_VERSION = '1.0.0';
const SETTINGS_FILE_NAME = 'grading.json';
const DEFAULT_ACTIVE_SETTING: ParameterName = 'BRIGHTNESS';

export interface GradingSettings {
  schemaVersion: string;
  activeSetting: ParameterName;
  parameters: ParameterSet;
  createdAt: string;
  updatedAt: string;
}

interface SettingsFileShape {
  version: string;
  data: GradingSettings;
}

const defaultSettings = (): GradingSettings => {
  const now = new Date().toISOString();
  return {
    schemaVersion: SETTINGS_SCHEMA_VERSION,
    activeSetting: DEFAULT_ACTIVE_SETTING,
    parameters: createDefaultParameterSet(),
    createdAt: now,
    updatedAt: now
  };
};

export class SettingsValidationError extends Error {}

export const getSettingsDirectory = (): string =>
  process.env.SOFTISP_SETTINGS_DIR ?? path.join(os.homedir(), '.softisp');

export const getSettingsFilePath = (): string =>
  process.env.SOFTISP_SETTINGS_FILE ?? path.join(getSettingsDirectory(), SETTINGS_FILE_NAME);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Keep known parameter names only and clamp every value into its range
 */
export const sanitizeParameters = (input: unknown): ParameterSet => {
  const parameters = createDefaultParameterSet();
  if (!isRecord(input)) {
    return parameters;
  }
  for (const name of PARAMETER_NAMES) {
    const value = input[name];
    if (typeof value === 'number') {
      parameters[name] = clampParameter(name, value);
    }
  }
  return parameters;
};

const sanitizeSettings = (input: unknown): GradingSettings => {
  const defaults = defaultSettings();
  if (!isRecord(input)) {
    return defaults;
  }
  const active = input.activeSetting;
  return {
    schemaVersion: SETTINGS_SCHEMA_VERSION,
    activeSetting: typeof active === 'string' && isParameterName(active) ? active : DEFAULT_ACTIVE_SETTING,
    parameters: sanitizeParameters(input.parameters),
    createdAt: typeof input.createdAt === 'string' ? input.createdAt : defaults.createdAt,
    updatedAt: typeof input.updatedAt === 'string' ? input.updatedAt : defaults.updatedAt
  };
};

const serialize = (settings: GradingSettings): string =>
  JSON.stringify(
    {
      version: SETTINGS_SCHEMA_VERSION,
      data: settings
    } satisfies SettingsFileShape,
    null,
    2
  );

async function ensureDirectoryExists(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/** `null` only when the file does not exist */
async function readSettingsFile(filePath: string): Promise<{ data: unknown } | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw new SettingsValidationError(`Failed to read settings file ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new SettingsValidationError(`Settings file ${filePath} is not valid JSON`);
  }
  return { data: isRecord(parsed) ? parsed.data : undefined };
}

export async function loadGradingSettings(): Promise<GradingSettings> {
  const filePath = getSettingsFilePath();
  await ensureDirectoryExists(path.dirname(filePath));

  const stored = await readSettingsFile(filePath);
  if (!stored) {
    const defaults = defaultSettings();
    await fs.writeFile(filePath, serialize(defaults), 'utf-8');
    return defaults;
  }

  return sanitizeSettings(stored.data);
}

export async function saveGradingSettings(settings: GradingSettings): Promise<GradingSettings> {
  const filePath = getSettingsFilePath();
  await ensureDirectoryExists(path.dirname(filePath));
  const payload = {
    ...sanitizeSettings(settings),
    createdAt: settings.createdAt,
    updatedAt: new Date().toISOString()
  } satisfies GradingSettings;

  await fs.writeFile(filePath, serialize(payload), 'utf-8');
  return payload;
}

export type SettingsUpdater = (current: GradingSettings) => Partial<GradingSettings>;

export async function updateGradingSettings(updater: SettingsUpdater): Promise<GradingSettings> {
  const current = await loadGradingSettings();
  const updated = updater(current);

  return saveGradingSettings({
    ...current,
    ...updated,
    parameters: sanitizeParameters({ ...current.parameters, ...updated.parameters }),
    createdAt: current.createdAt
  });
}

/**
 * Build a live store from persisted settings
 */
export const toParameterStore = (settings: GradingSettings, logger?: GradingLogger): ParameterStore =>
  new ParameterStore({
    initial: settings.parameters,
    activeSetting: settings.activeSetting,
    logger
  });

/**
 * Capture a store's state on top of previously persisted settings
 */
export const fromParameterStore = (store: ParameterStore, previous: GradingSettings): GradingSettings => ({
  ...previous,
  activeSetting: store.activeSetting,
  parameters: { ...store.snapshot() }
});

/**
 * Write the export document ({ sdk_version, settings }) to an arbitrary path
 */
export async function writeSettingsDocument(filePath: string, parameters: Readonly<ParameterSet>): Promise<string> {
  const resolved = path.resolve(filePath);
  await ensureDirectoryExists(path.dirname(resolved));
  await fs.writeFile(resolved, JSON.stringify(toSettingsDocument(parameters), null, 2), 'utf-8');
  return resolved;
}

/**
 * Read parameters from an export document or a bare name/value object
 */
export async function readSettingsDocument(filePath: string): Promise<ParameterSet> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch {
    throw new SettingsValidationError(`Failed to read settings document ${filePath}`);
  }
  if (!isRecord(parsed)) {
    throw new SettingsValidationError(`Settings document ${filePath} must be a JSON object`);
  }
  return sanitizeParameters(isRecord(parsed.settings) ? parsed.settings : parsed);
}
