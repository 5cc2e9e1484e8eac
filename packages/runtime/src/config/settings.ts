/**
 * @fileoverview User settings loading from YAML.
 * Validates the file and merges it over the defaults.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger, DETECTOR_DEFAULTS, SESSION_DEFAULTS } from '@touchless/gesture-core';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

const log = createLogger('settings');

/**
 * Calibration record location, relative to cwd unless absolute.
 */
export const DEFAULT_CALIBRATION_FILE = 'calibration.json';

const SettingsSchema = z.object({
  clickDelayMs: z.number().int().min(0).default(DETECTOR_DEFAULTS.CLICK_DELAY_MS),
  exitHoldMs: z.number().int().min(0).default(DETECTOR_DEFAULTS.EXIT_HOLD_MS),
  smoothing: z
    .object({
      enabled: z.boolean().default(true),
      window: z.number().int().positive().default(DETECTOR_DEFAULTS.SMOOTHING_WINDOW),
    })
    .default({}),
  calibration: z
    .object({
      requiredSamples: z.number().int().positive().default(SESSION_DEFAULTS.REQUIRED_SAMPLES),
      countdownMs: z.number().int().min(0).default(SESSION_DEFAULTS.COUNTDOWN_MS),
      timeoutMs: z.number().int().positive().default(SESSION_DEFAULTS.TIMEOUT_MS),
      file: z.string().min(1).default(DEFAULT_CALIBRATION_FILE),
    })
    .default({}),
  preferredHand: z.enum(['Left', 'Right']).optional(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Settings = z.infer<typeof SettingsSchema>;

/**
 * Error thrown when the settings file exists but is not valid.
 */
export class InvalidSettingsError extends Error {
  constructor(message: string) {
    super(`Invalid settings: ${message}`);
    this.name = 'InvalidSettingsError';
  }
}

let cachedSettings: Settings | null = null;

/**
 * Settings with every field at its default.
 */
export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

/**
 * Validate an already-parsed settings object.
 * @throws {InvalidSettingsError}
 */
export function parseSettings(raw: unknown): Settings {
  const result = SettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidSettingsError(issues);
  }
  return result.data;
}

/**
 * Resolve the settings file path.
 *
 * - the explicit argument if given
 * - TOUCHLESS_CONFIG_PATH environment variable if set
 * - otherwise config/settings.yaml relative to cwd
 */
export function resolveSettingsPath(path?: string): string {
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  return path ?? process.env['TOUCHLESS_CONFIG_PATH'] ?? join(process.cwd(), 'config/settings.yaml');
}

/**
 * Load and validate settings. A missing file yields the defaults.
 * Caches the result of the default path for subsequent calls.
 * @throws {InvalidSettingsError} if the file is not valid YAML or fails validation
 */
export function loadSettings(path?: string): Settings {
  if (path === undefined && cachedSettings) {
    return cachedSettings;
  }

  const settingsPath = resolveSettingsPath(path);
  let settings: Settings;
  if (!existsSync(settingsPath)) {
    log.debug('No settings file, using defaults', { path: settingsPath });
    settings = defaultSettings();
  } else {
    let raw: unknown;
    try {
      raw = parseYaml(readFileSync(settingsPath, 'utf8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new InvalidSettingsError(`${settingsPath}: ${message}`);
    }
    settings = parseSettings(raw);
    log.info('Loaded settings', { path: settingsPath });
  }

  if (path === undefined) {
    cachedSettings = settings;
  }
  return settings;
}

/**
 * Clear the cached settings (useful for testing or hot-reloading)
 */
export function clearSettingsCache(): void {
  cachedSettings = null;
}
