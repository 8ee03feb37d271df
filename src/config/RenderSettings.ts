/**
 * RenderSettings - Persisted renderer and demo settings
 *
 * Stored as JSON in ~/.halfblock3d/settings.json. Unknown keys in the file are
 * preserved on save; invalid values are replaced by defaults with a warning.
 */

import { readFile, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { logWarn, logError } from '../utils/Log.js';

export type RGB = [number, number, number];

export interface RenderSettings {
  quality: number;
  targetFps: number;
  clearColor: RGB;
  ambientLight: RGB;
  fov: number;
  showStatus: boolean;
}

// Supersampling factor per quality level
export const QUALITY_LEVELS: readonly number[] = [1 / 2, 2 / 3, 3 / 4, 1, 3 / 2, 2, 3, 5];
// Used when a requested level does not exist
export const FALLBACK_QUALITY = 2;

export const DEFAULT_RENDER_SETTINGS: RenderSettings = {
  quality: 3,
  targetFps: 30,
  clearColor: [12, 12, 20],
  ambientLight: [50, 50, 60],
  fov: 60,
  showStatus: true,
};

// Fields left out of overrides, or set to undefined, keep the base value
export function mergeRenderSettings(
  base: RenderSettings,
  overrides: Partial<RenderSettings> = {}
): RenderSettings {
  return {
    quality: overrides.quality ?? base.quality,
    targetFps: overrides.targetFps ?? base.targetFps,
    clearColor: overrides.clearColor ?? base.clearColor,
    ambientLight: overrides.ambientLight ?? base.ambientLight,
    fov: overrides.fov ?? base.fov,
    showStatus: overrides.showStatus ?? base.showStatus,
  };
}

export const SETTINGS_DIR = join(homedir(), '.halfblock3d');
export const SETTINGS_FILE = join(SETTINGS_DIR, 'settings.json');

export function isValidQuality(level: unknown): level is number {
  return typeof level === 'number' && Number.isInteger(level) && level >= 0 && level < QUALITY_LEVELS.length;
}

/**
 * Resolution factor for a quality level. Unknown levels fall back to
 * FALLBACK_QUALITY.
 */
export function qualityFactor(level: number): number {
  if (!isValidQuality(level)) {
    logWarn(`Invalid quality level ${level}, using ${FALLBACK_QUALITY}`);
    return QUALITY_LEVELS[FALLBACK_QUALITY];
  }
  return QUALITY_LEVELS[level];
}

function defaultRGB(rgb: RGB): RGB {
  return [rgb[0], rgb[1], rgb[2]];
}

function parseRGB(value: unknown): RGB | null {
  if (!Array.isArray(value) || value.length !== 3) return null;
  const out: number[] = [];
  for (const channel of value) {
    if (typeof channel !== 'number' || !Number.isFinite(channel)) return null;
    out.push(Math.max(0, Math.min(255, Math.trunc(channel))));
  }
  return [out[0], out[1], out[2]];
}

/**
 * Validate a parsed settings object field by field.
 */
export function normalizeRenderSettings(raw: unknown): RenderSettings {
  const settings: RenderSettings = {
    ...DEFAULT_RENDER_SETTINGS,
    clearColor: defaultRGB(DEFAULT_RENDER_SETTINGS.clearColor),
    ambientLight: defaultRGB(DEFAULT_RENDER_SETTINGS.ambientLight),
  };

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    if (raw !== undefined) {
      logWarn('Settings are not an object, using defaults');
    }
    return settings;
  }

  const fields = new Map<string, unknown>(Object.entries(raw));

  const quality = fields.get('quality');
  if (quality !== undefined) {
    if (isValidQuality(quality)) {
      settings.quality = quality;
    } else {
      logWarn(`Invalid quality ${String(quality)}, using ${settings.quality}`);
    }
  }

  const targetFps = fields.get('targetFps');
  if (targetFps !== undefined) {
    if (typeof targetFps === 'number' && Number.isFinite(targetFps) && targetFps > 0) {
      settings.targetFps = Math.min(240, targetFps);
    } else {
      logWarn(`Invalid targetFps ${String(targetFps)}, using ${settings.targetFps}`);
    }
  }

  for (const key of ['clearColor', 'ambientLight'] as const) {
    const value = fields.get(key);
    if (value === undefined) continue;
    const rgb = parseRGB(value);
    if (rgb) {
      settings[key] = rgb;
    } else {
      logWarn(`Invalid ${key}, using default`);
    }
  }

  const fov = fields.get('fov');
  if (fov !== undefined) {
    if (typeof fov === 'number' && Number.isFinite(fov)) {
      settings.fov = Math.max(10, Math.min(160, fov));
    } else {
      logWarn(`Invalid fov ${String(fov)}, using ${settings.fov}`);
    }
  }

  const showStatus = fields.get('showStatus');
  if (showStatus !== undefined) {
    if (typeof showStatus === 'boolean') {
      settings.showStatus = showStatus;
    } else {
      logWarn(`Invalid showStatus ${String(showStatus)}, using ${settings.showStatus}`);
    }
  }

  return settings;
}

/**
 * Load settings from disk
 */
export async function loadRenderSettings(file: string = SETTINGS_FILE): Promise<RenderSettings> {
  try {
    if (!existsSync(file)) {
      return normalizeRenderSettings(undefined);
    }

    const content = await readFile(file, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    return normalizeRenderSettings(parsed);
  } catch (error) {
    logWarn(`Failed to load settings from ${file}: ${error}`);
    return normalizeRenderSettings(undefined);
  }
}

/**
 * Save settings to disk, keeping any other keys already in the file
 */
export async function saveRenderSettings(
  changes: Partial<RenderSettings>,
  file: string = SETTINGS_FILE
): Promise<void> {
  let existing: Record<string, unknown> = {};
  if (existsSync(file)) {
    try {
      const parsed: unknown = JSON.parse(await readFile(file, 'utf-8'));
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        existing = Object.fromEntries(Object.entries(parsed));
      }
    } catch (error) {
      logWarn(`Settings file ${file} is corrupt, rewriting: ${error}`);
    }
  }

  const merged: Record<string, unknown> = { ...existing };
  for (const [key, value] of Object.entries(changes)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  try {
    await mkdir(dirname(file), { recursive: true });
    await writeFile(file, JSON.stringify(merged, null, 2));
  } catch (error) {
    logError(`Failed to save settings to ${file}: ${error}`);
    throw new Error(`Could not write settings to ${file}: ${error}`);
  }
}

/**
 * Reset settings to defaults
 */
export async function resetRenderSettings(file: string = SETTINGS_FILE): Promise<RenderSettings> {
  const defaults = normalizeRenderSettings(undefined);
  await saveRenderSettings(defaults, file);
  return defaults;
}
