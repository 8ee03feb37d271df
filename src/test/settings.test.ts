import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_RENDER_SETTINGS,
  loadRenderSettings,
  mergeRenderSettings,
  normalizeRenderSettings,
  qualityFactor,
  resetRenderSettings,
  saveRenderSettings,
} from '../config/RenderSettings.js';
import { getEngineLog } from '../utils/Log.js';

function lastWarning(): string | undefined {
  return getEngineLog().getMessages().filter(m => m.level === 'warn').at(-1)?.text;
}

describe('RenderSettings', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'halfblock3d-'));
    file = join(dir, 'nested', 'settings.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('maps quality levels to resolution factors', () => {
    expect(qualityFactor(3)).toBe(1);
    expect(qualityFactor(7)).toBe(5);
    expect(qualityFactor(-1)).toBe(0.75);
    expect(lastWarning()).toBe('Invalid quality level -1, using 2');
  });

  it('merges only the overrides that are defined', () => {
    const merged = mergeRenderSettings(DEFAULT_RENDER_SETTINGS, {
      quality: 6,
      showStatus: false,
      clearColor: undefined,
      fov: undefined,
    });
    expect(merged).toEqual({ ...DEFAULT_RENDER_SETTINGS, quality: 6, showStatus: false });
    expect(mergeRenderSettings(DEFAULT_RENDER_SETTINGS)).toEqual(DEFAULT_RENDER_SETTINGS);
  });

  it('returns defaults when no file exists', async () => {
    expect(await loadRenderSettings(file)).toEqual(DEFAULT_RENDER_SETTINGS);
  });

  it('returns defaults with a warning for a corrupt file', async () => {
    const corrupt = join(dir, 'corrupt.json');
    await writeFile(corrupt, '{ not json');
    expect(await loadRenderSettings(corrupt)).toEqual(DEFAULT_RENDER_SETTINGS);
    expect(lastWarning()).toMatch(/^Failed to load settings from /);
  });

  it('validates each field on its own', () => {
    const settings = normalizeRenderSettings({
      quality: 9,
      targetFps: 1000,
      fov: 5,
      clearColor: [300, -1, 12.7],
      ambientLight: [1, 2],
      showStatus: 'yes',
    });
    expect(settings).toEqual({
      quality: 3,
      targetFps: 240,
      clearColor: [255, 0, 12],
      ambientLight: [50, 50, 60],
      fov: 10,
      showStatus: true,
    });
  });

  it('warns when the settings are not an object', () => {
    expect(normalizeRenderSettings([1, 2])).toEqual(DEFAULT_RENDER_SETTINGS);
    expect(lastWarning()).toBe('Settings are not an object, using defaults');
  });

  it('saves into a new directory and loads the result back', async () => {
    await saveRenderSettings({ quality: 5, fov: 75 }, file);
    const loaded = await loadRenderSettings(file);
    expect(loaded.quality).toBe(5);
    expect(loaded.fov).toBe(75);
    expect(loaded.targetFps).toBe(30);
  });

  it('keeps keys it does not know about', async () => {
    const existing = join(dir, 'settings.json');
    await writeFile(existing, JSON.stringify({ custom: 'kept', quality: 1 }));
    await saveRenderSettings({ quality: 4 }, existing);
    expect(JSON.parse(await readFile(existing, 'utf-8'))).toEqual({ custom: 'kept', quality: 4 });
  });

  it('resets to defaults', async () => {
    await saveRenderSettings({ quality: 6 }, file);
    expect(await resetRenderSettings(file)).toEqual(DEFAULT_RENDER_SETTINGS);
    expect(await loadRenderSettings(file)).toEqual(DEFAULT_RENDER_SETTINGS);
  });

  it('throws when the file cannot be written', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'a file, not a directory');
    await expect(saveRenderSettings({ quality: 1 }, join(blocker, 'settings.json'))).rejects.toThrow(
      `Could not write settings to ${join(blocker, 'settings.json')}`
    );
  });
});
