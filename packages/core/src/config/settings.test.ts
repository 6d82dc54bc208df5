import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defaultSettings, loadSettings, parseSettings, saveSettings } from './settings.js';
import { ConfigError } from '../errors/index.js';

describe('settings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cutline-settings-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to built-in defaults', () => {
    const settings = defaultSettings();
    expect(settings.ffmpegPath).toBe('ffmpeg');
    expect(settings.whisperModel).toBe('small');
    expect(settings.hardwareAcceleration).toBe(true);
    expect(settings.defaultBitrate).toBe('20000k');
    expect(settings.qualityFactor).toBe(16);
    expect(settings.maxConcurrentJobs).toBe(1);
    expect(settings.silenceThreshold).toBe(0.8);
    expect(settings.fillerWords).toEqual(['嗯', '那个', '就是', '然后', '这个']);
  });

  it('ignores unknown keys and keeps recognised ones', () => {
    const settings = parseSettings({
      ffmpeg_path: '/opt/ffmpeg/bin/ffmpeg',
      hardware_acceleration: false,
      theme: 'dark',
    });
    expect(settings.ffmpegPath).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(settings.hardwareAcceleration).toBe(false);
    expect(settings).not.toHaveProperty('theme');
  });

  it('rejects ill-typed values with the offending key', () => {
    expect(() => parseSettings({ default_bitrate: 'fast' }, 'cfg.json')).toThrow(ConfigError);
    expect(() => parseSettings({ default_bitrate: '0k' }, 'cfg.json')).toThrow(ConfigError);
    expect(() => parseSettings({ default_bitrate: '0.0M' }, 'cfg.json')).toThrow(ConfigError);
    expect(parseSettings({ default_bitrate: '0.5M' }).defaultBitrate).toBe('0.5M');
    expect(() => parseSettings({ max_concurrent_jobs: 0 }, 'cfg.json')).toThrow(/max_concurrent_jobs/);
  });

  it('returns defaults when the file is missing', async () => {
    const settings = await loadSettings(join(dir, 'absent.json'));
    expect(settings).toEqual(defaultSettings());
  });

  it('reports unparsable JSON as a ConfigError', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ not json', 'utf8');
    await expect(loadSettings(path)).rejects.toBeInstanceOf(ConfigError);
  });

  it('saves in the snake_case document shape', async () => {
    const path = join(dir, 'nested', 'cutline.config.json');
    await saveSettings(path, { ...defaultSettings(), whisperModel: 'medium' });

    const stored: unknown = JSON.parse(await readFile(path, 'utf8'));
    expect(stored).toMatchObject({ whisper_model: 'medium', default_bitrate: '20000k' });
    expect((await loadSettings(path)).whisperModel).toBe('medium');
  });
});
