// Rating engine configuration: YAML loading, defaults and validation

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  clearEngineConfigCache,
  defaultEngineConfig,
  loadEngineConfig,
  parseEngineConfig,
  resolveConfigPath,
} from '../src/config/engine-config';
import { ConfigError } from '../src/errors';

describe('Engine configuration', () => {
  let tempDir: string;

  beforeEach(() => {
    clearEngineConfigCache();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'rating-config-'));
  });

  afterEach(() => {
    clearEngineConfigCache();
    delete process.env.RATING_ENGINE_CONFIG;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: string): string {
    const file = path.join(tempDir, 'rating-engine.yml');
    fs.writeFileSync(file, content);
    return file;
  }

  test('defaults', () => {
    const config = defaultEngineConfig();

    expect(config.elo.k_factor).toBe(32);
    expect(config.elo.home_field_advantage).toBe(65);
    expect(config.elo.tier_multipliers).toEqual({
      P5_G5: 0.9,
      G5_P5: 1.1,
      P5_FCS: 0.5,
      G5_FCS: 0.6,
      FCS_P5: 1.5,
      FCS_G5: 1.25,
    });
    expect(config.preseason.tier_offsets.FCS).toBe(-200);
    expect(config.season).toEqual({ min_week: 0, max_week: 20 });
    expect(config.sos.neutral_value).toBe(1500);
    expect(config.prediction.confidence).toEqual({ high: 0.8, medium: 0.65 });
  });

  test('bundled YAML matches the defaults', () => {
    expect(loadEngineConfig(path.join(__dirname, '../config/rating-engine.yml'))).toEqual(defaultEngineConfig());
  });

  test('partial YAML keeps defaults for missing keys', () => {
    const config = loadEngineConfig(writeConfig('elo:\n  k_factor: 24\nsos:\n  neutral_value: 1450\n'));

    expect(config.elo.k_factor).toBe(24);
    expect(config.elo.rating_scale).toBe(400);
    expect(config.sos.neutral_value).toBe(1450);
  });

  test('an empty file yields the defaults', () => {
    expect(loadEngineConfig(writeConfig(''))).toEqual(defaultEngineConfig());
  });

  test('result is cached until cleared', () => {
    const first = loadEngineConfig(writeConfig('elo:\n  k_factor: 20\n'));
    const cached = loadEngineConfig(writeConfig('elo:\n  k_factor: 40\n'));
    expect(cached).toBe(first);

    clearEngineConfigCache();
    expect(loadEngineConfig(writeConfig('elo:\n  k_factor: 40\n')).elo.k_factor).toBe(40);
  });

  test('RATING_ENGINE_CONFIG overrides the path', () => {
    process.env.RATING_ENGINE_CONFIG = '/etc/ratings/engine.yml';
    expect(resolveConfigPath()).toBe('/etc/ratings/engine.yml');
  });

  test('invalid values name the offending key', () => {
    expect(() => parseEngineConfig({ elo: { k_factor: -1 } })).toThrow(ConfigError);
    expect(() => parseEngineConfig({ elo: { k_factor: -1 } })).toThrow(/"elo\.k_factor"/);
    expect(() => parseEngineConfig({ prediction: { confidence: { high: 1.2 } } })).toThrow(
      /"prediction\.confidence\.high"/
    );
  });

  test('week range must be ordered', () => {
    expect(() => parseEngineConfig({ season: { min_week: 5, max_week: 2 } })).toThrow(/min_week must not exceed max_week/);
  });

  test('missing file → ConfigError', () => {
    expect(() => loadEngineConfig(path.join(tempDir, 'absent.yml'))).toThrow(ConfigError);
  });
});
