/**
 * Configuration system tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { DEFAULT_CONFIG } from '../config/defaults.js';
import { formatConfig, loadConfig, loadConfigFile, loadEnvConfig } from '../config/loader.js';
import {
  validateConfig,
  validatePartialConfig,
  ConfigValidationError,
} from '../config/validation.js';
import { ConfigError } from '../errors/cli-errors.js';

describe('Config Defaults', () => {
  it('should have display and output sections', () => {
    expect(DEFAULT_CONFIG).toHaveProperty('display');
    expect(DEFAULT_CONFIG).toHaveProperty('output');
  });

  it('should have valid default display config', () => {
    expect(DEFAULT_CONFIG.display).toEqual({
      glyphs: 'unicode',
      perspective: 'white',
      coordinates: true,
      color: true,
      emptyMarker: '·',
      lightSquare: '#b4b4b4',
      darkSquare: '#787878',
    });
  });

  it('should have status and verbose off by default', () => {
    expect(DEFAULT_CONFIG.output).toEqual({ status: false, verbose: false });
  });

  it('should pass validation', () => {
    expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
  });
});

describe('Config Validation', () => {
  it('should accept a partial config', () => {
    expect(validatePartialConfig({ display: { glyphs: 'ascii' } })).toEqual({
      display: { glyphs: 'ascii' },
    });
  });

  it('should accept an empty object', () => {
    expect(validatePartialConfig({})).toEqual({});
  });

  it('should reject an unknown glyph style', () => {
    expect(() => validatePartialConfig({ display: { glyphs: 'emoji' } })).toThrow(
      ConfigValidationError,
    );
  });

  it('should reject a square color that is not #rrggbb', () => {
    try {
      validatePartialConfig({ display: { darkSquare: 'grey' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.errors).toEqual([
          { path: 'display.darkSquare', message: 'Expected a #rrggbb color' },
        ]);
      }
    }
  });

  it('should reject an empty marker longer than one character', () => {
    expect(() => validatePartialConfig({ display: { emptyMarker: '..' } })).toThrow(
      ConfigValidationError,
    );
  });

  it('should reject a complete config with a missing section', () => {
    expect(() => validateConfig({ display: DEFAULT_CONFIG.display })).toThrow(
      ConfigValidationError,
    );
  });

  it('should format errors as path: message lines', () => {
    const error = new ConfigValidationError([{ path: 'output.status', message: 'Expected boolean' }]);
    expect(error.format().split('\n').slice(0, 3)).toEqual([
      'Configuration validation failed:',
      '',
      '  output.status: Expected boolean',
    ]);
  });
});

describe('loadEnvConfig', () => {
  it('should read SENTINEL_* variables', () => {
    const config = loadEnvConfig({
      SENTINEL_GLYPHS: 'ascii',
      SENTINEL_PERSPECTIVE: 'black',
      SENTINEL_COLOR: 'false',
      SENTINEL_LIGHT_SQUARE: '#eeeeee',
      SENTINEL_VERBOSE: '1',
    });
    expect(config).toEqual({
      display: { glyphs: 'ascii', perspective: 'black', color: false, lightSquare: '#eeeeee' },
      output: { verbose: true },
    });
  });

  it('should parse booleans case-insensitively', () => {
    expect(loadEnvConfig({ SENTINEL_COORDINATES: 'TRUE' })).toEqual({
      display: { coordinates: true },
    });
    expect(loadEnvConfig({ SENTINEL_COORDINATES: 'no' })).toEqual({
      display: { coordinates: false },
    });
  });

  it('should ignore empty and unrelated variables', () => {
    expect(loadEnvConfig({ SENTINEL_GLYPHS: '', HOME: '/home/test' })).toEqual({});
  });

  it('should reject invalid values', () => {
    expect(() => loadEnvConfig({ SENTINEL_PERSPECTIVE: 'sideways' })).toThrow(
      ConfigValidationError,
    );
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sentinel-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, config: unknown): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, JSON.stringify(config));
    return file;
  }

  it('should return defaults when nothing is configured', async () => {
    const config = await loadConfig({}, { env: {}, searchFrom: dir });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should find a config file in the search directory', async () => {
    writeConfig('.sentinelrc.json', { display: { glyphs: 'outline' } });
    const config = await loadConfig({}, { env: {}, searchFrom: dir });
    expect(config.display.glyphs).toBe('outline');
    expect(config.display.perspective).toBe('white');
  });

  it('should apply CLI > env > file > defaults', async () => {
    const file = writeConfig('board.json', {
      display: { glyphs: 'outline', perspective: 'black', coordinates: false },
      output: { status: true },
    });

    const config = await loadConfig(
      { config: file, perspective: 'white' },
      { env: { SENTINEL_GLYPHS: 'ascii', SENTINEL_PERSPECTIVE: 'black' } },
    );

    expect(config.display.glyphs).toBe('ascii');
    expect(config.display.perspective).toBe('white');
    expect(config.display.coordinates).toBe(false);
    expect(config.display.color).toBe(true);
    expect(config.output.status).toBe(true);
  });

  it('should map negated CLI flags', async () => {
    const config = await loadConfig(
      { noColor: true, noCoordinates: true, verbose: true },
      { env: {}, searchFrom: dir },
    );
    expect(config.display.color).toBe(false);
    expect(config.display.coordinates).toBe(false);
    expect(config.output.verbose).toBe(true);
  });

  it('should not mutate the defaults', async () => {
    await loadConfig({ glyphs: 'ascii' }, { env: {}, searchFrom: dir });
    expect(DEFAULT_CONFIG.display.glyphs).toBe('unicode');
  });

  it('should fail when an explicit config file cannot be loaded', async () => {
    const missing = path.join(dir, 'missing.json');
    await expect(loadConfig({ config: missing }, { env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('should fail when the config file is invalid', async () => {
    const file = writeConfig('board.json', { output: { verbose: 'loud' } });
    await expect(loadConfigFile(file)).rejects.toBeInstanceOf(ConfigValidationError);
  });
});

describe('formatConfig', () => {
  it('should print the config as indented JSON', () => {
    expect(JSON.parse(formatConfig(DEFAULT_CONFIG))).toEqual(DEFAULT_CONFIG);
    expect(formatConfig(DEFAULT_CONFIG).split('\n')[1]).toBe('  "display": {');
  });
});
