import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { config, validateConfig } from './config.js';

describe('config', () => {
  it('exposes routing defaults for the CLI', () => {
    expect(config.defaults.mode).toBe('RSVP');
    expect(config.defaults.experimentType).toBe('Calibration');
  });
});

describe('validateConfig', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    delete process.env.BCI_SAMPLE_RATE;
    delete process.env.LOG_LEVEL;
    delete process.env.BCI_DATA_SAVE_ROOT;
    process.env.BCI_PARAMETERS_PATH = 'parameters/test.json';
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const key of Object.keys(process.env)) {
      if (!(key in originalEnv)) {
        delete process.env[key];
      }
    }
    Object.assign(process.env, originalEnv);
  });

  it('passes with defaults', () => {
    const result = validateConfig();
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
  });

  it('rejects a non-numeric sample rate', () => {
    process.env.BCI_SAMPLE_RATE = 'fast';
    const result = validateConfig();
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['BCI_SAMPLE_RATE must be a positive integer (got "fast")']);
  });

  it('rejects a zero sample rate', () => {
    process.env.BCI_SAMPLE_RATE = '0';
    expect(validateConfig().valid).toBe(false);
  });

  it('warns about a low sample rate', () => {
    process.env.BCI_SAMPLE_RATE = '64';
    const result = validateConfig();
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['BCI_SAMPLE_RATE of 64 Hz is below typical EEG sampling rates']);
  });

  it('rejects an unknown log level', () => {
    process.env.LOG_LEVEL = 'loud';
    const result = validateConfig();
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toContain('LOG_LEVEL must be one of');
  });

  it('rejects an empty data save root', () => {
    process.env.BCI_DATA_SAVE_ROOT = '';
    expect(validateConfig().errors).toContain('BCI_DATA_SAVE_ROOT cannot be empty');
  });

  it('warns when the parameters path falls back to the default', () => {
    delete process.env.BCI_PARAMETERS_PATH;
    expect(validateConfig().warnings).toEqual(['BCI_PARAMETERS_PATH not set - using parameters/parameters.json']);
  });
});
