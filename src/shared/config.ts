import 'dotenv/config';

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

// Environment configuration with defaults
export const config = {
  nodeEnv: process.env.NODE_ENV || 'development',

  // Logging
  logLevel: process.env.LOG_LEVEL || 'info',

  // Session output
  dataSaveRoot: process.env.BCI_DATA_SAVE_ROOT || 'data',
  parametersPath: process.env.BCI_PARAMETERS_PATH || 'parameters/parameters.json',

  // Acquisition
  acquisition: {
    deviceName: process.env.BCI_DEVICE_NAME || 'Simulated',
    sampleRate: parseInt(process.env.BCI_SAMPLE_RATE || '300', 10),
  },

  // Task routing defaults for the CLI
  defaults: {
    mode: 'RSVP',
    experimentType: 'Calibration',
  },
} as const;

// Validate configuration (reads process.env directly so tests can override)
export function validateConfig(): { valid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  const sampleRate = process.env.BCI_SAMPLE_RATE;
  if (sampleRate !== undefined) {
    const parsed = Number(sampleRate);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      errors.push(`BCI_SAMPLE_RATE must be a positive integer (got "${sampleRate}")`);
    } else if (parsed < 100) {
      warnings.push(`BCI_SAMPLE_RATE of ${parsed} Hz is below typical EEG sampling rates`);
    }
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel !== undefined && !LOG_LEVELS.includes(logLevel)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${logLevel}")`);
  }

  if (process.env.BCI_DATA_SAVE_ROOT === '') {
    errors.push('BCI_DATA_SAVE_ROOT cannot be empty');
  }

  if (!process.env.BCI_PARAMETERS_PATH) {
    warnings.push('BCI_PARAMETERS_PATH not set - using parameters/parameters.json');
  }

  // Print summary
  if (errors.length > 0) {
    console.error('\n  Configuration errors:');
    errors.forEach(e => console.error(`    ${e}`));
  }
  if (warnings.length > 0) {
    console.warn('\n  Configuration warnings:');
    warnings.forEach(w => console.warn(`    ${w}`));
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

export default config;
