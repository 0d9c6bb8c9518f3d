/**
 * Environment Variable Utilities
 *
 * Provides type-safe access to environment variables with validation
 * and default value support.
 */

/**
 * Get an environment variable with a default value
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set or empty
 *
 * @example
 * const logLevel = getEnvWithDefault('LOG_LEVEL', 'info');
 * const dbPath = getEnvWithDefault('PARLEY_DB_PATH', './parley-output/parley.sqlite');
 */
export function getEnvWithDefault(key: string, defaultValue: string): string {
  const value = process.env[key];
  return value || defaultValue;
}

/**
 * Get an optional environment variable (returns undefined if not set)
 *
 * @param key - Environment variable name
 *
 * @example
 * const apiKey = getEnvOptional('ANTHROPIC_API_KEY');
 * if (apiKey) {
 *   // Use the API key
 * }
 */
export function getEnvOptional(key: string): string | undefined {
  return process.env[key];
}

/**
 * Get an environment variable as a boolean
 *
 * Treats 'true', '1', 'yes' (case-insensitive) as true, everything else as false
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set
 *
 * @example
 * const autoImport = getEnvBoolean('PARLEY_AUTO_IMPORT', true);
 */
export function getEnvBoolean(key: string, defaultValue: boolean = false): boolean {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  return ['true', '1', 'yes'].includes(value.toLowerCase());
}

/**
 * Get an environment variable as a number
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set or invalid
 *
 * @example
 * const timeoutMs = getEnvNumber('PARLEY_CALL_TIMEOUT_MS', 60000);
 */
export function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get an environment variable as a floating point number
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if not set or invalid
 *
 * @example
 * const threshold = getEnvFloat('PARLEY_CONVERGENCE_THRESHOLD', 0.85);
 */
export function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}
