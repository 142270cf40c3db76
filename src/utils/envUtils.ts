/**
 * Utility functions for environment variable parsing
 */

const TRUTHY = ['1', 'true', 'yes', 'on'];
const FALSY = ['0', 'false', 'no', 'off'];

/**
 * Parse a boolean environment variable that accepts multiple truthy/falsy values:
 * - Truthy: "1", "true", "yes", "on" (case insensitive)
 * - Falsy: "0", "false", "no", "off" (case insensitive)
 * Anything else (including undefined or empty) yields defaultValue.
 */
export function parseBooleanEnv(envVar: string | undefined, defaultValue = false): boolean {
  if (!envVar) return defaultValue;
  const normalized = envVar.toLowerCase().trim();
  if (TRUTHY.includes(normalized)) return true;
  if (FALSY.includes(normalized)) return false;
  return defaultValue;
}

/** Read and parse a boolean environment variable by name. */
export function getBooleanEnv(name: string, defaultValue = false): boolean {
  return parseBooleanEnv(process.env[name], defaultValue);
}
