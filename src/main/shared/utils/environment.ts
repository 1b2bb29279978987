/**
 * Check if the process is running in development mode.
 * This is determined by `NODE_ENV`, so test runs and production are treated alike.
 *
 * @returns true if running in development, false otherwise
 */
export function isDevelopment(): boolean {
  return process.env.NODE_ENV === 'development'
}

/**
 * Read a boolean switch from the environment. `true` and `1` enable it,
 * anything else (or an unset variable) falls back to the default.
 */
export function readBooleanEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase()
  if (raw === undefined || raw === '') return fallback
  return raw === 'true' || raw === '1'
}
