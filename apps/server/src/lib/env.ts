/**
 * Environment configuration, read once at import.
 *
 * Every variable has a default so the service starts without a .env file.
 * Numeric values that do not parse throw here, at startup, instead of
 * surfacing as NaN inside a request.
 */

function optional(key: string, fallback: string): string {
  return process.env[key] ?? fallback
}

function integer(key: string, fallback: number, min: number): number {
  const raw = optional(key, String(fallback))
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    throw new Error(
      `Invalid environment variable ${key}=${raw}: expected an integer >= ${min}.`,
    )
  }
  return value
}

export const env = {
  PORT: integer('PORT', 4000, 1),
  NODE_ENV: optional('NODE_ENV', 'development'),
  CORS_ORIGINS: optional('CORS_ORIGINS', 'http://localhost:3000').split(','),
  MAX_SAMPLE_SIZE: integer('MAX_SAMPLE_SIZE', 20_000, 1),
  // Bound on n × K for one band calibration
  MAX_BAND_CELLS: integer('MAX_BAND_CELLS', 2_000_000, 1),
  BAND_CACHE_LIMIT: integer('BAND_CACHE_LIMIT', 64, 1),
  DEFAULT_SEED: integer('DEFAULT_SEED', 1, Number.MIN_SAFE_INTEGER),
  RATE_LIMIT_MAX: integer('RATE_LIMIT_MAX', 30, 1),
} as const
