import dotenv from 'dotenv';

export interface EnvironmentSettings {
  proxy: string | undefined;
  timeoutMs: number | undefined;
  maxRetries: number | undefined;
  cacheDir: string;
}

const DEFAULT_CACHE_DIR = '.cache';

export function loadEnvironment(): void {
  dotenv.config();
}

export function readEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentSettings {
  return {
    proxy: nonEmpty(env.RGFETCH_PROXY) ?? nonEmpty(env.HTTPS_PROXY),
    timeoutMs: optionalPositiveInteger(env.RGFETCH_TIMEOUT_MS, 'RGFETCH_TIMEOUT_MS'),
    maxRetries: optionalPositiveInteger(env.RGFETCH_MAX_RETRIES, 'RGFETCH_MAX_RETRIES'),
    cacheDir: nonEmpty(env.RGFETCH_CACHE_DIR) ?? DEFAULT_CACHE_DIR,
  };
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Option --${flagName} must be a positive integer.`);
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Option --${flagName} must be zero or a positive integer.`);
  }
  return parsed;
}

function optionalPositiveInteger(value: string | undefined, name: string): number | undefined {
  const trimmed = nonEmpty(value);
  if (trimmed === undefined) {
    return undefined;
  }

  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer.`);
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
