import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';

/**
 * Deployment platform. Destructive admin endpoints only run on `dev`.
 */
export type Platform = 'dev' | 'prod';

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
function readSecret(envVar: string): string | undefined {
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    return readFileSync(filePath, 'utf-8').trim();
  }

  return process.env[envVar];
}

/**
 * Unknown or missing values fall back to the safest platform
 */
export function parsePlatform(value: string | undefined): Platform {
  return value === 'dev' ? 'dev' : 'prod';
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    platform: Platform;
  };
  database: {
    url: string | undefined;
  };
  secrets: {
    jwtSecret: string | undefined;
    polkaKey: string | undefined;
  };
  rateLimit: {
    windowMs: number;
    maxRequests: number;
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  return {
    server: {
      port: parseInt(process.env['PORT'] ?? '8080', 10),
      host: process.env['HOST'] ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
      platform: parsePlatform(process.env['PLATFORM']),
    },
    database: {
      url: process.env['DATABASE_URL'],
    },
    secrets: {
      jwtSecret: readSecret('JWT_SECRET'),
      polkaKey: readSecret('POLKA_KEY'),
    },
    rateLimit: {
      windowMs: parseInt(
        process.env['RATE_LIMIT_WINDOW_MS'] ?? String(constants.DEFAULT_RATE_LIMIT_WINDOW_MS),
        10
      ),
      maxRequests: parseInt(
        process.env['RATE_LIMIT_MAX_REQUESTS'] ?? String(constants.DEFAULT_RATE_LIMIT_MAX_REQUESTS),
        10
      ),
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
