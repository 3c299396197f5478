import rateLimit from 'express-rate-limit';
import { parseNonNegativeInt } from '../config/env';

export interface RateLimitConfig {
  windowMs: number;
  max: number;
}

export function parseRateLimitConfig(env: NodeJS.ProcessEnv = process.env): {
  api: RateLimitConfig;
  admin: RateLimitConfig;
} {
  return {
    api: {
      windowMs: parseNonNegativeInt(env.RATE_LIMIT_WINDOW_MS, 60000),
      max: parseNonNegativeInt(env.RATE_LIMIT_MAX, 300),
    },
    admin: {
      windowMs: parseNonNegativeInt(env.ADMIN_RATE_LIMIT_WINDOW_MS, 60000),
      max: parseNonNegativeInt(env.ADMIN_RATE_LIMIT_MAX, 20),
    },
  };
}

/** Applied to every /api request. */
export function createApiRateLimit(config?: Partial<RateLimitConfig>) {
  const defaults = parseRateLimitConfig().api;
  const isDev = process.env.NODE_ENV === 'development';
  return rateLimit({
    windowMs: config?.windowMs ?? defaults.windowMs,
    max: config?.max ?? defaults.max,
    skip: isDev ? () => true : undefined,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many requests, please try again later' },
  });
}

/** Applied to the endpoints that trigger work: reloads and on-demand checks. */
export function createAdminRateLimit(config?: Partial<RateLimitConfig>) {
  const defaults = parseRateLimitConfig().admin;
  const isDev = process.env.NODE_ENV === 'development';
  return rateLimit({
    windowMs: config?.windowMs ?? defaults.windowMs,
    max: config?.max ?? defaults.max,
    skip: isDev ? () => true : undefined,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: 'Too many reload or check requests, please try again later' },
  });
}
