import { ConfigService } from '@nestjs/config';
import type { Env } from './env.validation';

export const DEVICE_CONFIG = Symbol('DEVICE_CONFIG');

/** Fixed poll period of the coordinator. Not user-configurable. */
export const POLL_INTERVAL_MS = 10_000;

export interface DeviceCredentials {
  username: string;
  password?: string;
}

export interface RetryPolicy {
  /** Retries after the initial attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 disables jitter; 0.5 stretches each delay by up to 50% */
  jitterRatio: number;
}

/**
 * Resolved settings for one configured device.
 */
export interface DeviceConfig {
  /** Base URL including protocol, without trailing slash */
  baseUrl: string;
  credentials: DeviceCredentials;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  cacheTtlMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitterRatio: 0,
};

/**
 * Accepts "homevolt-abc.local", "192.168.1.20/" or "https://host" and returns
 * a base URL with protocol and no trailing slash.
 */
export function normalizeBaseUrl(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `http://${trimmed}`;
}

export function buildDeviceConfig(
  configService: ConfigService<Env, true>,
): DeviceConfig {
  const password = configService.get('DEVICE_PASSWORD', { infer: true });
  return {
    baseUrl: normalizeBaseUrl(configService.get('DEVICE_HOST', { infer: true })),
    credentials: {
      username: configService.get('DEVICE_USERNAME', { infer: true }),
      password: password ? password : undefined,
    },
    requestTimeoutMs: configService.get('DEVICE_REQUEST_TIMEOUT_MS', {
      infer: true,
    }),
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: configService.get('DEVICE_RETRY_MAX', { infer: true }),
      baseDelayMs: configService.get('DEVICE_RETRY_BASE_DELAY_MS', {
        infer: true,
      }),
      jitterRatio: configService.get('DEVICE_RETRY_JITTER', { infer: true }),
    },
    cacheTtlMs: configService.get('DEVICE_CACHE_TTL_MS', { infer: true }),
  };
}
