import os from 'os';
import path from 'path';
import process from 'process';

import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const intField = (fallback: number) =>
  z.union([z.string(), z.number(), z.undefined()]).transform((value: string | number | undefined): number => {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === 'string' && value.trim()) {
      const parsed = Number.parseInt(value, 10);
      if (Number.isFinite(parsed) && parsed > 0) {
        return parsed;
      }
    }
    return fallback;
  });

const stringField = (fallback: string) =>
  z.union([z.string(), z.undefined()]).transform((value: string | undefined): string => {
    if (typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
    return fallback;
  });

const optionalString = z.union([z.string(), z.undefined()]).transform((value: string | undefined) => {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  return undefined;
});

const logLevelField = stringField('warn').transform((value): LogLevel => {
  const normalized = value.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'warn';
});

const configSchema = z.object({
  SNCLOUD_BASE_URL: stringField('https://cloud.supernote.com/api').transform((value) => value.replace(/\/+$/, '')),
  SNCLOUD_TIMEOUT_MS: intField(60_000),
  SNCLOUD_CONFIG_DIR: optionalString,
  SNCLOUD_LOG_LEVEL: logLevelField,
  SNCLOUD_COUNTRY_CODE: stringField('1'),
  SNCLOUD_EMAIL: optionalString,
  SNCLOUD_PASSWORD: optionalString,
});

export type ServiceConfig = {
  baseUrl: string;
  timeoutMs: number;
  configDir: string;
  logLevel: LogLevel;
  countryCode: string;
  email?: string;
  password?: string;
};

export function defaultConfigDir(): string {
  return path.join(os.homedir(), '.config', 'sncloud');
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const raw = configSchema.parse(env);
  return {
    baseUrl: raw.SNCLOUD_BASE_URL,
    timeoutMs: raw.SNCLOUD_TIMEOUT_MS,
    configDir: raw.SNCLOUD_CONFIG_DIR ?? defaultConfigDir(),
    logLevel: raw.SNCLOUD_LOG_LEVEL,
    countryCode: raw.SNCLOUD_COUNTRY_CODE,
    email: raw.SNCLOUD_EMAIL,
    password: raw.SNCLOUD_PASSWORD,
  };
}
