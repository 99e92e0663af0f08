import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { headersFromEnv, intFromEnv, parseConfigSection } from './env.schemas';

const monitoringEnvSchema = z
  .object({
    MONITORING_API_BASE_URL: z
      .string()
      .url()
      .default('http://localhost:8080/sites/list'),
    MONITORING_API_HEADERS: headersFromEnv(),
    MONITORING_PAGE_SIZE: intFromEnv(100, 1),
    MONITORING_MAX_ATTEMPTS: intFromEnv(3, 1),
    MONITORING_RETRY_BASE_DELAY_MS: intFromEnv(1000),
    MONITORING_RETRY_MAX_DELAY_MS: intFromEnv(30000),
    MONITORING_REQUEST_TIMEOUT_MS: intFromEnv(30000, 1),
    MONITORING_PAGE_DELAY_MS: intFromEnv(1000),
    MONITORING_CSV_EXPORT_URL: z
      .string()
      .default('http://localhost:8080/charts/{siteId}/chartExport'),
    MONITORING_CSV_EXPORT_TIMEOUT_MS: intFromEnv(300000, 1),
  })
  .transform((env) => ({
    baseUrl: env.MONITORING_API_BASE_URL,
    headers: env.MONITORING_API_HEADERS,
    pageSize: env.MONITORING_PAGE_SIZE,
    maxAttempts: env.MONITORING_MAX_ATTEMPTS,
    retryBaseDelayMs: env.MONITORING_RETRY_BASE_DELAY_MS,
    retryMaxDelayMs: env.MONITORING_RETRY_MAX_DELAY_MS,
    requestTimeoutMs: env.MONITORING_REQUEST_TIMEOUT_MS,
    pageDelayMs: env.MONITORING_PAGE_DELAY_MS,
    csvExportUrl: env.MONITORING_CSV_EXPORT_URL,
    csvExportTimeoutMs: env.MONITORING_CSV_EXPORT_TIMEOUT_MS,
  }));

export type MonitoringConfig = z.infer<typeof monitoringEnvSchema>;

/**
 * Monitoring API connection, pagination and retry settings.
 */
export const monitoringConfig = registerAs(
  'monitoring',
  (): MonitoringConfig =>
    parseConfigSection('monitoring', monitoringEnvSchema, process.env),
);
