import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { intFromEnv, listFromEnv, parseConfigSection } from './env.schemas';

const productionEnvSchema = z
  .object({
    CSV_DATA_DIR: z.string().min(1).default('csv_data'),
    CSV_DOWNLOAD_COUNTRIES: listFromEnv(),
    CSV_DEFAULT_TIME_ZONE: z.string().min(1).default('UTC'),
    INGEST_BATCH_SIZE: intFromEnv(1000, 1),
  })
  .transform((env) => ({
    csvDataDir: env.CSV_DATA_DIR,
    downloadCountries: env.CSV_DOWNLOAD_COUNTRIES,
    defaultTimeZone: env.CSV_DEFAULT_TIME_ZONE,
    batchSize: env.INGEST_BATCH_SIZE,
  }));

export type ProductionConfig = z.infer<typeof productionEnvSchema>;

/**
 * CSV download location, ingest batching and time-zone fallback.
 */
export const productionConfig = registerAs(
  'production',
  (): ProductionConfig =>
    parseConfigSection('production', productionEnvSchema, process.env),
);
