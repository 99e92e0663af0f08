import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { booleanFromEnv, intFromEnv, parseConfigSection } from './env.schemas';

const databaseEnvSchema = z
  .object({
    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: intFromEnv(5432, 1),
    DB_USERNAME: z.string().default('postgres'),
    DB_PASSWORD: z.string().default(''),
    DB_DATABASE: z.string().min(1).default('solar_db'),
    DB_SCHEMA: z.string().min(1).default('solar'),
    DB_SYNCHRONIZE: booleanFromEnv(false),
    NODE_ENV: z.string().default('development'),
  })
  .transform((env) => ({
    host: env.DB_HOST,
    port: env.DB_PORT,
    username: env.DB_USERNAME,
    password: env.DB_PASSWORD,
    database: env.DB_DATABASE,
    schema: env.DB_SCHEMA,
    synchronize: env.DB_SYNCHRONIZE,
    logging: env.NODE_ENV !== 'production',
  }));

export type DatabaseConfig = z.infer<typeof databaseEnvSchema>;

export const databaseConfig = registerAs(
  'database',
  (): DatabaseConfig =>
    parseConfigSection('database', databaseEnvSchema, process.env),
);
