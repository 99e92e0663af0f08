import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { booleanFromEnv, intFromEnv, parseConfigSection } from './env.schemas';

const profilesEnvSchema = z
  .object({
    PROFILE_MIN_MONTHS: z.coerce.number().int().min(1).max(12).default(12),
    PROFILE_DROP_ZERO_DAYS: booleanFromEnv(true),
    PROFILE_INSERT_CHUNK_SIZE: intFromEnv(1000, 1),
  })
  .transform((env) => ({
    minMonths: env.PROFILE_MIN_MONTHS,
    dropZeroDays: env.PROFILE_DROP_ZERO_DAYS,
    insertChunkSize: env.PROFILE_INSERT_CHUNK_SIZE,
  }));

export type ProfilesConfig = z.infer<typeof profilesEnvSchema>;

export const profilesConfig = registerAs(
  'profiles',
  (): ProfilesConfig =>
    parseConfigSection('profiles', profilesEnvSchema, process.env),
);
