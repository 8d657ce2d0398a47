import 'dotenv/config';
import * as joi from 'joi';
import type { LogLevel } from '@nestjs/common';

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

interface EnvVars {
  NATS_SERVERS: string[];
  ONLY_NIF_BY_DEFAULT: boolean;
  LOG_LEVEL: LogLevel;
}

const envSchema = joi
  .object<EnvVars>({
    NATS_SERVERS: joi.array().items(joi.string()).min(1).required(),
    ONLY_NIF_BY_DEFAULT: joi.boolean().default(false),
    LOG_LEVEL: joi
      .string()
      .valid(...LOG_LEVELS)
      .default('log'),
  })
  .unknown(true);

const { error, value } = envSchema.validate({
  ...process.env,
  NATS_SERVERS: process.env['NATS_SERVERS']?.split(',').map((item) => item.trim()),
});

if (error) {
  throw new Error(`Config validation error: ${error.message}`);
}

const envVars = value as EnvVars;

export const envs = {
  natsServers: envVars.NATS_SERVERS,
  onlyNifByDefault: envVars.ONLY_NIF_BY_DEFAULT,
  // every level up to and including LOG_LEVEL
  logLevels: LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(envVars.LOG_LEVEL) + 1),
};
