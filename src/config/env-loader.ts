import { isValid, parseISO } from 'date-fns';

import { isDirection } from '../domain/entities/direction';

import { CliConfig } from './types';

export const ENV_NOW = 'HUMAN_DATETIME_NOW';
export const ENV_TIMEZONE = 'HUMAN_DATETIME_TIMEZONE';
export const ENV_DIRECTION = 'HUMAN_DATETIME_DIRECTION';

/**
 * Reads CLI defaults from the environment (populated from .env by dotenv at
 * startup). These have the lowest precedence.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<CliConfig> {
  const config: Partial<CliConfig> = {};

  const now = env[ENV_NOW];
  if (now) {
    if (!isValid(parseISO(now))) {
      throw new Error(`Invalid ${ENV_NOW}: "${now}". Must be an ISO 8601 date-time.`);
    }
    config.now = now;
  }

  const timezone = env[ENV_TIMEZONE];
  if (timezone) {
    config.timezone = timezone;
  }

  const direction = env[ENV_DIRECTION];
  if (direction) {
    if (!isDirection(direction)) {
      throw new Error(`Invalid ${ENV_DIRECTION}: "${direction}". Must be one of: next, previous, this.`);
    }
    config.direction = direction;
  }

  return config;
}
