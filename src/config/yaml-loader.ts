import fs from 'fs';

import * as yaml from 'js-yaml';

import { isDirection } from '../domain/entities/direction';

import { CliConfig } from './types';

const BOOLEAN_KEYS = [
  'inferDatetimes',
  'returnMatchedText',
  'returnSingleObject',
  'json',
  'interactive',
  'writeDebugFiles',
  'verboseLogging',
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** js-yaml turns unquoted timestamps into UTC Dates; keep the wall clock as written. */
function toNowString(value: unknown): string | undefined {
  if (value instanceof Date) return value.toISOString().slice(0, 23);
  if (typeof value === 'string') return value;
  return undefined;
}

/**
 * Checks the shape of a loaded YAML document and keeps the known keys.
 */
export function toCliConfig(document: unknown, source: string): Partial<CliConfig> {
  if (document === undefined || document === null) return {};
  if (!isRecord(document)) {
    throw new Error(`${source} must contain a mapping of option names to values`);
  }

  const config: Partial<CliConfig> = {};

  if (document.now !== undefined) {
    const now = toNowString(document.now);
    if (now === undefined) throw new Error(`${source}: now must be an ISO 8601 date-time`);
    config.now = now;
  }

  if (document.timezone !== undefined) {
    if (typeof document.timezone !== 'string') throw new Error(`${source}: timezone must be a string`);
    config.timezone = document.timezone;
  }

  if (document.direction !== undefined) {
    const direction = String(document.direction);
    if (!isDirection(direction)) throw new Error(`${source}: direction must be one of: next, previous, this`);
    config.direction = direction;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = document[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') throw new Error(`${source}: ${key} must be true or false`);
    config[key] = value;
  }

  return config;
}

export function loadYamlConfig(filePath: string): Partial<CliConfig> | undefined {
  try {
    if (fs.existsSync(filePath)) {
      const yamlContent = fs.readFileSync(filePath, 'utf-8');
      const config = toCliConfig(yaml.load(yamlContent), filePath);
      return config;
    }
  } catch (error) {
    throw new Error(
      `Failed to load YAML config from ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return undefined;
}
