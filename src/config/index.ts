import path from 'path';

import { Temporal } from '@js-temporal/polyfill';
import { format, parseISO } from 'date-fns';

import { parseCommandLineArgs } from './args-parser';
import { loadEnvConfig } from './env-loader';
import { CliConfig, ParserConfig } from './types';
import { validateAndCompleteConfig } from './validator';
import { loadYamlConfig } from './yaml-loader';

const USAGE = `Usage:
  human-datetime <text...> [options]

  Options:
    --config=<file.yaml>           YAML file with any of the options below
    --now <ISO date-time>          Reference time (default: current time)
    --timezone <IANA zone>         Zone of the reference time, e.g. America/New_York
    --direction next|previous|this Which occurrence of a bare weekday or time to pick
    --infer-datetimes true|false   Fill in missing dates and times (default: true)
    --matched-text true|false      Show the text each result was parsed from
    --single true|false            Print a lone result without the list around it
    --json true|false              Print results as JSON
    --interactive true|false       Read one expression per line from stdin
    --write-debug-files true|false Write debug/parse_trace.json
    --verbose-logging true|false

  Environment (.env): HUMAN_DATETIME_NOW, HUMAN_DATETIME_TIMEZONE, HUMAN_DATETIME_DIRECTION
  Precedence: environment < YAML file < command line`;

function findConfigPath(args: string[]): string | undefined {
  const inline = args.find((arg) => arg.startsWith('--config='));
  if (inline) return inline.slice('--config='.length);
  const index = args.indexOf('--config');
  return index >= 0 ? args[index + 1] : undefined;
}

/**
 * Builds the CLI configuration from the environment, a YAML file and the
 * command line, in increasing order of precedence.
 */
export function loadCliConfig(args: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): CliConfig {
  if (args.length === 0) {
    throw new Error(`No text provided.\n\n${USAGE}`);
  }

  let config: Partial<CliConfig> = loadEnvConfig(env);

  // Check for YAML config file first
  const configPath = findConfigPath(args);
  if (configPath) {
    const yamlConfig = loadYamlConfig(configPath);
    if (!yamlConfig) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    config = { ...config, ...yamlConfig };
  } else {
    // Check for default config.yaml
    const defaultConfigPaths = [path.join(process.cwd(), 'config.yaml'), path.join(process.cwd(), 'config.yml')];
    for (const defaultPath of defaultConfigPaths) {
      const yamlConfig = loadYamlConfig(defaultPath);
      if (yamlConfig) {
        config = { ...config, ...yamlConfig };
        break;
      }
    }
  }

  // CLI overrides YAML
  config = { ...config, ...parseCommandLineArgs(args) };

  return validateAndCompleteConfig(config);
}

/**
 * Turns CLI settings into parser options. Call once per parse: without
 * `--now` the reference time is read from the clock each time.
 */
export function toParserConfig(config: CliConfig): ParserConfig {
  let now: Temporal.PlainDateTime | Temporal.ZonedDateTime | undefined = undefined;
  if (config.now) {
    now = Temporal.PlainDateTime.from(format(parseISO(config.now), "yyyy-MM-dd'T'HH:mm:ss.SSS"));
  }

  if (config.timezone) {
    const timezone = config.timezone;
    try {
      now = now ? now.toZonedDateTime(timezone) : Temporal.Now.zonedDateTimeISO(timezone);
    } catch (error) {
      throw new Error(
        `Invalid timezone "${timezone}": ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  return {
    now,
    direction: config.direction,
    inferDatetimes: config.inferDatetimes,
    returnMatchedText: config.returnMatchedText,
    returnSingleObject: config.returnSingleObject,
  };
}

export { USAGE };
export * from './defaults';
export * from './types';
export { resolveParserConfig } from './validator';
