import { isDirection } from '../domain/entities/direction';

import { DEFAULT_CLI_CONFIG, DEFAULT_PARSER_CONFIG } from './defaults';
import { CliConfig, ParserConfig, ResolvedParserConfig } from './types';

/**
 * Fills in parser defaults. Returns a new object; the caller's config is left
 * untouched.
 */
export function resolveParserConfig(config: ParserConfig = {}): ResolvedParserConfig {
  if (config.direction !== undefined && !isDirection(config.direction)) {
    throw new Error(`Invalid direction: "${String(config.direction)}". Must be one of: next, previous, this.`);
  }
  return {
    inferDatetimes: config.inferDatetimes ?? DEFAULT_PARSER_CONFIG.inferDatetimes,
    direction: config.direction ?? DEFAULT_PARSER_CONFIG.direction,
    now: config.now,
    returnMatchedText: config.returnMatchedText ?? DEFAULT_PARSER_CONFIG.returnMatchedText,
    returnSingleObject: config.returnSingleObject ?? DEFAULT_PARSER_CONFIG.returnSingleObject,
    anchorDurations: config.anchorDurations ?? DEFAULT_PARSER_CONFIG.anchorDurations,
  };
}

/**
 * Validates and completes the CLI configuration with defaults
 * Outputs configuration summary to console when verbose logging is on (before Logger is initialized)
 */
export function validateAndCompleteConfig(config: Partial<CliConfig>): CliConfig {
  const provided = (key: keyof CliConfig): string => (config[key] === undefined ? ' (default)' : '');

  const direction = config.direction ?? DEFAULT_CLI_CONFIG.direction;
  if (!isDirection(direction)) {
    throw new Error(`Invalid direction: "${String(direction)}". Must be one of: next, previous, this.`);
  }

  const finalConfig: CliConfig = {
    now: config.now,
    timezone: config.timezone,
    direction,
    inferDatetimes: config.inferDatetimes ?? DEFAULT_CLI_CONFIG.inferDatetimes,
    returnMatchedText: config.returnMatchedText ?? DEFAULT_CLI_CONFIG.returnMatchedText,
    returnSingleObject: config.returnSingleObject ?? DEFAULT_CLI_CONFIG.returnSingleObject,
    json: config.json ?? DEFAULT_CLI_CONFIG.json,
    interactive: config.interactive ?? DEFAULT_CLI_CONFIG.interactive,
    writeDebugFiles: config.writeDebugFiles ?? DEFAULT_CLI_CONFIG.writeDebugFiles,
    verboseLogging: config.verboseLogging ?? DEFAULT_CLI_CONFIG.verboseLogging,
    text: config.text ?? DEFAULT_CLI_CONFIG.text,
  };

  if (finalConfig.text.length === 0 && !finalConfig.interactive) {
    throw new Error('No text to parse. Pass the text as arguments or use --interactive true.');
  }

  if (finalConfig.verboseLogging) {
    console.log('Configuration loaded successfully:');
    console.log(`  now: ${finalConfig.now ?? 'current time'}`);
    console.log(`  timezone: ${finalConfig.timezone ?? 'none'}`);
    console.log(`  direction: ${finalConfig.direction}${provided('direction')}`);
    console.log(`  inferDatetimes: ${finalConfig.inferDatetimes}${provided('inferDatetimes')}`);
    console.log(`  returnMatchedText: ${finalConfig.returnMatchedText}${provided('returnMatchedText')}`);
    console.log(`  returnSingleObject: ${finalConfig.returnSingleObject}${provided('returnSingleObject')}`);
    console.log(`  json: ${finalConfig.json}${provided('json')}`);
    console.log(`  interactive: ${finalConfig.interactive}${provided('interactive')}`);
    console.log(`  writeDebugFiles: ${finalConfig.writeDebugFiles}${provided('writeDebugFiles')}`);
    console.log('');
  }

  return finalConfig;
}
