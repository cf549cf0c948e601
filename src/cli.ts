#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { TimeParser } from './application';
import { CliConfig, loadCliConfig, toParserConfig } from './config';
import { DebugWriter, printResults, serializeOutput } from './presentation';
import { Logger } from './shared/logger';
import { forEachInputLine } from './shared/readline-helper';

function parseAndPrint(parser: TimeParser, config: CliConfig, text: string): void {
  const parserConfig = toParserConfig(config);
  if (config.json) {
    console.log(JSON.stringify(serializeOutput(parser.parse(text, parserConfig))));
  } else {
    printResults(text, parser.parseAll(text, parserConfig));
  }
}

async function main() {
  try {
    const config = loadCliConfig();

    const logger = new Logger(config.verboseLogging);
    const debugWriter = config.writeDebugFiles ? new DebugWriter(logger) : undefined;
    const parser = new TimeParser({ logger, debugWriter });

    try {
      for (const text of config.text) {
        parseAndPrint(parser, config, text);
      }

      if (config.interactive) {
        logger.verbose('Reading expressions from stdin, one per line...');
        await forEachInputLine((line) => {
          try {
            parseAndPrint(parser, config, line);
          } catch (error) {
            logger.error(`Could not parse "${line}":`, error);
          }
        });
      }
    } finally {
      debugWriter?.writeAll();
    }
  } catch (error) {
    new Logger(false).error('Error:', error);
    process.exit(1);
  }
}

void main();
