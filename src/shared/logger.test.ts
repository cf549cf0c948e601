import { describe, expect, it } from 'vitest';

import { Logger } from './logger';

describe('Logger', () => {
  it('writes verbose messages only when verbose', () => {
    const quiet: string[] = [];
    const loud: string[] = [];
    const quietLogger = new Logger(false, (message) => quiet.push(message));
    const loudLogger = new Logger(true, (message) => loud.push(message));

    for (const logger of [quietLogger, loudLogger]) {
      logger.log('always');
      logger.verbose('details');
    }

    expect(quiet).toEqual(['always']);
    expect(loud).toEqual(['always', 'details']);
    expect(loudLogger.verboseEnabled).toBe(true);
  });
});
