import { describe, expect, it } from 'vitest';

import { Direction } from '../domain/entities/direction';

import { ENV_DIRECTION, ENV_NOW, ENV_TIMEZONE, loadEnvConfig } from './env-loader';

describe('loadEnvConfig', () => {
  it('reads the variables that are set', () => {
    expect(
      loadEnvConfig({ [ENV_NOW]: '2018-08-04T14:00:00', [ENV_TIMEZONE]: 'Asia/Tokyo', [ENV_DIRECTION]: 'this' })
    ).toEqual({ now: '2018-08-04T14:00:00', timezone: 'Asia/Tokyo', direction: Direction.this });
  });

  it('ignores unset and empty variables', () => {
    expect(loadEnvConfig({ [ENV_TIMEZONE]: '' })).toEqual({});
  });

  it('rejects invalid values', () => {
    expect(() => loadEnvConfig({ [ENV_DIRECTION]: 'later' })).toThrow('Invalid HUMAN_DATETIME_DIRECTION: "later"');
    expect(() => loadEnvConfig({ [ENV_NOW]: 'soon' })).toThrow('Invalid HUMAN_DATETIME_NOW: "soon"');
  });
});
