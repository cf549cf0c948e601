import { describe, expect, it } from 'vitest';

import { Direction } from '../domain/entities/direction';

import { DEFAULT_CLI_CONFIG, DEFAULT_PARSER_CONFIG } from './defaults';
import { resolveParserConfig, validateAndCompleteConfig } from './validator';

describe('resolveParserConfig', () => {
  it('fills every missing option with its default', () => {
    expect(resolveParserConfig()).toEqual({ ...DEFAULT_PARSER_CONFIG, now: undefined });
  });

  it('returns a new object and keeps given options', () => {
    const config = { direction: Direction.previous };
    const resolved = resolveParserConfig(config);
    expect(resolved).not.toBe(config);
    expect(resolved.direction).toBe(Direction.previous);
    expect(config).toEqual({ direction: Direction.previous });
  });
});

describe('validateAndCompleteConfig', () => {
  it('completes a partial config with defaults', () => {
    expect(validateAndCompleteConfig({ text: ['noon'], json: true })).toEqual({
      ...DEFAULT_CLI_CONFIG,
      now: undefined,
      timezone: undefined,
      json: true,
      text: ['noon'],
    });
  });

  it('requires text unless reading from stdin', () => {
    expect(() => validateAndCompleteConfig({})).toThrow('No text to parse');
    expect(validateAndCompleteConfig({ interactive: true }).text).toEqual([]);
  });
});
