import { Temporal } from '@js-temporal/polyfill';
import { describe, expect, it } from 'vitest';

import { ParserConfig } from '../config';
import { GrammarError, InferenceError, RenderError } from '../domain/errors';
import { IDebugWriter } from '../domain/interfaces';
import { DebugParseEntry, ParseOutput } from '../domain/types';
import { serializeOutput } from '../presentation/result-serializer';
import { Logger } from '../shared/logger';
import { NOW } from '../test-support/context';

import { parse, TimeParser } from './time-parser';

function parsed(text: string, config: ParserConfig = {}) {
  return serializeOutput(parse(text, { now: NOW, ...config }));
}

describe('parse', () => {
  it('returns an empty list for empty text', () => {
    expect(parse('')).toEqual([]);
  });

  it('shares a meridiem across a range', () => {
    expect(parsed('3-4 pm')).toEqual([['2018-08-04T15:00:00', '2018-08-04T16:00:00']]);
  });

  it('shares a date and a meridiem across a list', () => {
    expect(parsed('7/17 4 or 5 PM')).toEqual([['2018-07-17T16:00:00', '2018-07-17T17:00:00']]);
  });

  it('reads a bare time without inference', () => {
    expect(parsed('5p', { inferDatetimes: false })).toEqual(['17:00:00']);
  });

  it('anchors a range of durations to now', () => {
    expect(parsed('30-40 mins')).toEqual([['2018-08-04T14:30:00', '2018-08-04T14:40:00']]);
  });

  it('finds the last weekday of a month', () => {
    expect(parsed('last Wednesday of December', { inferDatetimes: false })).toEqual(['2018-12-26']);
  });

  it('ends an overnight range on the next day', () => {
    expect(parsed('11PM to 1AM')).toEqual([['2018-08-04T23:00:00', '2018-08-05T01:00:00']]);
  });

  it('drops the free text around an expression', () => {
    expect(parsed('how does 5p sound?')).toEqual(['2018-08-04T17:00:00']);
  });

  it('handles relative expressions', () => {
    expect(parsed('2h30m ago')).toEqual(['2018-08-04T11:30:00']);
    expect(parsed('in 3 days')).toEqual(['2018-08-07T14:00:00']);
  });

  it('renders a standalone duration as a duration', () => {
    expect(parsed('an hour and 30 minutes')).toEqual(['PT1H30M']);
    expect(parsed('2 hours 15 minutes')).toEqual(['PT2H15M']);
  });

  it('reads spelled-out numbers in durations', () => {
    expect(parsed('thirty two minutes')).toEqual(['PT32M']);
    expect(parsed('twenty-five mins')).toEqual(['PT25M']);
  });

  it('keeps a duration end on the day it lands', () => {
    expect(parsed('5pm - 2 hours')).toEqual([['2018-08-04T17:00:00', '2018-08-04T16:00:00']]);
  });

  it('expands named day ranges', () => {
    expect(parsed('next weekend')).toEqual([['2018-08-11T00:00:00', '2018-08-12T00:00:00']]);
    expect(parsed('weekdays', { inferDatetimes: false })).toEqual([['2018-08-06', '2018-08-10']]);
    expect(parsed('this month', { inferDatetimes: false })).toEqual([['2018-08-01', '2018-08-31']]);
  });

  it('resolves weekday references', () => {
    expect(parsed('next Monday', { inferDatetimes: false })).toEqual(['2018-08-13']);
    expect(parsed('Monday at 9am')).toEqual(['2018-08-06T09:00:00']);
  });

  it('applies a written timezone', () => {
    expect(parsed('5pm EST')).toEqual(['2018-08-04T17:00:00-04:00[America/New_York]']);
  });

  it('pairs results with the text they came from', () => {
    expect(parsed('lunch at noon tomorrow', { returnMatchedText: true })).toEqual([
      { text: 'noon tomorrow', start: 9, end: 22, value: '2018-08-05T12:00:00' },
    ]);
  });

  it('unwraps a single result on request', () => {
    expect(parsed('tomorrow', { returnSingleObject: true })).toBe('2018-08-05T00:00:00');
    expect(parsed('today or tomorrow', { returnSingleObject: true, inferDatetimes: false })).toEqual([
      '2018-08-04',
      '2018-08-05',
    ]);
  });

  it('round-trips the ISO string of a rendered value', () => {
    const output = parse('July 17th, 2018 at 4:30pm', { now: NOW, returnSingleObject: true });
    expect(output).toBeInstanceOf(Temporal.PlainDateTime);
    expect(parsed(output.toString(), { returnSingleObject: true })).toBe('2018-07-17T16:30:00');
  });

  it('raises RenderError for impossible dates', () => {
    expect(() => parse('2/30/2018', { now: NOW })).toThrow(RenderError);
  });

  it('reads a numeric day past 31 as the year unless a year is written', () => {
    expect(parsed('7/32')).toEqual(['2032-07-01T00:00:00']);
    expect(() => parse('7/45/18', { now: NOW })).toThrow(GrammarError);
  });

  it('raises RenderError for offsets past the calendar', () => {
    expect(() => parse('in 999999999 years', { now: NOW })).toThrow(RenderError);
    expect(() => parse('5 - 999999999 years', { now: NOW })).toThrow(RenderError);
  });

  it('raises InferenceError when nothing gives an integer a meaning', () => {
    expect(() => parse('3 or 4', { now: NOW })).toThrow(InferenceError);
  });

  it('does not modify the config it is given', () => {
    const config: ParserConfig = { now: NOW, direction: undefined };
    parse('5p', config);
    expect(config).toEqual({ now: NOW, direction: undefined });
  });

  it('reads the clock on every call when now is not given', () => {
    const times = ['2018-08-04T14:00', '2018-08-04T18:00'].map((value) => Temporal.PlainDateTime.from(value));
    const parser = new TimeParser({ clock: () => times.shift() ?? NOW });

    const first: ParseOutput = parser.parse('5p');
    const second: ParseOutput = parser.parse('5p');
    expect(serializeOutput(first)).toEqual(['2018-08-04T17:00:00']);
    expect(serializeOutput(second)).toEqual(['2018-08-05T17:00:00']);
  });
});

describe('TimeParser', () => {
  class RecordingWriter implements IDebugWriter {
    entries: DebugParseEntry[] = [];
    addParseEntry(entry: DebugParseEntry): void {
      this.entries.push(entry);
    }
    writeAll(): void {}
  }

  it('logs tokens and the tree at verbose level', () => {
    const lines: string[] = [];
    const parser = new TimeParser({ logger: new Logger(true, (line) => lines.push(line)) });
    parser.parse('5p', { now: NOW });
    expect(lines[0]).toBe('Tokens: 5<INT> p<MERIDIEM|WORD>');
    expect(lines[1].startsWith('Tree:\nstart [0, 2)')).toBe(true);
  });

  it('stays quiet when not verbose', () => {
    const lines: string[] = [];
    new TimeParser({ logger: new Logger(false, (line) => lines.push(line)) }).parse('5p', { now: NOW });
    expect(lines).toEqual([]);
  });

  it('records a debug entry per call', () => {
    const writer = new RecordingWriter();
    const parser = new TimeParser({ debugWriter: writer });

    parser.parse('how about 5p', { now: NOW });
    expect(() => parser.parse('2/30/2018', { now: NOW })).toThrow(RenderError);

    expect(writer.entries).toHaveLength(2);
    expect(writer.entries[0]).toMatchObject({
      input: 'how about 5p',
      unknown: ['how about'],
      results: '["2018-08-04T17:00:00"]',
    });
    expect(writer.entries[0].tokens.map((token) => token.text)).toEqual(['how', 'about', '5', 'p']);
    expect(writer.entries[1].error).toMatch(/^RenderError: /);
    expect(writer.entries[1].results).toBeUndefined();
  });

  it('exposes the tokens and the parse tree', () => {
    const parser = new TimeParser();
    expect(parser.tokenize('noon').map((token) => token.kinds[0])).toEqual(['TIMENAME']);
    expect(parser.parseTree('noon').children).toHaveLength(1);
  });
});
