import {
  isScalarValue,
  MatchedResult,
  ParsedValue,
  ParseOutput,
  RangeValue,
  ScalarValue,
} from '../domain/types';

/** ISO 8601 strings, nested the same way as the parsed values */
export type SerializedValue = string | readonly SerializedValue[];

export interface SerializedMatch {
  text: string;
  start: number;
  end: number;
  value: SerializedValue;
}

export type SerializedOutput = SerializedValue | SerializedMatch | readonly (SerializedValue | SerializedMatch)[];

export function isMatchedResult(value: ParseOutput | ParsedValue | MatchedResult): value is MatchedResult {
  return Array.isArray(value) && value.length === 3 && typeof value[0] === 'string';
}

function isOutputList(value: ParseOutput): value is readonly ParsedValue[] | readonly MatchedResult[] {
  return Array.isArray(value);
}

export function serializeValue(value: ParsedValue): SerializedValue {
  if (isScalarValue(value)) return value.toString();
  const items: readonly (ScalarValue | RangeValue)[] = value;
  return items.map(serializeValue);
}

function serializeMatch([text, [start, end], value]: MatchedResult): SerializedMatch {
  return { text, start, end, value: serializeValue(value) };
}

function serializeItem(item: ParsedValue | MatchedResult): SerializedValue | SerializedMatch {
  return isMatchedResult(item) ? serializeMatch(item) : serializeValue(item);
}

/** JSON-ready form of whatever `parse` returned. */
export function serializeOutput(output: ParseOutput): SerializedOutput {
  if (isMatchedResult(output)) return serializeMatch(output);
  if (isOutputList(output)) {
    const items: readonly (ParsedValue | MatchedResult)[] = output;
    return items.map(serializeItem);
  }
  return serializeValue(output);
}
