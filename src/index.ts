export { parse, TimeParser, type TimeParserOptions } from './application';
export {
  DEFAULT_PARSER_CONFIG,
  resolveParserConfig,
  type ParserConfig,
  type ResolvedParserConfig,
} from './config';
export { Direction, Meridiem } from './domain/entities';
export { GrammarError, HumanDatetimeError, InferenceError, RenderError } from './domain/errors';
export type { IMonthLookup, ITimezoneLookup } from './domain/interfaces';
export {
  isDateTimeValue,
  isScalarValue,
  ZonedTime,
  type DateTimeValue,
  type MatchedResult,
  type ParsedValue,
  type ParseOutput,
  type RangeValue,
  type ScalarValue,
} from './domain/types';
export {
  createGrammar,
  formatTree,
  getDefaultGrammar,
  Grammar,
  type GrammarOptions,
  type ParseNode,
  type Token,
} from './grammar';
export { formatResults, serializeOutput, serializeValue, type SerializedOutput } from './presentation';
export { Logger } from './shared/logger';
