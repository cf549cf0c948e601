import { ParserConfig, resolveParserConfig } from '../config';
import { SemanticValue, UnknownText } from '../domain/entities';
import { IDebugWriter } from '../domain/interfaces';
import {
  Clock,
  createRenderContext,
  RenderContext,
  renderResultList,
  renderResults,
  SemanticBuilder,
} from '../domain/services';
import { DebugTokenEntry, MatchedResult, ParsedValue, ParseOutput } from '../domain/types';
import { formatTree, getDefaultGrammar, Grammar, ParseNode, Token } from '../grammar';
import { serializeOutput } from '../presentation/result-serializer';
import { Logger } from '../shared/logger';

export interface TimeParserOptions {
  grammar?: Grammar;
  logger?: Logger;
  debugWriter?: IDebugWriter;
  /** Source of "now" when the config carries none */
  clock?: Clock;
}

function toTokenEntry(token: Token): DebugTokenEntry {
  return { text: token.text, kinds: [...token.kinds], start: token.start, end: token.end };
}

function isUnknownText(value: SemanticValue): value is UnknownText {
  return value instanceof UnknownText;
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * text → tokens → parse tree → semantic values → rendered output.
 * Holds no per-call state; one instance can serve any number of calls.
 */
export class TimeParser {
  private readonly grammar: Grammar;
  private readonly logger: Logger;
  private readonly debugWriter?: IDebugWriter;
  private readonly clock?: Clock;

  constructor(options: TimeParserOptions = {}) {
    this.grammar = options.grammar ?? getDefaultGrammar();
    this.logger = options.logger ?? new Logger(false);
    this.debugWriter = options.debugWriter;
    this.clock = options.clock;
  }

  tokenize(text: string): Token[] {
    return this.grammar.tokenize(text);
  }

  parseTree(text: string): ParseNode {
    return this.grammar.parse(text);
  }

  parse(text: string, config: ParserConfig = {}): ParseOutput {
    return this.run(text, config, renderResults);
  }

  /** Like `parse`, but always returns the list of results. */
  parseAll(text: string, config: ParserConfig = {}): readonly ParsedValue[] | readonly MatchedResult[] {
    return this.run(text, config, renderResultList);
  }

  private run<Output extends ParseOutput>(
    text: string,
    config: ParserConfig,
    render: (values: readonly SemanticValue[], text: string, context: RenderContext) => Output
  ): Output {
    const resolved = resolveParserConfig(config);
    const context = createRenderContext(resolved, this.clock);

    const tokens = this.tokenize(text);
    const tree = this.parseTree(text);
    this.logger.verbose(`Tokens: ${tokens.map((token) => `${token.text}<${token.kinds.join('|')}>`).join(' ')}`);
    this.logger.verbose(`Tree:\n${formatTree(tree)}`);

    let values: SemanticValue[] = [];
    try {
      values = new SemanticBuilder(this.grammar, context).build(tree, text);
      const output = render(values, text, context);
      this.record(text, tokens, tree, values, output);
      return output;
    } catch (error) {
      this.logger.verbose(`Failed to parse "${text}": ${describeError(error)}`);
      this.record(text, tokens, tree, values, undefined, error);
      throw error;
    }
  }

  private record(
    text: string,
    tokens: Token[],
    tree: ParseNode,
    values: SemanticValue[],
    output: ParseOutput | undefined,
    error?: unknown
  ): void {
    if (!this.debugWriter) return;
    const serialized = output === undefined ? undefined : serializeOutput(output);
    this.debugWriter.addParseEntry({
      input: text,
      tokens: tokens.map(toTokenEntry),
      tree: formatTree(tree),
      unknown: values.filter(isUnknownText).map((value) => value.text),
      values: values.filter((value) => !isUnknownText(value)).map((value) => value.toString()),
      results: serialized === undefined ? undefined : JSON.stringify(serialized),
      error: error === undefined ? undefined : describeError(error),
    });
  }
}

let defaultParser: TimeParser | undefined;

/** Parses with the shared default grammar. */
export function parse(text: string, config: ParserConfig = {}): ParseOutput {
  defaultParser ??= new TimeParser();
  return defaultParser.parse(text, config);
}
