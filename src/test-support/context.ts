import { Temporal } from '@js-temporal/polyfill';

import { ParserConfig, resolveParserConfig } from '../config';
import { createRenderContext, RenderContext } from '../domain/services/render-context';

/** Saturday afternoon */
export const NOW = Temporal.PlainDateTime.from('2018-08-04T14:00');

export function contextAt(overrides: ParserConfig = {}): RenderContext {
  return createRenderContext(resolveParserConfig({ now: NOW, ...overrides }));
}
