export type HumanDatetimeErrorKind = 'grammar' | 'inference' | 'render';

/**
 * Base class for every error raised while turning text into date/time values.
 * `text` is the raw fragment that could not be interpreted.
 */
export class HumanDatetimeError extends Error {
  constructor(
    readonly kind: HumanDatetimeErrorKind,
    readonly text: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A parse node whose children disagree, e.g. a meridiem after a 24-hour clock
 * hour or a day past 31 written next to an explicit year.
 */
export class GrammarError extends HumanDatetimeError {
  constructor(
    readonly rule: string,
    text: string,
    detail?: string
  ) {
    super('grammar', text, `Cannot build ${rule} from "${text}"${detail ? `: ${detail}` : ''}`);
  }
}

export class InferenceError extends HumanDatetimeError {
  constructor(text: string, detail: string) {
    super('inference', text, `Cannot infer a type for "${text}": ${detail}`);
  }
}

/** A calendar value that does not exist, such as February 30th. */
export class RenderError extends HumanDatetimeError {
  constructor(
    readonly field: string,
    text: string,
    detail?: string
  ) {
    super('render', text, `Invalid ${field} "${text}"${detail ? `: ${detail}` : ''}`);
  }
}

/** Runs a Temporal call, reporting its RangeError as a RenderError. */
export function guardTemporal<T>(field: string, text: string, render: () => T): T {
  try {
    return render();
  } catch (error) {
    if (error instanceof RangeError) {
      throw new RenderError(field, text, error.message);
    }
    throw error;
  }
}
