/**
 * Maps timezone abbreviations and names ("EST", "Pacific Time") to IANA ids
 */
export interface ITimezoneLookup {
  resolve(text: string): string | undefined;

  /** Every spelling the lexicon should recognise, matched case-sensitively */
  names(): readonly string[];
}

/**
 * Maps month names and abbreviations to month numbers (1-12)
 */
export interface IMonthLookup {
  resolve(text: string): number | undefined;

  names(): readonly string[];
}
