/** Tunables of the conversion engine. Every field has a default. */
export interface ConversionOptions {
  /** String samples longer than this (in characters) get the `textarea` widget. Default: `50`. */
  readonly textareaThreshold: number;
  /** Joins list elements into one cell. Default: `', '`. */
  readonly listJoinSeparator: string;
  /** Splits a list cell back into elements. Default: `','`. */
  readonly listSplitSeparator: string;
  /** Lower-cased cell texts that coerce to `true`. Default: `true`, `yes`, `1`, `y`. */
  readonly truthyValues: readonly string[];
}

export const DEFAULT_CONVERSION_OPTIONS: ConversionOptions = Object.freeze({
  textareaThreshold: 50,
  listJoinSeparator: ', ',
  listSplitSeparator: ',',
  truthyValues: Object.freeze(['true', 'yes', '1', 'y']),
});

export function resolveConversionOptions(options?: Partial<ConversionOptions>): ConversionOptions {
  return {
    textareaThreshold: options?.textareaThreshold ?? DEFAULT_CONVERSION_OPTIONS.textareaThreshold,
    listJoinSeparator: options?.listJoinSeparator ?? DEFAULT_CONVERSION_OPTIONS.listJoinSeparator,
    listSplitSeparator: options?.listSplitSeparator ?? DEFAULT_CONVERSION_OPTIONS.listSplitSeparator,
    truthyValues: (options?.truthyValues ?? DEFAULT_CONVERSION_OPTIONS.truthyValues).map((v) => v.toLowerCase()),
  };
}
