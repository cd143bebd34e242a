/**
 * Response Parser Types
 */

/**
 * How the duration was expressed
 */
export type DurationKind = 'explicit' | 'colloquial' | 'vague';

/**
 * A reply that named a duration
 */
export interface ParsedDuration {
  parsed: true;
  duration_ms: number;
  /** The fragment of the reply that produced the duration */
  matched: string;
  kind: DurationKind;
}

/**
 * A reply with no recognizable duration
 */
export interface Unparsed {
  parsed: false;
  reason: 'empty' | 'no_duration';
}

export type ParseResult = ParsedDuration | Unparsed;

/**
 * Parser configuration
 */
export interface ResponseParserConfig {
  /** Duration for "a bit" / "a little" */
  short_default_ms: number;
  /** Duration for "quick" / "just a sec" */
  minimal_default_ms: number;
}
