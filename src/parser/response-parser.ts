/**
 * Response Parser
 *
 * Turns a free-text reply ("just 10 more minutes please") into a duration.
 * Pure and deterministic: no I/O, never throws.
 */

import { HOUR_MS, MINUTE_MS } from '../utils/clock';
import { DurationKind, ParseResult, ResponseParserConfig } from './types';

const SECOND_MS = 1000;

export const DEFAULT_PARSER_CONFIG: ResponseParserConfig = {
  short_default_ms: 5 * MINUTE_MS,
  minimal_default_ms: 2 * MINUTE_MS,
};

/**
 * Explicit numeric durations, tried in this order
 */
const NUMERIC_PATTERNS: Array<{ pattern: RegExp; unit_ms: number }> = [
  { pattern: /(\d+(?:\.\d+)?)\s*(?:more\s+)?(?:hours?|hrs?)\b/g, unit_ms: HOUR_MS },
  { pattern: /(\d+(?:\.\d+)?)\s*(?:more\s+)?(?:minutes?|mins?)\b/g, unit_ms: MINUTE_MS },
  { pattern: /(\d+(?:\.\d+)?)\s*(?:more\s+)?(?:seconds?|secs?)\b/g, unit_ms: SECOND_MS },
];

/**
 * Spelled-out numbers accepted before a unit word. A tens word may take a
 * trailing unit ("twenty five").
 */
const UNIT_WORDS: Record<string, number> = {
  one: 1, two: 2, three: 3, four: 4, five: 5,
  six: 6, seven: 7, eight: 8, nine: 9,
};

const SINGLE_WORDS: Record<string, number> = {
  ...UNIT_WORDS,
  ten: 10, eleven: 11, twelve: 12, thirteen: 13, fourteen: 14, fifteen: 15,
  sixteen: 16, seventeen: 17, eighteen: 18, nineteen: 19, sixty: 60,
};

const TENS_WORDS: Record<string, number> = {
  twenty: 20, thirty: 30, forty: 40, fifty: 50,
};

// Words that make a following spelled number part of a larger one
const NUMBER_WORDS = new Set([
  ...Object.keys(SINGLE_WORDS),
  ...Object.keys(TENS_WORDS),
  'hundred',
  'thousand',
]);

function alternation(table: Record<string, number>): string {
  return Object.keys(table)
    .sort((a, b) => b.length - a.length)
    .join('|');
}

const SPELLED_PATTERN = new RegExp(
  `\\b(?:(${alternation(TENS_WORDS)})(?:\\s+(${alternation(UNIT_WORDS)}))?|(${alternation(SINGLE_WORDS)}))` +
    `\\s+(?:more\\s+)?(hours?|hrs?|minutes?|mins?|seconds?|secs?)\\b`
);

function precededByNumber(input: string, index: number): boolean {
  const words = input.slice(0, index).trim().split(' ');
  let last = words.pop();
  if (last === 'and') {
    last = words.pop();
  }
  return last !== undefined && (NUMBER_WORDS.has(last) || /\d$/.test(last));
}

/**
 * Fixed phrases, tried in this order
 */
const COLLOQUIAL_PATTERNS: Array<{ pattern: RegExp; duration_ms: number }> = [
  { pattern: /\bhalf\s+(?:an?\s+)?hour\b/, duration_ms: 30 * MINUTE_MS },
  { pattern: /\bquarter\s+(?:of\s+)?(?:an?\s+)?hour\b/, duration_ms: 15 * MINUTE_MS },
  { pattern: /\b(?:an?|one)\s+(?:more\s+)?hour\b/, duration_ms: HOUR_MS },
  { pattern: /\b(?:a\s+)?couple(?:\s+of)?(?:\s+more)?\s+(?:minutes?|mins?)\b/, duration_ms: 2 * MINUTE_MS },
  { pattern: /\b(?:a\s+)?few(?:\s+more)?\s+(?:minutes?|mins?)\b/, duration_ms: 3 * MINUTE_MS },
];

const SHORT_PATTERNS: RegExp[] = [
  /\b(?:a\s+)?bit(?:\s+longer|\s+more)?\b/,
  /\b(?:a\s+)?little(?:\s+more)?(?:\s+time)?\b/,
];

const MINIMAL_PATTERN = /\bquick(?:ly)?\b|\bjust\s+a\s+sec(?:ond)?\b|\ba\s+(?:sec(?:ond)?|moment)\b/;

const DECLINE_PATTERN =
  /\b(?:no|nah|nope|fine|okay|ok|alright)\b.*\b(?:stop|stopping|quit|done|close|closing)\b/;

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/([a-z])-([a-z])/g, '$1 $2')
    .replace(/\s+/g, ' ')
    .trim();
}

function unitMs(unit: string): number {
  if (unit.startsWith('h')) return HOUR_MS;
  if (unit.startsWith('m')) return MINUTE_MS;
  return SECOND_MS;
}

/**
 * Response Parser
 */
export class ResponseParser {
  private readonly config: ResponseParserConfig;

  constructor(config: Partial<ResponseParserConfig> = {}) {
    this.config = {
      short_default_ms: config.short_default_ms ?? DEFAULT_PARSER_CONFIG.short_default_ms,
      minimal_default_ms: config.minimal_default_ms ?? DEFAULT_PARSER_CONFIG.minimal_default_ms,
    };
  }

  /**
   * Extracts a duration from a reply
   */
  parse(text: string): ParseResult {
    const input = normalize(text);
    if (!input) {
      return { parsed: false, reason: 'empty' };
    }

    return (
      this.matchNumeric(input) ??
      this.matchColloquial(input) ??
      this.matchSpelled(input) ??
      this.matchVague(input) ?? { parsed: false, reason: 'no_duration' }
    );
  }

  /**
   * True when the reply gives up the request ("no, I'll stop"). A reply
   * that also names a duration ("ok, 5 more minutes then I'm done") is a
   * request, not a decline.
   */
  isDecline(text: string): boolean {
    return DECLINE_PATTERN.test(normalize(text)) && !this.parse(text).parsed;
  }

  private matchNumeric(input: string): ParseResult | null {
    for (const { pattern, unit_ms } of NUMERIC_PATTERNS) {
      for (const match of input.matchAll(pattern)) {
        const value = Number(match[1]);
        if (value > 0) {
          return this.result(Math.round(value * unit_ms), match[0], 'explicit');
        }
      }
    }
    return null;
  }

  private matchColloquial(input: string): ParseResult | null {
    for (const { pattern, duration_ms } of COLLOQUIAL_PATTERNS) {
      const match = pattern.exec(input);
      if (match) {
        return this.result(duration_ms, match[0], 'colloquial');
      }
    }
    return null;
  }

  private matchSpelled(input: string): ParseResult | null {
    const match = SPELLED_PATTERN.exec(input);
    if (!match) {
      return null;
    }
    if (precededByNumber(input, match.index)) {
      return null;
    }
    const value = match[1]
      ? TENS_WORDS[match[1]] + (match[2] ? UNIT_WORDS[match[2]] : 0)
      : SINGLE_WORDS[match[3]];
    return this.result(value * unitMs(match[4]), match[0], 'explicit');
  }

  private matchVague(input: string): ParseResult | null {
    for (const pattern of SHORT_PATTERNS) {
      const match = pattern.exec(input);
      if (match) {
        return this.result(this.config.short_default_ms, match[0], 'vague');
      }
    }
    const minimal = MINIMAL_PATTERN.exec(input);
    if (minimal) {
      return this.result(this.config.minimal_default_ms, minimal[0], 'vague');
    }
    return null;
  }

  private result(duration_ms: number, matched: string, kind: DurationKind): ParseResult {
    return { parsed: true, duration_ms, matched: matched.trim(), kind };
  }
}
