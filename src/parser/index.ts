/**
 * Response Parser
 *
 * Free-text replies to durations.
 */

export * from './types';
export { ResponseParser, DEFAULT_PARSER_CONFIG } from './response-parser';
