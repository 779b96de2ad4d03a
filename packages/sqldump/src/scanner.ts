/**
 * Scanner State Utilities
 *
 * Functional-style, position-based scanning over the dump text. Every
 * matcher either returns a new state past the matched text or null, and
 * never backtracks further than the construct it is matching.
 *
 * @packageDocumentation
 */

// =============================================================================
// SCAN STATE
// =============================================================================

/**
 * Immutable scan state
 */
export interface ScanState {
  /** Full input text */
  readonly input: string;
  /** Current 0-based position in input */
  readonly position: number;
}

/**
 * Create a scan state at the given position
 */
export function createScanState(input: string, position = 0): ScanState {
  return { input, position };
}

/**
 * Advance position by count characters
 */
export function advance(state: ScanState, count: number): ScanState {
  return {
    ...state,
    position: Math.min(state.position + count, state.input.length),
  };
}

/**
 * Peek at character at offset from current position
 */
export function peek(state: ScanState, offset = 0): string {
  return state.input[state.position + offset] ?? '';
}

// =============================================================================
// CHARACTER CLASSES
// =============================================================================

const WHITESPACE = /\s/;

/** Letters, marks and digits of any script, plus underscore */
const WORD_CHAR = /[\p{L}\p{M}\p{N}_]/uy;
const WORD_RUN = /[\p{L}\p{M}\p{N}_]+/uy;

export function isWhitespace(char: string): boolean {
  return char !== '' && WHITESPACE.test(char);
}

/**
 * Check whether a word character starts at `index`. Characters outside the
 * Basic Multilingual Plane are read as one code point.
 */
export function isWordCharAt(text: string, index: number): boolean {
  WORD_CHAR.lastIndex = index;
  return WORD_CHAR.test(text);
}

/**
 * Length in code units of the run of word characters starting at `index`
 */
export function wordRunLength(text: string, index: number): number {
  WORD_RUN.lastIndex = index;
  return WORD_RUN.exec(text)?.[0].length ?? 0;
}

// =============================================================================
// WHITESPACE HANDLING
// =============================================================================

/**
 * Skip any whitespace
 */
export function skipWhitespace(state: ScanState): ScanState {
  let position = state.position;
  while (position < state.input.length && isWhitespace(state.input[position])) {
    position++;
  }
  return position === state.position ? state : { ...state, position };
}

/**
 * Skip at least one whitespace character
 * @returns New state, or null when not positioned on whitespace
 */
export function requireWhitespace(state: ScanState): ScanState | null {
  const next = skipWhitespace(state);
  return next.position > state.position ? next : null;
}

// =============================================================================
// MATCHING UTILITIES
// =============================================================================

/**
 * Try to match a keyword (case-insensitive) that is not followed by a word character
 */
export function matchKeyword(state: ScanState, keyword: string): ScanState | null {
  const candidate = state.input.slice(state.position, state.position + keyword.length);
  if (candidate.length !== keyword.length || candidate.toUpperCase() !== keyword.toUpperCase()) {
    return null;
  }
  const next = advance(state, keyword.length);
  return isWordCharAt(next.input, next.position) ? null : next;
}

/**
 * Try to match exact string
 */
export function matchExact(state: ScanState, str: string): ScanState | null {
  return state.input.startsWith(str, state.position) ? advance(state, str.length) : null;
}

/**
 * Try to match an identifier made of word characters, optionally
 * preceded and followed by a quote character.
 *
 * Each quote is optional on its own, so `` `name `` and `` name` `` both match.
 */
export function matchIdentifier(
  state: ScanState,
  quote = '`'
): { state: ScanState; name: string } | null {
  let next = matchExact(state, quote) ?? state;
  const length = wordRunLength(next.input, next.position);
  if (length === 0) {
    return null;
  }
  const name = next.input.slice(next.position, next.position + length);
  next = advance(next, length);
  next = matchExact(next, quote) ?? next;
  return { state: next, name };
}

// =============================================================================
// SEARCHING
// =============================================================================

/**
 * Escape a literal string for use inside a RegExp
 */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a case-insensitive pattern for a keyword phrase whose words may be
 * separated by any run of whitespace.
 */
export function phrasePattern(phrase: string): RegExp {
  const words = phrase.trim().split(/\s+/).map(escapeRegExp);
  return new RegExp(words.join('\\s+'), 'gi');
}

/**
 * Find the next match of a global pattern at or after the current position
 * @returns Start and end offsets of the match, or null
 */
export function findNext(
  state: ScanState,
  pattern: RegExp
): { start: number; end: number } | null {
  const global = pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`);
  global.lastIndex = state.position;
  const match = global.exec(state.input);
  if (!match) {
    return null;
  }
  return { start: match.index, end: match.index + match[0].length };
}

/**
 * Find the next unquoted occurrence of a character.
 *
 * Single quotes open and close strings; inside a string a backslash escapes
 * the following character.
 *
 * @returns Offset of the character, or -1 if it only occurs inside strings
 * or not at all
 */
export function findUnquoted(state: ScanState, char: string): number {
  const { input } = state;
  let inString = false;
  let escapePending = false;

  for (let i = state.position; i < input.length; i++) {
    const c = input[i];
    if (inString) {
      if (escapePending) {
        escapePending = false;
      } else if (c === '\\') {
        escapePending = true;
      } else if (c === "'") {
        inString = false;
      }
      continue;
    }
    if (c === "'") {
      inString = true;
    } else if (c === char) {
      return i;
    }
  }

  return -1;
}
