/**
 * Value Tuple Splitter
 *
 * Splits the body of an `INSERT ... VALUES` statement into one string per
 * tuple, each still wrapped in its parentheses.
 *
 * @packageDocumentation
 */

/**
 * Scanner state carried from one character to the next
 */
interface SplitState {
  inString: boolean;
  escapePending: boolean;
  parenDepth: number;
}

/**
 * Split a tuple list such as `(1,'a'),(2,'b')` into `(1,'a')` and `(2,'b')`.
 *
 * Commas inside quoted strings or inside parens never separate tuples. An
 * unterminated string or unbalanced parens end the scan early in effect:
 * whatever has accumulated is flushed as the last tuple. Never throws.
 */
export function splitTuples(values: string): string[] {
  const tuples: string[] = [];
  const state: SplitState = { inString: false, escapePending: false, parenDepth: 0 };
  let current = '';

  const flush = (): void => {
    const tuple = current.trim();
    if (tuple) {
      tuples.push(tuple);
    }
    current = '';
  };

  for (const char of values) {
    if (char === "'" && !state.escapePending) {
      state.inString = !state.inString;
    }
    if (char === '\\' && state.inString) {
      state.escapePending = !state.escapePending;
    } else {
      state.escapePending = false;
    }

    if (!state.inString) {
      if (char === '(') {
        state.parenDepth++;
      } else if (char === ')') {
        state.parenDepth = Math.max(0, state.parenDepth - 1);
      }
    }

    if (char === ',' && state.parenDepth === 0 && !state.inString) {
      flush();
      continue;
    }
    current += char;
  }

  flush();
  return tuples;
}
