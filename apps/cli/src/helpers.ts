/**
 * CLI helpers: action error handling, argument parsing, line tokenizing.
 */

import { parseDate } from '@tasktrack/core';
import * as out from './output.js';

/**
 * Run a command action, printing any thrown error instead of letting it
 * end the session.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Turn a due-date argument into yyyy-MM-dd. Input the date parser does not
 * understand is passed through so task validation reports it.
 */
export function parseDueArg(input: string, now?: Date): string {
  return parseDate(input, now) ?? input.trim();
}

/** Parse a priority argument; non-numeric input becomes NaN and fails validation */
export function parsePriorityArg(level: string): number {
  const trimmed = level.trim();
  return trimmed.length === 0 ? Number.NaN : Number(trimmed);
}

/**
 * Split a command line into arguments. Single and double quotes group words;
 * a backslash escapes the next character outside single quotes.
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;
  let escaping = false;

  for (const ch of line) {
    if (escaping) {
      current += ch;
      escaping = false;
      continue;
    }
    if (quote) {
      if (ch === quote) quote = null;
      else if (ch === '\\' && quote === '"') escaping = true;
      else current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (ch === '\\') {
      escaping = true;
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) tokens.push(current);
      current = '';
      inToken = false;
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote || escaping) throw new Error('Unterminated quote or escape in command');
  if (inToken) tokens.push(current);
  return tokens;
}
