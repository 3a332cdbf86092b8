import { MalformedInputError } from '../types/errors.js';
import type { LineSource } from './line-io.js';

const WHITESPACE = /\s+/;
const INTEGER = /^[+-]?\d+$/;

/**
 * Parse a whole token as a safe integer.
 *
 * @returns The integer, or undefined if the token is not one
 */
export function parseInteger(token: string): number | undefined {
  if (!INTEGER.test(token)) {
    return undefined;
  }
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
}

/**
 * Split a line into whitespace-delimited tokens.
 */
export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === '' ? [] : trimmed.split(WHITESPACE);
}

/**
 * Reads whitespace-delimited tokens and whole lines from a
 * {@link LineSource}.
 *
 * Token reads cross line boundaries; line reads return whatever is left of
 * the line a token read stopped in, or the next non-blank line.
 */
export class TokenReader {
  private pending = '';

  constructor(private readonly source: LineSource) {}

  /**
   * Next token, or undefined at end of input.
   */
  nextToken(): string | undefined {
    for (;;) {
      const rest = this.pending.trimStart();
      if (rest !== '') {
        const match = WHITESPACE.exec(rest);
        if (match) {
          this.pending = rest.slice(match.index);
          return rest.slice(0, match.index);
        }
        this.pending = '';
        return rest;
      }

      const line = this.source.nextLine();
      if (line === undefined) {
        this.pending = '';
        return undefined;
      }
      this.pending = line;
    }
  }

  /**
   * Rest of the current line if it holds anything, else the next
   * non-blank line, trimmed. Undefined at end of input.
   */
  nextLine(): string | undefined {
    const rest = this.pending.trim();
    this.pending = '';
    if (rest !== '') {
      return rest;
    }

    for (;;) {
      const line = this.source.nextLine();
      if (line === undefined) {
        return undefined;
      }
      const trimmed = line.trim();
      if (trimmed !== '') {
        return trimmed;
      }
    }
  }

  /**
   * Next token as an integer.
   *
   * @param what - Name of the value, used in the error message
   * @throws MalformedInputError at end of input or when the token is not an integer
   */
  nextInteger(what: string): number {
    const token = this.nextToken();
    if (token === undefined) {
      throw new MalformedInputError(`Expected ${what}, reached end of input`);
    }
    const value = parseInteger(token);
    if (value === undefined) {
      throw new MalformedInputError(`Expected ${what} to be an integer, got '${token}'`, token);
    }
    return value;
  }

  /**
   * Next token as a non-negative count.
   *
   * @throws MalformedInputError at end of input or when the token is not a non-negative integer
   */
  nextCount(what: string): number {
    const value = this.nextInteger(what);
    if (value < 0) {
      throw new MalformedInputError(`Expected ${what} to be non-negative, got ${value}`, String(value));
    }
    return value;
  }

  /**
   * Next token, required.
   *
   * @throws MalformedInputError at end of input
   */
  requireToken(what: string): string {
    const token = this.nextToken();
    if (token === undefined) {
      throw new MalformedInputError(`Expected ${what}, reached end of input`);
    }
    return token;
  }
}
