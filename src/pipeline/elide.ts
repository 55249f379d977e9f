import { StructuralError, positionAt } from '../errors';

// Atoms run until whitespace or a parenthesis; a quote inside one is literal.
const BREAK_RE = /[\s()]/;

function isBreak(ch: string): boolean {
  return BREAK_RE.test(ch);
}

function atomEnd(text: string, start: number): number {
  let j = start;
  while (j < text.length && !isBreak(text[j])) j++;
  return j;
}

/**
 * Index past the closing quote of the string opened at `start`. A quote
 * that is never closed starts an atom instead, as in the tokenizer.
 */
function stringEnd(text: string, start: number): number {
  for (let j = start + 1; j < text.length; j++) {
    if (text[j] === '\\') j++;
    else if (text[j] === '"') return j + 1;
  }
  return atomEnd(text, start);
}

/**
 * Returns the index just past the parenthesis that closes the expression
 * opened at `start`. Tokens are scanned the way the parser scans them, so
 * parentheses inside string literals are ignored.
 */
function skipExpression(text: string, start: number): number {
  let balance = 1;
  let j = start + 1;
  while (j < text.length) {
    const ch = text[j];
    if (ch === '(') {
      balance++;
      j++;
    } else if (ch === ')') {
      balance--;
      j++;
      if (balance === 0) return j;
    } else if (ch === '"') {
      j = stringEnd(text, j);
    } else if (isBreak(ch)) {
      j++;
    } else {
      j = atomEnd(text, j);
    }
  }
  throw new StructuralError('Unclosed expression', positionAt(text, start));
}

/**
 * Removes every `(constructName ...)` expression, nested ones included,
 * and copies all other text through unchanged.
 */
export function elide(text: string, constructName: string): string {
  if (!constructName || /[\s()"]/.test(constructName)) {
    throw new Error(`Invalid construct name: ${JSON.stringify(constructName)}`);
  }
  const marker = `(${constructName}`;
  const parts: string[] = [];
  let copyFrom = 0;
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '(') {
      const nameEnd = i + marker.length;
      if (text.startsWith(marker, i) && (nameEnd >= text.length || isBreak(text[nameEnd]))) {
        const end = skipExpression(text, i);
        parts.push(text.slice(copyFrom, i));
        copyFrom = end;
        i = end;
      } else {
        i++;
      }
    } else if (ch === '"') {
      i = stringEnd(text, i);
    } else if (isBreak(ch)) {
      i++;
    } else {
      i = atomEnd(text, i);
    }
  }
  parts.push(text.slice(copyFrom));
  return parts.join('');
}
