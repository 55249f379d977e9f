import type { SNode, ListNode, Token } from './types';
import { StructuralError, EmptyInputError, positionAt } from '../errors';

const STRING_RE = /"(?:\\[\s\S]|[^"\\])*"/y;
const SPACE_RE = /\s/;

function isSpace(ch: string): boolean {
  return SPACE_RE.test(ch);
}

function unescapeString(body: string): string {
  return body.replace(/\\([\s\S])/g, '$1');
}

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  const n = text.length;
  let i = 0;
  while (i < n) {
    const ch = text[i];
    if (isSpace(ch)) {
      i++;
      continue;
    }
    if (ch === '(') {
      tokens.push({ type: 'open', offset: i });
      i++;
      continue;
    }
    if (ch === ')') {
      tokens.push({ type: 'close', offset: i });
      i++;
      continue;
    }
    if (ch === '"') {
      STRING_RE.lastIndex = i;
      const m = STRING_RE.exec(text);
      if (m) {
        tokens.push({ type: 'string', value: unescapeString(m[0].slice(1, -1)), offset: i });
        i += m[0].length;
        continue;
      }
      // No closing quote: the run is read as an atom.
    }
    let j = i + 1;
    while (j < n && text[j] !== '(' && text[j] !== ')' && !isSpace(text[j])) j++;
    tokens.push({ type: 'atom', value: text.slice(i, j), offset: i });
    i = j;
  }
  return tokens;
}

type Collector = { items: SNode[]; offset: number };

export function parse(text: string): SNode {
  const outer: Collector = { items: [], offset: -1 };
  const stack: Collector[] = [outer];
  const topLevelOffsets: number[] = [];

  for (const tok of tokenize(text)) {
    const current = stack[stack.length - 1];
    if (tok.type === 'open') {
      stack.push({ items: [], offset: tok.offset });
      continue;
    }
    if (tok.type === 'close') {
      if (current === outer) {
        throw new StructuralError('Unmatched closing parenthesis', positionAt(text, tok.offset));
      }
      stack.pop();
      const parent = stack[stack.length - 1];
      if (parent === outer) topLevelOffsets.push(current.offset);
      parent.items.push({ type: 'list', items: current.items });
      continue;
    }
    if (current === outer) topLevelOffsets.push(tok.offset);
    current.items.push(tok.type === 'string' ? { type: 'string', value: tok.value } : { type: 'atom', value: tok.value });
  }

  if (stack.length > 1) {
    const unclosed = stack[stack.length - 1];
    throw new StructuralError('Unclosed parenthesis', positionAt(text, unclosed.offset));
  }
  if (outer.items.length === 0) throw new EmptyInputError();
  if (outer.items.length > 1) {
    throw new StructuralError('Unexpected expression after document root', positionAt(text, topLevelOffsets[1]));
  }
  return outer.items[0];
}

export function serialize(node: SNode): string {
  switch (node.type) {
    case 'atom':
      return node.value;
    case 'string':
      return `"${node.value.replace(/[\\"]/g, '\\$&')}"`;
    case 'list':
      return `(${node.items.map(serialize).join(' ')})`;
  }
}

export function isList(node: SNode | undefined): node is ListNode {
  return node !== undefined && node.type === 'list';
}

export function headOf(node: SNode | undefined): string | undefined {
  if (!isList(node)) return undefined;
  const first = node.items[0];
  return first && first.type === 'atom' ? first.value : undefined;
}

export function findChild(list: ListNode, name: string): ListNode | undefined {
  for (const item of list.items) {
    if (isList(item) && headOf(item) === name) return item;
  }
  return undefined;
}

export function atomValues(list: ListNode): string[] {
  const out: string[] = [];
  for (const item of list.items.slice(1)) {
    if (item.type === 'atom') out.push(item.value);
  }
  return out;
}
