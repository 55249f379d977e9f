import type { SNode, ListNode, Region } from './types';
import { isList, headOf, findChild, atomValues } from './sexpr';
import { MissingFieldError } from '../errors';
import type { RegionField } from '../errors';

export const DEFAULT_DOCUMENT_KIND = 'kicad_sch';
export const DEFAULT_REGION_CONSTRUCT = 'text_box';

export type ExtractOptions = {
  documentKind?: string;
  construct?: string;
  onSkip?: (error: MissingFieldError) => void;
};

export type Justify = { left: boolean; top: boolean };

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

function toNumber(node: SNode | undefined): number | null {
  if (!node || node.type !== 'atom' || !NUMBER_RE.test(node.value)) return null;
  const v = Number(node.value);
  return Number.isFinite(v) ? v : null;
}

function readPair(entry: ListNode, name: 'at' | 'size'): [number, number] | string {
  const list = findChild(entry, name);
  if (!list) return `missing (${name} ...)`;
  const a = toNumber(list.items[1]);
  const b = toNumber(list.items[2]);
  if (a === null || b === null) return `(${name} ...) needs two numeric fields`;
  return [a, b];
}

function firstString(entry: ListNode): string | null {
  for (const item of entry.items.slice(1)) {
    if (item.type === 'string') return item.value;
  }
  return null;
}

export function readJustify(entry: ListNode): Justify {
  const effects = findChild(entry, 'effects');
  const justify = effects ? findChild(effects, 'justify') : undefined;
  const flags = justify ? atomValues(justify) : [];
  return { left: flags.includes('left'), top: flags.includes('top') };
}

// Centered axes describe the rectangle's middle; left/top already give the corner.
export function resolveTopLeft(anchorX: number, anchorY: number, width: number, height: number, justify: Justify): { x: number; y: number } {
  return {
    x: justify.left ? anchorX : anchorX - width / 2,
    y: justify.top ? anchorY : anchorY - height / 2,
  };
}

function toRegion(entry: ListNode, index: number): Region | MissingFieldError {
  const skip = (field: RegionField, detail: string) => new MissingFieldError(field, index, detail);

  const label = firstString(entry);
  if (label === null) return skip('label', 'no text content');

  const at = readPair(entry, 'at');
  if (typeof at === 'string') return skip('at', at);
  const size = readPair(entry, 'size');
  if (typeof size === 'string') return skip('size', size);

  const [width, height] = size;
  if (!(width > 0) || !(height > 0)) return skip('size', `non-positive size ${width}x${height}`);

  const { x, y } = resolveTopLeft(at[0], at[1], width, height, readJustify(entry));
  return Object.freeze({ label, x, y, width, height });
}

export function extractRegions(root: SNode, options: ExtractOptions = {}): Region[] {
  const documentKind = options.documentKind ?? DEFAULT_DOCUMENT_KIND;
  const construct = options.construct ?? DEFAULT_REGION_CONSTRUCT;
  if (!isList(root) || headOf(root) !== documentKind) return [];

  const regions: Region[] = [];
  let index = 0;
  for (const item of root.items.slice(1)) {
    if (!isList(item) || headOf(item) !== construct) continue;
    index++;
    const result = toRegion(item, index);
    if (result instanceof MissingFieldError) {
      options.onSkip?.(result);
      continue;
    }
    regions.push(result);
  }
  return regions;
}
