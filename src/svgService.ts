import fs from 'fs';
import * as cheerio from 'cheerio';
import type { ViewBox, PhysicalUnit } from './pipeline/types';
import { UnitResolutionError, ExternalToolError } from './errors';

const MM_PER_UNIT: Record<PhysicalUnit, number> = { mm: 1, cm: 10, in: 25.4 };

const LENGTH_RE = /^\s*([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*([a-z%]*)\s*$/i;

export type PhysicalLength = { value: number; unit: PhysicalUnit };

function isPhysicalUnit(u: string): u is PhysicalUnit {
  return u === 'mm' || u === 'cm' || u === 'in';
}

export function parseViewBox(attr: string | undefined): ViewBox | null {
  if (!attr) return null;
  const parts = attr.trim().split(/[\s,]+/).map(Number);
  if (parts.length !== 4 || !parts.every(Number.isFinite)) return null;
  return [parts[0], parts[1], parts[2], parts[3]];
}

export function parsePhysicalLength(attr: string | undefined): PhysicalLength {
  if (!attr) throw new UnitResolutionError('Declared width is missing');
  const m = attr.match(LENGTH_RE);
  if (!m) throw new UnitResolutionError(`Unparsable length "${attr}"`);
  const unit = m[2].toLowerCase();
  if (!isPhysicalUnit(unit)) {
    throw new UnitResolutionError(unit ? `Unsupported unit "${unit}" in "${attr}"` : `No physical unit in "${attr}"`);
  }
  return { value: Number(m[1]), unit };
}

export function toMillimetres(length: PhysicalLength): number {
  return length.value * MM_PER_UNIT[length.unit];
}

export function fromMillimetres(mm: number, unit: PhysicalUnit): number {
  return mm / MM_PER_UNIT[unit];
}

/** Viewport units per millimetre of the rendered sheet. */
export function measureScale(declaredWidth: string | undefined, viewBox: ViewBox | null): number {
  const mm = toMillimetres(parsePhysicalLength(declaredWidth));
  if (!(mm > 0)) throw new UnitResolutionError(`Declared width "${declaredWidth}" is not positive`);
  if (!viewBox || !(viewBox[2] > 0)) throw new UnitResolutionError('viewBox is missing or has no width');
  return viewBox[2] / mm;
}

export function resolveScale(
  declaredWidth: string | undefined,
  viewBox: ViewBox | null,
  onFallback?: (error: UnitResolutionError) => void,
): number {
  try {
    return measureScale(declaredWidth, viewBox);
  } catch (e) {
    if (!(e instanceof UnitResolutionError)) throw e;
    onFallback?.(e);
    return 1.0;
  }
}

export function formatNumber(n: number): string {
  return String(Number(n.toFixed(6)));
}

export type Viewport = { viewBox: ViewBox; width: number; height: number; unit: PhysicalUnit };

/**
 * Parsed output of the renderer. Never mutated; every crop serializes
 * its own clone of the root element.
 */
export class RenderedSvg {
  private readonly $: cheerio.CheerioAPI;

  readonly width: string | undefined;
  readonly height: string | undefined;
  readonly viewBox: ViewBox | null;

  private constructor($: cheerio.CheerioAPI) {
    this.$ = $;
    const root = this.rootElement();
    this.width = root.attr('width');
    this.height = root.attr('height');
    this.viewBox = parseViewBox(root.attr('viewBox'));
  }

  static parse(text: string): RenderedSvg {
    const $ = cheerio.load(text, { xml: true });
    if ($.root().children('svg').length === 0) {
      throw new ExternalToolError('renderer', 'Rendered file has no <svg> root element');
    }
    return new RenderedSvg($);
  }

  /** Unit the sheet declares its width in, or null when none is recognized. */
  get unit(): PhysicalUnit | null {
    try {
      return parsePhysicalLength(this.width).unit;
    } catch (e) {
      if (e instanceof UnitResolutionError) return null;
      throw e;
    }
  }

  scale(onFallback?: (error: UnitResolutionError) => void): number {
    return resolveScale(this.width, this.viewBox, onFallback);
  }

  withViewport(viewport: Viewport): string {
    const clone = this.rootElement().clone();
    clone.attr('viewBox', viewport.viewBox.map(formatNumber).join(' '));
    clone.attr('width', `${formatNumber(viewport.width)}${viewport.unit}`);
    clone.attr('height', `${formatNumber(viewport.height)}${viewport.unit}`);
    return this.$.xml(clone);
  }

  toString(): string {
    return this.$.xml();
  }

  private rootElement() {
    return this.$.root().children('svg').first();
  }
}

export function loadRenderedSvg(text: string): RenderedSvg {
  return RenderedSvg.parse(text);
}

export function readRenderedSvg(file: string): RenderedSvg {
  return RenderedSvg.parse(fs.readFileSync(file, 'utf8'));
}
