import { describe, it, expect, vi } from 'vitest';
import { parseViewBox, parsePhysicalLength, measureScale, resolveScale, loadRenderedSvg, formatNumber } from './svgService';
import { UnitResolutionError, ExternalToolError } from './errors';

const SHEET_SVG = [
  '<?xml version="1.0" standalone="no"?>',
  '<svg xmlns="http://www.w3.org/2000/svg" width="100mm" height="75mm" viewBox="0 0 4000 3000" version="1.1">',
  '<rect x="0" y="0" width="10" height="10"/>',
  '</svg>',
].join('\n');

describe('parseViewBox', () => {
  it('reads space or comma separated numbers', () => {
    expect(parseViewBox('0 0 4000 3000')).toEqual([0, 0, 4000, 3000]);
    expect(parseViewBox(' -5,2.5, 10 ,10 ')).toEqual([-5, 2.5, 10, 10]);
  });

  it('rejects anything else', () => {
    expect(parseViewBox(undefined)).toBeNull();
    expect(parseViewBox('0 0 10')).toBeNull();
    expect(parseViewBox('0 0 a 10')).toBeNull();
  });
});

describe('parsePhysicalLength', () => {
  it('splits value and unit', () => {
    expect(parsePhysicalLength('297mm')).toEqual({ value: 297, unit: 'mm' });
    expect(parsePhysicalLength('11.7 in')).toEqual({ value: 11.7, unit: 'in' });
  });

  it('rejects missing or unknown units', () => {
    expect(() => parsePhysicalLength('100')).toThrow('No physical unit in "100"');
    expect(() => parsePhysicalLength('100px')).toThrow('Unsupported unit "px" in "100px"');
    expect(() => parsePhysicalLength('wide')).toThrow(UnitResolutionError);
  });
});

describe('resolveScale', () => {
  it('divides the viewBox width by the physical width', () => {
    expect(resolveScale('100mm', [0, 0, 4000, 3000])).toBe(40);
    expect(resolveScale('10cm', [0, 0, 4000, 3000])).toBe(40);
    expect(resolveScale('4in', [0, 0, 1016, 800])).toBeCloseTo(10, 9);
  });

  it('falls back to 1.0 without a unit suffix', () => {
    const onFallback = vi.fn();
    expect(resolveScale('100', [0, 0, 4000, 3000], onFallback)).toBe(1);
    expect(onFallback).toHaveBeenCalledTimes(1);
    expect(onFallback.mock.calls[0][0]).toBeInstanceOf(UnitResolutionError);
  });

  it('falls back to 1.0 for missing attributes', () => {
    expect(resolveScale(undefined, [0, 0, 4000, 3000])).toBe(1);
    expect(resolveScale('100mm', null)).toBe(1);
    expect(resolveScale('0mm', [0, 0, 4000, 3000])).toBe(1);
  });

  it('measureScale throws instead of falling back', () => {
    expect(() => measureScale('100px', [0, 0, 4000, 3000])).toThrow(UnitResolutionError);
  });
});

describe('formatNumber', () => {
  it('drops float noise and trailing zeros', () => {
    expect(formatNumber(0.1 + 0.2)).toBe('0.3');
    expect(formatNumber(320)).toBe('320');
    expect(formatNumber(-0)).toBe('0');
  });
});

describe('RenderedSvg', () => {
  it('exposes the root attributes', () => {
    const svg = loadRenderedSvg(SHEET_SVG);
    expect(svg.width).toBe('100mm');
    expect(svg.height).toBe('75mm');
    expect(svg.viewBox).toEqual([0, 0, 4000, 3000]);
    expect(svg.unit).toBe('mm');
    expect(svg.scale()).toBe(40);
  });

  it('reports no unit for a unitless width', () => {
    const svg = loadRenderedSvg('<svg xmlns="http://www.w3.org/2000/svg" width="1000" viewBox="0 0 1000 500"></svg>');
    expect(svg.unit).toBeNull();
    expect(svg.scale()).toBe(1);
  });

  it('serializes a clone with a new viewport and leaves the template alone', () => {
    const svg = loadRenderedSvg(SHEET_SVG);
    const out = svg.withViewport({ viewBox: [320, 360, 160, 80], width: 4, height: 2, unit: 'mm' });

    const crop = loadRenderedSvg(out);
    expect(crop.viewBox).toEqual([320, 360, 160, 80]);
    expect(crop.width).toBe('4mm');
    expect(crop.height).toBe('2mm');
    expect(out).toContain('<rect');

    expect(svg.viewBox).toEqual([0, 0, 4000, 3000]);
    expect(loadRenderedSvg(svg.toString()).viewBox).toEqual([0, 0, 4000, 3000]);
  });

  it('rejects a document without an svg root', () => {
    expect(() => loadRenderedSvg('<html><body/></html>')).toThrow(ExternalToolError);
  });
});
