import { describe, it, expect, vi } from 'vitest';
import { parse } from './sexpr';
import { extractRegions, resolveTopLeft } from './regions';
import { MissingFieldError } from '../errors';

function sheet(body: string): string {
  return `(kicad_sch (version 20231120) (generator "eeschema")\n${body}\n)`;
}

describe('resolveTopLeft', () => {
  it('treats a centered anchor as the rectangle middle', () => {
    expect(resolveTopLeft(10, 10, 4, 2, { left: false, top: false })).toEqual({ x: 8, y: 9 });
  });

  it('treats a left/top anchor as the corner', () => {
    expect(resolveTopLeft(10, 10, 4, 2, { left: true, top: true })).toEqual({ x: 10, y: 10 });
  });
});

describe('extractRegions', () => {
  it('resolves anchors for each justification mode', () => {
    const doc = sheet(`
  (text_box "both" (at 10 10 0) (size 4 2) (effects (font (size 1.27 1.27)) (justify left top)))
  (text_box "none" (at 10 10 0) (size 4 2))
  (text_box "left" (at 10 10 0) (size 4 2) (effects (justify left)))
  (text_box "top" (at 10 10 0) (size 4 2) (effects (justify top)))
  (text_box "right" (at 10 10 0) (size 4 2) (effects (justify right bottom)))`);
    expect(extractRegions(parse(doc))).toEqual([
      { label: 'both', x: 10, y: 10, width: 4, height: 2 },
      { label: 'none', x: 8, y: 9, width: 4, height: 2 },
      { label: 'left', x: 10, y: 9, width: 4, height: 2 },
      { label: 'top', x: 8, y: 10, width: 4, height: 2 },
      { label: 'right', x: 8, y: 9, width: 4, height: 2 },
    ]);
  });

  it('keeps document order and duplicate labels', () => {
    const doc = sheet(`
  (text_box "B" (at 0 0) (size 2 2))
  (wire (pts (xy 0 0) (xy 1 1)))
  (text_box "A" (at 5 5) (size 2 2))
  (text_box "B" (at 9 9) (size 2 2))`);
    expect(extractRegions(parse(doc)).map(r => r.label)).toEqual(['B', 'A', 'B']);
  });

  it('takes the label from the first string child', () => {
    const doc = sheet('(text_box (uuid 1) "Power (5V)" (at 3 4) (size 2 2))');
    expect(extractRegions(parse(doc))[0].label).toBe('Power (5V)');
  });

  it('skips entries with missing or invalid fields and reports them', () => {
    const onSkip = vi.fn();
    const doc = sheet(`
  (text_box "no-at" (size 4 2))
  (text_box "bad-size" (at 1 1) (size four 2))
  (text_box (at 1 1) (size 4 2))
  (text_box "flat" (at 1 1) (size 4 0))
  (text_box "ok" (at 1 1) (size 4 2))`);
    const regions = extractRegions(parse(doc), { onSkip });
    expect(regions).toEqual([{ label: 'ok', x: -1, y: 0, width: 4, height: 2 }]);
    expect(onSkip).toHaveBeenCalledTimes(4);
    const errors = onSkip.mock.calls.map(call => call[0]);
    expect(errors.every(e => e instanceof MissingFieldError)).toBe(true);
    expect(errors.map(e => [e.field, e.index])).toEqual([['at', 1], ['size', 2], ['label', 3], ['size', 4]]);
    expect(errors[0].message).toBe('Region #1 skipped: missing (at ...)');
  });

  it('returns nothing for another document kind', () => {
    const doc = '(kicad_pcb (text_box "x" (at 1 1) (size 2 2)))';
    expect(extractRegions(parse(doc))).toEqual([]);
    expect(extractRegions(parse(doc), { documentKind: 'kicad_pcb' })).toHaveLength(1);
  });

  it('returns nothing for a non-list root', () => {
    expect(extractRegions(parse('kicad_sch'))).toEqual([]);
  });

  it('only looks at direct children of the root', () => {
    const doc = sheet('(sheet (text_box "nested" (at 1 1) (size 2 2)))');
    expect(extractRegions(parse(doc))).toEqual([]);
  });

  it('supports another construct name', () => {
    const doc = sheet('(label_box "L" (at 4 4) (size 2 2) (effects (justify left top)))');
    expect(extractRegions(parse(doc), { construct: 'label_box' })).toEqual([
      { label: 'L', x: 4, y: 4, width: 2, height: 2 },
    ]);
  });

  it('returns frozen values', () => {
    const [region] = extractRegions(parse(sheet('(text_box "x" (at 1 1) (size 2 2))')));
    expect(Object.isFrozen(region)).toBe(true);
  });
});
