import fs from 'fs';
import path from 'path';
import { PNG } from 'pngjs';
import pixelmatch from 'pixelmatch';
import { errorMessage } from '../errors';

export type DiffStats = {
  width: number;
  height: number;
  totalPixels: number;
  differentPixels: number;
  diffPercent: number;
  resized: boolean;
};

export type DiffOptions = {
  threshold?: number;
  maxSizeDeltaPercent?: number;
};

export function loadPng(filePath: string): PNG {
  return PNG.sync.read(fs.readFileSync(filePath));
}

export function savePng(png: PNG, filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, PNG.sync.write(png));
}

export function resizeNearest(src: PNG, targetW: number, targetH: number): PNG {
  const dst = new PNG({ width: targetW, height: targetH });
  const sx = src.width / targetW;
  const sy = src.height / targetH;
  for (let y = 0; y < targetH; y++) {
    const syIdx = Math.min(src.height - 1, Math.max(0, Math.floor(y * sy)));
    for (let x = 0; x < targetW; x++) {
      const sxIdx = Math.min(src.width - 1, Math.max(0, Math.floor(x * sx)));
      const si = (syIdx * src.width + sxIdx) * 4;
      const di = (y * targetW + x) * 4;
      dst.data[di] = src.data[si];
      dst.data[di + 1] = src.data[si + 1];
      dst.data[di + 2] = src.data[si + 2];
      dst.data[di + 3] = src.data[si + 3];
    }
  }
  return dst;
}

/**
 * Compares `b` against reference `a`. A size mismatch within
 * `maxSizeDeltaPercent` on both axes is aligned by resizing `b`.
 */
export function diffPng(a: PNG, b: PNG, opts: DiffOptions = {}): { diff: PNG; stats: DiffStats } {
  const maxSizeDeltaPercent = opts.maxSizeDeltaPercent ?? 2.5;
  let other = b;
  let resized = false;

  if (a.width !== b.width || a.height !== b.height) {
    const wPct = a.width > 0 ? (Math.abs(a.width - b.width) / a.width) * 100 : 100;
    const hPct = a.height > 0 ? (Math.abs(a.height - b.height) / a.height) * 100 : 100;
    if (wPct > maxSizeDeltaPercent || hPct > maxSizeDeltaPercent) {
      throw new Error(`images have significantly different dimensions: ${a.width}x${a.height} vs ${b.width}x${b.height} (Δw=${wPct.toFixed(2)}%, Δh=${hPct.toFixed(2)}%)`);
    }
    other = resizeNearest(b, a.width, a.height);
    resized = true;
  }

  const { width, height } = a;
  const diff = new PNG({ width, height });
  const differentPixels = pixelmatch(a.data, other.data, diff.data, width, height, { threshold: opts.threshold ?? 0.15 });
  const totalPixels = width * height;
  const diffPercent = totalPixels > 0 ? (differentPixels / totalPixels) * 100 : 0;
  return { diff, stats: { width, height, totalPixels, differentPixels, diffPercent, resized } };
}

export type CropComparison = {
  name: string;
  passed: boolean;
  stats: DiffStats | null;
  error?: string;
};

export type CompareOptions = DiffOptions & {
  thresholdPercent?: number;
  diffDir?: string | null;
};

function listPngs(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs.readdirSync(dir).filter(f => f.toLowerCase().endsWith('.png'));
}

/** Compares same-named PNGs in a reference and a candidate crop directory. */
export function compareCropDirs(referenceDir: string, candidateDir: string, opts: CompareOptions = {}): CropComparison[] {
  const thresholdPercent = opts.thresholdPercent ?? 1;
  const reference = new Set(listPngs(referenceDir));
  const candidate = new Set(listPngs(candidateDir));
  const names = Array.from(new Set([...reference, ...candidate])).sort();

  return names.map((name): CropComparison => {
    if (!reference.has(name)) return { name, passed: false, stats: null, error: 'missing in reference' };
    if (!candidate.has(name)) return { name, passed: false, stats: null, error: 'missing in candidate' };
    try {
      const { diff, stats } = diffPng(loadPng(path.join(referenceDir, name)), loadPng(path.join(candidateDir, name)), opts);
      if (opts.diffDir) savePng(diff, path.join(opts.diffDir, name));
      return { name, passed: stats.diffPercent <= thresholdPercent, stats };
    } catch (e) {
      return { name, passed: false, stats: null, error: errorMessage(e) };
    }
  });
}
