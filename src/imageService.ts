import path from 'path';
import fs from 'fs';
import sharp from 'sharp';
import type { CropRequest, Rasterizer } from './pipeline/types';

// sharp renders SVG at 72 DPI unless told otherwise; CSS pixels assume 96.
export const BASE_DENSITY = 96;

export function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function createSharpRasterizer(outDir: string): Rasterizer {
  return {
    async rasterize(request: CropRequest): Promise<string> {
      ensureDir(outDir);
      const file = path.join(outDir, request.fileName);
      await sharp(Buffer.from(request.svg, 'utf8'), { density: BASE_DENSITY * request.supersample })
        .png()
        .toFile(file);
      return file;
    },
  };
}
