import type { Region, CropRequest, CropResult, Rasterizer, ViewBox } from './types';
import type { RenderedSvg } from '../svgService';
import { fromMillimetres } from '../svgService';
import { assignFileNames } from '../utils/labels';
import { ExternalToolError, errorMessage } from '../errors';

// 4x over 96 DPI, i.e. 384 DPI output.
export const DEFAULT_SUPERSAMPLE = 4;

export type PlanOptions = {
  supersample?: number;
  onDuplicate?: (label: string, fileName: string) => void;
};

export type ExportOptions = PlanOptions & {
  onCrop?: (result: CropResult) => void;
};

export function toViewBox(region: Region, scale: number): ViewBox {
  return [region.x * scale, region.y * scale, region.width * scale, region.height * scale];
}

export function planCrops(svg: RenderedSvg, regions: Region[], scale: number, options: PlanOptions = {}): CropRequest[] {
  const supersample = options.supersample ?? DEFAULT_SUPERSAMPLE;
  if (!(supersample > 0)) throw new RangeError(`supersample must be positive, got ${supersample}`);
  const unit = svg.unit ?? 'mm';
  const fileNames = assignFileNames(regions.map(r => r.label), 'png', options.onDuplicate);

  return regions.map((region, i) => {
    const viewBox = toViewBox(region, scale);
    const width = fromMillimetres(region.width, unit);
    const height = fromMillimetres(region.height, unit);
    return {
      label: region.label,
      fileName: fileNames[i],
      viewBox,
      width,
      height,
      unit,
      svg: svg.withViewport({ viewBox, width, height, unit }),
      supersample,
    };
  });
}

/**
 * One rasterizer call per region, in order. Outputs already written stay
 * on disk when a later call fails.
 */
export async function exportCrops(
  svg: RenderedSvg,
  regions: Region[],
  scale: number,
  rasterizer: Rasterizer,
  options: ExportOptions = {},
): Promise<CropResult[]> {
  const results: CropResult[] = [];
  for (const request of planCrops(svg, regions, scale, options)) {
    let output: string;
    try {
      output = await rasterizer.rasterize(request);
    } catch (e) {
      if (e instanceof ExternalToolError) throw e;
      throw new ExternalToolError('rasterizer', `Failed to rasterize "${request.label}"`, errorMessage(e), e);
    }
    const result: CropResult = { label: request.label, request, output };
    results.push(result);
    options.onCrop?.(result);
  }
  return results;
}
