import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Region, Rasterizer, CropResult } from './types';
import { parse } from './sexpr';
import { extractRegions, DEFAULT_REGION_CONSTRUCT } from './regions';
import { elide } from './elide';
import { exportCrops } from './crop';
import { readRenderedSvg } from '../svgService';
import { formatSvg } from '../utils/format';
import type { LogSink } from '../utils/logger';

export type AnalyzeOptions = {
  construct?: string;
  logger?: LogSink;
};

export function analyzeSchematic(text: string, options: AnalyzeOptions = {}): Region[] {
  const root = parse(text);
  return extractRegions(root, {
    construct: options.construct,
    onSkip: (err) => options.logger?.warn(err.message, { field: err.field, index: err.index }),
  });
}

export function cleanSchematicPath(inputPath: string): string {
  const base = path.basename(inputPath, path.extname(inputPath));
  return path.join(path.dirname(inputPath), `${base}_clean_temp${path.extname(inputPath)}`);
}

export type RunOptions = {
  inputPath: string;
  outputDir: string;
  supersample?: number;
  construct?: string;
  debugDir?: string | null;
};

export type RunDeps = {
  render: (cleanPath: string, tempDir: string) => Promise<string>;
  rasterizer: Rasterizer;
  logger: LogSink;
  onProgress?: (line: string) => void;
};

export type RunResult = { regions: Region[]; crops: CropResult[]; scale: number | null };

function writeDebugFile(dir: string | null | undefined, name: string, contents: string) {
  if (!dir) return;
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(path.join(dir, name), contents, 'utf8');
}

/**
 * Parses, elides, renders and crops one schematic. The clean copy and
 * the render directory are removed however the run ends.
 */
export async function runExport(options: RunOptions, deps: RunDeps): Promise<RunResult> {
  const { logger } = deps;
  const progress = deps.onProgress || (() => undefined);
  const construct = options.construct || DEFAULT_REGION_CONSTRUCT;

  const content = fs.readFileSync(options.inputPath, 'utf8');
  const regions = analyzeSchematic(content, { construct, logger });
  logger.info('regions extracted', { input: options.inputPath, count: regions.length });
  progress(`Found ${regions.length} text boxes.`);
  if (!regions.length) return { regions, crops: [], scale: null };

  const cleaned = elide(content, construct);
  writeDebugFile(options.debugDir, 'clean.kicad_sch', cleaned);

  const cleanPath = cleanSchematicPath(options.inputPath);
  let tempDir: string | null = null;
  try {
    fs.writeFileSync(cleanPath, cleaned, 'utf8');
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sheetcrop-'));

    const svgPath = await deps.render(cleanPath, tempDir);
    logger.info('schematic rendered', { svg: svgPath });

    const svg = readRenderedSvg(svgPath);
    const scale = svg.scale((err) => logger.warn('scale fallback to 1.0', err));
    logger.debug('scale resolved', { scale, width: svg.width, viewBox: svg.viewBox });

    const crops = await exportCrops(svg, regions, scale, deps.rasterizer, {
      supersample: options.supersample,
      onDuplicate: (label, fileName) => logger.warn('duplicate label renamed', { label, fileName }),
      onCrop: (result) => {
        writeDebugFile(options.debugDir, result.request.fileName.replace(/\.png$/, '.svg'), formatSvg(result.request.svg));
        progress(`Generated PNG: ${result.output}`);
      },
    });
    return { regions, crops, scale };
  } finally {
    fs.rmSync(cleanPath, { force: true });
    if (tempDir) fs.rmSync(tempDir, { recursive: true, force: true });
  }
}
