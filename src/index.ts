export { tokenize, parse, serialize, isList, headOf, findChild, atomValues } from './pipeline/sexpr';
export { extractRegions, resolveTopLeft, readJustify, DEFAULT_DOCUMENT_KIND, DEFAULT_REGION_CONSTRUCT } from './pipeline/regions';
export type { ExtractOptions, Justify } from './pipeline/regions';
export { elide } from './pipeline/elide';
export { planCrops, exportCrops, toViewBox, DEFAULT_SUPERSAMPLE } from './pipeline/crop';
export type { PlanOptions, ExportOptions } from './pipeline/crop';
export { analyzeSchematic, runExport, cleanSchematicPath } from './pipeline/run';
export type { RunOptions, RunDeps, RunResult } from './pipeline/run';
export { RenderedSvg, loadRenderedSvg, readRenderedSvg, resolveScale, measureScale, parseViewBox, parsePhysicalLength } from './svgService';
export { createSharpRasterizer, BASE_DENSITY } from './imageService';
export { renderSchematicSvg, execRunner } from './renderService';
export type { ProcessRunner, ProcessResult, RenderOptions } from './renderService';
export { sanitizeLabel, assignFileNames } from './utils/labels';
export { diffPng, compareCropDirs } from './utils/pngDiff';
export { loadConfig, loadEnvFile } from './config';
export type { Config } from './config';
export { createLogger } from './utils/logger';
export type { Logger, LogSink, Level } from './utils/logger';
export * from './errors';
export type { SNode, AtomNode, StringNode, ListNode, Token, Region, ViewBox, PhysicalUnit, CropRequest, CropResult, Rasterizer } from './pipeline/types';
