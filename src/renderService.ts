import fs from 'fs';
import path from 'path';
import { execFile } from 'child_process';
import { ExternalToolError, errorMessage } from './errors';

export type ProcessResult = { code: number; signal?: string | null; stdout: string; stderr: string };
export type ProcessRunner = (command: string, args: string[]) => Promise<ProcessResult>;

type ExecError = Error & { code?: string | number | null; signal?: string | null };
type ExecCallback = (error: ExecError | null, stdout: string | Buffer, stderr: string | Buffer) => void;
export type ExecFileFn = (command: string, args: string[], options: { maxBuffer: number }, callback: ExecCallback) => unknown;

export const DEFAULT_KICAD_CLI = 'kicad-cli';

const defaultExecFile: ExecFileFn = (command, args, options, callback) => execFile(command, args, options, callback);

/**
 * Wraps `execFile` as a `ProcessRunner`. Non-zero exits and signals resolve
 * as results; only a process that never started rejects.
 */
export function createExecRunner(exec: ExecFileFn = defaultExecFile): ProcessRunner {
  return (command, args) =>
    new Promise((resolve, reject) => {
      exec(command, args, { maxBuffer: 16 * 1024 * 1024 }, (error, stdout, stderr) => {
        const output = { stdout: String(stdout), stderr: String(stderr) };
        if (!error) {
          resolve({ code: 0, ...output });
        } else if (typeof error.code === 'number') {
          resolve({ code: error.code, ...output });
        } else if (error.signal) {
          resolve({ code: 1, signal: error.signal, ...output });
        } else {
          reject(error);
        }
      });
    });
}

export const execRunner: ProcessRunner = createExecRunner();

export type RenderOptions = {
  cli?: string;
  run?: ProcessRunner;
};

export function exportSvgArgs(inputPath: string, outDir: string): string[] {
  return ['sch', 'export', 'svg', '-n', '--output', outDir, inputPath];
}

function pickSvg(outDir: string, inputPath: string): string | null {
  const svgs = fs.readdirSync(outDir).filter(f => f.toLowerCase().endsWith('.svg')).sort();
  if (!svgs.length) return null;
  // Hierarchical schematics produce one file per sheet; the root sheet carries the input's name.
  const rootName = `${path.basename(inputPath, path.extname(inputPath))}.svg`;
  return path.join(outDir, svgs.includes(rootName) ? rootName : svgs[0]);
}

/** Renders a schematic to SVG in `outDir` and returns the root sheet's file. */
export async function renderSchematicSvg(inputPath: string, outDir: string, options: RenderOptions = {}): Promise<string> {
  const cli = options.cli || DEFAULT_KICAD_CLI;
  const run = options.run || execRunner;
  fs.mkdirSync(outDir, { recursive: true });

  let result: ProcessResult;
  try {
    result = await run(cli, exportSvgArgs(inputPath, outDir));
  } catch (e) {
    throw new ExternalToolError('renderer', `Failed to start ${cli}`, errorMessage(e), e);
  }
  if (result.code !== 0) {
    const reason = result.signal ? `was killed by ${result.signal}` : `exited with code ${result.code}`;
    throw new ExternalToolError('renderer', `${cli} ${reason}`, (result.stderr || result.stdout).trim());
  }

  const svg = pickSvg(outDir, inputPath);
  if (!svg) throw new ExternalToolError('renderer', 'No SVG file generated', result.stderr.trim());
  return svg;
}
