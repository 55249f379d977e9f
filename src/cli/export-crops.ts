#!/usr/bin/env node
/*
 Export the area under every text box of a KiCad schematic as a PNG.
 Usage: npm run export-crops -- <file.kicad_sch> [--output <dir>] [--supersample <n>] [--list]

 Example:
   npm run export-crops -- board.kicad_sch
   npm run export-crops -- board.kicad_sch --output docs/figures --supersample 2
*/

import fs from 'fs';
import path from 'path';
import { loadEnvFile, loadConfig, parseSupersample } from '../config';
import { createLogger } from '../utils/logger';
import { analyzeSchematic, runExport } from '../pipeline/run';
import { renderSchematicSvg } from '../renderService';
import { createSharpRasterizer } from '../imageService';
import { errorMessage } from '../errors';

type Args = {
  input: string | null;
  output: string | null;
  supersample: number | null;
  list: boolean;
};

function parseArgs(argv: string[]): Args {
  let input: string | null = null;
  let output: string | null = null;
  let supersample: number | null = null;
  let list = false;

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--output' || arg === '-o') {
      output = argv[++i] || null;
    } else if (arg === '--supersample' || arg === '-s') {
      supersample = parseSupersample(argv[++i]);
    } else if (arg === '--list') {
      list = true;
    } else if (!input) {
      input = arg;
    }
  }

  return { input, output, supersample, list };
}

function resolvePath(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
}

async function main() {
  const args = parseArgs(process.argv);
  if (!args.input) {
    console.error('Usage: npm run export-crops -- <file.kicad_sch> [--output <dir>] [--supersample <n>] [--list]');
    process.exit(1);
  }

  const inputPath = resolvePath(args.input);
  if (!fs.existsSync(inputPath)) {
    console.error(`Error: File '${inputPath}' not found.`);
    process.exit(1);
  }

  loadEnvFile();
  const config = loadConfig();
  const logger = createLogger({ dir: config.logDir, level: config.logLevel });

  if (args.list) {
    const regions = analyzeSchematic(fs.readFileSync(inputPath, 'utf8'), { logger });
    console.log(JSON.stringify(regions, null, 2));
    return;
  }

  const baseName = path.basename(inputPath, path.extname(inputPath));
  const outputDir = args.output ? resolvePath(args.output) : path.join(process.cwd(), `${baseName}_pngs`);

  console.log(`Analyzing ${inputPath}...`);
  try {
    const result = await runExport(
      {
        inputPath,
        outputDir,
        supersample: args.supersample ?? config.supersample,
        debugDir: config.debug ? config.debugDir : null,
      },
      {
        render: (cleanPath, tempDir) => renderSchematicSvg(cleanPath, tempDir, { cli: config.kicadCli }),
        rasterizer: createSharpRasterizer(outputDir),
        logger,
        onProgress: (line) => console.log(`   ${line}`),
      },
    );
    if (!result.regions.length) {
      console.log('No text boxes found, nothing to do.');
      return;
    }
    console.log(`   Success! ${result.crops.length} PNGs saved to: ${outputDir}/`);
  } catch (e) {
    logger.error('export failed', e);
    throw e;
  }
}

main().catch((err) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
