#!/usr/bin/env node
/*
 Compare two directories of exported crops, file by file.
 Usage: npm run diff-crops -- <reference-dir> <candidate-dir> [--threshold <pct>] [--diff-dir <dir>]

 Example:
   npm run diff-crops -- docs/figures board_pngs
   npm run diff-crops -- docs/figures board_pngs --threshold 0.5 --diff-dir debug/diff
*/

import path from 'path';
import { compareCropDirs } from '../utils/pngDiff';
import { errorMessage } from '../errors';

type Args = {
  reference: string | null;
  candidate: string | null;
  thresholdPercent: number;
  maxSizeDeltaPercent: number;
  diffDir: string | null;
};

function parseArgs(argv: string[]): Args {
  let reference: string | null = null;
  let candidate: string | null = null;
  let thresholdPercent = 1;
  let maxSizeDeltaPercent = 2.5;
  let diffDir: string | null = null;

  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--threshold') { thresholdPercent = Number(argv[++i] || '1'); continue; }
    if (a === '--size-tolerance-percent') { maxSizeDeltaPercent = Number(argv[++i] || '2.5'); continue; }
    if (a === '--diff-dir') { diffDir = argv[++i] || null; continue; }
    if (!reference) reference = a;
    else if (!candidate) candidate = a;
  }

  return { reference, candidate, thresholdPercent, maxSizeDeltaPercent, diffDir };
}

function resolvePath(filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
}

async function main() {
  const args = parseArgs(process.argv);
  if (!args.reference || !args.candidate) {
    console.error('Usage: npm run diff-crops -- <reference-dir> <candidate-dir> [--threshold <pct>] [--diff-dir <dir>]');
    process.exit(1);
  }

  const results = compareCropDirs(resolvePath(args.reference), resolvePath(args.candidate), {
    thresholdPercent: args.thresholdPercent,
    maxSizeDeltaPercent: args.maxSizeDeltaPercent,
    diffDir: args.diffDir ? resolvePath(args.diffDir) : null,
  });
  if (!results.length) {
    console.error('No PNG files found in either directory');
    process.exit(1);
  }

  for (const r of results) {
    if (r.passed) {
      console.log(`- ${r.name} ... OK (${r.stats ? r.stats.diffPercent.toFixed(2) : 'n/a'}%)`);
    } else {
      console.log(`- ${r.name} ... FAIL${r.stats ? ` (${r.stats.diffPercent.toFixed(2)}%)` : ''}${r.error ? ` - ${r.error}` : ''}`);
    }
  }

  const passed = results.filter(r => r.passed).length;
  console.log('');
  console.log(`Summary: ${passed}/${results.length} passed, ${results.length - passed} failed`);
  process.exit(passed === results.length ? 0 : 1);
}

main().catch((err) => {
  console.error(`Error: ${errorMessage(err)}`);
  process.exit(1);
});
