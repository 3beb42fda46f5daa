#!/usr/bin/env ts-node
/**
 * Solve a sliding-block puzzle from a JSON definition and print the result.
 *
 * Usage:
 *   npx ts-node scripts/solve-puzzle.ts [options]
 *
 * Options:
 *   --puzzle=path      Puzzle definition (default: PUZZLE_FILE or puzzles/rush-hour-6x6.json)
 *   --max-plies=N      Give up after N plies (default: SOLVER_MAX_PLIES, else unbounded)
 *   --verbose          Print every move of the solution
 *   --help             Show this message
 *
 * Without a ply ceiling an unsolvable puzzle, or one whose start position is
 * already won, keeps the search running until it is interrupted.
 */

import { config } from '../src/node/config';
import { loadPuzzleFile } from '../src/node/puzzles/puzzleDefinition';
import { formatSolverReport, runSolver } from '../src/node/solverService';
import { isEngineError } from '../src/shared/engine';

export interface CliArgs {
  puzzlePath: string;
  verbose: boolean;
  maxPlies?: number;
  help: boolean;
}

export function parseArgs(argv: string[], defaultPuzzlePath: string): CliArgs | null {
  const args: CliArgs = {
    puzzlePath: defaultPuzzlePath,
    verbose: false,
    help: false,
  };

  for (const arg of argv) {
    if (arg === '--verbose') {
      args.verbose = true;
    } else if (arg === '--help') {
      args.help = true;
    } else if (arg.startsWith('--puzzle=')) {
      const value = arg.slice('--puzzle='.length);
      if (!value) {
        console.error('Missing value for --puzzle');
        return null;
      }
      args.puzzlePath = value;
    } else if (arg.startsWith('--max-plies=')) {
      const value = Number(arg.slice('--max-plies='.length));
      if (!Number.isInteger(value) || value <= 0) {
        console.error(`Invalid --max-plies value: ${arg.slice('--max-plies='.length)}`);
        return null;
      }
      args.maxPlies = value;
    } else {
      console.warn(`Ignoring unknown flag: ${arg}`);
    }
  }

  return args;
}

function printUsage(): void {
  console.log(`
Sliding-block puzzle solver

Usage:
  npx ts-node scripts/solve-puzzle.ts [options]

Options:
  --puzzle=path      Puzzle definition (default: ${config.solver.puzzleFile})
  --max-plies=N      Give up after N plies (default: unbounded)
  --verbose          Print every move of the solution
  --help             Show this message
`);
}

export function main(argv: string[] = process.argv.slice(2)): number {
  const args = parseArgs(argv, config.solver.puzzleFile);
  if (!args) {
    printUsage();
    return 1;
  }
  if (args.help) {
    printUsage();
    return 0;
  }

  try {
    const puzzle = loadPuzzleFile(args.puzzlePath);
    const report = runSolver(puzzle.board, { name: puzzle.name, maxPlies: args.maxPlies });
    for (const line of formatSolverReport(report, args.verbose)) {
      console.log(line);
    }
    return 0;
  } catch (err) {
    if (isEngineError(err)) {
      console.error(`[solve-puzzle] ${err.code}: ${err.message}`);
    } else {
      console.error('[solve-puzzle] Fatal error:', err);
    }
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main();
}
