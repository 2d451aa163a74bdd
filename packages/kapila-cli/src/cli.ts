#!/usr/bin/env node
/**
 * Kapila CLI - run a JSON instruction program on the stack machine
 */

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_STACK_CAPACITY, isRuntimeFault, listPrimitives, wordsFor } from 'kapila-core';
import { ProgramError, loadProgram, runProgram } from './program.js';

interface CliOptions {
  stackSize: number;
  allocationLimit?: number;
  strict: boolean;
  warn: boolean;
  showStack: boolean;
  list: boolean;
}

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function printPrimitiveTable(): void {
  for (const primitive of listPrimitives()) {
    const words = wordsFor(primitive.name);
    const aliases = words.length > 0 ? `  ${words.join(' ')}` : '';
    console.log(`${primitive.category.padEnd(10)} ${primitive.name.padEnd(14)} ${primitive.arity}${aliases}`);
  }
}

const program = new Command();

program
  .name('kapila-run')
  .description('Run a JSON instruction program on the Kapila stack machine')
  .version('0.1.0')
  .option('-s, --stack-size <n>', 'Operand stack capacity', parseCount, DEFAULT_STACK_CAPACITY)
  .option('-a, --allocation-limit <n>', 'Maximum number of live allocations', parseCount)
  .option('--strict', 'Fault on bad operands instead of pushing defaults', false)
  .option('-w, --warn', 'Report operations that fell back to a default', false)
  .option('--show-stack', 'Print the values left on the stack', false)
  .option('-l, --list', 'List the primitive operations and exit', false)
  .argument('[program]', 'Program file (JSON array of steps)')
  .action((programFile: string | undefined, options: CliOptions) => {
    if (options.list) {
      printPrimitiveTable();
      return;
    }

    if (!programFile || programFile.trim() === '') {
      console.error('Error: Program file is required');
      process.exit(1);
    }

    const programPath = path.resolve(programFile);
    if (!fs.existsSync(programPath)) {
      console.error(`Error: Program file not found: ${programFile}`);
      process.exit(1);
    }

    try {
      const steps = loadProgram(programPath);
      const report = runProgram(steps, {
        stackCapacity: options.stackSize,
        allocationLimit: options.allocationLimit,
        operandPolicy: options.strict ? 'strict' : 'lenient',
        onDefault: options.warn
          ? (operation, reason) => console.error(`Warning: ${operation}: ${reason}`)
          : undefined,
      });

      if (options.showStack) {
        console.log(`Stack: [${report.remaining.join(' ')}]`);
      }
      if (process.env.DEBUG) {
        console.error(`Released ${report.released} buffers`);
      }
    } catch (error) {
      if (error instanceof ProgramError) {
        console.error('Error:', error.message);
      } else if (isRuntimeFault(error)) {
        console.error(`Fault (${error.kind}):`, error.message);
      } else if (error instanceof Error) {
        console.error('Error:', error.message);
      } else {
        console.error('Error:', String(error));
      }
      if (process.env.DEBUG && error instanceof Error) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

program.parse();
