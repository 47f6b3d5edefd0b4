#!/usr/bin/env node
import { Command } from 'commander';
import { registerAnalyzeCommand } from './analyze.js';
import { registerServeCommand } from './serve.js';

const program = new Command();

program
    .name('codescope')
    .description('Single-file code health analyzer: complexity, loop nesting, dead code and call dependencies.')
    .version('0.1.0');

registerAnalyzeCommand(program);
registerServeCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
