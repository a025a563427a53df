#!/usr/bin/env node

import { Command } from 'commander';
import { registerFetchCommand } from './commands/fetch.js';
import { registerExtractorsCommand } from './commands/extractors.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('docfetch')
    .description('Crawl a documentation site into a single Markdown file')
    .version('0.1.0');

  registerFetchCommand(program);
  registerExtractorsCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  void runCli();
}
