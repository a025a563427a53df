// src/cli/commands/extractors.ts
import { Command } from 'commander';
import { registry } from '../../core/extract/registry.js';

export function registerExtractorsCommand(program: Command): void {
  program
    .command('extractors')
    .description('List available extractors, in detection order')
    .action(() => {
      for (const name of registry.names()) {
        console.log(name);
      }
    });
}
