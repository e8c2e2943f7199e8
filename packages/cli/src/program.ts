import { Command } from 'commander';
import { version } from '../package.json';
import { registerCheckCommand } from './commands/check';

export const name = '@typecensus/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('typecensus')
    .description('Type-hint status of packages on the package index')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerCheckCommand(program);

  return program;
}
